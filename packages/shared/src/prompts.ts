import type { InstructionTemplateOverrides } from "./settings.js";

export interface InstructionTemplates {
  generation: string;
  backfill: string;
}

const GENERATION_INSTRUCTION_TEMPLATE = `Generate {count} records with these requirements:
1. Domain: {domain}
2. Ambiguity type: {ambiguity_type}
3. Dialogue rounds: {rounds}
4. Format: output one valid JSON array. Every record uses the ShareGPT layout with a "system" field and a "conversations" field; each turn is {"from": "human" | "gpt", "value": "..."}.
5. Every record is a complete dialogue whose final gpt turn starts with {summary_marker}.
6. While information is missing the assistant must ask a follow-up question; once the request is complete it must summarize.`;

const BACKFILL_INSTRUCTION_TEMPLATE = `{generated} records have been generated so far. Generate the remaining {remaining} records with the same requirements and the same JSON format.`;

export const defaultInstructionTemplates: InstructionTemplates = {
  generation: GENERATION_INSTRUCTION_TEMPLATE,
  backfill: BACKFILL_INSTRUCTION_TEMPLATE,
};

function pickTemplate(value: string | undefined): string | undefined {
  if (typeof value === "string" && value.trim().length > 0) {
    return value;
  }
  return undefined;
}

export function resolveInstructionTemplates(
  overrides: InstructionTemplateOverrides | undefined,
): InstructionTemplates {
  return {
    generation:
      pickTemplate(overrides?.generation) ?? defaultInstructionTemplates.generation,
    backfill: pickTemplate(overrides?.backfill) ?? defaultInstructionTemplates.backfill,
  };
}

export function fillPromptTemplate(template: string, values: Record<string, unknown>): string {
  let text = template;
  for (const [key, rawValue] of Object.entries(values)) {
    const value = String(rawValue ?? "");
    text = text.replaceAll(`{${key}}`, value);
  }
  return text;
}

export interface GenerationInstructionInput {
  domainLine: string;
  typeLine: string;
  roundLine: string;
  count: number;
  summaryMarker: string;
}

export function buildGenerationInstruction(
  input: GenerationInstructionInput,
  templates: InstructionTemplates = defaultInstructionTemplates,
): string {
  return fillPromptTemplate(templates.generation, {
    count: input.count,
    domain: input.domainLine,
    ambiguity_type: input.typeLine,
    rounds: input.roundLine,
    summary_marker: input.summaryMarker,
  });
}

export function buildBackfillInstruction(
  input: { generated: number; remaining: number },
  templates: InstructionTemplates = defaultInstructionTemplates,
): string {
  return fillPromptTemplate(templates.backfill, {
    generated: input.generated,
    remaining: input.remaining,
  });
}
