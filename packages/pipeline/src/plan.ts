import { readFile } from "node:fs/promises";
import { ConfigurationError, toErrorMessage } from "./errors.js";
import type { GenerationPlan, GenerationTask, TaskFilter } from "./types.js";
import { normalizeNewlines } from "./utils.js";

type PlanSection = keyof GenerationPlan;

function sectionForHeader(header: string): PlanSection | "stop" | null {
  const lower = header.toLowerCase();
  if (lower.includes("instruction")) {
    return "stop";
  }
  if (lower.includes("domain")) {
    return "domains";
  }
  if (lower.includes("ambiguity") || lower.includes("type")) {
    return "types";
  }
  if (lower.includes("round")) {
    return "rounds";
  }
  return null;
}

/**
 * Reads the three `##` sections of a generation plan. Lines are kept verbatim;
 * they are quoted as-is in the generation instruction.
 */
export function parseGenerationPlan(text: string): GenerationPlan {
  const plan: GenerationPlan = { domains: [], types: [], rounds: [] };
  let current: PlanSection | null = null;

  for (const line of normalizeNewlines(text).split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    if (trimmed.startsWith("##")) {
      const section = sectionForHeader(trimmed.replace(/^#+/, ""));
      if (section === "stop") {
        break;
      }
      current = section;
      continue;
    }
    if (current) {
      plan[current].push(trimmed);
    }
  }

  if (plan.domains.length === 0) {
    throw new ConfigurationError("Generation plan lists no domains");
  }
  if (plan.types.length === 0) {
    throw new ConfigurationError("Generation plan lists no ambiguity types");
  }
  if (plan.rounds.length === 0) {
    throw new ConfigurationError("Generation plan lists no round counts");
  }
  return plan;
}

/** `Beauty & Hairdressing (Beauty_Hairdressing)` gives `Beauty_Hairdressing`. */
export function extractDomainCode(line: string): string {
  const match = /[(\uff08]([^()\uff08\uff09]*)[)\uff09][^()\uff08\uff09]*$/.exec(line);
  return match?.[1]?.trim() ?? "";
}

/** `condition_missing (Missing conditions)` gives `condition_missing`. */
export function extractTypeCode(line: string): string {
  const cut = line.search(/[(\uff08]/);
  return (cut === -1 ? line : line.slice(0, cut)).trim();
}

export function extractRoundCount(line: string): number {
  const match = /^(\d+)/.exec(line.trim());
  return match?.[1] ? Number.parseInt(match[1], 10) : 0;
}

function matchesFilter(values: readonly string[] | undefined, value: string): boolean {
  return !values || values.length === 0 || values.includes(value);
}

/** Every domain × type × rounds combination, in plan order. */
export function expandTasks(plan: GenerationPlan, filter: TaskFilter = {}): GenerationTask[] {
  const tasks: GenerationTask[] = [];

  for (const domainLine of plan.domains) {
    const domainCode = extractDomainCode(domainLine);
    if (!domainCode) {
      throw new ConfigurationError(`Cannot read a domain code from plan line: ${domainLine}`);
    }
    if (!matchesFilter(filter.domains, domainCode)) {
      continue;
    }
    for (const typeLine of plan.types) {
      const typeCode = extractTypeCode(typeLine);
      if (!typeCode) {
        throw new ConfigurationError(`Cannot read a type code from plan line: ${typeLine}`);
      }
      if (!matchesFilter(filter.types, typeCode)) {
        continue;
      }
      for (const roundLine of plan.rounds) {
        const rounds = extractRoundCount(roundLine);
        if (rounds <= 0) {
          throw new ConfigurationError(`Cannot read a round count from plan line: ${roundLine}`);
        }
        if (filter.rounds && filter.rounds.length > 0 && !filter.rounds.includes(rounds)) {
          continue;
        }
        tasks.push({ domainCode, typeCode, rounds, domainLine, typeLine, roundLine });
      }
    }
  }

  if (typeof filter.limit === "number" && filter.limit > 0) {
    return tasks.slice(0, filter.limit);
  }
  return tasks;
}

export async function readTextFile(filePath: string, what: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${what} at ${filePath}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}

export async function readGenerationPlan(filePath: string): Promise<GenerationPlan> {
  return parseGenerationPlan(await readTextFile(filePath, "generation plan"));
}

export async function readSystemPrompt(filePath: string): Promise<string> {
  const prompt = (await readTextFile(filePath, "system prompt")).trim();
  if (!prompt) {
    throw new ConfigurationError(`System prompt at ${filePath} is empty`);
  }
  return prompt;
}
