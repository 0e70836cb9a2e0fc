import { z } from "zod";
import { DEFAULT_SUMMARY_SENTINEL } from "./records.js";

/** Average generated tokens per record, keyed by round count. */
export const DEFAULT_TOKENS_PER_RECORD_BY_ROUND: Record<string, number> = {
  "1": 365,
  "2": 344,
  "3": 354,
  "4": 481,
  "5": 425,
};

export const instructionTemplatesSchema = z
  .object({
    generation: z.string().min(1).optional(),
    backfill: z.string().min(1).optional(),
  })
  .strict();
export type InstructionTemplateOverrides = z.infer<typeof instructionTemplatesSchema>;

export const generatorSettingsSchema = z
  .object({
    targetPerTask: z.number().int().positive().default(50),
    maxRetries: z.number().int().min(1).default(3),
    retryDelayMs: z.number().int().min(0).default(2000),
    interTaskDelayMs: z.number().int().min(0).default(5000),
    contextCeiling: z.number().int().positive().default(110_000),
    standardOutputCeiling: z.number().int().positive().default(8000),
    reasoningOutputCeiling: z.number().int().positive().default(64_000),
    reasoningBuffer: z.number().int().min(0).default(5000),
    maxBufferRatio: z.number().min(0).max(2).default(0.5),
    minBufferRatio: z.number().min(0).max(2).default(0.3),
    bufferTaperCount: z.number().int().positive().default(50),
    tokensPerRecordByRound: z
      .record(z.string().regex(/^\d+$/, "round keys must be integers"), z.number().int().positive())
      .default(DEFAULT_TOKENS_PER_RECORD_BY_ROUND),
    fallbackTokensPerRecord: z.number().int().positive().default(1000),
    summarySentinel: z.string().min(1).default(DEFAULT_SUMMARY_SENTINEL),
    jsonMode: z.boolean().default(true),
    reasoning: z.boolean().optional(),
    instructionTemplates: instructionTemplatesSchema.default({}),
  })
  .strict()
  .refine((value) => value.minBufferRatio <= value.maxBufferRatio, {
    message: "minBufferRatio must not exceed maxBufferRatio",
    path: ["minBufferRatio"],
  });

export type GeneratorSettings = z.infer<typeof generatorSettingsSchema>;
export type GeneratorSettingsInput = z.input<typeof generatorSettingsSchema>;

export function parseGeneratorSettings(payload: unknown): GeneratorSettings {
  return generatorSettingsSchema.parse(payload);
}

export function defaultGeneratorSettings(): GeneratorSettings {
  return generatorSettingsSchema.parse({});
}
