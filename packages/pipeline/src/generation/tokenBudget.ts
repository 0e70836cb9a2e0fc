import type { GeneratorSettings } from "@clarify-corpus/shared";

export type BudgetSettings = Pick<
  GeneratorSettings,
  | "tokensPerRecordByRound"
  | "fallbackTokensPerRecord"
  | "maxBufferRatio"
  | "minBufferRatio"
  | "bufferTaperCount"
  | "reasoningBuffer"
  | "standardOutputCeiling"
  | "reasoningOutputCeiling"
>;

export interface BudgetRequest {
  rounds: number;
  recordsNeeded: number;
  reasoning: boolean;
}

export interface OutputBudget {
  /** Value to send as the request's output-token limit. */
  maxTokens: number;
  /** Buffered estimate for the records themselves. */
  contentTokens: number;
  reasoningReserve: boolean;
  reasoningTokens: number;
  bufferRatio: number;
  ceiling: number;
  clamped: boolean;
}

export function usesReasoning(model: string, forced?: boolean): boolean {
  if (typeof forced === "boolean") {
    return forced;
  }
  return model.toLowerCase().includes("reasoner");
}

export function tokensPerRecord(rounds: number, settings: BudgetSettings): number {
  return settings.tokensPerRecordByRound[String(rounds)] ?? settings.fallbackTokensPerRecord;
}

/**
 * Multiplier applied to the raw estimate. Starts at 1 + maxBufferRatio for a
 * single record and tapers linearly to 1 + minBufferRatio at bufferTaperCount.
 */
export function bufferRatioFor(recordsNeeded: number, settings: BudgetSettings): number {
  const taper = Math.max(1, settings.bufferTaperCount);
  const span = settings.maxBufferRatio - settings.minBufferRatio;
  const progress = Math.min(Math.max(recordsNeeded, 0), taper) / taper;
  return 1 + settings.maxBufferRatio - span * progress;
}

export function planOutputBudget(request: BudgetRequest, settings: BudgetSettings): OutputBudget {
  const needed = Math.max(0, Math.floor(request.recordsNeeded));
  const bufferRatio = bufferRatioFor(needed, settings);
  const contentTokens = Math.floor(tokensPerRecord(request.rounds, settings) * needed * bufferRatio);
  const reasoningTokens = request.reasoning ? settings.reasoningBuffer : 0;
  const ceiling = request.reasoning
    ? settings.reasoningOutputCeiling
    : settings.standardOutputCeiling;
  const requested = contentTokens + reasoningTokens;

  return {
    maxTokens: Math.min(requested, ceiling),
    contentTokens,
    reasoningReserve: request.reasoning,
    reasoningTokens,
    bufferRatio,
    ceiling,
    clamped: requested > ceiling,
  };
}
