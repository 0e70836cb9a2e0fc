import type { UsageReport, UsageTotals } from "../types.js";
import { formatPercent } from "../utils.js";

export function emptyUsageTotals(): UsageTotals {
  return {
    exchanges: 0,
    promptTokens: 0,
    cachedPromptTokens: 0,
    cacheMissTokens: 0,
    completionTokens: 0,
    reasoningTokens: 0,
  };
}

export function addUsage(totals: UsageTotals, report: UsageReport): UsageTotals {
  return {
    exchanges: totals.exchanges + 1,
    promptTokens: totals.promptTokens + report.promptTokens,
    cachedPromptTokens: totals.cachedPromptTokens + report.cachedPromptTokens,
    cacheMissTokens: totals.cacheMissTokens + report.cacheMissTokens,
    completionTokens: totals.completionTokens + report.completionTokens,
    reasoningTokens: totals.reasoningTokens + report.reasoningTokens,
  };
}

export function mergeUsageTotals(left: UsageTotals, right: UsageTotals): UsageTotals {
  return {
    exchanges: left.exchanges + right.exchanges,
    promptTokens: left.promptTokens + right.promptTokens,
    cachedPromptTokens: left.cachedPromptTokens + right.cachedPromptTokens,
    cacheMissTokens: left.cacheMissTokens + right.cacheMissTokens,
    completionTokens: left.completionTokens + right.completionTokens,
    reasoningTokens: left.reasoningTokens + right.reasoningTokens,
  };
}

export function cacheHitRate(usage: Pick<UsageReport, "promptTokens" | "cachedPromptTokens">): string {
  return formatPercent(usage.cachedPromptTokens, usage.promptTokens);
}
