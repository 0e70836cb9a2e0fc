import type { RejectReason } from "@clarify-corpus/shared";

export type JsonRecord = Record<string, unknown>;

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface TaskIdentity {
  domainCode: string;
  typeCode: string;
  rounds: number;
}

/** A task as expanded from the plan; the lines are quoted verbatim in instructions. */
export interface GenerationTask extends TaskIdentity {
  domainLine: string;
  typeLine: string;
  roundLine: string;
}

export type TaskStatus = "incomplete" | "complete" | "failed";

export interface UsageReport {
  promptTokens: number;
  cachedPromptTokens: number;
  cacheMissTokens: number;
  completionTokens: number;
  reasoningTokens: number;
  contentTokens: number;
  totalTokens: number;
  finishReason: string;
}

export interface UsageTotals {
  exchanges: number;
  promptTokens: number;
  cachedPromptTokens: number;
  cacheMissTokens: number;
  completionTokens: number;
  reasoningTokens: number;
}

export type RejectionTally = Record<RejectReason, number>;

export interface ExtractionResult {
  records: JsonRecord[];
  truncated: boolean;
}

export interface GenerationPlan {
  domains: string[];
  types: string[];
  rounds: string[];
}

export interface TaskFilter {
  domains?: string[];
  types?: string[];
  rounds?: number[];
  limit?: number;
}
