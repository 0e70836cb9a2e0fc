import type { ChatMessage } from "../types.js";

const CJK_PATTERN = /[\u4e00-\u9fff]/g;

/**
 * Rough token count: about 1.5 CJK ideographs or 4 other characters per token.
 */
export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }
  const cjk = text.match(CJK_PATTERN)?.length ?? 0;
  const other = text.length - cjk;
  return Math.floor(cjk / 1.5 + other / 4);
}

/**
 * Message history for one task's conversation with the endpoint. Owned by a
 * single task run and never shared; the endpoint caches on the literal prefix,
 * so a reset keeps cache credit for the system prompt only.
 */
export class GenerationSession {
  private messages: ChatMessage[] = [];
  private runningTokens = 0;
  private produced = 0;
  private exchanges = 0;
  private resets = 0;
  private systemPrompt = "";

  constructor(private readonly contextCeiling: number) {}

  reset(systemPrompt: string): void {
    this.systemPrompt = systemPrompt;
    this.messages = [{ role: "system", content: systemPrompt }];
    this.runningTokens = estimateTokens(systemPrompt);
    this.produced = 0;
    this.exchanges = 0;
    this.resets += 1;
  }

  appendExchange(instruction: string, response: string): void {
    this.messages.push({ role: "user", content: instruction });
    this.messages.push({ role: "assistant", content: response });
    this.runningTokens += estimateTokens(instruction) + estimateTokens(response);
    this.exchanges += 1;
  }

  hasHeadroom(nextOutputTokens: number, prospectivePrompt = ""): boolean {
    const expected = this.runningTokens + estimateTokens(prospectivePrompt) + nextOutputTokens;
    return expected < this.contextCeiling;
  }

  recordProduced(count: number): void {
    this.produced += Math.max(0, count);
  }

  snapshot(): ChatMessage[] {
    return this.messages.map((message) => ({ ...message }));
  }

  get system(): string {
    return this.systemPrompt;
  }

  get messageCount(): number {
    return this.messages.length;
  }

  get estimatedTokens(): number {
    return this.runningTokens;
  }

  get recordsProduced(): number {
    return this.produced;
  }

  get exchangeCount(): number {
    return this.exchanges;
  }

  /** Number of times this session was (re)started, including the first. */
  get resetCount(): number {
    return this.resets;
  }

  get hasHistory(): boolean {
    return this.exchanges > 0;
  }
}

export function createSession(systemPrompt: string, contextCeiling: number): GenerationSession {
  const session = new GenerationSession(contextCeiling);
  session.reset(systemPrompt);
  return session;
}
