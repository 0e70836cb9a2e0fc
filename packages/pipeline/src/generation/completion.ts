import type { ChatCompletionResult, ChatTransport } from "../llm.js";
import type { GenerationSession } from "./session.js";

export interface ExchangeOptions {
  maxTokens: number;
  signal?: AbortSignal;
  requestTag?: string;
}

/**
 * Sends the session history plus one instruction. The session only grows when
 * the transport returns a usable reply; a thrown CompletionError leaves it as
 * it was so the next attempt resends the same prefix.
 */
export class CompletionDriver {
  constructor(private readonly transport: ChatTransport) {}

  async exchange(
    session: GenerationSession,
    instruction: string,
    options: ExchangeOptions,
  ): Promise<ChatCompletionResult> {
    const messages = [...session.snapshot(), { role: "user" as const, content: instruction }];
    const result = await this.transport.complete(
      { messages, maxTokens: options.maxTokens },
      { signal: options.signal, requestTag: options.requestTag },
    );
    session.appendExchange(instruction, result.text);
    return result;
  }
}
