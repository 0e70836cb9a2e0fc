import { CompletionError, classifyHttpStatus, toErrorMessage } from "./errors.js";
import type { ChatMessage, UsageReport } from "./types.js";
import { asArray, asNumber, asRecord, asString } from "./utils.js";

export interface LlmConfig {
  baseUrl: string;
  model: string;
  apiKey: string;
  temperature: number;
  /** Seconds before an in-flight request is abandoned. */
  timeout: number;
  jsonMode: boolean;
  reasoning: boolean;
}

export interface ChatCompletionRequest {
  messages: ChatMessage[];
  maxTokens: number;
}

export interface ChatCompletionResult {
  text: string;
  usage: UsageReport;
}

export interface RequestOptions {
  signal?: AbortSignal;
  requestTag?: string;
}

/** The remote endpoint as the completion driver sees it. */
export interface ChatTransport {
  complete(request: ChatCompletionRequest, options?: RequestOptions): Promise<ChatCompletionResult>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export const DEFAULT_BASE_URL = "https://api.deepseek.com";

function trimBaseUrl(value: string): string {
  return value.trim().replace(/\/+$/g, "");
}

export function chatCompletionsUrl(baseUrl: string): string {
  const trimmed = trimBaseUrl(baseUrl || DEFAULT_BASE_URL);
  return /\/(v1|api\/v1)$/.test(trimmed)
    ? `${trimmed}/chat/completions`
    : `${trimmed}/v1/chat/completions`;
}

function truncateBody(text: string, max = 800): string {
  if (text.length <= max) {
    return text;
  }
  return `${text.slice(0, max)}...`;
}

export function emptyUsageReport(): UsageReport {
  return {
    promptTokens: 0,
    cachedPromptTokens: 0,
    cacheMissTokens: 0,
    completionTokens: 0,
    reasoningTokens: 0,
    contentTokens: 0,
    totalTokens: 0,
    finishReason: "unknown",
  };
}

/**
 * Reads both the prompt-cache counters some providers put at the top level
 * (`prompt_cache_hit_tokens`) and the nested OpenAI form
 * (`prompt_tokens_details.cached_tokens`).
 */
export function parseUsage(payload: unknown, finishReason = "unknown"): UsageReport {
  const usage = asRecord(asRecord(payload)?.usage);
  if (!usage) {
    return { ...emptyUsageReport(), finishReason };
  }
  const promptTokens = asNumber(usage.prompt_tokens) ?? 0;
  const completionTokens = asNumber(usage.completion_tokens) ?? 0;
  const promptDetails = asRecord(usage.prompt_tokens_details);
  const completionDetails = asRecord(usage.completion_tokens_details);
  const cachedPromptTokens =
    asNumber(usage.prompt_cache_hit_tokens) ?? asNumber(promptDetails?.cached_tokens) ?? 0;
  const cacheMissTokens =
    asNumber(usage.prompt_cache_miss_tokens) ?? Math.max(0, promptTokens - cachedPromptTokens);
  const reasoningTokens = asNumber(completionDetails?.reasoning_tokens) ?? 0;

  return {
    promptTokens,
    cachedPromptTokens,
    cacheMissTokens,
    completionTokens,
    reasoningTokens,
    contentTokens: Math.max(0, completionTokens - reasoningTokens),
    totalTokens: asNumber(usage.total_tokens) ?? promptTokens + completionTokens,
    finishReason,
  };
}

interface ParsedChoice {
  text: string;
  finishReason: string;
}

function extractFirstChoice(payload: unknown): ParsedChoice | null {
  const root = asRecord(payload);
  const first = asRecord(asArray(root?.choices)[0]);
  if (!first) {
    return null;
  }
  const message = asRecord(first.message);
  return {
    text: asString(message?.content) ?? "",
    finishReason: asString(first.finish_reason) ?? "unknown",
  };
}

export class OpenAiCompatibleTransport implements ChatTransport {
  private readonly url: string;

  constructor(
    private readonly config: LlmConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.url = chatCompletionsUrl(config.baseUrl);
  }

  buildPayload(request: ChatCompletionRequest): Record<string, unknown> {
    const payload: Record<string, unknown> = {
      model: this.config.model,
      messages: request.messages,
      temperature: this.config.temperature,
      max_tokens: request.maxTokens,
      stream: false,
    };
    if (this.config.reasoning) {
      payload.thinking = { type: "enabled" };
    }
    if (this.config.jsonMode) {
      payload.response_format = { type: "json_object" };
    }
    return payload;
  }

  async complete(
    request: ChatCompletionRequest,
    options: RequestOptions = {},
  ): Promise<ChatCompletionResult> {
    const body = JSON.stringify(this.buildPayload(request));
    const data = await this.fetchJson(body, options);

    const choice = extractFirstChoice(data);
    if (!choice) {
      throw new CompletionError(
        "server-error",
        `Response carried no choices | response=${truncateBody(JSON.stringify(data))}`,
      );
    }

    const usage = parseUsage(data, choice.finishReason);
    if (
      choice.finishReason === "length" &&
      this.config.reasoning &&
      usage.reasoningTokens > 0 &&
      usage.contentTokens === 0
    ) {
      throw new CompletionError(
        "empty-completion",
        `Reasoning consumed the whole output budget (reasoning=${usage.reasoningTokens}, max_tokens=${request.maxTokens})`,
      );
    }
    if (choice.text.trim().length === 0) {
      throw new CompletionError(
        "empty-completion",
        `Response content was empty (finish_reason=${choice.finishReason}, reasoning=${usage.reasoningTokens})`,
      );
    }

    return { text: choice.text, usage };
  }

  private async fetchJson(body: string, options: RequestOptions): Promise<unknown> {
    const controller = new AbortController();
    const timeoutSeconds = this.config.timeout;
    const timeoutMs = Math.max(1, timeoutSeconds) * 1000;
    let timeoutTriggered = false;
    const timer = globalThis.setTimeout(() => {
      timeoutTriggered = true;
      controller.abort();
    }, timeoutMs);
    const upstreamSignal = options.signal;
    const handleUpstreamAbort = (): void => {
      controller.abort();
    };

    if (upstreamSignal) {
      if (upstreamSignal.aborted) {
        controller.abort();
      } else {
        upstreamSignal.addEventListener("abort", handleUpstreamAbort, { once: true });
      }
    }

    const tag = options.requestTag ? ` [${options.requestTag}]` : "";

    try {
      let response: Response;
      try {
        response = await this.fetchImpl(this.url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body,
          signal: controller.signal,
        });
      } catch (error) {
        if (upstreamSignal?.aborted) {
          const abortError = new Error(`Request aborted by upstream signal${tag} | url=${this.url}`);
          abortError.name = "AbortError";
          throw abortError;
        }
        if (timeoutTriggered) {
          throw new CompletionError(
            "transient-network",
            `Request timed out after ${timeoutSeconds}s${tag} | url=${this.url} | payload_bytes=${Buffer.byteLength(body, "utf8")}`,
            { cause: error },
          );
        }
        throw new CompletionError(
          "transient-network",
          `Request failed${tag}: ${toErrorMessage(error)} | url=${this.url}`,
          { cause: error },
        );
      }

      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw new CompletionError(
          "transient-network",
          `Response body was cut off${tag}: ${toErrorMessage(error)}`,
          { status: response.status, cause: error },
        );
      }

      if (!response.ok) {
        throw new CompletionError(
          classifyHttpStatus(response.status),
          `HTTP ${response.status} ${response.statusText}${tag} | response=${truncateBody(text)}`,
          { status: response.status },
        );
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        throw new CompletionError(
          "server-error",
          `Invalid JSON response${tag} (${text.length} chars) | response=${truncateBody(text, 500)}`,
          { status: response.status, cause: error },
        );
      }
    } finally {
      globalThis.clearTimeout(timer);
      if (upstreamSignal) {
        upstreamSignal.removeEventListener("abort", handleUpstreamAbort);
      }
    }
  }
}
