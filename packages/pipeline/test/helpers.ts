import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_SUMMARY_SENTINEL, parseGeneratorSettings } from "@clarify-corpus/shared";
import type { DialogueRecord, GeneratorSettings, GeneratorSettingsInput } from "@clarify-corpus/shared";
import type { ChatCompletionRequest, ChatCompletionResult, ChatTransport } from "../src/llm.js";
import type { IncompleteTaskEntry, IncompleteTaskLog, TaskStore } from "../src/storage/taskStore.js";
import type { GenerationTask, JsonRecord, TaskIdentity, UsageReport } from "../src/types.js";

export function makeRecord(rounds: number, index = 1, sentinel = DEFAULT_SUMMARY_SENTINEL): DialogueRecord {
  const conversations: DialogueRecord["conversations"] = [];
  for (let round = 1; round <= rounds; round += 1) {
    conversations.push({ from: "human", value: `question ${round} of record ${index}` });
    conversations.push({
      from: "gpt",
      value: round < rounds ? `follow-up ${round} of record ${index}` : `${sentinel} record ${index} summary`,
    });
  }
  return { system: "You are a careful assistant.", conversations };
}

export function makeRecords(count: number, rounds: number, startIndex = 1): DialogueRecord[] {
  return Array.from({ length: count }, (_, offset) => makeRecord(rounds, startIndex + offset));
}

export function makeTask(overrides: Partial<GenerationTask> = {}): GenerationTask {
  return {
    domainCode: "Beauty_Hairdressing",
    typeCode: "condition_missing",
    rounds: 3,
    domainLine: "Beauty & Hairdressing (Beauty_Hairdressing)",
    typeLine: "condition_missing (Missing conditions)",
    roundLine: "3 rounds: the assistant asks two clarifying questions, then summarizes",
    ...overrides,
  };
}

export function testSettings(overrides: GeneratorSettingsInput = {}): GeneratorSettings {
  return parseGeneratorSettings({ retryDelayMs: 0, interTaskDelayMs: 0, ...overrides });
}

export function usage(overrides: Partial<UsageReport> = {}): UsageReport {
  return {
    promptTokens: 100,
    cachedPromptTokens: 60,
    cacheMissTokens: 40,
    completionTokens: 500,
    reasoningTokens: 0,
    contentTokens: 500,
    totalTokens: 600,
    finishReason: "stop",
    ...overrides,
  };
}

export function reply(text: string): ChatCompletionResult {
  return { text, usage: usage() };
}

/** Plays back replies (or throws errors) in order and records each request. */
export class ScriptedTransport implements ChatTransport {
  readonly calls: ChatCompletionRequest[] = [];

  constructor(private readonly steps: Array<ChatCompletionResult | Error>) {}

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    this.calls.push({ ...request, messages: request.messages.map((message) => ({ ...message })) });
    const step = this.steps.shift();
    if (!step) {
      throw new Error("no scripted reply left");
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

function keyOf(task: TaskIdentity): string {
  return `${task.domainCode}/${task.typeCode}/${task.rounds}`;
}

export class MemoryTaskStore implements TaskStore {
  readonly files = new Map<string, JsonRecord[]>();
  readonly debug: Array<{ key: string; raw: string; reason: string }> = [];

  constructor(private readonly failAppendFor: string | null = null) {}

  seed(task: TaskIdentity, records: readonly JsonRecord[]): void {
    this.files.set(keyOf(task), [...records]);
  }

  async readRecords(task: TaskIdentity): Promise<JsonRecord[]> {
    return [...(this.files.get(keyOf(task)) ?? [])];
  }

  async readCount(task: TaskIdentity): Promise<number> {
    return this.files.get(keyOf(task))?.length ?? 0;
  }

  async appendRecords(task: TaskIdentity, records: readonly JsonRecord[]): Promise<number> {
    if (this.failAppendFor === task.domainCode) {
      throw new Error("disk full");
    }
    const merged = [...(this.files.get(keyOf(task)) ?? []), ...records];
    this.files.set(keyOf(task), merged);
    return merged.length;
  }

  async appendDebug(task: TaskIdentity, raw: string, reason: string): Promise<void> {
    this.debug.push({ key: keyOf(task), raw, reason });
  }
}

export class MemoryIncompleteLog implements IncompleteTaskLog {
  readonly entries: IncompleteTaskEntry[] = [];

  async append(entry: IncompleteTaskEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export function recordingSleep(): { calls: number[]; sleep: (ms: number) => Promise<void> } {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms: number) => {
      calls.push(ms);
    },
  };
}

export async function withTempDir<T>(prefix: string, run: (dir: string) => Promise<T>): Promise<T> {
  const tempDir = await mkdtemp(path.join(os.tmpdir(), prefix));
  try {
    return await run(tempDir);
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
}
