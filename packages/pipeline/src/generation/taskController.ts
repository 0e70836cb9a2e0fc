import { setTimeout as delay } from "node:timers/promises";
import {
  buildBackfillInstruction,
  buildGenerationInstruction,
  defaultInstructionTemplates,
} from "@clarify-corpus/shared";
import type { GeneratorSettings, InstructionTemplates } from "@clarify-corpus/shared";
import { CompletionError, isAbortError } from "../errors.js";
import type { Logger } from "../logger.js";
import { extractRecords } from "../records/extract.js";
import { countRejections, emptyRejectionTally, mergeRejectionTally, partitionRecords } from "../records/validate.js";
import type { IncompleteTaskLog, TaskStore } from "../storage/taskStore.js";
import type { GenerationTask, RejectionTally, TaskStatus, UsageTotals } from "../types.js";
import type { CompletionDriver } from "./completion.js";
import { createSession } from "./session.js";
import type { GenerationSession } from "./session.js";
import { isTerminalState, statusForState, transition } from "./taskState.js";
import type { TaskState } from "./taskState.js";
import { planOutputBudget } from "./tokenBudget.js";
import { addUsage, cacheHitRate, emptyUsageTotals } from "./usage.js";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface TaskDependencies {
  driver: CompletionDriver;
  store: TaskStore;
  incompleteLog: IncompleteTaskLog;
  logger: Logger;
  settings: GeneratorSettings;
  systemPrompt: string;
  reasoning: boolean;
  templates?: InstructionTemplates;
  signal?: AbortSignal;
  sleep?: SleepFn;
  now?: () => Date;
}

export interface TaskRunResult {
  task: GenerationTask;
  state: TaskState;
  status: TaskStatus;
  initialCount: number;
  finalCount: number;
  /** Requests sent, failed ones included. */
  exchanges: number;
  sessionResets: number;
  usage: UsageTotals;
  rejected: RejectionTally;
  failureReason?: string;
}

export const defaultSleep: SleepFn = async (ms, signal) => {
  if (ms <= 0) {
    return;
  }
  await delay(ms, undefined, { signal });
};

export function taskLabel(task: GenerationTask): string {
  return `${task.domainCode}/${task.typeCode}/${task.rounds}_round`;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    const error = new Error("Generation aborted");
    error.name = "AbortError";
    throw error;
  }
}

export async function runTask(task: GenerationTask, deps: TaskDependencies): Promise<TaskRunResult> {
  const { driver, store, incompleteLog, logger, settings, signal } = deps;
  const templates = deps.templates ?? defaultInstructionTemplates;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const target = settings.targetPerTask;
  const label = taskLabel(task);

  const initialCount = await store.readCount(task);
  let state: TaskState = "NOT_STARTED";
  let count = initialCount;
  let exchanges = 0;
  let retries = 0;
  let usage = emptyUsageTotals();
  let rejected = emptyRejectionTally();
  let failureReason: string | undefined;
  let session: GenerationSession | null = null;

  const finish = (): TaskRunResult => ({
    task,
    state,
    status: statusForState(state),
    initialCount,
    finalCount: count,
    exchanges,
    sessionResets: session ? Math.max(0, session.resetCount - 1) : 0,
    usage,
    rejected,
    failureReason,
  });

  if (initialCount >= target) {
    state = transition(state, { type: "ALREADY_COMPLETE" });
    logger.info("task already complete", { task: label, count: initialCount, target });
    return finish();
  }

  logger.info("task started", { task: label, count: initialCount, target });
  const activeSession = createSession(deps.systemPrompt, settings.contextCeiling);
  session = activeSession;

  const generationInstruction = (remaining: number): string =>
    buildGenerationInstruction(
      {
        domainLine: task.domainLine,
        typeLine: task.typeLine,
        roundLine: task.roundLine,
        count: remaining,
        summaryMarker: settings.summarySentinel,
      },
      templates,
    );

  while (!isTerminalState(state)) {
    throwIfAborted(signal);

    const remaining = target - count;
    const budget = planOutputBudget(
      { rounds: task.rounds, recordsNeeded: remaining, reasoning: deps.reasoning },
      settings,
    );

    let instruction = activeSession.hasHistory
      ? buildBackfillInstruction({ generated: count, remaining }, templates)
      : generationInstruction(remaining);
    if (activeSession.hasHistory && !activeSession.hasHeadroom(budget.maxTokens, instruction)) {
      logger.info("session reset", {
        task: label,
        estimatedTokens: activeSession.estimatedTokens,
        nextOutput: budget.maxTokens,
        ceiling: settings.contextCeiling,
      });
      activeSession.reset(deps.systemPrompt);
      instruction = generationInstruction(remaining);
    }

    state = transition(state, { type: "EXCHANGE_STARTED" });
    exchanges += 1;
    logger.info("requesting records", {
      task: label,
      state,
      requested: remaining,
      maxTokens: budget.maxTokens,
      clamped: budget.clamped,
      attempt: retries + 1,
    });

    let failure: string;
    try {
      const result = await driver.exchange(activeSession, instruction, {
        maxTokens: budget.maxTokens,
        signal,
        requestTag: label,
      });
      usage = addUsage(usage, result.usage);
      logger.info("exchange finished", {
        task: label,
        prompt: result.usage.promptTokens,
        cacheHit: result.usage.cachedPromptTokens,
        cacheMiss: result.usage.cacheMissTokens,
        hitRate: cacheHitRate(result.usage),
        completion: result.usage.completionTokens,
        reasoning: result.usage.reasoningTokens,
        content: result.usage.contentTokens,
        finish: result.usage.finishReason,
      });

      const extraction = extractRecords(result.text);
      const partition = partitionRecords(extraction.records, task.rounds, settings.summarySentinel);
      rejected = mergeRejectionTally(rejected, partition.rejected);
      if (countRejections(partition.rejected) > 0) {
        logger.warn("records rejected", {
          task: label,
          rejected: countRejections(partition.rejected),
          first: partition.errors[0],
        });
      }

      if (partition.accepted.length > 0) {
        await store.appendRecords(task, partition.accepted);
        activeSession.recordProduced(partition.accepted.length);
        count = await store.readCount(task);
        retries = 0;
        state = transition(state, { type: "RECORDS_PERSISTED", reachedTarget: count >= target });
        logger.info("records persisted", {
          task: label,
          accepted: partition.accepted.length,
          extracted: extraction.records.length,
          truncated: extraction.truncated,
          count,
          target,
        });
        continue;
      }

      failure = `no valid records in response (extracted=${extraction.records.length}, truncated=${extraction.truncated})`;
      await store.appendDebug(task, result.text, failure);
    } catch (error) {
      if (isAbortError(error) || !(error instanceof CompletionError)) {
        throw error;
      }
      failure = `${error.kind}: ${error.message}`;
    }

    retries += 1;
    const retriesExhausted = retries >= settings.maxRetries;
    state = transition(state, { type: "EXCHANGE_FAILED", retriesExhausted });
    if (retriesExhausted) {
      failureReason = failure;
      logger.error("task failed", { task: label, retries, count, target, reason: failure });
      await incompleteLog.append({ task, count, target, reason: failure, at: now() });
      break;
    }
    logger.warn("exchange failed, retrying", {
      task: label,
      retry: retries,
      maxRetries: settings.maxRetries,
      reason: failure,
    });
    await sleep(settings.retryDelayMs, signal);
  }

  logger.info("task finished", { task: label, state, count, target, exchanges });
  return finish();
}
