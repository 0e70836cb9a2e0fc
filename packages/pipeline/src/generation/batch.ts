import { errorToLogLine, isAbortError, toErrorMessage } from "../errors.js";
import type { GenerationTask, RejectionTally, UsageTotals } from "../types.js";
import { emptyRejectionTally, mergeRejectionTally } from "../records/validate.js";
import { defaultSleep, runTask, taskLabel } from "./taskController.js";
import type { TaskDependencies, TaskRunResult } from "./taskController.js";
import { emptyUsageTotals, mergeUsageTotals } from "./usage.js";

export interface BatchDependencies extends TaskDependencies {
  onTaskFinished?: (result: TaskRunResult, index: number, total: number) => void;
}

export interface BatchSummary {
  total: number;
  complete: number;
  failed: number;
  /** Tasks that threw something other than a completion failure. */
  errored: number;
  skipped: number;
  exchanges: number;
  usage: UsageTotals;
  rejected: RejectionTally;
  results: TaskRunResult[];
}

/**
 * Runs tasks one after another. A task that throws is logged and recorded as
 * incomplete; only an abort stops the batch.
 */
export async function runBatch(
  tasks: readonly GenerationTask[],
  deps: BatchDependencies,
): Promise<BatchSummary> {
  const { logger, settings } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const now = deps.now ?? (() => new Date());
  const summary: BatchSummary = {
    total: tasks.length,
    complete: 0,
    failed: 0,
    errored: 0,
    skipped: 0,
    exchanges: 0,
    usage: emptyUsageTotals(),
    rejected: emptyRejectionTally(),
    results: [],
  };

  for (const [index, task] of tasks.entries()) {
    logger.info(`task ${index + 1}/${tasks.length}`, { task: taskLabel(task) });

    let result: TaskRunResult;
    try {
      result = await runTask(task, deps);
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      summary.errored += 1;
      logger.error("task crashed", { task: taskLabel(task), error: errorToLogLine(error) });
      let count = 0;
      try {
        count = await deps.store.readCount(task);
      } catch (readError) {
        logger.warn("task count unreadable", {
          task: taskLabel(task),
          error: toErrorMessage(readError),
        });
      }
      await deps.incompleteLog.append({
        task,
        count,
        target: settings.targetPerTask,
        reason: `unexpected error: ${toErrorMessage(error)}`,
        at: now(),
      });
      continue;
    }

    summary.results.push(result);
    summary.exchanges += result.exchanges;
    summary.usage = mergeUsageTotals(summary.usage, result.usage);
    summary.rejected = mergeRejectionTally(summary.rejected, result.rejected);
    if (result.status === "complete") {
      summary.complete += 1;
      if (result.exchanges === 0) {
        summary.skipped += 1;
      }
    } else if (result.status === "failed") {
      summary.failed += 1;
    }
    deps.onTaskFinished?.(result, index, tasks.length);

    const isLast = index === tasks.length - 1;
    if (!isLast && result.exchanges > 0) {
      await sleep(settings.interTaskDelayMs, deps.signal);
    }
  }

  logger.info("batch finished", {
    total: summary.total,
    complete: summary.complete,
    failed: summary.failed,
    errored: summary.errored,
    skipped: summary.skipped,
    exchanges: summary.exchanges,
    prompt: summary.usage.promptTokens,
    cacheHit: summary.usage.cachedPromptTokens,
    completion: summary.usage.completionTokens,
  });
  return summary;
}
