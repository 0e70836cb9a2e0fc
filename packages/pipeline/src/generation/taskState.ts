import type { TaskStatus } from "../types.js";

export type TaskState = "NOT_STARTED" | "GENERATING" | "BACKFILLING" | "COMPLETE" | "FAILED";

export type TaskEvent =
  | { type: "ALREADY_COMPLETE" }
  | { type: "EXCHANGE_STARTED" }
  | { type: "RECORDS_PERSISTED"; reachedTarget: boolean }
  | { type: "EXCHANGE_FAILED"; retriesExhausted: boolean };

export function isTerminalState(state: TaskState): boolean {
  return state === "COMPLETE" || state === "FAILED";
}

export function transition(current: TaskState, event: TaskEvent): TaskState {
  switch (current) {
    case "NOT_STARTED":
      if (event.type === "ALREADY_COMPLETE") return "COMPLETE";
      if (event.type === "EXCHANGE_STARTED") return "GENERATING";
      break;
    case "GENERATING":
    case "BACKFILLING":
      if (event.type === "RECORDS_PERSISTED") {
        return event.reachedTarget ? "COMPLETE" : "BACKFILLING";
      }
      if (event.type === "EXCHANGE_FAILED" && event.retriesExhausted) return "FAILED";
      break;
    case "COMPLETE":
    case "FAILED":
      return current;
  }
  return current;
}

export function statusForState(state: TaskState): TaskStatus {
  if (state === "COMPLETE") {
    return "complete";
  }
  if (state === "FAILED") {
    return "failed";
  }
  return "incomplete";
}
