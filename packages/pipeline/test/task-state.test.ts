import assert from "node:assert/strict";
import test from "node:test";

import { isTerminalState, statusForState, transition } from "../src/generation/taskState.js";

test("task state moves through generating and backfilling to complete", () => {
  let state = transition("NOT_STARTED", { type: "EXCHANGE_STARTED" });
  assert.equal(state, "GENERATING");
  state = transition(state, { type: "RECORDS_PERSISTED", reachedTarget: false });
  assert.equal(state, "BACKFILLING");
  state = transition(state, { type: "EXCHANGE_STARTED" });
  assert.equal(state, "BACKFILLING");
  state = transition(state, { type: "RECORDS_PERSISTED", reachedTarget: true });
  assert.equal(state, "COMPLETE");
});

test("an already complete task never starts", () => {
  assert.equal(transition("NOT_STARTED", { type: "ALREADY_COMPLETE" }), "COMPLETE");
});

test("failures only end the task once retries are exhausted", () => {
  assert.equal(
    transition("GENERATING", { type: "EXCHANGE_FAILED", retriesExhausted: false }),
    "GENERATING",
  );
  assert.equal(
    transition("BACKFILLING", { type: "EXCHANGE_FAILED", retriesExhausted: false }),
    "BACKFILLING",
  );
  assert.equal(
    transition("BACKFILLING", { type: "EXCHANGE_FAILED", retriesExhausted: true }),
    "FAILED",
  );
});

test("terminal states are sticky", () => {
  assert.equal(transition("FAILED", { type: "EXCHANGE_STARTED" }), "FAILED");
  assert.equal(transition("COMPLETE", { type: "RECORDS_PERSISTED", reachedTarget: false }), "COMPLETE");
  assert.equal(isTerminalState("FAILED"), true);
  assert.equal(isTerminalState("BACKFILLING"), false);
});

test("statusForState maps states onto task status", () => {
  assert.equal(statusForState("COMPLETE"), "complete");
  assert.equal(statusForState("FAILED"), "failed");
  assert.equal(statusForState("GENERATING"), "incomplete");
  assert.equal(statusForState("NOT_STARTED"), "incomplete");
});
