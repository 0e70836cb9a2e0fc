import assert from "node:assert/strict";
import test from "node:test";

import { createSession, estimateTokens } from "../src/generation/session.js";

test("estimateTokens weighs ideographs and other characters differently", () => {
  assert.equal(estimateTokens(""), 0);
  assert.equal(estimateTokens("abcdefgh"), 2);
  assert.equal(estimateTokens("\u4f60\u597d\u4e16"), 2);
  assert.equal(estimateTokens("\u4f60\u597dabcd"), 2);
});

test("appendExchange grows history and the running estimate", () => {
  const session = createSession("x".repeat(40), 110_000);
  assert.equal(session.estimatedTokens, 10);
  assert.equal(session.hasHistory, false);

  session.appendExchange("y".repeat(20), "z".repeat(80));

  assert.equal(session.messageCount, 3);
  assert.equal(session.estimatedTokens, 35);
  assert.equal(session.exchangeCount, 1);
  assert.equal(session.hasHistory, true);
  assert.deepEqual(
    session.snapshot().map((message) => message.role),
    ["system", "user", "assistant"],
  );
});

test("reset leaves only the system prompt and zeroes counters", () => {
  const session = createSession("first system prompt", 110_000);
  session.appendExchange("generate 10", "[...]");
  session.appendExchange("generate 2 more", "[...]");
  session.recordProduced(8);

  session.reset("second system prompt");

  assert.deepEqual(session.snapshot(), [{ role: "system", content: "second system prompt" }]);
  assert.equal(session.estimatedTokens, estimateTokens("second system prompt"));
  assert.equal(session.recordsProduced, 0);
  assert.equal(session.exchangeCount, 0);
  assert.equal(session.hasHistory, false);
  assert.equal(session.resetCount, 2);
  assert.equal(session.system, "second system prompt");
});

test("hasHeadroom compares history, next prompt and output against the ceiling", () => {
  const session = createSession("x".repeat(40), 100);

  assert.equal(session.hasHeadroom(89), true);
  assert.equal(session.hasHeadroom(90), false);
  assert.equal(session.hasHeadroom(87, "y".repeat(8)), true);
  assert.equal(session.hasHeadroom(88, "y".repeat(8)), false);
});

test("snapshot returns a copy", () => {
  const session = createSession("system", 1000);
  const messages = session.snapshot();
  messages.push({ role: "user", content: "extra" });

  assert.equal(session.messageCount, 1);
});
