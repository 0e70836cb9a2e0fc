import assert from "node:assert/strict";
import test from "node:test";

import { DEFAULT_SUMMARY_SENTINEL } from "@clarify-corpus/shared";
import { partitionRecords, validateRecord } from "../src/records/validate.js";
import { makeRecord } from "./helpers.js";

const SENTINEL = DEFAULT_SUMMARY_SENTINEL;

function reasonOf(candidate: unknown, rounds: number): string {
  const result = validateRecord(candidate, rounds, SENTINEL);
  return result.ok ? "ok" : result.reason;
}

test("validateRecord accepts a well-formed record and keeps extra fields", () => {
  const candidate = { ...makeRecord(3), id: 7 };
  const result = validateRecord(candidate, 3, SENTINEL);

  assert.equal(result.ok, true);
  if (result.ok) {
    assert.equal(result.record.id, 7);
    assert.equal(result.record.conversations.length, 6);
  }
});

test("validateRecord reports round-count-mismatch for three rounds against five", () => {
  assert.equal(reasonOf(makeRecord(3), 5), "round-count-mismatch");
});

test("validateRecord reports a missing summary marker", () => {
  const record = makeRecord(2);
  const last = record.conversations[3];
  assert.ok(last);
  last.value = "Here is what you asked for.";

  assert.equal(reasonOf(record, 2), "missing-summary-marker");
});

test("validateRecord reports missing fields", () => {
  assert.equal(reasonOf({ conversations: [] }, 1), "missing-field");
  assert.equal(reasonOf({ system: "x" }, 1), "missing-field");
  assert.equal(reasonOf("not an object", 1), "missing-field");
});

test("validateRecord reports malformed turns", () => {
  const record = makeRecord(1);
  assert.equal(
    reasonOf({ ...record, conversations: [{ from: "assistant", value: "hi" }] }, 1),
    "malformed-turn",
  );
  assert.equal(reasonOf({ ...record, conversations: [{ from: "human" }] }, 1), "malformed-turn");
  assert.equal(reasonOf({ ...record, conversations: ["hello"] }, 1), "malformed-turn");
});

test("validateRecord reports role order problems", () => {
  const summary = `${SENTINEL} done`;
  assert.equal(reasonOf({ system: "s", conversations: [] }, 1), "role-mismatch");
  assert.equal(
    reasonOf(
      {
        system: "s",
        conversations: [
          { from: "human", value: "a" },
          { from: "human", value: "b" },
          { from: "gpt", value: summary },
        ],
      },
      1,
    ),
    "role-mismatch",
  );
  assert.equal(
    reasonOf(
      {
        system: "s",
        conversations: [
          { from: "gpt", value: summary },
          { from: "human", value: "a" },
        ],
      },
      1,
    ),
    "role-mismatch",
  );
  assert.equal(
    reasonOf(
      {
        system: "s",
        conversations: [
          { from: "human", value: "a" },
          { from: "gpt", value: summary },
          { from: "human", value: "b" },
        ],
      },
      1,
    ),
    "role-mismatch",
  );
});

test("partitionRecords keeps valid records and tallies the rest by reason", () => {
  const candidates = [
    makeRecord(2, 1),
    { system: "s" },
    makeRecord(3, 2),
    makeRecord(2, 3),
    { system: "s", conversations: [{ from: "bot", value: "x" }] },
  ];

  const result = partitionRecords(candidates, 2, SENTINEL);

  assert.deepEqual(result.accepted, [makeRecord(2, 1), makeRecord(2, 3)]);
  assert.deepEqual(result.rejected, {
    "missing-field": 1,
    "malformed-turn": 1,
    "role-mismatch": 0,
    "round-count-mismatch": 1,
    "missing-summary-marker": 0,
  });
  assert.equal(result.errors.length, 3);
  assert.match(result.errors[1] ?? "", /^record 3: round-count-mismatch/);
});
