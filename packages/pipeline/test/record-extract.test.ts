import assert from "node:assert/strict";
import test from "node:test";

import { extractRecords } from "../src/records/extract.js";
import { makeRecord, makeRecords } from "./helpers.js";

test("extractRecords returns every object of a complete array", () => {
  const records = makeRecords(4, 2);
  const result = extractRecords(JSON.stringify(records));

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});

test("extractRecords unwraps the first array field of a JSON-mode object", () => {
  const records = makeRecords(3, 1);
  const result = extractRecords(JSON.stringify({ note: "ok", data: records }));

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});

test("extractRecords reads a fenced block surrounded by prose", () => {
  const records = makeRecords(2, 3);
  const text = `Here are the records:\n\`\`\`json\n${JSON.stringify(records, null, 2)}\n\`\`\`\nLet me know.`;
  const result = extractRecords(text);

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});

test("extractRecords keeps the complete prefix when the last 30% is cut off", () => {
  const records = makeRecords(5, 2);
  const whole = JSON.stringify(records, null, 2);
  const cut = whole.slice(0, Math.floor(whole.length * 0.7));

  const full = extractRecords(whole);
  const partial = extractRecords(cut);

  assert.equal(full.records.length, 5);
  assert.equal(partial.truncated, true);
  assert.equal(partial.records.length, 3);
  assert.deepEqual(partial.records, records.slice(0, 3));
});

test("extractRecords is not confused by brackets and quotes inside strings", () => {
  const tricky = makeRecord(1, 1);
  tricky.system = 'He said "[ok]" and left } with a \\ backslash';
  const second = JSON.stringify(makeRecord(1, 2));
  const text = `[${JSON.stringify(tricky)},${second.slice(0, 20)}`;

  const result = extractRecords(text);

  assert.deepEqual(result.records, [tricky]);
  assert.equal(result.truncated, true);
});

test("extractRecords marks a closed array found inside prose as complete", () => {
  const records = makeRecords(2, 1);
  const result = extractRecords(`Sure! ${JSON.stringify(records)} Hope this helps.`);

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});

test("extractRecords returns nothing for empty or unparseable text", () => {
  assert.deepEqual(extractRecords("   "), { records: [], truncated: false });
  assert.deepEqual(extractRecords("I could not produce the data."), { records: [], truncated: true });
});

test("extractRecords yields nothing when the first record is cut off", () => {
  const records = makeRecords(2, 3);
  const whole = JSON.stringify(records);
  const cut = whole.slice(0, JSON.stringify(records[0]).length - 4);

  assert.deepEqual(extractRecords(cut), { records: [], truncated: true });
});

test("extractRecords unwraps an object that lists records under conversations", () => {
  const records = makeRecords(2, 2);
  const result = extractRecords(JSON.stringify({ conversations: records }));

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});

test("extractRecords skips array fields that hold no objects", () => {
  const records = makeRecords(2, 3);
  const result = extractRecords(JSON.stringify({ rounds: [3], data: records }));

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});

test("extractRecords keeps a single record object whole", () => {
  const record = makeRecord(2, 7);

  assert.deepEqual(extractRecords(JSON.stringify(record)), { records: [record], truncated: false });
});

test("extractRecords recovers the prefix of a cut-off array inside a fence", () => {
  const first = makeRecord(1, 1);
  const second = JSON.stringify(makeRecord(1, 2));
  const text = `Here:\n\`\`\`json\n[${JSON.stringify(first)},${second.slice(0, 20)}\n\`\`\``;

  assert.deepEqual(extractRecords(text), { records: [first], truncated: true });
});

test("extractRecords moves past a bracketed aside to the record array", () => {
  const records = makeRecords(2, 1);
  const result = extractRecords(`See [1] below: ${JSON.stringify(records)}`);

  assert.deepEqual(result.records, records);
  assert.equal(result.truncated, false);
});
