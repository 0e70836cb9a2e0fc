import {
  TurnRole,
  dialogueRecordShapeSchema,
  dialogueTurnSchema,
  rejectReasonSchema,
} from "@clarify-corpus/shared";
import type { DialogueRecord, DialogueTurn, RejectReason } from "@clarify-corpus/shared";
import type { JsonRecord, RejectionTally } from "../types.js";

export type ValidationResult =
  | { ok: true; record: DialogueRecord }
  | { ok: false; reason: RejectReason; detail: string };

export interface PartitionResult {
  accepted: DialogueRecord[];
  rejected: RejectionTally;
  /** Human-readable reason per rejected candidate, in input order. */
  errors: string[];
}

export function emptyRejectionTally(): RejectionTally {
  return {
    "missing-field": 0,
    "malformed-turn": 0,
    "role-mismatch": 0,
    "round-count-mismatch": 0,
    "missing-summary-marker": 0,
  };
}

export function mergeRejectionTally(left: RejectionTally, right: RejectionTally): RejectionTally {
  const merged = emptyRejectionTally();
  for (const reason of rejectReasonSchema.options) {
    merged[reason] = left[reason] + right[reason];
  }
  return merged;
}

export function countRejections(tally: RejectionTally): number {
  return rejectReasonSchema.options.reduce((sum, reason) => sum + tally[reason], 0);
}

function reject(reason: RejectReason, detail: string): ValidationResult {
  return { ok: false, reason, detail };
}

export function validateRecord(
  candidate: unknown,
  rounds: number,
  sentinel: string,
): ValidationResult {
  const shape = dialogueRecordShapeSchema.safeParse(candidate);
  if (!shape.success) {
    const fields = shape.error.issues.map((issue) => issue.path.join(".") || "(root)");
    return reject("missing-field", `missing or mistyped: ${[...new Set(fields)].join(", ")}`);
  }

  const turns: DialogueTurn[] = [];
  for (const [index, rawTurn] of shape.data.conversations.entries()) {
    const turn = dialogueTurnSchema.safeParse(rawTurn);
    if (!turn.success) {
      return reject("malformed-turn", `turn ${index + 1} is not a {from, value} pair`);
    }
    turns.push(turn.data);
  }

  if (turns.length === 0) {
    return reject("role-mismatch", "conversation has no turns");
  }
  for (const [index, turn] of turns.entries()) {
    const expected = index % 2 === 0 ? TurnRole.Requester : TurnRole.Responder;
    if (turn.from !== expected) {
      return reject("role-mismatch", `turn ${index + 1} is "${turn.from}", expected "${expected}"`);
    }
  }
  if (turns.length % 2 !== 0) {
    return reject("role-mismatch", "conversation does not end with a gpt turn");
  }

  const requesterTurns = turns.length / 2;
  if (requesterTurns !== rounds) {
    return reject(
      "round-count-mismatch",
      `expected ${rounds} human turns, found ${requesterTurns}`,
    );
  }

  const last = turns[turns.length - 1];
  if (!last || !last.value.trim().startsWith(sentinel)) {
    return reject("missing-summary-marker", `final gpt turn does not start with ${sentinel}`);
  }

  return { ok: true, record: { ...shape.data, conversations: turns } };
}

export function partitionRecords(
  candidates: readonly JsonRecord[],
  rounds: number,
  sentinel: string,
): PartitionResult {
  const accepted: DialogueRecord[] = [];
  const rejected = emptyRejectionTally();
  const errors: string[] = [];

  for (const [index, candidate] of candidates.entries()) {
    const result = validateRecord(candidate, rounds, sentinel);
    if (result.ok) {
      accepted.push(result.record);
      continue;
    }
    rejected[result.reason] += 1;
    errors.push(`record ${index + 1}: ${result.reason} (${result.detail})`);
  }

  return { accepted, rejected, errors };
}
