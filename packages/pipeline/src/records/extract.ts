import type { ExtractionResult, JsonRecord } from "../types.js";
import { asRecord } from "../utils.js";

const FENCED_BLOCK_PATTERN = /```(?:json|JSON)?\s*\n?([\s\S]*?)```/g;

function isWhitespace(ch: string): boolean {
  return ch === " " || ch === "\n" || ch === "\r" || ch === "\t";
}

function objectsOf(items: unknown[]): JsonRecord[] {
  const records: JsonRecord[] = [];
  for (const item of items) {
    const record = asRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

function looksLikeTurns(items: unknown[]): boolean {
  return items.every((item) => {
    const turn = asRecord(item);
    return turn !== null && "from" in turn;
  });
}

/**
 * A single dialogue record: its `conversations` hold turns, or it has a
 * `system` prompt and no `conversations` array at all.
 */
function looksLikeRecord(record: JsonRecord): boolean {
  const turns = record.conversations;
  if (!Array.isArray(turns)) {
    return "system" in record;
  }
  return looksLikeTurns(turns);
}

/**
 * Array payloads yield their objects. JSON-mode replies wrap the array in an
 * object (often under `conversations` itself), so an object yields the first
 * field holding objects, or itself when it is a single record.
 */
function recordsFromValue(value: unknown): JsonRecord[] | null {
  if (Array.isArray(value)) {
    return objectsOf(value);
  }
  const record = asRecord(value);
  if (!record) {
    return null;
  }
  if (looksLikeRecord(record)) {
    return [record];
  }
  for (const field of Object.values(record)) {
    if (Array.isArray(field)) {
      const records = objectsOf(field);
      if (records.length > 0) {
        return records;
      }
    }
  }
  return [];
}

function parseStrict(text: string): JsonRecord[] | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  return recordsFromValue(value);
}

function parseObject(text: string): JsonRecord | null {
  try {
    return asRecord(JSON.parse(text));
  } catch {
    return null;
  }
}

interface ArrayScan {
  records: JsonRecord[];
  closed: boolean;
  /** First index the scan did not consume. */
  end: number;
}

/**
 * Walks the top-level elements of the array opening at `start`, keeping every
 * balanced object that parses on its own. Stops at the first element that is
 * cut off or broken; a cut-off element runs the scan to the end of the text.
 */
function scanArrayFrom(text: string, start: number): ArrayScan {
  const records: JsonRecord[] = [];
  let index = start + 1;
  let capturing = false;
  let tokenStart = 0;
  let depth = 0;
  let inString = false;
  let escaped = false;

  while (index < text.length) {
    const ch = text[index];
    if (ch === undefined) {
      break;
    }

    if (!capturing) {
      if (isWhitespace(ch) || ch === ",") {
        index += 1;
        continue;
      }
      if (ch === "]") {
        return { records, closed: true, end: index + 1 };
      }
      if (ch !== "{") {
        return { records, closed: false, end: index };
      }
      capturing = true;
      tokenStart = index;
      depth = 1;
      inString = false;
      escaped = false;
      index += 1;
      continue;
    }

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === "\\") {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      index += 1;
      continue;
    }

    if (ch === '"') {
      inString = true;
      index += 1;
      continue;
    }

    if (ch === "{" || ch === "[") {
      depth += 1;
    } else if (ch === "}" || ch === "]") {
      depth -= 1;
    }

    if (depth === 0) {
      const item = parseObject(text.slice(tokenStart, index + 1));
      if (!item) {
        return { records, closed: false, end: index + 1 };
      }
      records.push(item);
      capturing = false;
    }
    index += 1;
  }

  return { records, closed: false, end: text.length };
}

/**
 * Pulls dialogue records out of a raw completion. Never throws; a reply with
 * nothing recoverable gives an empty list flagged as truncated.
 */
export function extractRecords(text: string): ExtractionResult {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    return { records: [], truncated: false };
  }

  const whole = parseStrict(trimmed);
  if (whole) {
    return { records: whole, truncated: false };
  }

  for (const match of trimmed.matchAll(FENCED_BLOCK_PATTERN)) {
    const body = match[1]?.trim() ?? "";
    const fenced = body ? parseStrict(body) : null;
    if (fenced) {
      return { records: fenced, truncated: false };
    }
  }

  let start = trimmed.indexOf("[");
  while (start !== -1) {
    const scan = scanArrayFrom(trimmed, start);
    if (scan.records.length > 0) {
      return { records: scan.records, truncated: !scan.closed };
    }
    // Resume past the consumed span, never inside an element.
    start = trimmed.indexOf("[", scan.end);
  }

  return { records: [], truncated: true };
}
