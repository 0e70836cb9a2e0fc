import { mkdir, rename, writeFile } from "node:fs/promises";
import path from "node:path";

export function asRecord(value: unknown): Record<string, unknown> | null {
  return value !== null && typeof value === "object" && !Array.isArray(value)
    ? (value as Record<string, unknown>)
    : null;
}

export function asString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function asNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

export function parseListArg(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(/[\s,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function normalizeNewlines(value: string): string {
  return value.replace(/\r\n/g, "\n").replace(/\r/g, "\n").replace(/\u0000/g, "");
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

/** Local wall-clock time as `YYYY-MM-DD HH:mm:ss`. */
export function formatLocalTimestamp(date: Date): string {
  const y = date.getFullYear().toString().padStart(4, "0");
  return `${y}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())} ${pad2(date.getHours())}:${pad2(
    date.getMinutes(),
  )}:${pad2(date.getSeconds())}`;
}

export function formatPercent(part: number, whole: number): string {
  if (whole <= 0) {
    return "0.00%";
  }
  return `${((part / whole) * 100).toFixed(2)}%`;
}

/** Writes to a temp file beside the target, then renames it into place. */
export async function writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  await rename(tempPath, filePath);
}
