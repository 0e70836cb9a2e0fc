import { appendFile, mkdir, readFile } from "node:fs/promises";
import path from "node:path";
import { dialogueRecordShapeSchema } from "@clarify-corpus/shared";
import { isNotFoundError } from "../errors.js";
import { extractRecords } from "../records/extract.js";
import type { JsonRecord, TaskIdentity } from "../types.js";
import { asRecord, formatLocalTimestamp, writeJsonAtomic } from "../utils.js";

export interface TaskStore {
  readCount(task: TaskIdentity): Promise<number>;
  readRecords(task: TaskIdentity): Promise<JsonRecord[]>;
  /** Appends and returns the new on-disk total. */
  appendRecords(task: TaskIdentity, records: readonly JsonRecord[]): Promise<number>;
  appendDebug(task: TaskIdentity, raw: string, reason: string): Promise<void>;
}

export function taskDirectory(outputDir: string, task: TaskIdentity): string {
  return path.join(outputDir, task.domainCode, task.typeCode);
}

export function taskFilePath(outputDir: string, task: TaskIdentity): string {
  return path.join(taskDirectory(outputDir, task), `${task.rounds}_round.json`);
}

export function debugFilePath(outputDir: string, task: TaskIdentity): string {
  return path.join(taskDirectory(outputDir, task), `${task.rounds}_round_debug.txt`);
}

function shapedRecords(items: readonly unknown[]): JsonRecord[] {
  const records: JsonRecord[] = [];
  for (const item of items) {
    const record = asRecord(item);
    if (record && dialogueRecordShapeSchema.safeParse(record).success) {
      records.push(record);
    }
  }
  return records;
}

/**
 * A stored file that no longer parses (an interrupted external edit, a
 * hand-trimmed array) is read back through the extractor so the intact
 * prefix survives the next append. Only record-shaped objects are kept.
 */
export function parseStoredRecords(text: string): JsonRecord[] {
  if (text.trim().length === 0) {
    return [];
  }
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return shapedRecords(extractRecords(text).records);
  }
  return Array.isArray(value) ? shapedRecords(value) : [];
}

export class FileTaskStore implements TaskStore {
  constructor(
    readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async readRecords(task: TaskIdentity): Promise<JsonRecord[]> {
    let text: string;
    try {
      text = await readFile(taskFilePath(this.outputDir, task), "utf8");
    } catch (error) {
      if (isNotFoundError(error)) {
        return [];
      }
      throw error;
    }
    return parseStoredRecords(text);
  }

  async readCount(task: TaskIdentity): Promise<number> {
    const records = await this.readRecords(task);
    return records.length;
  }

  async appendRecords(task: TaskIdentity, records: readonly JsonRecord[]): Promise<number> {
    const existing = await this.readRecords(task);
    const merged = [...existing, ...records];
    await writeJsonAtomic(taskFilePath(this.outputDir, task), merged);
    return merged.length;
  }

  async appendDebug(task: TaskIdentity, raw: string, reason: string): Promise<void> {
    const filePath = debugFilePath(this.outputDir, task);
    await mkdir(path.dirname(filePath), { recursive: true });
    const banner = "=".repeat(80);
    const block = [
      "",
      banner,
      `Time: ${formatLocalTimestamp(this.now())}`,
      `Reason: ${reason}`,
      banner,
      raw,
      "",
    ].join("\n");
    await appendFile(filePath, block, "utf8");
  }
}

export interface IncompleteTaskEntry {
  task: TaskIdentity;
  count: number;
  target: number;
  reason?: string;
  at: Date;
}

export interface IncompleteTaskLog {
  append(entry: IncompleteTaskEntry): Promise<void>;
}

function singleLine(value: string, max = 240): string {
  const flat = value.replace(/\s+/g, " ").trim();
  return flat.length > max ? `${flat.slice(0, max)}...` : flat;
}

export function formatIncompleteEntry(entry: IncompleteTaskEntry): string {
  const parts = [
    `[${formatLocalTimestamp(entry.at)}] ${entry.task.domainCode}`,
    entry.task.typeCode,
    `${entry.task.rounds}_round`,
    `${entry.count}/${entry.target}`,
  ];
  if (entry.reason) {
    parts.push(singleLine(entry.reason));
  }
  return parts.join(" | ");
}

export class FileIncompleteTaskLog implements IncompleteTaskLog {
  constructor(readonly filePath: string) {}

  /** Creates the file when missing; existing entries are kept. */
  async ensureExists(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, "", "utf8");
  }

  async append(entry: IncompleteTaskEntry): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${formatIncompleteEntry(entry)}\n`, "utf8");
  }
}
