import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, isNotFoundError, toErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import type { JsonRecord } from "../types.js";
import { asRecord, writeJsonAtomic } from "../utils.js";
import { findRoundFiles, toPosixPath } from "./files.js";

export type ConsolidateMode = "exclude" | "include";

export interface ConsolidateOptions {
  dataRoot: string;
  outputFile: string;
  /** Take at most this many records from each file; 0 or absent keeps all. */
  maxItemsPerFile?: number;
  mode?: ConsolidateMode;
  paths?: string[];
  logger?: Logger;
}

export interface ConsolidateResult {
  outputFile: string;
  totalRecords: number;
  filesFound: number;
  filesUsed: number;
  byDomain: Record<string, number>;
  /** Selection paths that did not exist and were ignored. */
  missingPaths: string[];
}

/**
 * Resolves a selection path against the data root. Paths may repeat the data
 * root as a prefix, use either slash style, or be absolute.
 */
export function resolveSelectionPath(dataRoot: string, raw: string): string {
  let cleaned = raw.trim().replace(/\\/g, "/").replace(/^\.\//, "");
  if (path.isAbsolute(cleaned)) {
    return path.normalize(cleaned);
  }
  const rootPrefix = `${toPosixPath(dataRoot).replace(/^\.\//, "").replace(/\/+$/, "")}/`;
  if (cleaned.startsWith(rootPrefix)) {
    cleaned = cleaned.slice(rootPrefix.length);
  }
  return path.resolve(dataRoot, cleaned);
}

export function isPathWithin(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}

async function readRecordArray(filePath: string, logger: Logger): Promise<JsonRecord[]> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    logger.warn("skipping unreadable file", { file: filePath, error: toErrorMessage(error) });
    return [];
  }
  if (!Array.isArray(data)) {
    logger.warn("skipping file without a JSON array", { file: filePath });
    return [];
  }
  const records: JsonRecord[] = [];
  for (const item of data) {
    const record = asRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

export async function consolidateDataset(options: ConsolidateOptions): Promise<ConsolidateResult> {
  const logger = options.logger ?? silentLogger;
  const mode = options.mode ?? "exclude";
  const dataRoot = path.resolve(options.dataRoot);
  const rawPaths = options.paths ?? [];

  if (mode === "include" && rawPaths.length === 0) {
    throw new ConfigurationError("Include mode needs at least one path");
  }
  if (!(await pathExists(dataRoot))) {
    throw new ConfigurationError(`Data root does not exist: ${options.dataRoot}`);
  }

  const selection: string[] = [];
  const missingPaths: string[] = [];
  for (const raw of rawPaths) {
    const resolved = resolveSelectionPath(options.dataRoot, raw);
    if (await pathExists(resolved)) {
      selection.push(path.resolve(resolved));
    } else {
      missingPaths.push(raw);
      logger.warn("selection path does not exist, ignored", { path: raw, resolved });
    }
  }

  const files = await findRoundFiles(dataRoot);
  const selected = files.filter((file) => {
    const matched = selection.some((entry) => isPathWithin(entry, file));
    return mode === "include" ? matched : !matched;
  });
  logger.info("files selected", { mode, found: files.length, selected: selected.length });

  const cap = options.maxItemsPerFile && options.maxItemsPerFile > 0 ? options.maxItemsPerFile : 0;
  const merged: JsonRecord[] = [];
  const byDomain: Record<string, number> = {};
  let filesUsed = 0;

  for (const file of selected) {
    const records = await readRecordArray(file, logger);
    const taken = cap > 0 ? records.slice(0, cap) : records;
    if (taken.length === 0) {
      continue;
    }
    filesUsed += 1;
    merged.push(...taken);
    const relative = toPosixPath(path.relative(dataRoot, file));
    const domain = relative.split("/")[0] ?? "unknown";
    byDomain[domain] = (byDomain[domain] ?? 0) + taken.length;
    logger.info("file merged", { file: relative, records: taken.length });
  }

  await writeJsonAtomic(options.outputFile, merged);
  return {
    outputFile: options.outputFile,
    totalRecords: merged.length,
    filesFound: files.length,
    filesUsed,
    byDomain,
    missingPaths,
  };
}
