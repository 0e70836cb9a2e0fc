import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_SUMMARY_SENTINEL, parseDatasetCheckReport } from "@clarify-corpus/shared";
import type { DatasetBucket, DatasetCheckReport, DatasetErrorDetail } from "@clarify-corpus/shared";
import { ConfigurationError, isNotFoundError, toErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { validateRecord } from "../records/validate.js";
import { formatPercent, writeJsonAtomic } from "../utils.js";
import { findRoundFiles, roundsFromFileName, toPosixPath } from "./files.js";

export const CHECK_REPORT_FILE = "conversation_check_stats.json";
const ERRORS_KEPT_PER_FILE = 5;
const ERROR_DETAILS_KEPT = 20;
const ERROR_DETAILS_PRINTED = 10;

export interface CheckDatasetOptions {
  sentinel?: string;
  /** Report only; leave files untouched. */
  dryRun?: boolean;
  logger?: Logger;
  now?: () => Date;
}

interface FileOutcome {
  before: number;
  after: number;
  errors: string[];
}

function emptyBucket(): DatasetBucket {
  return { files: 0, dataBefore: 0, dataAfter: 0, removed: 0 };
}

function addToBucket(
  buckets: Record<string, DatasetBucket>,
  key: string,
  outcome: FileOutcome,
): void {
  const bucket = buckets[key] ?? emptyBucket();
  bucket.files += 1;
  bucket.dataBefore += outcome.before;
  bucket.dataAfter += outcome.after;
  bucket.removed += outcome.before - outcome.after;
  buckets[key] = bucket;
}

async function checkFile(
  filePath: string,
  sentinel: string,
  dryRun: boolean,
): Promise<FileOutcome> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    return { before: 0, after: 0, errors: [`cannot read file: ${toErrorMessage(error)}`] };
  }
  if (!Array.isArray(data)) {
    return { before: 0, after: 0, errors: ["file does not hold a JSON array"] };
  }
  const rounds = roundsFromFileName(path.basename(filePath));
  if (rounds === 0) {
    return { before: 0, after: 0, errors: [`no round count in file name ${path.basename(filePath)}`] };
  }

  const valid: unknown[] = [];
  const errors: string[] = [];
  for (const [index, item] of data.entries()) {
    const result = validateRecord(item, rounds, sentinel);
    if (result.ok) {
      valid.push(item);
    } else {
      errors.push(`record #${index + 1}: ${result.reason} (${result.detail})`);
    }
  }

  if (valid.length !== data.length && !dryRun) {
    await writeJsonAtomic(filePath, valid);
  }
  return { before: data.length, after: valid.length, errors };
}

/**
 * Re-validates every `{domain}/{type}/{N}_round.json` under `dataRoot` and,
 * unless dry-run, rewrites files that held invalid records.
 */
export async function checkDataset(
  dataRoot: string,
  options: CheckDatasetOptions = {},
): Promise<DatasetCheckReport> {
  const sentinel = options.sentinel ?? DEFAULT_SUMMARY_SENTINEL;
  const dryRun = options.dryRun ?? false;
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());

  try {
    const info = await stat(dataRoot);
    if (!info.isDirectory()) {
      throw new ConfigurationError(`Data root is not a directory: ${dataRoot}`);
    }
  } catch (error) {
    if (isNotFoundError(error)) {
      throw new ConfigurationError(`Data root does not exist: ${dataRoot}`, { cause: error });
    }
    throw error;
  }

  const report: DatasetCheckReport = {
    generatedAt: now().toISOString(),
    dataRoot,
    dryRun,
    totalFiles: 0,
    totalBefore: 0,
    totalAfter: 0,
    totalRemoved: 0,
    filesWithRemovals: 0,
    byDomain: {},
    byRound: {},
    byAmbiguityType: {},
    errorDetails: [],
  };
  const details: DatasetErrorDetail[] = [];

  for (const filePath of await findRoundFiles(dataRoot)) {
    const relative = toPosixPath(path.relative(dataRoot, filePath));
    const segments = relative.split("/");
    // Only the {domain}/{type}/{file} layout the generator writes.
    if (segments.length !== 3) {
      continue;
    }
    const [domain = "", ambiguityType = "", fileName = ""] = segments;

    const outcome = await checkFile(filePath, sentinel, dryRun);
    const removed = outcome.before - outcome.after;
    report.totalFiles += 1;
    report.totalBefore += outcome.before;
    report.totalAfter += outcome.after;
    report.totalRemoved += removed;
    addToBucket(report.byDomain, domain, outcome);
    addToBucket(report.byRound, String(roundsFromFileName(fileName)), outcome);
    addToBucket(report.byAmbiguityType, ambiguityType, outcome);

    if (removed > 0) {
      report.filesWithRemovals += 1;
      logger.warn("invalid records removed", { file: relative, removed, kept: outcome.after, dryRun });
    } else {
      logger.info("file passed", { file: relative, records: outcome.after });
    }
    if (outcome.errors.length > 0) {
      details.push({ file: relative, removed, errors: outcome.errors.slice(0, ERRORS_KEPT_PER_FILE) });
    }
  }

  report.errorDetails = details.slice(0, ERROR_DETAILS_KEPT);
  return report;
}

function formatBucket(label: string, bucket: DatasetBucket): string[] {
  const lines = [
    `  ${label}:`,
    `    files: ${bucket.files}`,
    `    records before: ${bucket.dataBefore}`,
    `    records after: ${bucket.dataAfter}`,
    `    removed: ${bucket.removed}`,
  ];
  if (bucket.dataBefore > 0) {
    lines.push(`    removal rate: ${formatPercent(bucket.removed, bucket.dataBefore)}`);
  }
  return lines;
}

function sortedEntries(
  buckets: Record<string, DatasetBucket>,
  compare: (a: string, b: string) => number = (a, b) => a.localeCompare(b),
): Array<[string, DatasetBucket]> {
  return Object.entries(buckets).sort(([a], [b]) => compare(a, b));
}

export function formatCheckReport(report: DatasetCheckReport): string {
  const rule = "=".repeat(80);
  const lines = [
    rule,
    "Dataset check report",
    rule,
    "",
    "Totals:",
    `  files: ${report.totalFiles}`,
    `  records before: ${report.totalBefore}`,
    `  records after: ${report.totalAfter}`,
    `  removed: ${report.totalRemoved}`,
    `  files with removals: ${report.filesWithRemovals}`,
  ];
  if (report.totalBefore > 0) {
    lines.push(`  removal rate: ${formatPercent(report.totalRemoved, report.totalBefore)}`);
  }

  lines.push("", "By domain:");
  for (const [domain, bucket] of sortedEntries(report.byDomain)) {
    lines.push(...formatBucket(domain, bucket));
  }
  lines.push("", "By rounds:");
  for (const [rounds, bucket] of sortedEntries(report.byRound, (a, b) => Number(a) - Number(b))) {
    lines.push(...formatBucket(`${rounds}_round`, bucket));
  }
  lines.push("", "By ambiguity type:");
  for (const [type, bucket] of sortedEntries(report.byAmbiguityType)) {
    lines.push(...formatBucket(type, bucket));
  }

  if (report.errorDetails.length > 0) {
    lines.push("", `Error details (first ${ERROR_DETAILS_PRINTED}):`);
    for (const [index, detail] of report.errorDetails.slice(0, ERROR_DETAILS_PRINTED).entries()) {
      lines.push(`  ${index + 1}. ${detail.file}`, `     removed: ${detail.removed}`);
      for (const error of detail.errors) {
        lines.push(`     - ${error}`);
      }
    }
  }
  return lines.join("\n");
}

export async function saveCheckReport(filePath: string, report: DatasetCheckReport): Promise<void> {
  await writeJsonAtomic(filePath, report);
}

export async function loadCheckReport(filePath: string): Promise<DatasetCheckReport> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read check report ${filePath}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  try {
    return parseDatasetCheckReport(JSON.parse(raw));
  } catch (error) {
    throw new ConfigurationError(`Check report ${filePath} is malformed: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
}
