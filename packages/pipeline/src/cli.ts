#!/usr/bin/env node
import path from "node:path";
import { pathToFileURL } from "node:url";
import { resolveInstructionTemplates } from "@clarify-corpus/shared";
import { loadGeneratorConfig } from "./config.js";
import type { EnvMap } from "./config.js";
import { CHECK_REPORT_FILE, checkDataset, formatCheckReport, loadCheckReport, saveCheckReport } from "./dataset/check.js";
import { consolidateDataset } from "./dataset/consolidate.js";
import type { ConsolidateMode } from "./dataset/consolidate.js";
import { splitDataset } from "./dataset/split.js";
import { isAbortError } from "./errors.js";
import { runBatch } from "./generation/batch.js";
import { CompletionDriver } from "./generation/completion.js";
import type { SleepFn } from "./generation/taskController.js";
import { taskLabel } from "./generation/taskController.js";
import { OpenAiCompatibleTransport } from "./llm.js";
import type { ChatTransport, LlmConfig } from "./llm.js";
import { createRuntimeLogger } from "./logger.js";
import { expandTasks, readGenerationPlan, readSystemPrompt } from "./plan.js";
import { FileIncompleteTaskLog, FileTaskStore } from "./storage/taskStore.js";
import { parseListArg } from "./utils.js";

type CliCommand = "generate" | "check" | "stats" | "consolidate" | "split";

const COMMANDS: readonly CliCommand[] = ["generate", "check", "stats", "consolidate", "split"];

const DEFAULT_PLAN_FILE = "config/generation_plan.txt";
const DEFAULT_PROMPT_FILE = "config/initial_prompt.txt";
const DEFAULT_DATA_DIR = "data/raw";
const DEFAULT_CONSOLIDATED_FILE = "output_dataset/consolidated_data.json";
const DEFAULT_ALPACA_FILE = "output_dataset/alpaca_format_data.json";

interface CliArgs {
  command: CliCommand | null;
  help: boolean;
  quiet: boolean;
  list: boolean;
  dryRun: boolean;
  plan: string;
  prompt: string;
  dataDir: string;
  settings?: string;
  logFile?: string;
  domains: string[];
  types: string[];
  rounds: number[];
  limit: number;
  target: number;
  report: string;
  sentinel?: string;
  input?: string;
  output?: string;
  maxItems: number;
  mode: ConsolidateMode;
  paths: string[];
}

export interface CliRuntime {
  cwd: string;
  env: EnvMap;
  write: (text: string) => void;
  createTransport: (config: LlmConfig) => ChatTransport;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

function defaultRuntime(): CliRuntime {
  return {
    cwd: process.cwd(),
    env: process.env,
    write: (text) => {
      process.stdout.write(text);
    },
    createTransport: (config) => new OpenAiCompatibleTransport(config),
  };
}

export async function runCli(
  argv = process.argv.slice(2),
  overrides: Partial<CliRuntime> = {},
): Promise<number> {
  const runtime: CliRuntime = { ...defaultRuntime(), ...overrides };
  const args = parseCliArgs(argv);

  if (args.help || !args.command) {
    runtime.write(helpText());
    return args.help ? 0 : 1;
  }

  switch (args.command) {
    case "generate":
      return runGenerate(args, runtime);
    case "check":
      return runCheck(args, runtime);
    case "stats":
      return runStats(args, runtime);
    case "consolidate":
      return runConsolidate(args, runtime);
    case "split":
      return runSplit(args, runtime);
  }
}

async function runGenerate(args: CliArgs, runtime: CliRuntime): Promise<number> {
  const resolve = (value: string): string => path.resolve(runtime.cwd, value);
  const plan = await readGenerationPlan(resolve(args.plan));
  const tasks = expandTasks(plan, {
    domains: args.domains,
    types: args.types,
    rounds: args.rounds,
    limit: args.limit,
  });

  if (args.list) {
    for (const task of tasks) {
      runtime.write(`${taskLabel(task)}\n`);
    }
    runtime.write(`${tasks.length} tasks\n`);
    return 0;
  }

  const config = await loadGeneratorConfig({
    cwd: runtime.cwd,
    env: runtime.env,
    settingsPath: args.settings,
  });
  const settings = args.target > 0 ? { ...config.settings, targetPerTask: args.target } : config.settings;
  const systemPrompt = await readSystemPrompt(resolve(args.prompt));
  const outputDir = resolve(args.dataDir);
  const logger = createRuntimeLogger({
    logFile: args.logFile ? resolve(args.logFile) : path.join(outputDir, "generation.log"),
    echo: !args.quiet,
  });
  const incompleteLog = new FileIncompleteTaskLog(path.join(outputDir, "incomplete_tasks.txt"));
  await incompleteLog.ensureExists();

  logger.info("generation starting", {
    model: config.llm.model,
    baseUrl: config.llm.baseUrl,
    reasoning: config.llm.reasoning,
    tasks: tasks.length,
    target: settings.targetPerTask,
    outputDir,
    envFile: config.envFile ?? undefined,
  });

  try {
    const summary = await runBatch(tasks, {
      driver: new CompletionDriver(runtime.createTransport(config.llm)),
      store: new FileTaskStore(outputDir),
      incompleteLog,
      logger,
      settings,
      systemPrompt,
      reasoning: config.llm.reasoning,
      templates: resolveInstructionTemplates(settings.instructionTemplates),
      signal: runtime.signal,
      sleep: runtime.sleep,
    });
    runtime.write(
      `Done. tasks=${summary.total} complete=${summary.complete} failed=${summary.failed} errored=${summary.errored} skipped=${summary.skipped} exchanges=${summary.exchanges}\n`,
    );
    if (summary.failed + summary.errored > 0) {
      runtime.write(`Unfinished tasks are listed in ${incompleteLog.filePath}\n`);
      return 1;
    }
    return 0;
  } finally {
    await logger.flush();
  }
}

async function runCheck(args: CliArgs, runtime: CliRuntime): Promise<number> {
  const dataRoot = path.resolve(runtime.cwd, args.dataDir);
  const logger = createRuntimeLogger({ echo: !args.quiet });
  const report = await checkDataset(dataRoot, {
    sentinel: args.sentinel,
    dryRun: args.dryRun,
    logger,
  });
  runtime.write(`${formatCheckReport(report)}\n`);
  const reportPath = path.resolve(runtime.cwd, args.report);
  await saveCheckReport(reportPath, report);
  runtime.write(`Report saved to ${reportPath}\n`);
  return 0;
}

async function runStats(args: CliArgs, runtime: CliRuntime): Promise<number> {
  const report = await loadCheckReport(path.resolve(runtime.cwd, args.report));
  runtime.write(`${formatCheckReport(report)}\n`);
  return 0;
}

async function runConsolidate(args: CliArgs, runtime: CliRuntime): Promise<number> {
  const logger = createRuntimeLogger({ echo: !args.quiet });
  const result = await consolidateDataset({
    dataRoot: path.resolve(runtime.cwd, args.dataDir),
    outputFile: path.resolve(runtime.cwd, args.output ?? DEFAULT_CONSOLIDATED_FILE),
    maxItemsPerFile: args.maxItems,
    mode: args.mode,
    paths: args.paths,
    logger,
  });
  runtime.write(`Saved ${result.totalRecords} records from ${result.filesUsed} files to ${result.outputFile}\n`);
  for (const domain of Object.keys(result.byDomain).sort((a, b) => a.localeCompare(b))) {
    runtime.write(`  ${domain}: ${result.byDomain[domain] ?? 0}\n`);
  }
  return 0;
}

async function runSplit(args: CliArgs, runtime: CliRuntime): Promise<number> {
  const outputFile = path.resolve(runtime.cwd, args.output ?? DEFAULT_ALPACA_FILE);
  const result = await splitDataset({
    inputFile: path.resolve(runtime.cwd, args.input ?? DEFAULT_CONSOLIDATED_FILE),
    outputFile,
    maxConversations: args.maxItems,
  });
  runtime.write(`Wrote ${result.samples} samples from ${result.conversations} conversations to ${outputFile}\n`);
  const counts = Object.keys(result.conversationsBySampleCount).sort((a, b) => Number(a) - Number(b));
  for (const key of counts) {
    runtime.write(`  ${key} turns: ${result.conversationsBySampleCount[key] ?? 0}\n`);
  }
  return 0;
}

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = {
    command: null,
    help: false,
    quiet: false,
    list: false,
    dryRun: false,
    plan: DEFAULT_PLAN_FILE,
    prompt: DEFAULT_PROMPT_FILE,
    dataDir: DEFAULT_DATA_DIR,
    domains: [],
    types: [],
    rounds: [],
    limit: 0,
    target: 0,
    report: CHECK_REPORT_FILE,
    maxItems: 0,
    mode: "exclude",
    paths: [],
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }

    if (!arg.startsWith("-") && parsed.command === null) {
      if (!isCommand(arg)) {
        throw new Error(`Unknown command: ${arg}`);
      }
      parsed.command = arg;
      continue;
    }

    if (arg === "--quiet") {
      parsed.quiet = true;
      continue;
    }

    if (arg === "--list") {
      parsed.list = true;
      continue;
    }

    if (arg === "--dry-run") {
      parsed.dryRun = true;
      continue;
    }

    if (arg === "--plan") {
      parsed.plan = readArgValue(argv, ++i, "--plan");
      continue;
    }

    if (arg === "--prompt") {
      parsed.prompt = readArgValue(argv, ++i, "--prompt");
      continue;
    }

    if (arg === "--data" || arg === "--output-dir") {
      parsed.dataDir = readArgValue(argv, ++i, arg);
      continue;
    }

    if (arg === "--settings") {
      parsed.settings = readArgValue(argv, ++i, "--settings");
      continue;
    }

    if (arg === "--log-file") {
      parsed.logFile = readArgValue(argv, ++i, "--log-file");
      continue;
    }

    if (arg === "--domain") {
      parsed.domains = parseListArg(readArgValue(argv, ++i, "--domain"));
      continue;
    }

    if (arg === "--type") {
      parsed.types = parseListArg(readArgValue(argv, ++i, "--type"));
      continue;
    }

    if (arg === "--rounds") {
      parsed.rounds = parseListArg(readArgValue(argv, ++i, "--rounds")).map((value) =>
        parseCount(value, "--rounds"),
      );
      continue;
    }

    if (arg === "--limit") {
      parsed.limit = parseCount(readArgValue(argv, ++i, "--limit"), "--limit");
      continue;
    }

    if (arg === "--target") {
      parsed.target = parseCount(readArgValue(argv, ++i, "--target"), "--target");
      continue;
    }

    if (arg === "--report") {
      parsed.report = readArgValue(argv, ++i, "--report");
      continue;
    }

    if (arg === "--sentinel") {
      parsed.sentinel = readArgValue(argv, ++i, "--sentinel");
      continue;
    }

    if (arg === "--input") {
      parsed.input = readArgValue(argv, ++i, "--input");
      continue;
    }

    if (arg === "--output") {
      parsed.output = readArgValue(argv, ++i, "--output");
      continue;
    }

    if (arg === "--max-items" || arg === "--max-samples") {
      parsed.maxItems = parseCount(readArgValue(argv, ++i, arg), arg);
      continue;
    }

    if (arg === "--mode") {
      const value = readArgValue(argv, ++i, "--mode");
      if (value !== "include" && value !== "exclude") {
        throw new Error(`--mode must be include or exclude, got ${value}`);
      }
      parsed.mode = value;
      continue;
    }

    if (arg === "--paths") {
      parsed.paths.push(...parseListArg(readArgValue(argv, ++i, "--paths")));
      continue;
    }

    throw new Error(`Unknown argument: ${arg}`);
  }

  return parsed;
}

function parseCount(value: string, flagName: string): number {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${flagName} expects a non-negative integer, got ${value}`);
  }
  return Number.parseInt(value, 10);
}

function readArgValue(args: string[], index: number, flagName: string): string {
  const value = args[index];
  if (!value) {
    throw new Error(`Missing value for ${flagName}`);
  }
  return value;
}

function helpText(): string {
  return [
    "Usage: clarify-corpus <command> [options]",
    "",
    "Commands:",
    "  generate                   Run every planned task until its file holds the target count",
    "  check                      Re-validate stored records and drop invalid ones",
    "  stats                      Print a saved check report",
    "  consolidate                Merge stored records into one JSON array",
    "  split                      Turn merged conversations into per-turn training samples",
    "",
    "generate:",
    `  --plan <path>              Generation plan (default: ${DEFAULT_PLAN_FILE})`,
    `  --prompt <path>            System prompt (default: ${DEFAULT_PROMPT_FILE})`,
    `  --output-dir <path>        Record store root (default: ${DEFAULT_DATA_DIR})`,
    "  --settings <path>          JSON generator settings",
    "  --domain <csv>             Only these domain codes",
    "  --type <csv>               Only these ambiguity type codes",
    "  --rounds <csv>             Only these round counts",
    "  --limit <n>                Stop after the first N tasks",
    "  --target <n>               Records per task (overrides settings)",
    "  --log-file <path>          Runtime log (default: <output-dir>/generation.log)",
    "  --list                     Print the expanded task list and exit",
    "",
    "check / stats:",
    `  --data <path>              Record store root (default: ${DEFAULT_DATA_DIR})`,
    `  --report <path>            Report file (default: ${CHECK_REPORT_FILE})`,
    "  --sentinel <text>          Summary marker the last reply must start with",
    "  --dry-run                  Report without rewriting files",
    "",
    "consolidate:",
    `  --data <path>              Record store root (default: ${DEFAULT_DATA_DIR})`,
    `  --output <path>            Output file (default: ${DEFAULT_CONSOLIDATED_FILE})`,
    "  --mode <exclude|include>   How --paths selects files (default: exclude)",
    "  --paths <csv>              Files or directories, relative to the data root",
    "  --max-items <n>            At most N records from each file",
    "",
    "split:",
    `  --input <path>             Merged conversations (default: ${DEFAULT_CONSOLIDATED_FILE})`,
    `  --output <path>            Output file (default: ${DEFAULT_ALPACA_FILE})`,
    "  --max-samples <n>          Only the first N conversations",
    "",
    "  --quiet                    Do not echo log lines",
    "",
  ].join("\n");
}

const entryPath = process.argv[1];
if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    process.stderr.write("Interrupted, stopping after the current request.\n");
    controller.abort();
  });

  runCli(process.argv.slice(2), { signal: controller.signal })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      if (isAbortError(error)) {
        process.stderr.write("Aborted.\n");
        process.exitCode = 130;
        return;
      }
      const message = error instanceof Error ? error.message : String(error);
      process.stderr.write(`Error: ${message}\n`);
      process.exitCode = 1;
    });
}
