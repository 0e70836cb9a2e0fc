export { estimateTokens, createSession, GenerationSession } from "./generation/session.js";

export {
  bufferRatioFor,
  planOutputBudget,
  tokensPerRecord,
  usesReasoning,
} from "./generation/tokenBudget.js";
export type { BudgetRequest, BudgetSettings, OutputBudget } from "./generation/tokenBudget.js";

export { extractRecords } from "./records/extract.js";

export {
  countRejections,
  emptyRejectionTally,
  mergeRejectionTally,
  partitionRecords,
  validateRecord,
} from "./records/validate.js";
export type { PartitionResult, ValidationResult } from "./records/validate.js";

export { CompletionDriver } from "./generation/completion.js";
export type { ExchangeOptions } from "./generation/completion.js";

export {
  DEFAULT_BASE_URL,
  OpenAiCompatibleTransport,
  chatCompletionsUrl,
  emptyUsageReport,
  parseUsage,
} from "./llm.js";
export type {
  ChatCompletionRequest,
  ChatCompletionResult,
  ChatTransport,
  FetchLike,
  LlmConfig,
  RequestOptions,
} from "./llm.js";

export { isTerminalState, statusForState, transition } from "./generation/taskState.js";
export type { TaskEvent, TaskState } from "./generation/taskState.js";

export { defaultSleep, runTask, taskLabel } from "./generation/taskController.js";
export type { SleepFn, TaskDependencies, TaskRunResult } from "./generation/taskController.js";

export { runBatch } from "./generation/batch.js";
export type { BatchDependencies, BatchSummary } from "./generation/batch.js";

export { addUsage, cacheHitRate, emptyUsageTotals, mergeUsageTotals } from "./generation/usage.js";

export {
  FileIncompleteTaskLog,
  FileTaskStore,
  debugFilePath,
  formatIncompleteEntry,
  parseStoredRecords,
  taskFilePath,
} from "./storage/taskStore.js";
export type { IncompleteTaskEntry, IncompleteTaskLog, TaskStore } from "./storage/taskStore.js";

export {
  expandTasks,
  extractDomainCode,
  extractRoundCount,
  extractTypeCode,
  parseGenerationPlan,
  readGenerationPlan,
  readSystemPrompt,
} from "./plan.js";

export { loadDotEnv, loadGeneratorConfig, parseDotEnv, readSettingsFile } from "./config.js";
export type { EnvMap, GeneratorConfig, LoadConfigOptions } from "./config.js";

export { checkDataset, formatCheckReport, loadCheckReport, saveCheckReport } from "./dataset/check.js";
export type { CheckDatasetOptions } from "./dataset/check.js";
export { consolidateDataset, resolveSelectionPath } from "./dataset/consolidate.js";
export type { ConsolidateMode, ConsolidateOptions, ConsolidateResult } from "./dataset/consolidate.js";
export { splitConversation, splitDataset } from "./dataset/split.js";
export type { SplitDatasetOptions, SplitDatasetResult } from "./dataset/split.js";

export { CompletionError, ConfigurationError } from "./errors.js";
export type { CompletionErrorKind } from "./errors.js";

export { createRuntimeLogger, formatLogLine, silentLogger } from "./logger.js";
export type { Logger, LogMeta, RuntimeLogger } from "./logger.js";

export type {
  ChatMessage,
  ExtractionResult,
  GenerationPlan,
  GenerationTask,
  JsonRecord,
  RejectionTally,
  TaskFilter,
  TaskIdentity,
  TaskStatus,
  UsageReport,
  UsageTotals,
} from "./types.js";
