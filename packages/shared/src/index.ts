export {
  DEFAULT_SUMMARY_SENTINEL,
  TurnRole,
  alpacaSampleSchema,
  dialogueRecordSchema,
  dialogueRecordShapeSchema,
  dialogueTurnSchema,
  rejectReasonSchema,
  turnRoleSchema,
} from "./records.js";
export type {
  AlpacaSample,
  DialogueRecord,
  DialogueRecordShape,
  DialogueTurn,
  RejectReason,
} from "./records.js";

export {
  DEFAULT_TOKENS_PER_RECORD_BY_ROUND,
  defaultGeneratorSettings,
  generatorSettingsSchema,
  instructionTemplatesSchema,
  parseGeneratorSettings,
} from "./settings.js";
export type {
  GeneratorSettings,
  GeneratorSettingsInput,
  InstructionTemplateOverrides,
} from "./settings.js";

export {
  datasetBucketSchema,
  datasetCheckReportSchema,
  datasetErrorDetailSchema,
  parseDatasetCheckReport,
} from "./reports.js";
export type { DatasetBucket, DatasetCheckReport, DatasetErrorDetail } from "./reports.js";

export {
  buildBackfillInstruction,
  buildGenerationInstruction,
  defaultInstructionTemplates,
  fillPromptTemplate,
  resolveInstructionTemplates,
} from "./prompts.js";
export type { GenerationInstructionInput, InstructionTemplates } from "./prompts.js";
