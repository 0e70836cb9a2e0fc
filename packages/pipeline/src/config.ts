import { readFile } from "node:fs/promises";
import path from "node:path";
import { generatorSettingsSchema } from "@clarify-corpus/shared";
import type { GeneratorSettings } from "@clarify-corpus/shared";
import { ConfigurationError, isNotFoundError, toErrorMessage } from "./errors.js";
import { DEFAULT_BASE_URL } from "./llm.js";
import type { LlmConfig } from "./llm.js";
import { usesReasoning } from "./generation/tokenBudget.js";

export const DEFAULT_MODEL = "deepseek-reasoner";
export const DEFAULT_TIMEOUT_SECONDS = 1800;
export const DEFAULT_TEMPERATURE = 0.7;

export type EnvMap = Record<string, string | undefined>;

export interface GeneratorConfig {
  llm: LlmConfig;
  settings: GeneratorSettings;
  /** Path of the .env file that was applied, if any. */
  envFile: string | null;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: EnvMap;
  settingsPath?: string;
}

export function parseDotEnv(raw: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const idx = trimmed.indexOf("=");
    if (idx <= 0) {
      continue;
    }
    const key = trimmed.slice(0, idx).replace(/^export\s+/, "").trim();
    let value = trimmed.slice(idx + 1).trim();
    if ((value.startsWith("\"") && value.endsWith("\"")) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    if (key) {
      out[key] = value;
    }
  }
  return out;
}

/**
 * Applies the first .env found in `cwd` or up to two parents. Variables that
 * are already set win.
 */
export async function loadDotEnv(cwd: string, env: EnvMap): Promise<string | null> {
  const candidates = [
    path.resolve(cwd, ".env"),
    path.resolve(cwd, "..", ".env"),
    path.resolve(cwd, "..", "..", ".env"),
  ];

  for (const envPath of candidates) {
    let raw: string;
    try {
      raw = await readFile(envPath, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) {
        continue;
      }
      throw new ConfigurationError(`Cannot read ${envPath}: ${toErrorMessage(error)}`, { cause: error });
    }
    for (const [key, value] of Object.entries(parseDotEnv(raw))) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    return envPath;
  }
  return null;
}

function formatZodPath(pathParts: ReadonlyArray<string | number>): string {
  return pathParts.length > 0 ? pathParts.join(".") : "(root)";
}

export async function readSettingsFile(filePath: string): Promise<GeneratorSettings> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read settings file ${filePath}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Settings file ${filePath} is not valid JSON: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }
  const parsed = generatorSettingsSchema.safeParse(payload);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${formatZodPath(issue.path)}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid settings in ${filePath}: ${problems}`, { cause: parsed.error });
  }
  return parsed.data;
}

function readNumberEnv(env: EnvMap, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${key} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.map((value) => value?.trim()).find((value) => Boolean(value));
}

export async function loadGeneratorConfig(options: LoadConfigOptions = {}): Promise<GeneratorConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const envFile = await loadDotEnv(cwd, env);

  const settings = options.settingsPath
    ? await readSettingsFile(path.resolve(cwd, options.settingsPath))
    : generatorSettingsSchema.parse({});

  const apiKey = firstNonEmpty(env.LLM_API_KEY, env.DEEPSEEK_API_KEY);
  if (!apiKey) {
    throw new ConfigurationError(
      "No API key configured. Set LLM_API_KEY (or DEEPSEEK_API_KEY) in the environment or a .env file.",
    );
  }

  const model = firstNonEmpty(env.LLM_MODEL, env.DEEPSEEK_MODEL) ?? DEFAULT_MODEL;
  const llm: LlmConfig = {
    baseUrl: firstNonEmpty(env.LLM_BASE_URL) ?? DEFAULT_BASE_URL,
    model,
    apiKey,
    temperature: readNumberEnv(env, "LLM_TEMPERATURE", DEFAULT_TEMPERATURE),
    timeout: readNumberEnv(env, "LLM_TIMEOUT_SECONDS", DEFAULT_TIMEOUT_SECONDS),
    jsonMode: settings.jsonMode,
    reasoning: usesReasoning(model, settings.reasoning),
  };

  return { llm, settings, envFile };
}
