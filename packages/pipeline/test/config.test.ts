import assert from "node:assert/strict";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import test from "node:test";

import { loadGeneratorConfig, parseDotEnv, readSettingsFile } from "../src/config.js";
import type { EnvMap } from "../src/config.js";
import { ConfigurationError } from "../src/errors.js";
import { withTempDir } from "./helpers.js";

async function nestedWorkdir(root: string): Promise<string> {
  const cwd = path.join(root, "a", "b", "c");
  await mkdir(cwd, { recursive: true });
  return cwd;
}

test("parseDotEnv reads quoted values and skips comments", () => {
  const parsed = parseDotEnv(
    ["# comment", "LLM_API_KEY=\"test-secret\"", "export LLM_MODEL='deepseek-chat'", "BROKEN", "=nokey", ""].join("\n"),
  );

  assert.deepEqual(parsed, { LLM_API_KEY: "test-secret", LLM_MODEL: "deepseek-chat" });
});

test("loadGeneratorConfig fills defaults around the key from a .env file", async () => {
  await withTempDir("config-env-", async (root) => {
    const cwd = await nestedWorkdir(root);
    await writeFile(path.join(cwd, ".env"), "LLM_API_KEY=test-secret\n", "utf8");
    const env: EnvMap = {};

    const config = await loadGeneratorConfig({ cwd, env });

    assert.equal(config.envFile, path.join(cwd, ".env"));
    assert.equal(env.LLM_API_KEY, "test-secret");
    assert.deepEqual(config.llm, {
      baseUrl: "https://api.deepseek.com",
      model: "deepseek-reasoner",
      apiKey: "test-secret",
      temperature: 0.7,
      timeout: 1800,
      jsonMode: true,
      reasoning: true,
    });
    assert.equal(config.settings.targetPerTask, 50);
    assert.equal(config.settings.contextCeiling, 110000);
  });
});

test("loadGeneratorConfig prefers variables that are already set", async () => {
  await withTempDir("config-precedence-", async (root) => {
    const cwd = await nestedWorkdir(root);
    await writeFile(path.join(cwd, "..", ".env"), "LLM_API_KEY=from-file\nLLM_MODEL=deepseek-chat\n", "utf8");

    const config = await loadGeneratorConfig({ cwd, env: { LLM_API_KEY: "from-env" } });

    assert.equal(config.llm.apiKey, "from-env");
    assert.equal(config.llm.model, "deepseek-chat");
    assert.equal(config.llm.reasoning, false);
  });
});

test("loadGeneratorConfig accepts the provider-specific variable names", async () => {
  await withTempDir("config-fallback-", async (root) => {
    const cwd = await nestedWorkdir(root);

    const config = await loadGeneratorConfig({
      cwd,
      env: { DEEPSEEK_API_KEY: "test-secret", DEEPSEEK_MODEL: "deepseek-chat", LLM_TIMEOUT_SECONDS: "90" },
    });

    assert.equal(config.llm.apiKey, "test-secret");
    assert.equal(config.llm.model, "deepseek-chat");
    assert.equal(config.llm.timeout, 90);
  });
});

test("loadGeneratorConfig fails without an API key", async () => {
  await withTempDir("config-missing-", async (root) => {
    const cwd = await nestedWorkdir(root);

    await assert.rejects(loadGeneratorConfig({ cwd, env: {} }), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /^No API key configured/);
      return true;
    });
  });
});

test("loadGeneratorConfig rejects a malformed numeric variable", async () => {
  await withTempDir("config-number-", async (root) => {
    const cwd = await nestedWorkdir(root);

    await assert.rejects(
      loadGeneratorConfig({ cwd, env: { LLM_API_KEY: "test-secret", LLM_TEMPERATURE: "warm" } }),
      ConfigurationError,
    );
  });
});

test("a settings file overrides defaults and can force reasoning off", async () => {
  await withTempDir("config-settings-", async (root) => {
    const cwd = await nestedWorkdir(root);
    await writeFile(
      path.join(cwd, "settings.json"),
      JSON.stringify({ targetPerTask: 10, maxRetries: 5, reasoning: false }),
      "utf8",
    );

    const config = await loadGeneratorConfig({
      cwd,
      env: { LLM_API_KEY: "test-secret" },
      settingsPath: "settings.json",
    });

    assert.equal(config.settings.targetPerTask, 10);
    assert.equal(config.settings.maxRetries, 5);
    assert.equal(config.settings.retryDelayMs, 2000);
    assert.equal(config.llm.model, "deepseek-reasoner");
    assert.equal(config.llm.reasoning, false);
  });
});

test("readSettingsFile rejects unknown keys and inverted buffer bounds", async () => {
  await withTempDir("config-invalid-", async (dir) => {
    const unknownKey = path.join(dir, "unknown.json");
    await writeFile(unknownKey, JSON.stringify({ bogus: 1 }), "utf8");
    await assert.rejects(readSettingsFile(unknownKey), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /^Invalid settings in /);
      return true;
    });

    const inverted = path.join(dir, "inverted.json");
    await writeFile(inverted, JSON.stringify({ maxBufferRatio: 0.2, minBufferRatio: 0.4 }), "utf8");
    await assert.rejects(readSettingsFile(inverted), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /minBufferRatio: minBufferRatio must not exceed maxBufferRatio/);
      return true;
    });

    const notJson = path.join(dir, "broken.json");
    await writeFile(notJson, "{ not json", "utf8");
    await assert.rejects(readSettingsFile(notJson), ConfigurationError);
  });
});
