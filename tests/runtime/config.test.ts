/** Intent: runtime configuration defaults and validation of flags and environment, including the LLM provider settings. */
import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import { resolveRuntimeConfig } from "../../runtime/config";
import { ConfigurationError } from "../../runtime/llm/errors";

test("defaults apply when nothing is set", () => {
  assert.deepEqual(resolveRuntimeConfig({}, {}, "/work"), {
    dataDir: path.resolve("/work", "ops", "runtime"),
    defaultBudget: 30000,
    toolTimeoutMs: 5000,
    toolMaxAttempts: 2,
    toolBackoffMs: [200],
    llm: null,
  });
});

test("flags win over environment values", () => {
  const config = resolveRuntimeConfig(
    { dataDir: "flag-dir", budget: 10000 },
    {
      RECIPE_DATA_DIR: "env-dir",
      RECIPE_DEFAULT_BUDGET: "50000",
      RECIPE_TOOL_TIMEOUT_MS: "250",
      RECIPE_TOOL_MAX_ATTEMPTS: "3",
    },
    "/work"
  );
  assert.equal(config.dataDir, path.resolve("/work", "flag-dir"));
  assert.equal(config.defaultBudget, 10000);
  assert.equal(config.toolTimeoutMs, 250);
  assert.equal(config.toolMaxAttempts, 3);
  assert.deepEqual(config.toolBackoffMs, [200, 400]);
});

test("invalid values are configuration errors", () => {
  const cases = [
    () => resolveRuntimeConfig({ budget: -1 }, {}),
    () => resolveRuntimeConfig({}, { RECIPE_DEFAULT_BUDGET: "lots" }),
    () => resolveRuntimeConfig({}, { RECIPE_TOOL_TIMEOUT_MS: "0" }),
    () => resolveRuntimeConfig({}, { RECIPE_TOOL_MAX_ATTEMPTS: "1.5" }),
  ];
  for (const run of cases) {
    assert.throws(run, (error: unknown) => error instanceof ConfigurationError && error.message.startsWith("CONFIGURATION_ERROR"));
  }
});

function isConfigError(pattern: RegExp) {
  return (error: unknown): boolean => error instanceof ConfigurationError && pattern.test(error.message);
}

test("a named provider resolves with retry defaults", () => {
  assert.deepEqual(resolveRuntimeConfig({ provider: " OLLAMA " }, {}, "/work").llm, {
    provider: "ollama",
    model: undefined,
    timeoutMs: 30000,
    maxAttempts: 3,
    backoffMs: [500, 1000],
  });
  assert.equal(resolveRuntimeConfig({}, { LLM_PROVIDER: "gemini" }, "/work").llm?.provider, "gemini");
});

test("provider flags win over environment", () => {
  const llm = resolveRuntimeConfig(
    { provider: "openai", model: "flag-model", maxAttempts: 1 },
    { LLM_PROVIDER: "gemini", LLM_MODEL: "env-model", LLM_MAX_ATTEMPTS: "5", LLM_TIMEOUT_MS: "900" },
    "/work"
  ).llm;
  assert.deepEqual(llm, {
    provider: "openai",
    model: "flag-model",
    timeoutMs: 900,
    maxAttempts: 1,
    backoffMs: [],
  });
});

test("unknown providers and bad retry settings are rejected", () => {
  assert.throws(
    () => resolveRuntimeConfig({ provider: "claude" }, {}),
    isConfigError(/^CONFIGURATION_ERROR unsupported provider='claude'\. expected one of: ollama\|gemini\|openai$/)
  );
  assert.throws(
    () => resolveRuntimeConfig({ provider: "ollama" }, { LLM_TIMEOUT_MS: "fast" }),
    isConfigError(/LLM_TIMEOUT_MS must be a number/)
  );
  assert.throws(
    () => resolveRuntimeConfig({ provider: "ollama", maxAttempts: 0 }, {}),
    isConfigError(/maxAttempts must be >= 1/)
  );
  assert.throws(
    () => resolveRuntimeConfig({ provider: "ollama" }, { LLM_TIMEOUT_MS: "0" }),
    isConfigError(/timeoutMs must be > 0/)
  );
});

test("retry settings without a provider are not read", () => {
  assert.equal(resolveRuntimeConfig({ maxAttempts: 0 }, { LLM_TIMEOUT_MS: "fast" }, "/work").llm, null);
});
