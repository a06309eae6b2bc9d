import path from "node:path";
import { ConfigurationError } from "./llm/errors";
import { LLM_PROVIDERS, type LLMProvider, type LLMSettings } from "./llm/llm.types";

export interface RuntimeConfigArgs {
  readonly dataDir?: string;
  readonly budget?: number;
  readonly provider?: string;
  readonly model?: string;
  readonly timeoutMs?: number;
  readonly maxAttempts?: number;
}

export interface RuntimeConfigEnv {
  readonly RECIPE_DATA_DIR?: string;
  readonly RECIPE_DEFAULT_BUDGET?: string;
  readonly RECIPE_TOOL_TIMEOUT_MS?: string;
  readonly RECIPE_TOOL_MAX_ATTEMPTS?: string;
  readonly LLM_PROVIDER?: string;
  readonly LLM_MODEL?: string;
  readonly LLM_TIMEOUT_MS?: string;
  readonly LLM_MAX_ATTEMPTS?: string;
}

export interface RuntimeConfig {
  readonly dataDir: string;
  readonly defaultBudget: number;
  readonly toolTimeoutMs: number;
  readonly toolMaxAttempts: number;
  readonly toolBackoffMs: readonly number[];
  /** Null when no provider is named; the caller must then inject a client. */
  readonly llm: LLMSettings | null;
}

export const DEFAULT_DATA_REL_DIR = path.join("ops", "runtime");
const DEFAULT_BUDGET_WON = 30000;
const DEFAULT_TOOL_TIMEOUT_MS = 5000;
const DEFAULT_TOOL_MAX_ATTEMPTS = 2;
const DEFAULT_TOOL_BACKOFF_MS = [200, 400] as const;
const DEFAULT_LLM_TIMEOUT_MS = 30000;
const DEFAULT_LLM_MAX_ATTEMPTS = 3;
const DEFAULT_LLM_BACKOFF_MS = [500, 1000] as const;

function toTrimmedString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

function parseNumberOption(value: string | number | undefined, field: string): number | undefined {
  if (typeof value === "undefined") {
    return undefined;
  }
  const num = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isFinite(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be a number`);
  }
  return num;
}

function parseIntegerOption(value: string | number | undefined, field: string): number | undefined {
  const num = parseNumberOption(typeof value === "string" ? toTrimmedString(value) : value, field);
  if (typeof num === "number" && !Number.isInteger(num)) {
    throw new ConfigurationError(`CONFIGURATION_ERROR ${field} must be an integer`);
  }
  return num;
}

function backoffSchedule(steps: readonly number[], maxAttempts: number): readonly number[] {
  return steps.slice(0, Math.max(0, maxAttempts - 1));
}

function parseProvider(value: string): LLMProvider {
  const normalized = value.toLowerCase();
  const provider = LLM_PROVIDERS.find((candidate) => candidate === normalized);
  if (!provider) {
    throw new ConfigurationError(
      `CONFIGURATION_ERROR unsupported provider='${value}'. expected one of: ${LLM_PROVIDERS.join("|")}`
    );
  }
  return provider;
}

// Flags win over environment; timeouts and attempts fall back to the defaults above.
function resolveLLMSettings(args: RuntimeConfigArgs, env: RuntimeConfigEnv): LLMSettings | null {
  const providerRaw = toTrimmedString(args.provider) ?? toTrimmedString(env.LLM_PROVIDER);
  if (!providerRaw) {
    return null;
  }
  const provider = parseProvider(providerRaw);

  const timeoutMs =
    parseIntegerOption(args.timeoutMs, "timeoutMs") ??
    parseIntegerOption(env.LLM_TIMEOUT_MS, "LLM_TIMEOUT_MS") ??
    DEFAULT_LLM_TIMEOUT_MS;
  if (timeoutMs <= 0) {
    throw new ConfigurationError("CONFIGURATION_ERROR timeoutMs must be > 0");
  }

  const maxAttempts =
    parseIntegerOption(args.maxAttempts, "maxAttempts") ??
    parseIntegerOption(env.LLM_MAX_ATTEMPTS, "LLM_MAX_ATTEMPTS") ??
    DEFAULT_LLM_MAX_ATTEMPTS;
  if (maxAttempts < 1) {
    throw new ConfigurationError("CONFIGURATION_ERROR maxAttempts must be >= 1");
  }

  return {
    provider,
    model: toTrimmedString(args.model) ?? toTrimmedString(env.LLM_MODEL),
    timeoutMs,
    maxAttempts,
    backoffMs: backoffSchedule(DEFAULT_LLM_BACKOFF_MS, maxAttempts),
  };
}

export function resolveRuntimeConfig(
  args: RuntimeConfigArgs,
  env: RuntimeConfigEnv,
  cwd: string = process.cwd()
): RuntimeConfig {
  const dataDirRaw = toTrimmedString(args.dataDir) ?? toTrimmedString(env.RECIPE_DATA_DIR);
  const dataDir = path.resolve(cwd, dataDirRaw ?? DEFAULT_DATA_REL_DIR);

  const defaultBudget =
    parseNumberOption(args.budget, "budget") ??
    parseNumberOption(toTrimmedString(env.RECIPE_DEFAULT_BUDGET), "RECIPE_DEFAULT_BUDGET") ??
    DEFAULT_BUDGET_WON;
  if (defaultBudget < 0) {
    throw new ConfigurationError("CONFIGURATION_ERROR budget must be >= 0");
  }

  const toolTimeoutMs =
    parseIntegerOption(env.RECIPE_TOOL_TIMEOUT_MS, "RECIPE_TOOL_TIMEOUT_MS") ??
    DEFAULT_TOOL_TIMEOUT_MS;
  if (toolTimeoutMs <= 0) {
    throw new ConfigurationError("CONFIGURATION_ERROR RECIPE_TOOL_TIMEOUT_MS must be > 0");
  }

  const toolMaxAttempts =
    parseIntegerOption(env.RECIPE_TOOL_MAX_ATTEMPTS, "RECIPE_TOOL_MAX_ATTEMPTS") ??
    DEFAULT_TOOL_MAX_ATTEMPTS;
  if (toolMaxAttempts < 1) {
    throw new ConfigurationError("CONFIGURATION_ERROR RECIPE_TOOL_MAX_ATTEMPTS must be >= 1");
  }

  return {
    dataDir,
    defaultBudget,
    toolTimeoutMs,
    toolMaxAttempts,
    toolBackoffMs: backoffSchedule(DEFAULT_TOOL_BACKOFF_MS, toolMaxAttempts),
    llm: resolveLLMSettings(args, env),
  };
}
