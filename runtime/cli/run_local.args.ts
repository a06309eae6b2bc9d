import type { BudgetChoice } from "../../src/core/turn/turn.types";

export interface RunLocalArgs {
  initialInput?: string;
  session: string;
  user?: string;
  budget?: number;
  servings?: number;
  provider?: string;
  model?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  freshSession: boolean;
  dataDir?: string;
}

export const DEFAULT_SESSION_NAME = "default";

const CHOICE_ALIASES: Readonly<Record<string, BudgetChoice>> = Object.freeze({
  c: "CONTINUE",
  continue: "CONTINUE",
  계속: "CONTINUE",
  s: "SUBSTITUTE",
  substitute: "SUBSTITUTE",
  대체: "SUBSTITUTE",
  x: "CANCEL",
  cancel: "CANCEL",
  취소: "CANCEL",
});

export function parseChoiceInput(raw: string): BudgetChoice | null {
  const key = raw.trim().toLowerCase();
  return Object.hasOwn(CHOICE_ALIASES, key) ? (CHOICE_ALIASES[key] ?? null) : null;
}

function readText(argv: readonly string[], i: number): string | undefined {
  const next = argv[i + 1];
  if (typeof next === "string" && next.trim() !== "" && !next.startsWith("--")) {
    return next.trim();
  }
  return undefined;
}

function readNumber(argv: readonly string[], i: number): number | undefined {
  const text = readText(argv, i);
  if (typeof text === "undefined") {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function parseRunLocalArgs(argv: string[]): RunLocalArgs {
  const positional: string[] = [];
  const args: RunLocalArgs = { session: DEFAULT_SESSION_NAME, freshSession: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (typeof token === "undefined" || token === "--") {
      continue;
    }
    if (token === "--fresh" || token === "--fresh-session") {
      args.freshSession = true;
      continue;
    }

    if (token === "--session" || token === "--user" || token === "--provider" || token === "--model" || token === "--data-dir") {
      const value = readText(argv, i);
      if (typeof value === "undefined") {
        throw new Error(`${token} requires a value`);
      }
      i += 1;
      if (token === "--session") {
        args.session = value;
      } else if (token === "--user") {
        args.user = value;
      } else if (token === "--provider") {
        args.provider = value;
      } else if (token === "--model") {
        args.model = value;
      } else {
        args.dataDir = value;
      }
      continue;
    }

    if (token === "--budget" || token === "--servings" || token === "--timeoutMs" || token === "--maxAttempts") {
      const value = readNumber(argv, i);
      if (typeof value === "undefined") {
        throw new Error(`${token} requires a numeric value`);
      }
      i += 1;
      if (token === "--budget") {
        args.budget = value;
      } else if (token === "--servings") {
        args.servings = value;
      } else if (token === "--timeoutMs") {
        args.timeoutMs = value;
      } else {
        args.maxAttempts = value;
      }
      continue;
    }

    positional.push(token);
  }

  if (positional.length > 0) {
    args.initialInput = positional.join(" ");
  }
  return args;
}
