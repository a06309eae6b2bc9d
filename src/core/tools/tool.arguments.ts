import type { ToolArguments } from "../turn/turn.types";

export class ArgumentError extends Error {
  readonly kind = "Argument";

  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

export function assertOnlyKeys(args: ToolArguments, allowed: readonly string[]): void {
  for (const key of Object.keys(args)) {
    if (!allowed.includes(key)) {
      throw new ArgumentError(`unexpected argument '${key}'`);
    }
  }
}

export function requireText(args: ToolArguments, key: string): string {
  const value = args[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ArgumentError(`'${key}' must be a non-empty string`);
  }
  return value.trim();
}

export function optionalText(args: ToolArguments, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ArgumentError(`'${key}' must be a string when present`);
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

export function optionalFlag(args: ToolArguments, key: string): boolean {
  const value = args[key];
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value !== "boolean") {
    throw new ArgumentError(`'${key}' must be a boolean when present`);
  }
  return value;
}
