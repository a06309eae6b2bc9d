import readline from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { ConfigurationError } from "../llm/errors";
import { RuntimeError } from "../error";
import { createRuntimeEngine } from "../orchestrator/engine.bootstrap";
import type { TurnEngine, TurnResult } from "../orchestrator/turn_engine";
import { parseChoiceInput, parseRunLocalArgs, type RunLocalArgs } from "./run_local.args";

const EXIT_COMMANDS = new Set(["/exit", "/quit", "exit", "quit"]);

function printResult(result: TurnResult): void {
  if (result.status === "awaiting_user_choice") {
    console.log(result.interruptPrompt.message);
    return;
  }
  console.log("----- answer -----");
  console.log(result.finalAnswer);
  if (result.status === "completed" && result.sources.length > 0) {
    console.log("----- sources -----");
    for (const source of result.sources) {
      console.log(`(${source.score.toFixed(2)}) ${source.text}`);
    }
  }
  const route = result.status === "completed" ? result.route : "UNROUTABLE";
  console.log(`----- route=${route} confidence=${result.confidence.toFixed(2)} -----`);
}

async function settleInterrupts(
  rl: readline.Interface,
  engine: TurnEngine,
  sessionId: string,
  first: TurnResult
): Promise<TurnResult> {
  let result = first;
  while (result.status === "awaiting_user_choice") {
    printResult(result);
    const raw = await rl.question("continue / substitute / cancel > ");
    const choice = parseChoiceInput(raw);
    if (choice === null) {
      console.log("continue, substitute, cancel 중 하나를 입력해 주세요.");
      continue;
    }
    result = await engine.resolveInterrupt({ sessionId, choice });
  }
  return result;
}

async function runTurn(
  rl: readline.Interface,
  engine: TurnEngine,
  args: RunLocalArgs,
  text: string
): Promise<void> {
  const first = await engine.submitTurn({
    sessionId: args.session,
    userId: args.user,
    text,
    budget: args.budget,
    constraints: typeof args.servings === "number" ? { servings: args.servings } : undefined,
  });
  printResult(await settleInterrupts(rl, engine, args.session, first));
}

function reportError(error: unknown): void {
  if (error instanceof RuntimeError) {
    console.error(`run:local ${error.errorCode}: ${error.message}`);
  } else if (error instanceof ConfigurationError) {
    console.error(`run:local configuration error: ${error.message}`);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`run:local failed: ${message}`);
  }
}

try {
  const args = parseRunLocalArgs(process.argv.slice(2));
  const handle = createRuntimeEngine({
    provider: args.provider,
    model: args.model,
    timeoutMs: args.timeoutMs,
    maxAttempts: args.maxAttempts,
    dataDir: args.dataDir,
    budget: args.budget,
  });
  if (args.freshSession) {
    handle.sessions.prepareFreshSession(args.session);
  }
  console.log(
    `mode=local session=${args.session} user=${args.user ?? args.session} provider=${handle.config.llm?.provider ?? "injected"} model=${handle.config.llm?.model ?? "DEFAULT"}`
  );

  const rl = readline.createInterface({ input: stdin, output: stdout });
  try {
    if (args.initialInput) {
      await runTurn(rl, handle.engine, args, args.initialInput).catch(reportError);
    }
    for (;;) {
      const line = (await rl.question("> ")).trim();
      if (EXIT_COMMANDS.has(line)) {
        break;
      }
      if (line === "") {
        continue;
      }
      await runTurn(rl, handle.engine, args, line).catch(reportError);
    }
  } finally {
    rl.close();
    handle.close();
  }
} catch (error) {
  reportError(error);
  process.exitCode = 1;
}
