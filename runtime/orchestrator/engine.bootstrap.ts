import path from "node:path";
import { createSQLiteStorageLayer } from "../../src/adapter/storage/sqlite";
import { KeywordTurnClassifier } from "../../src/core/supervisor/turn.classifier";
import { ToolDispatcher } from "../../src/core/tools/tool.dispatcher";
import { createMockToolRegistry } from "../../src/core/tools/tool.registry";
import { FileSessionStore } from "../../src/session/file_session.store";
import { resolveRuntimeConfig, type RuntimeConfig, type RuntimeConfigArgs } from "../config";
import { buildTurnGraph } from "../graph/graph";
import { ConfigurationError } from "../llm/errors";
import { createLLMClient } from "../llm/llm.client";
import type { LLMClient } from "../llm/llm.types";
import { KeywordRetriever, loadKnowledgeEntries } from "../retrieval/keyword.retriever";
import { loadMockCatalog } from "../tools/catalog.loader";
import { TurnEngine } from "./turn_engine";

export const MEMORY_DB_FILENAME = "memory.db";

export interface RuntimeEngineRequest extends RuntimeConfigArgs {
  readonly knowledgePath?: string;
  readonly catalogPath?: string;
  readonly llm?: LLMClient;
}

export interface RuntimeEngineHandle {
  readonly engine: TurnEngine;
  readonly config: RuntimeConfig;
  readonly sessions: FileSessionStore;
  close(): void;
}

/**
 * Wires config, LLM provider, retrieval, tool table and storage into one engine. The caller
 * owns the returned handle and must close it.
 */
export function createRuntimeEngine(
  input: RuntimeEngineRequest,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RuntimeEngineHandle {
  const config = resolveRuntimeConfig(input, env, cwd);

  let llm = input.llm;
  if (!llm) {
    if (config.llm === null) {
      throw new ConfigurationError(
        "CONFIGURATION_ERROR provider must be set via --provider or LLM_PROVIDER"
      );
    }
    llm = createLLMClient(config.llm, env);
  }

  const retriever = new KeywordRetriever(loadKnowledgeEntries(input.knowledgePath));
  const dispatcher = new ToolDispatcher(createMockToolRegistry(loadMockCatalog(input.catalogPath)), {
    timeoutMs: config.toolTimeoutMs,
    maxAttempts: config.toolMaxAttempts,
    backoffMs: config.toolBackoffMs,
  });

  const storageLayer = createSQLiteStorageLayer({
    dbPath: path.join(config.dataDir, MEMORY_DB_FILENAME),
  });
  storageLayer.storage.connect();

  const sessions = new FileSessionStore(config.dataDir);
  const graph = buildTurnGraph({
    llm,
    retriever,
    classifier: new KeywordTurnClassifier(),
    dispatcher,
    memory: storageLayer.longTermMemory,
  });

  console.log(
    `[engine] ready provider=${input.llm ? "injected" : config.llm?.provider ?? "none"} dataDir=${config.dataDir} budget=${config.defaultBudget}`
  );

  return {
    engine: new TurnEngine({
      graph,
      sessions,
      memory: storageLayer.longTermMemory,
      defaultBudget: config.defaultBudget,
    }),
    config,
    sessions,
    close: () => storageLayer.storage.close(),
  };
}
