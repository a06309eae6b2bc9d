/** Intent: runtime wiring - an engine built from config keeps sessions as JSON and long-term facts in SQLite across restarts. */
import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { LLMClientPort } from "../../../src/core/agent/llm.port";
import { sessionFilename } from "../../../src/session/file_session.store";
import { ConfigurationError } from "../../../runtime/llm/errors";
import { createRuntimeEngine, MEMORY_DB_FILENAME } from "../../../runtime/orchestrator/engine.bootstrap";

class EchoLLM implements LLMClientPort {
  readonly prompts: string[] = [];

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return prompt.includes("[초안]")
      ? "두부조림을 추천해요."
      : JSON.stringify({ draft: "두부조림 초안", tool_calls: [] });
  }
}

function makeTempDir(t: TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-bootstrap-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}

test("a provider is required unless a client is injected", (t) => {
  const dir = makeTempDir(t);
  assert.throws(
    () => createRuntimeEngine({ dataDir: dir }, {}, dir),
    (error: unknown) =>
      error instanceof ConfigurationError &&
      error.message === "CONFIGURATION_ERROR provider must be set via --provider or LLM_PROVIDER"
  );
  assert.throws(
    () => createRuntimeEngine({ dataDir: dir, provider: "gemini" }, {}, dir),
    (error: unknown) => error instanceof ConfigurationError && /GEMINI_API_KEY is required/.test(error.message)
  );
  assert.equal(fs.existsSync(path.join(dir, MEMORY_DB_FILENAME)), false);
});

test("facts written by one engine are loaded by the next", async (t) => {
  const dir = makeTempDir(t);

  const first = createRuntimeEngine({ dataDir: dir, llm: new EchoLLM() }, {}, dir);
  try {
    const result = await first.engine.submitTurn({ sessionId: "s-1", userId: "u-1", text: "땅콩 알레르기 있어요" });
    assert.equal(result.status, "completed");
  } finally {
    first.close();
  }
  assert.equal(fs.existsSync(path.join(dir, MEMORY_DB_FILENAME)), true);
  assert.equal(fs.existsSync(path.join(dir, sessionFilename("s-1"))), true);

  const llm = new EchoLLM();
  const second = createRuntimeEngine({ dataDir: dir, llm, budget: 12000 }, {}, dir);
  try {
    assert.equal(second.config.defaultBudget, 12000);
    assert.equal(second.config.llm, null);
    await second.engine.submitTurn({ sessionId: "s-2", userId: "u-1", text: "반찬 추천해줘" });
    assert.ok(llm.prompts[0]?.includes("[사용자 장기 기억]\n- 땅콩 알레르기"));
    assert.ok(llm.prompts[0]?.includes("- 예산: 12,000원"));
  } finally {
    second.close();
  }
});
