/** Intent: session records - whitelist-only JSON per session, fail-fast load, atomic save, and backup on a fresh start. */
import test, { type TestContext } from "node:test";
import assert from "node:assert/strict";
import crypto from "node:crypto";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  FileSessionStore,
  sessionFilename,
  validateSessionRecord,
} from "../../src/session/file_session.store";
import type { SessionRecord } from "../../src/session/session.types";

function makeTempDir(t: TestContext): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "session-store-"));
  t.after(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
  return dir;
}

function sampleRecord(sessionId = "s-1"): SessionRecord {
  return {
    sessionId,
    userId: "u-1",
    conversationHistory: [{ user: "스테이크 레시피", answer: "간단 스테이크" }],
    shortTermMemory: [{ user: "스테이크 레시피", answer: "간단 스테이크" }],
    budget: 30000,
    spentEstimate: 23000,
    updatedAt: "1970-01-01T00:00:00.000Z",
  };
}

function idHash(sessionId: string): string {
  return crypto.createHash("sha256").update(sessionId, "utf8").digest("hex").slice(0, 12);
}

test("session file names are sanitized and carry a hash of the raw id", () => {
  assert.equal(
    sessionFilename("web/alice 1"),
    `session_state.web_alice_1.${idHash("web/alice 1")}.json`
  );
  assert.throws(() => sessionFilename("  "), /SESSION_NAMESPACE_INVALID/);
});

test("ids that sanitize alike keep separate files", (t) => {
  const dir = makeTempDir(t);
  const store = new FileSessionStore(dir);
  assert.notEqual(store.pathFor("가족1"), store.pathFor("친구1"));

  store.save(sampleRecord("가족1"));
  assert.equal(store.load("친구1"), null);
  store.save(sampleRecord("친구1"));
  assert.equal(store.load("가족1")?.sessionId, "가족1");
  assert.equal(store.load("친구1")?.sessionId, "친구1");
});

test("load of a missing session returns null without creating a file", (t) => {
  const dir = makeTempDir(t);
  const store = new FileSessionStore(dir);
  assert.equal(store.load("s-1"), null);
  assert.equal(fs.existsSync(store.pathFor("s-1")), false);
});

test("save then load round-trips the whitelisted fields", (t) => {
  const dir = makeTempDir(t);
  const store = new FileSessionStore(dir);
  store.save(sampleRecord());

  const loaded = store.load("s-1");
  assert.ok(loaded);
  assert.deepEqual({ ...loaded, updatedAt: "x" }, { ...sampleRecord(), updatedAt: "x" });
  assert.notEqual(loaded.updatedAt, "1970-01-01T00:00:00.000Z");
  assert.deepEqual(
    fs.readdirSync(dir).filter((name) => name.includes(".tmp-")),
    []
  );
});

test("unexpected fields and wrong types are rejected", () => {
  assert.throws(
    () => validateSessionRecord({ ...sampleRecord(), draftAnswer: "leak" }),
    /SESSION_STATE_VALIDATION_ERROR unexpected fields present/
  );
  assert.throws(
    () => validateSessionRecord({ ...sampleRecord(), budget: -1 }),
    /SESSION_STATE_VALIDATION_ERROR budget must be a non-negative number/
  );
  assert.throws(
    () => validateSessionRecord({ ...sampleRecord(), conversationHistory: [{ user: "q" }] }),
    /SESSION_STATE_VALIDATION_ERROR conversationHistory\[0\] requires string user and answer/
  );
});

test("corrupt JSON and a record of another session fail fast", (t) => {
  const dir = makeTempDir(t);
  const store = new FileSessionStore(dir);
  fs.writeFileSync(store.pathFor("s-1"), "{not json", "utf8");
  assert.throws(() => store.load("s-1"), /SESSION_STATE_PARSE_ERROR/);

  fs.writeFileSync(store.pathFor("s-2"), JSON.stringify(sampleRecord("s-3")), "utf8");
  assert.throws(() => store.load("s-2"), /belongs to session 's-3'/);
});

test("a fresh session moves the old record into the backup directory", (t) => {
  const dir = makeTempDir(t);
  const store = new FileSessionStore(dir);
  store.prepareFreshSession("s-1");
  store.save(sampleRecord());

  store.prepareFreshSession("s-1");
  assert.equal(store.load("s-1"), null);
  const backups = fs.readdirSync(path.join(dir, "_bak"));
  assert.equal(backups.length, 1);
  assert.match(
    backups[0] ?? "",
    new RegExp(`^session_state\\.s-1\\.${idHash("s-1")}\\.\\d{8}_\\d{6}\\.json\\.bak$`)
  );
});
