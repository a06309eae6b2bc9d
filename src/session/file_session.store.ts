import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { ConversationTurn } from "../core/turn/turn.types";
import type { SessionRecord, SessionStore } from "./session.types";

const BACKUP_DIR_NAME = "_bak";
const MAX_BACKUP_FILES_PER_GROUP = 10;

const WHITELIST_KEYS = [
  "sessionId",
  "userId",
  "conversationHistory",
  "shortTermMemory",
  "budget",
  "spentEstimate",
  "updatedAt",
] as const;

function toRecord(value: unknown, where: string): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  throw new Error(`SESSION_STATE_VALIDATION_ERROR ${where} must be an object`);
}

function requireString(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  if (typeof value !== "string") {
    throw new Error(`SESSION_STATE_VALIDATION_ERROR ${key} must be a string`);
  }
  return value;
}

function requireAmount(row: Record<string, unknown>, key: string): number {
  const value = row[key];
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new Error(`SESSION_STATE_VALIDATION_ERROR ${key} must be a non-negative number`);
  }
  return value;
}

function requireTurns(row: Record<string, unknown>, key: string): readonly ConversationTurn[] {
  const value = row[key];
  if (!Array.isArray(value)) {
    throw new Error(`SESSION_STATE_VALIDATION_ERROR ${key} must be an array`);
  }
  return value.map((item, idx) => {
    const turn = toRecord(item, `${key}[${idx}]`);
    if (typeof turn.user !== "string" || typeof turn.answer !== "string") {
      throw new Error(
        `SESSION_STATE_VALIDATION_ERROR ${key}[${idx}] requires string user and answer`
      );
    }
    return { user: turn.user, answer: turn.answer };
  });
}

export function validateSessionRecord(value: unknown): SessionRecord {
  const row = toRecord(value, "state");
  const keys = Object.keys(row).sort();
  const allowed = [...WHITELIST_KEYS].sort();

  if (keys.length !== allowed.length || keys.some((key, idx) => key !== allowed[idx])) {
    throw new Error("SESSION_STATE_VALIDATION_ERROR unexpected fields present");
  }

  return {
    sessionId: requireString(row, "sessionId"),
    userId: requireString(row, "userId"),
    conversationHistory: requireTurns(row, "conversationHistory"),
    shortTermMemory: requireTurns(row, "shortTermMemory"),
    budget: requireAmount(row, "budget"),
    spentEstimate: requireAmount(row, "spentEstimate"),
    updatedAt: requireString(row, "updatedAt"),
  };
}

export function sanitizeSessionName(raw: string): string {
  const trimmed = raw.trim();
  if (trimmed === "") {
    throw new Error("SESSION_NAMESPACE_INVALID session name must be non-empty");
  }
  return trimmed.replace(/[^A-Za-z0-9._-]/g, "_");
}

const SESSION_ID_HASH_LENGTH = 12;

// The readable part is lossy; the hash of the raw id keeps distinct sessions apart.
function sessionFileStem(sessionId: string): string {
  const digest = crypto.createHash("sha256").update(sessionId, "utf8").digest("hex");
  return `session_state.${sanitizeSessionName(sessionId)}.${digest.slice(0, SESSION_ID_HASH_LENGTH)}`;
}

export function sessionFilename(sessionId: string): string {
  return `${sessionFileStem(sessionId)}.json`;
}

function formatTimestampLocal(value: Date): string {
  const year = String(value.getFullYear()).padStart(4, "0");
  const month = String(value.getMonth() + 1).padStart(2, "0");
  const day = String(value.getDate()).padStart(2, "0");
  const hours = String(value.getHours()).padStart(2, "0");
  const minutes = String(value.getMinutes()).padStart(2, "0");
  const seconds = String(value.getSeconds()).padStart(2, "0");
  return `${year}${month}${day}_${hours}${minutes}${seconds}`;
}

function enforceBackupRetention(backupDirPath: string, prefix: string): void {
  const entries = fs
    .readdirSync(backupDirPath, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.startsWith(prefix) && entry.name.endsWith(".json.bak"))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  if (entries.length <= MAX_BACKUP_FILES_PER_GROUP) {
    return;
  }

  for (const name of entries.slice(0, entries.length - MAX_BACKUP_FILES_PER_GROUP)) {
    fs.unlinkSync(path.join(backupDirPath, name));
  }
}

/**
 * One JSON file per session under the data directory. Writes go to a temp file first and
 * are renamed into place.
 */
export class FileSessionStore implements SessionStore {
  private readonly dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = path.resolve(dataDir);
  }

  pathFor(sessionId: string): string {
    return path.join(this.dataDir, sessionFilename(sessionId));
  }

  prepareFreshSession(sessionId: string): void {
    const sourcePath = this.pathFor(sessionId);
    if (!fs.existsSync(sourcePath)) {
      return;
    }

    const stem = sessionFileStem(sessionId);
    const backupDirPath = path.join(this.dataDir, BACKUP_DIR_NAME);
    const backupPath = path.join(
      backupDirPath,
      `${stem}.${formatTimestampLocal(new Date())}.json.bak`
    );

    try {
      fs.mkdirSync(backupDirPath, { recursive: true });
      fs.renameSync(sourcePath, backupPath);
      enforceBackupRetention(backupDirPath, `${stem}.`);
      console.log(`[session] session=${sessionId} previous state moved to ${backupPath}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`SESSION_STATE_ROTATION_ERROR ${sourcePath} -> ${backupPath}: ${message}`);
    }
  }

  load(sessionId: string): SessionRecord | null {
    const targetPath = this.pathFor(sessionId);

    let serialized: string;
    try {
      serialized = fs.readFileSync(targetPath, "utf8");
    } catch (error) {
      const nodeError = error as NodeJS.ErrnoException;
      if (nodeError?.code === "ENOENT") {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(serialized) as unknown;
    } catch (error) {
      throw new Error(
        `SESSION_STATE_PARSE_ERROR ${targetPath}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    const record = validateSessionRecord(parsed);
    if (record.sessionId !== sessionId) {
      throw new Error(
        `SESSION_STATE_VALIDATION_ERROR ${targetPath} belongs to session '${record.sessionId}'`
      );
    }
    return record;
  }

  save(next: SessionRecord): void {
    const targetPath = this.pathFor(next.sessionId);
    const tmpPath = `${targetPath}.tmp-${process.pid}`;

    const serialized = `${JSON.stringify(
      {
        sessionId: next.sessionId,
        userId: next.userId,
        conversationHistory: next.conversationHistory,
        shortTermMemory: next.shortTermMemory,
        budget: next.budget,
        spentEstimate: next.spentEstimate,
        updatedAt: new Date().toISOString(),
      },
      null,
      2
    )}\n`;

    fs.mkdirSync(this.dataDir, { recursive: true });
    fs.writeFileSync(tmpPath, serialized, "utf8");
    fs.renameSync(tmpPath, targetPath);
  }
}
