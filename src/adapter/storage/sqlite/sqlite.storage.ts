import fs from "node:fs";
import path from "node:path";
import BetterSqlite3, { type Database as BetterSqliteDatabase } from "better-sqlite3";

export type SQLiteParam = string | number | bigint | Buffer | null;

export interface SQLiteStorageOptions {
  readonly dbPath?: string;
  readonly expectedSchemaVersion?: string;
}

export const DEFAULT_SQLITE_DB_REL_PATH = path.join("ops", "runtime", "memory.db");
export const SQLITE_STORAGE_SCHEMA_VERSION = "1";

const CREATE_SCHEMA_VERSION_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version TEXT PRIMARY KEY,
  applied_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
);
`;

const CREATE_MEMORY_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS long_term_facts (
  user_id TEXT NOT NULL,
  fact_key TEXT NOT NULL,
  kind TEXT CHECK(kind IN ('allergy', 'restriction', 'diet', 'like', 'dislike')) NOT NULL,
  subject TEXT NOT NULL,
  text TEXT NOT NULL,
  reinforced INTEGER NOT NULL DEFAULT 0,
  seq INTEGER NOT NULL,
  created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (user_id, fact_key)
);

CREATE TABLE IF NOT EXISTS fact_sessions (
  user_id TEXT NOT NULL,
  fact_key TEXT NOT NULL,
  session_id TEXT NOT NULL,
  seen_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
  PRIMARY KEY (user_id, fact_key, session_id),
  FOREIGN KEY(user_id, fact_key) REFERENCES long_term_facts(user_id, fact_key)
);

CREATE INDEX IF NOT EXISTS idx_long_term_facts_user_rank
  ON long_term_facts(user_id, reinforced, seq);
`;

function resolveDbPath(explicitPath?: string): string {
  if (explicitPath && explicitPath.trim() !== "") {
    return path.resolve(explicitPath);
  }
  return path.resolve(process.cwd(), DEFAULT_SQLITE_DB_REL_PATH);
}

export class SQLiteStorage {
  private readonly dbPath: string;
  private readonly expectedSchemaVersion: string;
  private db: BetterSqliteDatabase | null = null;
  private closed = false;

  constructor(options: SQLiteStorageOptions = {}) {
    this.dbPath = resolveDbPath(options.dbPath);
    this.expectedSchemaVersion = options.expectedSchemaVersion ?? SQLITE_STORAGE_SCHEMA_VERSION;
  }

  connect(): void {
    if (this.closed) {
      throw new Error("SQLITE_STORAGE_ERROR storage has been closed");
    }
    if (this.db !== null) {
      throw new Error("SQLITE_STORAGE_ERROR single connection already opened");
    }

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    const db = new BetterSqlite3(this.dbPath);

    try {
      db.exec("PRAGMA journal_mode = WAL;");
      db.exec("PRAGMA synchronous = FULL;");
      db.exec("PRAGMA foreign_keys = ON;");
      this.db = db;
      this.initializeSchema();
    } catch (error) {
      db.close();
      this.db = null;
      throw error;
    }
  }

  close(): void {
    if (this.db === null) {
      this.closed = true;
      return;
    }
    this.db.close();
    this.db = null;
    this.closed = true;
  }

  exec(sql: string, params: readonly SQLiteParam[] = []): unknown {
    const db = this.requireDb();
    return db.prepare(sql).run(...params);
  }

  query<T extends Record<string, unknown>>(
    sql: string,
    params: readonly SQLiteParam[] = []
  ): readonly T[] {
    const db = this.requireDb();
    return db.prepare(sql).all(...params) as T[];
  }

  /**
   * Runs `work` inside one transaction; any throw rolls the whole unit back.
   */
  transaction<T>(work: () => T): T {
    const db = this.requireDb();
    return db.transaction(work)();
  }

  private initializeSchema(): void {
    const db = this.requireDb();
    db.exec(CREATE_SCHEMA_VERSION_TABLE_SQL);

    this.validateSchemaVersionTableShape();

    const versions = this.query<{ version: unknown }>(
      "SELECT version FROM schema_version ORDER BY version ASC"
    );

    if (versions.length === 0) {
      db.exec("BEGIN TRANSACTION;");
      try {
        db.exec(CREATE_MEMORY_SCHEMA_SQL);
        this.exec("INSERT INTO schema_version(version) VALUES (?)", [
          this.expectedSchemaVersion,
        ]);
        db.exec("COMMIT;");
      } catch (error) {
        db.exec("ROLLBACK;");
        throw error;
      }
      return;
    }

    this.assertSchemaVersionMatch(versions);
    db.exec(CREATE_MEMORY_SCHEMA_SQL);
  }

  private assertSchemaVersionMatch(versions: readonly { version: unknown }[]): void {
    const storedVersions = versions
      .map((row) => row.version)
      .filter((value): value is string => typeof value === "string");
    const schemaMatches =
      storedVersions.length === 1 && storedVersions[0] === this.expectedSchemaVersion;

    if (!schemaMatches) {
      throw new Error(
        `SQLITE_STORAGE_VERSION_MISMATCH expected=${this.expectedSchemaVersion} actual=${storedVersions.join(",")}`
      );
    }
  }

  private validateSchemaVersionTableShape(): void {
    const columns = this.query<{
      name?: unknown;
      type?: unknown;
      pk?: unknown;
    }>("PRAGMA table_info(schema_version)");

    const normalized = columns.map((column) => ({
      name: typeof column.name === "string" ? column.name : "",
      type: typeof column.type === "string" ? column.type.toUpperCase() : "",
      pk: Number(column.pk ?? 0),
    }));

    const isExactShape =
      normalized.length === 2 &&
      normalized[0]?.name === "version" &&
      normalized[0]?.type === "TEXT" &&
      normalized[0]?.pk === 1 &&
      normalized[1]?.name === "applied_at" &&
      normalized[1]?.type === "TIMESTAMP" &&
      normalized[1]?.pk === 0;

    if (!isExactShape) {
      throw new Error("SQLITE_STORAGE_SCHEMA_CORRUPTED schema_version shape mismatch");
    }
  }

  private requireDb(): BetterSqliteDatabase {
    if (this.db === null) {
      if (this.closed) {
        throw new Error("SQLITE_STORAGE_ERROR connection is closed");
      }
      throw new Error("SQLITE_STORAGE_ERROR connection is not open");
    }
    return this.db;
  }
}
