import { KeyedWriteQueue } from "../../../core/_shared/utils/keyed_queue";
import type { ExtractedFact, LongTermMemoryStore } from "../../../core/memory/memory.types";
import { REINFORCEMENT_MIN_SESSIONS } from "../../../core/memory/memory.types";
import type { FactKind, LongTermFact } from "../../../core/turn/turn.types";
import { SQLiteStorage, type SQLiteStorageOptions } from "./sqlite.storage";

const FACT_KINDS: readonly FactKind[] = ["allergy", "restriction", "diet", "like", "dislike"];

function parseFactKind(value: unknown): FactKind {
  const matched = FACT_KINDS.find((kind) => kind === value);
  if (!matched) {
    throw new Error(`LONG_TERM_MEMORY_STORE_ERROR unknown fact kind '${String(value)}'`);
  }
  return matched;
}

function assertUserId(userId: string): void {
  if (userId.trim() === "") {
    throw new Error("LONG_TERM_MEMORY_STORE_ERROR userId must be non-empty");
  }
}

/**
 * Long-term memory over the shared SQLite connection. Facts and their sessions are only
 * ever inserted; `reinforced` only ever flips from 0 to 1. Writes for one user run in order.
 */
export class SQLiteLongTermMemoryStore implements LongTermMemoryStore {
  private readonly queue = new KeyedWriteQueue();

  constructor(private readonly storage: SQLiteStorage) {}

  async loadFacts(userId: string): Promise<readonly LongTermFact[]> {
    assertUserId(userId);
    await this.queue.flush(userId);
    return this.readFacts(userId);
  }

  recordFacts(userId: string, sessionId: string, facts: readonly ExtractedFact[]): Promise<void> {
    assertUserId(userId);
    return this.queue.enqueue(userId, () => {
      this.storage.transaction(() => {
        for (const fact of facts) {
          this.storage.exec(
            `INSERT OR IGNORE INTO long_term_facts(user_id, fact_key, kind, subject, text, reinforced, seq)
             VALUES (?, ?, ?, ?, ?, 0,
               (SELECT COALESCE(MAX(seq), 0) + 1 FROM long_term_facts WHERE user_id = ?))`,
            [userId, fact.key, fact.kind, fact.subject, fact.text, userId]
          );
          this.storage.exec(
            "INSERT OR IGNORE INTO fact_sessions(user_id, fact_key, session_id) VALUES (?, ?, ?)",
            [userId, fact.key, sessionId]
          );
        }
      });
    });
  }

  consolidate(
    userId: string,
    minSessions: number = REINFORCEMENT_MIN_SESSIONS
  ): Promise<readonly LongTermFact[]> {
    assertUserId(userId);
    return this.queue.enqueue(userId, () => {
      this.storage.exec(
        `UPDATE long_term_facts SET reinforced = 1
         WHERE user_id = ? AND reinforced = 0 AND (
           SELECT COUNT(*) FROM fact_sessions fs
           WHERE fs.user_id = long_term_facts.user_id AND fs.fact_key = long_term_facts.fact_key
         ) >= ?`,
        [userId, minSessions]
      );
      return this.readFacts(userId);
    });
  }

  private readFacts(userId: string): readonly LongTermFact[] {
    const rows = this.storage.query<{
      fact_key: unknown;
      kind: unknown;
      subject: unknown;
      text: unknown;
      reinforced: unknown;
    }>(
      `SELECT fact_key, kind, subject, text, reinforced FROM long_term_facts
       WHERE user_id = ? ORDER BY reinforced DESC, seq ASC`,
      [userId]
    );
    const sessions = this.storage.query<{ fact_key: unknown; session_id: unknown }>(
      "SELECT fact_key, session_id FROM fact_sessions WHERE user_id = ? ORDER BY rowid ASC",
      [userId]
    );

    const sessionsByKey = new Map<string, string[]>();
    for (const row of sessions) {
      const key = String(row.fact_key);
      const list = sessionsByKey.get(key) ?? [];
      list.push(String(row.session_id));
      sessionsByKey.set(key, list);
    }

    return rows.map((row) => ({
      key: String(row.fact_key),
      kind: parseFactKind(row.kind),
      subject: String(row.subject),
      text: String(row.text),
      reinforced: Number(row.reinforced) === 1,
      sessionIds: sessionsByKey.get(String(row.fact_key)) ?? [],
    }));
  }
}

export interface SQLiteStorageLayer {
  readonly storage: SQLiteStorage;
  readonly longTermMemory: SQLiteLongTermMemoryStore;
}

export function createSQLiteStorageLayer(options: SQLiteStorageOptions = {}): SQLiteStorageLayer {
  const storage = new SQLiteStorage(options);
  return {
    storage,
    longTermMemory: new SQLiteLongTermMemoryStore(storage),
  };
}
