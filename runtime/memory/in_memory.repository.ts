import { KeyedWriteQueue } from "../../src/core/_shared/utils/keyed_queue";
import type { ExtractedFact, LongTermMemoryStore } from "../../src/core/memory/memory.types";
import { REINFORCEMENT_MIN_SESSIONS, rankFacts } from "../../src/core/memory/memory.types";
import type { LongTermFact } from "../../src/core/turn/turn.types";

interface StoredFact {
  readonly fact: ExtractedFact;
  readonly sessionIds: string[];
  reinforced: boolean;
}

export class InMemoryLongTermMemoryStore implements LongTermMemoryStore {
  private readonly users = new Map<string, Map<string, StoredFact>>();
  private readonly queue = new KeyedWriteQueue();

  async loadFacts(userId: string): Promise<readonly LongTermFact[]> {
    await this.queue.flush(userId);
    return this.snapshot(userId);
  }

  recordFacts(userId: string, sessionId: string, facts: readonly ExtractedFact[]): Promise<void> {
    return this.queue.enqueue(userId, () => {
      const entries = this.users.get(userId) ?? new Map<string, StoredFact>();
      for (const fact of facts) {
        const existing = entries.get(fact.key);
        if (!existing) {
          entries.set(fact.key, { fact, sessionIds: [sessionId], reinforced: false });
        } else if (!existing.sessionIds.includes(sessionId)) {
          existing.sessionIds.push(sessionId);
        }
      }
      this.users.set(userId, entries);
    });
  }

  consolidate(
    userId: string,
    minSessions: number = REINFORCEMENT_MIN_SESSIONS
  ): Promise<readonly LongTermFact[]> {
    return this.queue.enqueue(userId, () => {
      for (const entry of this.users.get(userId)?.values() ?? []) {
        if (entry.sessionIds.length >= minSessions) {
          entry.reinforced = true;
        }
      }
      return this.snapshot(userId);
    });
  }

  private snapshot(userId: string): readonly LongTermFact[] {
    const facts = [...(this.users.get(userId)?.values() ?? [])].map((entry) => ({
      ...entry.fact,
      reinforced: entry.reinforced,
      sessionIds: [...entry.sessionIds],
    }));
    return rankFacts(facts);
  }
}
