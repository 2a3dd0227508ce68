import type { Pool } from "pg";
import { INTENT_TYPES, type IntentType, type QueryHistoryEntry, type ResponseSource } from "./types";

export const DEFAULT_HISTORY_LIMIT = 20;
export const MAX_HISTORY_LIMIT = 100;

/** Stores answered queries so a user can look back at them. */
export interface HistoryStore {
  init(): Promise<void>;
  record(entry: QueryHistoryEntry): Promise<void>;
  listByUser(userId: string, limit?: number): Promise<QueryHistoryEntry[]>;
}

type HistoryRow = {
  user_id: string | null;
  session_id: string;
  query: string;
  summary: string;
  intent: string;
  source: string;
  retrieved_case_count: number;
  created_at: Date;
};

function toIntent(value: string): IntentType {
  return INTENT_TYPES.find((intent) => intent === value) ?? "general_inquiry";
}

function toSource(value: string): ResponseSource {
  return value === "golden_kb" ? "golden_kb" : "pipeline";
}

export class PgHistoryStore implements HistoryStore {
  constructor(private readonly pool: Pool) {}

  async init(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS query_history (
        id SERIAL PRIMARY KEY,
        created_at TIMESTAMPTZ DEFAULT NOW(),
        user_id TEXT,
        session_id TEXT NOT NULL,
        query TEXT NOT NULL,
        summary TEXT NOT NULL,
        intent TEXT NOT NULL,
        source TEXT NOT NULL,
        retrieved_case_count INTEGER NOT NULL
      );
    `);
    await this.pool.query("CREATE INDEX IF NOT EXISTS query_history_user_idx ON query_history (user_id, created_at DESC);");
  }

  async record(entry: QueryHistoryEntry): Promise<void> {
    const values = [
      entry.userId,
      entry.sessionId,
      entry.query,
      entry.summary,
      entry.intent,
      entry.source,
      entry.retrievedCaseCount,
      entry.createdAt
    ];

    await this.pool.query(
      `INSERT INTO query_history (user_id, session_id, query, summary, intent, source, retrieved_case_count, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
      values
    );
  }

  async listByUser(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<QueryHistoryEntry[]> {
    const result = await this.pool.query<HistoryRow>(
      `SELECT user_id, session_id, query, summary, intent, source, retrieved_case_count, created_at
       FROM query_history
       WHERE user_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [userId, limit]
    );

    return result.rows.map((row) => ({
      userId: row.user_id,
      sessionId: row.session_id,
      query: row.query,
      summary: row.summary,
      intent: toIntent(row.intent),
      source: toSource(row.source),
      retrievedCaseCount: row.retrieved_case_count,
      createdAt: row.created_at
    }));
  }
}

export interface InMemoryHistoryOptions {
  /** Newest entries kept for each user. */
  maxEntriesPerUser?: number;
  /** Users kept; the one written to least recently is dropped first. */
  maxUsers?: number;
}

/**
 * Process-local history used when no database is configured. Entries without
 * a user id are not kept, since `listByUser` could never return them.
 */
export class InMemoryHistoryStore implements HistoryStore {
  private readonly entriesByUser = new Map<string, QueryHistoryEntry[]>();

  private readonly maxEntriesPerUser: number;

  private readonly maxUsers: number;

  constructor(options: InMemoryHistoryOptions = {}) {
    this.maxEntriesPerUser = Math.max(1, options.maxEntriesPerUser ?? MAX_HISTORY_LIMIT);
    this.maxUsers = Math.max(1, options.maxUsers ?? 1_000);
  }

  async init(): Promise<void> {
    // nothing to prepare
  }

  async record(entry: QueryHistoryEntry): Promise<void> {
    if (entry.userId === null) {
      return;
    }

    const entries = this.entriesByUser.get(entry.userId) ?? [];
    this.entriesByUser.delete(entry.userId);
    entries.push({ ...entry });
    if (entries.length > this.maxEntriesPerUser) {
      entries.splice(0, entries.length - this.maxEntriesPerUser);
    }
    this.entriesByUser.set(entry.userId, entries);

    while (this.entriesByUser.size > this.maxUsers) {
      const oldest = this.entriesByUser.keys().next();
      if (oldest.done) {
        break;
      }
      this.entriesByUser.delete(oldest.value);
    }
  }

  async listByUser(userId: string, limit = DEFAULT_HISTORY_LIMIT): Promise<QueryHistoryEntry[]> {
    const entries = this.entriesByUser.get(userId) ?? [];
    return [...entries].reverse().slice(0, Math.max(0, limit));
  }
}
