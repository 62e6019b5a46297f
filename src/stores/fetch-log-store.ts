import type { FetchLogEntry } from "../core/types.js";
import { schema, type Database } from "../db/index.js";
import { fetchLogToInsert } from "../db/mappers.js";

export interface FetchLogStore {
  append(entry: FetchLogEntry): Promise<void>;
}

export class PgFetchLogStore implements FetchLogStore {
  constructor(private db: Database) {}

  async append(entry: FetchLogEntry): Promise<void> {
    await this.db.insert(schema.fetchLogs).values(fetchLogToInsert(entry));
  }
}

// ── In-memory store (tests) ─────────────────────────

export class InMemoryFetchLogStore implements FetchLogStore {
  readonly entries: FetchLogEntry[] = [];

  async append(entry: FetchLogEntry): Promise<void> {
    this.entries.push({ ...entry });
  }
}
