import { eq, and, asc } from "drizzle-orm";
import type { Source, SourceSeed, SourceType } from "../core/types.js";
import { schema, type Database } from "../db/index.js";
import { rowToSource, seedToSourceInsert } from "../db/mappers.js";

export interface SourceFilters {
  type?: SourceType;
  enabled?: boolean;
}

export interface SourceStore {
  list(filters?: SourceFilters): Promise<Source[]>;
  get(id: number): Promise<Source | null>;
  getByName(name: string): Promise<Source | null>;
  upsert(seed: SourceSeed): Promise<Source>;
  markFetched(id: number, at: string): Promise<void>;
}

export class PgSourceStore implements SourceStore {
  constructor(private db: Database) {}

  async list(filters?: SourceFilters): Promise<Source[]> {
    const conditions: ReturnType<typeof eq>[] = [];

    if (filters?.type) {
      conditions.push(eq(schema.sources.type, filters.type));
    }
    if (filters?.enabled !== undefined) {
      conditions.push(eq(schema.sources.enabled, filters.enabled));
    }

    const where = conditions.length > 0 ? and(...conditions) : undefined;
    const rows = await this.db
      .select()
      .from(schema.sources)
      .where(where)
      .orderBy(asc(schema.sources.id));
    return rows.map(rowToSource);
  }

  async get(id: number): Promise<Source | null> {
    const [row] = await this.db
      .select()
      .from(schema.sources)
      .where(eq(schema.sources.id, id))
      .limit(1);
    return row ? rowToSource(row) : null;
  }

  async getByName(name: string): Promise<Source | null> {
    const [row] = await this.db
      .select()
      .from(schema.sources)
      .where(eq(schema.sources.name, name))
      .limit(1);
    return row ? rowToSource(row) : null;
  }

  async upsert(seed: SourceSeed): Promise<Source> {
    const values = seedToSourceInsert(seed);
    const [row] = await this.db
      .insert(schema.sources)
      .values(values)
      .onConflictDoUpdate({
        target: schema.sources.name,
        set: {
          type: values.type,
          url: values.url,
          enabled: values.enabled,
        },
      })
      .returning();
    if (!row) throw new Error(`Upsert returned no row for source ${seed.name}`);
    return rowToSource(row);
  }

  async markFetched(id: number, at: string): Promise<void> {
    await this.db
      .update(schema.sources)
      .set({ lastFetchAt: new Date(at) })
      .where(eq(schema.sources.id, id));
  }
}

// ── In-memory store (tests) ─────────────────────────

export class InMemorySourceStore implements SourceStore {
  private sources = new Map<number, Source>();
  private nextId = 1;

  async list(filters?: SourceFilters): Promise<Source[]> {
    let result = [...this.sources.values()];
    if (filters?.type) {
      result = result.filter((s) => s.type === filters.type);
    }
    if (filters?.enabled !== undefined) {
      result = result.filter((s) => s.enabled === filters.enabled);
    }
    return result.sort((a, b) => a.id - b.id);
  }

  async get(id: number): Promise<Source | null> {
    return this.sources.get(id) ?? null;
  }

  async getByName(name: string): Promise<Source | null> {
    for (const source of this.sources.values()) {
      if (source.name === name) return source;
    }
    return null;
  }

  async upsert(seed: SourceSeed): Promise<Source> {
    const existing = await this.getByName(seed.name);
    const source: Source = existing
      ? { ...existing, type: seed.type, url: seed.url, enabled: seed.enabled }
      : { id: this.nextId++, ...seed, lastFetchAt: null };
    this.sources.set(source.id, source);
    return source;
  }

  async markFetched(id: number, at: string): Promise<void> {
    const source = this.sources.get(id);
    if (source) this.sources.set(id, { ...source, lastFetchAt: at });
  }
}

/** Upserts every seed in file order; sources missing from the file are left alone. */
export async function seedSources(store: SourceStore, seeds: readonly SourceSeed[]): Promise<Source[]> {
  const stored: Source[] = [];
  for (const seed of seeds) {
    stored.push(await store.upsert(seed));
  }
  return stored;
}
