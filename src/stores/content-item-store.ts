import { eq, and, gte, inArray, isNull, desc, asc, sql } from "drizzle-orm";
import { IntegrityViolationError } from "../core/errors.js";
import {
  isTier,
  type ContentItem,
  type ContentRating,
  type ContentStats,
  type NewContentItem,
  type Tier,
} from "../core/types.js";
import { isUniqueViolation, schema, type Database } from "../db/index.js";
import { contentItemToInsert, rowToContentItem } from "../db/mappers.js";
import { compareForDigest } from "../digest/order.js";

export const TOP_TIERS: readonly Tier[] = ["S", "A"];

export interface ContentItemStore {
  existsByUrl(url: string): Promise<boolean>;
  /** Throws IntegrityViolationError when the URL is already stored. */
  insert(item: NewContentItem): Promise<ContentItem>;
  get(id: number): Promise<ContentItem | null>;
  listUnrated(limit: number): Promise<ContentItem[]>;
  /** Sets all rating fields at once; returns false if the item was not unrated. */
  applyRating(id: number, rating: ContentRating): Promise<boolean>;
  /** Unpublished S/A items fetched at or after `since`. */
  listDigestCandidates(since: string): Promise<ContentItem[]>;
  countByDigest(digestId: number): Promise<number>;
  stats(): Promise<ContentStats>;
}

export class PgContentItemStore implements ContentItemStore {
  constructor(private db: Database) {}

  async existsByUrl(url: string): Promise<boolean> {
    const [row] = await this.db
      .select({ id: schema.contentItems.id })
      .from(schema.contentItems)
      .where(eq(schema.contentItems.url, url))
      .limit(1);
    return row !== undefined;
  }

  async insert(item: NewContentItem): Promise<ContentItem> {
    try {
      const [row] = await this.db
        .insert(schema.contentItems)
        .values(contentItemToInsert(item))
        .returning();
      if (!row) throw new Error(`Insert returned no row for ${item.url}`);
      return rowToContentItem(row);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new IntegrityViolationError(`Content item already exists: ${item.url}`, { cause: err });
      }
      throw err;
    }
  }

  async get(id: number): Promise<ContentItem | null> {
    const [row] = await this.db
      .select()
      .from(schema.contentItems)
      .where(eq(schema.contentItems.id, id))
      .limit(1);
    return row ? rowToContentItem(row) : null;
  }

  async listUnrated(limit: number): Promise<ContentItem[]> {
    const rows = await this.db
      .select()
      .from(schema.contentItems)
      .where(isNull(schema.contentItems.rating))
      .orderBy(desc(schema.contentItems.fetchedAt), asc(schema.contentItems.id))
      .limit(limit);
    return rows.map(rowToContentItem);
  }

  async applyRating(id: number, rating: ContentRating): Promise<boolean> {
    const updated = await this.db
      .update(schema.contentItems)
      .set({
        rating: rating.tier,
        ratingReasoning: rating.reasoning,
        ratedAt: new Date(rating.ratedAt),
      })
      .where(and(eq(schema.contentItems.id, id), isNull(schema.contentItems.rating)))
      .returning({ id: schema.contentItems.id });
    return updated.length === 1;
  }

  async listDigestCandidates(since: string): Promise<ContentItem[]> {
    const t = schema.contentItems;
    const rows = await this.db
      .select()
      .from(t)
      .where(
        and(
          inArray(t.rating, [...TOP_TIERS]),
          eq(t.publishedToObsidian, false),
          gte(t.fetchedAt, new Date(since)),
        ),
      )
      .orderBy(
        sql`case ${t.rating} when 'S' then 0 else 1 end`,
        sql`${t.publishedDate} desc nulls last`,
        asc(t.id),
      );
    return rows.map(rowToContentItem);
  }

  async countByDigest(digestId: number): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(schema.contentItems)
      .where(eq(schema.contentItems.digestId, digestId));
    return row?.count ?? 0;
  }

  async stats(): Promise<ContentStats> {
    const t = schema.contentItems;
    const [totals] = await this.db
      .select({
        total: sql<number>`count(*)::int`,
        rated: sql<number>`count(${t.rating})::int`,
        unpublishedTopTier: sql<number>`(count(*) filter (where ${t.rating} in ('S', 'A') and not ${t.publishedToObsidian}))::int`,
      })
      .from(t);

    const grouped = await this.db
      .select({ rating: t.rating, count: sql<number>`count(*)::int` })
      .from(t)
      .where(sql`${t.rating} is not null`)
      .groupBy(t.rating);

    const byRating: ContentStats["byRating"] = {};
    for (const { rating, count } of grouped) {
      if (rating !== null && isTier(rating)) byRating[rating] = count;
    }

    return {
      totalItems: totals?.total ?? 0,
      ratedItems: totals?.rated ?? 0,
      byRating,
      unpublishedTopTier: totals?.unpublishedTopTier ?? 0,
    };
  }
}

// ── In-memory store (tests) ─────────────────────────

export class InMemoryContentItemStore implements ContentItemStore {
  protected items = new Map<number, ContentItem>();
  private nextId = 1;

  async existsByUrl(url: string): Promise<boolean> {
    return this.findByUrl(url) !== undefined;
  }

  async insert(item: NewContentItem): Promise<ContentItem> {
    if (this.findByUrl(item.url)) {
      throw new IntegrityViolationError(`Content item already exists: ${item.url}`);
    }
    const stored: ContentItem = { ...item, id: this.nextId++, rating: null, digestId: null };
    this.items.set(stored.id, stored);
    return stored;
  }

  async get(id: number): Promise<ContentItem | null> {
    return this.items.get(id) ?? null;
  }

  async listUnrated(limit: number): Promise<ContentItem[]> {
    return [...this.items.values()]
      .filter((it) => it.rating === null)
      .sort((a, b) => Date.parse(b.fetchedAt) - Date.parse(a.fetchedAt) || a.id - b.id)
      .slice(0, limit);
  }

  async applyRating(id: number, rating: ContentRating): Promise<boolean> {
    const item = this.items.get(id);
    if (!item || item.rating !== null) return false;
    this.items.set(id, { ...item, rating: { ...rating } });
    return true;
  }

  async listDigestCandidates(since: string): Promise<ContentItem[]> {
    const sinceMs = Date.parse(since);
    return [...this.items.values()]
      .filter(
        (it) =>
          it.rating !== null &&
          TOP_TIERS.includes(it.rating.tier) &&
          it.digestId === null &&
          Date.parse(it.fetchedAt) >= sinceMs,
      )
      .sort(compareForDigest);
  }

  async countByDigest(digestId: number): Promise<number> {
    let count = 0;
    for (const item of this.items.values()) {
      if (item.digestId === digestId) count++;
    }
    return count;
  }

  async stats(): Promise<ContentStats> {
    const all = [...this.items.values()];
    const byRating: ContentStats["byRating"] = {};
    let rated = 0;
    let unpublishedTopTier = 0;
    for (const item of all) {
      if (!item.rating) continue;
      rated++;
      byRating[item.rating.tier] = (byRating[item.rating.tier] ?? 0) + 1;
      if (TOP_TIERS.includes(item.rating.tier) && item.digestId === null) unpublishedTopTier++;
    }
    return { totalItems: all.length, ratedItems: rated, byRating, unpublishedTopTier };
  }

  /**
   * Link unpublished items to a digest. Synchronous so a publication step
   * never yields between marking items. Returns how many were marked.
   */
  markPublished(ids: readonly number[], digestId: number): number {
    let marked = 0;
    for (const id of ids) {
      const item = this.items.get(id);
      if (!item || item.digestId !== null) continue;
      this.items.set(id, { ...item, digestId });
      marked++;
    }
    return marked;
  }

  snapshot(): Map<number, ContentItem> {
    return new Map(this.items);
  }

  restore(snapshot: Map<number, ContentItem>): void {
    this.items = new Map(snapshot);
  }

  private findByUrl(url: string): ContentItem | undefined {
    for (const item of this.items.values()) {
      if (item.url === url) return item;
    }
    return undefined;
  }
}
