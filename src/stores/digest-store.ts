import { eq, and, inArray, desc } from "drizzle-orm";
import type { Digest, DigestDraft } from "../core/types.js";
import { schema, type Database } from "../db/index.js";
import { digestToInsert, rowToDigest } from "../db/mappers.js";
import type { InMemoryContentItemStore } from "./content-item-store.js";

export interface DigestStore {
  /**
   * Publication step: create the digest record and link every listed item
   * to it as one unit. Either all items end up carrying the new digest id
   * or the record does not exist.
   */
  publish(draft: DigestDraft, itemIds: readonly number[]): Promise<Digest>;
  list(limit?: number): Promise<Digest[]>;
}

function assertDraftMatches(draft: DigestDraft, itemIds: readonly number[]): void {
  if (itemIds.length === 0) {
    throw new Error("Cannot publish a digest with no items");
  }
  if (new Set(itemIds).size !== itemIds.length) {
    throw new Error("Digest item ids must be unique");
  }
  if (draft.itemCount !== itemIds.length) {
    throw new Error(`Digest item count ${draft.itemCount} does not match ${itemIds.length} selected items`);
  }
}

export class IncompletePublicationError extends Error {
  constructor(
    readonly marked: number,
    readonly expected: number,
  ) {
    super(`Marked ${marked} of ${expected} items; digest rolled back`);
    this.name = "IncompletePublicationError";
  }
}

export class PgDigestStore implements DigestStore {
  constructor(private db: Database) {}

  async publish(draft: DigestDraft, itemIds: readonly number[]): Promise<Digest> {
    assertDraftMatches(draft, itemIds);

    return this.db.transaction(async (tx) => {
      const [row] = await tx.insert(schema.digests).values(digestToInsert(draft)).returning();
      if (!row) throw new Error("Digest insert returned no row");

      const marked = await tx
        .update(schema.contentItems)
        .set({ publishedToObsidian: true, digestId: row.id })
        .where(
          and(
            inArray(schema.contentItems.id, [...itemIds]),
            eq(schema.contentItems.publishedToObsidian, false),
          ),
        )
        .returning({ id: schema.contentItems.id });

      // Throwing inside the callback rolls back the digest insert as well.
      if (marked.length !== itemIds.length) {
        throw new IncompletePublicationError(marked.length, itemIds.length);
      }
      return rowToDigest(row);
    });
  }

  async list(limit = 20): Promise<Digest[]> {
    const rows = await this.db
      .select()
      .from(schema.digests)
      .orderBy(desc(schema.digests.createdAt), desc(schema.digests.id))
      .limit(limit);
    return rows.map(rowToDigest);
  }
}

// ── In-memory store (tests) ─────────────────────────

export class InMemoryDigestStore implements DigestStore {
  private digests = new Map<number, Digest>();
  private nextId = 1;

  constructor(
    private items: InMemoryContentItemStore,
    private now: () => Date = () => new Date(),
  ) {}

  async publish(draft: DigestDraft, itemIds: readonly number[]): Promise<Digest> {
    assertDraftMatches(draft, itemIds);

    // No await below this point: the step runs without yielding.
    // The id is only consumed once the items are marked.
    const digest: Digest = { ...draft, id: this.nextId, createdAt: this.now().toISOString() };
    const snapshot = this.items.snapshot();
    this.digests.set(digest.id, digest);

    try {
      const marked = this.items.markPublished(itemIds, digest.id);
      if (marked !== itemIds.length) {
        throw new IncompletePublicationError(marked, itemIds.length);
      }
      this.nextId++;
      return digest;
    } catch (err) {
      this.items.restore(snapshot);
      this.digests.delete(digest.id);
      throw err;
    }
  }

  async list(limit = 20): Promise<Digest[]> {
    return [...this.digests.values()].sort((a, b) => b.id - a.id).slice(0, limit);
  }
}
