/**
 * Translation between drizzle rows and the entity types in core/types.ts.
 *
 * Entities carry ISO-8601 strings and nested optional groups; rows carry
 * Date objects and flat nullable columns. Nothing outside src/db and
 * src/stores should see a row type.
 */
import {
  isSourceType,
  isTier,
  type ContentItem,
  type ContentRating,
  type Digest,
  type DigestDraft,
  type FetchLogEntry,
  type NewContentItem,
  type Source,
  type SourceSeed,
} from "../core/types.js";
import * as schema from "./schema.js";

export type SourceRow = typeof schema.sources.$inferSelect;
export type ContentItemRow = typeof schema.contentItems.$inferSelect;
export type ContentItemInsert = typeof schema.contentItems.$inferInsert;
export type DigestRow = typeof schema.digests.$inferSelect;
export type DigestInsert = typeof schema.digests.$inferInsert;
export type FetchLogInsert = typeof schema.fetchLogs.$inferInsert;
export type SourceInsert = typeof schema.sources.$inferInsert;

function toDate(iso: string | null): Date | null {
  return iso ? new Date(iso) : null;
}

export function rowToSource(row: SourceRow): Source {
  if (!isSourceType(row.type)) {
    throw new Error(`Unknown source type in row ${row.id}: ${row.type}`);
  }
  return {
    id: row.id,
    name: row.name,
    type: row.type,
    url: row.url,
    enabled: row.enabled,
    lastFetchAt: row.lastFetchAt?.toISOString() ?? null,
  };
}

export function seedToSourceInsert(seed: SourceSeed): SourceInsert {
  return {
    name: seed.name,
    type: seed.type,
    url: seed.url,
    enabled: seed.enabled,
  };
}

function rowToRating(row: ContentItemRow): ContentRating | null {
  if (row.rating === null) return null;
  if (!isTier(row.rating) || row.ratingReasoning === null || row.ratedAt === null) {
    throw new Error(`Content item ${row.id} has a partial rating`);
  }
  return {
    tier: row.rating,
    reasoning: row.ratingReasoning,
    ratedAt: row.ratedAt.toISOString(),
  };
}

export function rowToContentItem(row: ContentItemRow): ContentItem {
  if (row.publishedToObsidian !== (row.digestId !== null)) {
    throw new Error(`Content item ${row.id} has inconsistent publication fields`);
  }
  return {
    id: row.id,
    sourceId: row.sourceId,
    title: row.title,
    url: row.url,
    description: row.description,
    transcript: row.transcript,
    publishedDate: row.publishedDate?.toISOString() ?? null,
    durationMinutes: row.durationMinutes,
    rating: rowToRating(row),
    digestId: row.digestId,
    fetchedAt: row.fetchedAt.toISOString(),
  };
}

export function contentItemToInsert(item: NewContentItem): ContentItemInsert {
  return {
    sourceId: item.sourceId,
    title: item.title,
    url: item.url,
    description: item.description,
    transcript: item.transcript,
    publishedDate: toDate(item.publishedDate),
    durationMinutes: item.durationMinutes,
    fetchedAt: new Date(item.fetchedAt),
  };
}

export function rowToDigest(row: DigestRow): Digest {
  return {
    id: row.id,
    windowStart: row.weekStartDate.toISOString(),
    windowEnd: row.weekEndDate.toISOString(),
    itemCount: row.itemCount,
    sTierCount: row.sTierCount,
    aTierCount: row.aTierCount,
    artifactPath: row.obsidianPath,
    createdAt: row.createdAt.toISOString(),
  };
}

export function digestToInsert(draft: DigestDraft): DigestInsert {
  return {
    weekStartDate: new Date(draft.windowStart),
    weekEndDate: new Date(draft.windowEnd),
    itemCount: draft.itemCount,
    sTierCount: draft.sTierCount,
    aTierCount: draft.aTierCount,
    obsidianPath: draft.artifactPath,
  };
}

export function fetchLogToInsert(entry: FetchLogEntry): FetchLogInsert {
  return {
    sourceId: entry.sourceId,
    itemsFetched: entry.itemsFetched,
    success: entry.success,
    errorMessage: entry.errorMessage ?? null,
    startedAt: new Date(entry.startedAt),
    completedAt: new Date(entry.completedAt),
  };
}
