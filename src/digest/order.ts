import type { ContentItem } from "../core/types.js";

function tierRank(item: ContentItem): number {
  return item.rating?.tier === "S" ? 0 : 1;
}

function publishedMs(item: ContentItem): number | null {
  if (!item.publishedDate) return null;
  const ms = Date.parse(item.publishedDate);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * S before A; within a tier, newest published first; undated items last.
 * Ties keep their input order (Array.prototype.sort is stable).
 */
export function compareForDigest(a: ContentItem, b: ContentItem): number {
  const byTier = tierRank(a) - tierRank(b);
  if (byTier !== 0) return byTier;

  const pa = publishedMs(a);
  const pb = publishedMs(b);
  if (pa === pb) return 0;
  if (pa === null) return 1;
  if (pb === null) return -1;
  return pb - pa;
}

export function orderForDigest(items: readonly ContentItem[]): ContentItem[] {
  return [...items].sort(compareForDigest);
}
