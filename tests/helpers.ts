import type { NewContentItem, PreparedCandidate, SourceSeed, Tier } from "../src/core/types.js";
import type { Logger } from "../src/logger.js";
import type { InMemoryContentItemStore } from "../src/stores/content-item-store.js";

export const NOW = new Date("2024-01-12T12:00:00.000Z");
export const fixedNow = () => NOW;

export interface RecordingLogger extends Logger {
  lines: string[];
}

export function recordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}

export function sourceSeed(overrides: Partial<SourceSeed> = {}): SourceSeed {
  return {
    name: "Example Feed",
    type: "feed",
    url: "https://blog.example.com/atom.xml",
    enabled: true,
    ...overrides,
  };
}

export function candidate(overrides: Partial<PreparedCandidate> = {}): PreparedCandidate {
  return {
    title: "An article",
    url: "https://blog.example.com/posts/1",
    description: null,
    transcript: null,
    publishedDate: null,
    durationMinutes: null,
    ...overrides,
  };
}

export function newItem(overrides: Partial<NewContentItem> = {}): NewContentItem {
  return {
    ...candidate(),
    sourceId: 1,
    fetchedAt: NOW.toISOString(),
    ...overrides,
  };
}

/** Insert an item and rate it in one go. */
export async function insertRated(
  store: InMemoryContentItemStore,
  tier: Tier,
  overrides: Partial<NewContentItem> = {},
): Promise<number> {
  const item = await store.insert(newItem(overrides));
  await store.applyRating(item.id, {
    tier,
    reasoning: `${tier}-tier reasoning`,
    ratedAt: NOW.toISOString(),
  });
  return item.id;
}
