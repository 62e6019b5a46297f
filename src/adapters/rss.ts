import RssParser from "rss-parser";
import { TimeoutError } from "../core/errors.js";
import type { CandidateItem, FetchWindow, Source, SourceFetcher, SourceType } from "../core/types.js";

const MAX_DESCRIPTION_CHARS = 2_000;
const DAY_MS = 24 * 60 * 60 * 1000;

interface PodcastFields {
  itunesDuration?: string;
}

type FeedOutput = RssParser.Output<PodcastFields>;
type FeedLoader = (url: string, timeoutMs: number) => Promise<FeedOutput>;

function stripHtml(html: string): string {
  return html.replace(/<[^>]*>/g, "").replace(/\s+/g, " ").trim();
}

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen).trimEnd() + "…";
}

/** itunes:duration is either plain seconds or [[HH:]MM:]SS. */
export function parseDuration(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parts = value.trim().split(":");
  if (parts.length > 3 || parts.some((p) => !/^\d+$/.test(p))) return undefined;
  const seconds = parts.reduce((total, part) => total * 60 + Number(part), 0);
  return seconds > 0 ? seconds : undefined;
}

function newParser(timeoutMs: number): RssParser<Record<string, unknown>, PodcastFields> {
  return new RssParser<Record<string, unknown>, PodcastFields>({
    timeout: timeoutMs,
    customFields: { item: [["itunes:duration", "itunesDuration"]] },
  });
}

const loadFeed: FeedLoader = async (url, timeoutMs) => {
  try {
    return await newParser(timeoutMs).parseURL(url);
  } catch (err) {
    if (err instanceof Error && /timed out/i.test(err.message)) {
      throw new TimeoutError(`fetch ${url}`, timeoutMs);
    }
    throw err;
  }
};

export async function parseFeedXml(xml: string): Promise<FeedOutput> {
  return newParser(10_000).parseString(xml);
}

/** Entries inside the lookback window, newest feed order kept, capped at maxItems. */
export function candidatesFromFeed(feed: FeedOutput, window: FetchWindow, now: Date): CandidateItem[] {
  const sinceMs = now.getTime() - window.daysBack * DAY_MS;
  const items: CandidateItem[] = [];

  for (const entry of feed.items ?? []) {
    const url = entry.link ?? entry.enclosure?.url;
    if (!url) continue;

    const published = entry.isoDate ?? entry.pubDate;
    const publishedMs = published ? Date.parse(published) : NaN;
    if (!Number.isNaN(publishedMs) && publishedMs < sinceMs) continue;

    const candidate: CandidateItem = { title: entry.title ?? "(untitled)", url };
    const description = stripHtml(entry.contentSnippet ?? entry.content ?? entry.summary ?? "");
    if (description) candidate.description = truncate(description, MAX_DESCRIPTION_CHARS);
    if (!Number.isNaN(publishedMs)) candidate.uploadedAt = new Date(publishedMs).toISOString();
    const duration = parseDuration(entry.itunesDuration);
    if (duration) candidate.durationSeconds = duration;

    items.push(candidate);
    if (items.length >= window.maxItems) break;
  }
  return items;
}

export interface RssFetcherOptions {
  load?: FeedLoader;
  now?: () => Date;
}

abstract class RssBackedFetcher implements SourceFetcher {
  abstract readonly type: SourceType;

  private load: FeedLoader;
  private now: () => Date;

  constructor(options: RssFetcherOptions = {}) {
    this.load = options.load ?? loadFeed;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(source: Source, window: FetchWindow): Promise<CandidateItem[]> {
    const feed = await this.load(source.url, window.timeoutMs);
    return candidatesFromFeed(feed, window, this.now());
  }
}

export class PodcastFetcher extends RssBackedFetcher {
  readonly type = "podcast";
}

export class FeedFetcher extends RssBackedFetcher {
  readonly type = "feed";
}
