import { PodcastFetcher, FeedFetcher } from "./adapters/rss.js";
import { YouTubeChannelFetcher } from "./adapters/youtube-channel.js";
import type { Config } from "./config.js";
import { DigestAssembler } from "./core/digest-assembler.js";
import { FetcherRegistry } from "./core/fetcher-registry.js";
import { IngestionGate } from "./core/ingestion-gate.js";
import { IngestionService } from "./core/ingestion-service.js";
import { RatingService } from "./core/rating-service.js";
import { createDatabase, type DatabaseHandle } from "./db/index.js";
import { renderDigestMarkdown } from "./digest/render.js";
import { VaultWriter } from "./digest/vault-writer.js";
import type { Logger } from "./logger.js";
import { AnthropicRatingClient } from "./rating/anthropic-client.js";
import type { RatingClient } from "./rating/client.js";
import { FabricRatingClient } from "./rating/fabric-client.js";
import { PgContentItemStore, type ContentItemStore } from "./stores/content-item-store.js";
import { PgDigestStore, type DigestStore } from "./stores/digest-store.js";
import { PgFetchLogStore, type FetchLogStore } from "./stores/fetch-log-store.js";
import { PgSourceStore, type SourceStore } from "./stores/source-store.js";

export interface App {
  config: Config;
  database: DatabaseHandle;
  sources: SourceStore;
  items: ContentItemStore;
  digests: DigestStore;
  fetchLogs: FetchLogStore;
  fetchers: FetcherRegistry;
  ingestion: IngestionService;
  rating: RatingService;
  digest: DigestAssembler;
  close(): Promise<void>;
}

export function createRatingClient(config: Config["rating"]): RatingClient {
  if (config.client === "anthropic") {
    if (!config.anthropicApiKey) {
      throw new Error("ANTHROPIC_API_KEY is required when RATER=anthropic");
    }
    return new AnthropicRatingClient({
      apiKey: config.anthropicApiKey,
      model: config.anthropicModel,
      timeoutMs: config.timeoutMs,
    });
  }
  return new FabricRatingClient({
    pattern: config.fabricPattern,
    model: config.fabricModel,
    timeoutMs: config.timeoutMs,
  });
}

/** Wires stores, fetchers and services for one process. */
export function createApp(config: Config, logger: Logger): App {
  const database = createDatabase(config.databaseUrl);

  // ── Stores ──────────────────────────────────────────────────────

  const sources = new PgSourceStore(database.db);
  const items = new PgContentItemStore(database.db);
  const digests = new PgDigestStore(database.db);
  const fetchLogs = new PgFetchLogStore(database.db);

  // ── Fetcher registry ────────────────────────────────────────────

  const fetchers = new FetcherRegistry();
  fetchers.register(new YouTubeChannelFetcher({ logger }));
  fetchers.register(new PodcastFetcher());
  fetchers.register(new FeedFetcher());

  // ── Core services ───────────────────────────────────────────────

  const gate = new IngestionGate(items, sources, fetchLogs, { logger });
  const ingestion = new IngestionService(fetchers, gate, sources, fetchLogs, {
    window: {
      daysBack: config.fetch.daysBack,
      maxItems: config.fetch.maxItems,
      timeoutMs: config.fetch.timeoutMs,
    },
    maxTranscriptChars: config.fetch.maxTranscriptChars,
    logger,
  });
  const rating = new RatingService(items, createRatingClient(config.rating), {
    delayMs: config.rating.delayMs,
    logger,
  });
  const digest = new DigestAssembler(
    items,
    digests,
    sources,
    renderDigestMarkdown,
    new VaultWriter(config.vault.readingListPath),
    { logger },
  );

  return {
    config,
    database,
    sources,
    items,
    digests,
    fetchLogs,
    fetchers,
    ingestion,
    rating,
    digest,
    close: () => database.close(),
  };
}
