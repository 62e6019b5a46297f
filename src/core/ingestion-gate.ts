import type { Logger } from "../logger.js";
import type { ContentItemStore } from "../stores/content-item-store.js";
import type { FetchLogStore } from "../stores/fetch-log-store.js";
import type { SourceStore } from "../stores/source-store.js";
import { IntegrityViolationError, errorMessage } from "./errors.js";
import type { PreparedCandidate, Source } from "./types.js";

export interface IngestionResult {
  sourceId: number;
  received: number;
  added: number;
  skipped: number;
  failed: number;
}

export interface IngestionGateOptions {
  now?: () => Date;
  logger: Logger;
}

/**
 * Deduplicating writer for fetched candidates. A URL that is already stored,
 * including one that appears between the existence check and the insert,
 * is counted as skipped and never produces a second row.
 */
export class IngestionGate {
  private now: () => Date;
  private logger: Logger;

  constructor(
    private items: ContentItemStore,
    private sources: SourceStore,
    private fetchLogs: FetchLogStore,
    options: IngestionGateOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  async ingest(
    source: Source,
    candidates: readonly PreparedCandidate[],
    startedAt: string = this.now().toISOString(),
  ): Promise<IngestionResult> {
    const result: IngestionResult = {
      sourceId: source.id,
      received: candidates.length,
      added: 0,
      skipped: 0,
      failed: 0,
    };
    const errors: string[] = [];

    for (const candidate of candidates) {
      try {
        if (await this.items.existsByUrl(candidate.url)) {
          result.skipped++;
          continue;
        }
        await this.items.insert({
          ...candidate,
          sourceId: source.id,
          fetchedAt: this.now().toISOString(),
        });
        result.added++;
      } catch (err) {
        if (err instanceof IntegrityViolationError) {
          result.skipped++;
          continue;
        }
        result.failed++;
        errors.push(`${candidate.url}: ${errorMessage(err)}`);
        this.logger.error(`Failed to store ${candidate.url}`, err);
      }
    }

    const completedAt = this.now().toISOString();
    await this.sources.markFetched(source.id, completedAt);
    await this.fetchLogs.append({
      sourceId: source.id,
      itemsFetched: result.added,
      success: result.failed === 0,
      errorMessage: errors.length > 0 ? errors.join("; ") : undefined,
      startedAt,
      completedAt,
    });

    return result;
  }
}
