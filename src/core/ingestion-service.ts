import type { Logger } from "../logger.js";
import type { FetchLogStore } from "../stores/fetch-log-store.js";
import type { SourceStore } from "../stores/source-store.js";
import { NotFoundError, errorMessage } from "./errors.js";
import type { FetcherRegistry } from "./fetcher-registry.js";
import type { IngestionGate } from "./ingestion-gate.js";
import { prepareCandidate } from "./prepare.js";
import type { FetchWindow, Source, SourceType } from "./types.js";

export type SourceSelection =
  | { kind: "name"; name: string }
  | { kind: "type"; type: SourceType }
  | { kind: "all" };

export type SourceFetchReport =
  | { source: string; status: "ok"; fetched: number; added: number; skipped: number; failed: number }
  | { source: string; status: "unsupported"; type: SourceType }
  | { source: string; status: "failed"; error: string };

export interface IngestionServiceOptions {
  window: FetchWindow;
  maxTranscriptChars: number;
  now?: () => Date;
  logger: Logger;
}

/**
 * Runs a fetch pass: one source at a time, fetch, normalize, then hand the
 * candidates to the ingestion gate. A failing source is logged and recorded
 * and the pass moves on to the next one.
 */
export class IngestionService {
  private now: () => Date;
  private logger: Logger;

  constructor(
    private fetchers: FetcherRegistry,
    private gate: IngestionGate,
    private sources: SourceStore,
    private fetchLogs: FetchLogStore,
    private options: IngestionServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  async selectSources(selection: SourceSelection): Promise<Source[]> {
    switch (selection.kind) {
      case "name": {
        const source = await this.sources.getByName(selection.name);
        if (!source) throw new NotFoundError("Source", selection.name);
        return [source];
      }
      case "type":
        return this.sources.list({ type: selection.type, enabled: true });
      case "all":
        return this.sources.list({ enabled: true });
    }
  }

  async fetchSources(sources: readonly Source[]): Promise<SourceFetchReport[]> {
    const reports: SourceFetchReport[] = [];
    for (const source of sources) {
      reports.push(await this.fetchOne(source));
    }
    return reports;
  }

  async fetchOne(source: Source): Promise<SourceFetchReport> {
    const startedAt = this.now().toISOString();
    this.logger.info(`[${source.type}] ${source.name}`);

    try {
      const outcome = await this.fetchers.fetch(source, this.options.window);
      if (outcome.status === "unsupported") {
        this.logger.warn(`No fetcher registered for ${outcome.type}; skipping ${source.name}`);
        return { source: source.name, status: "unsupported", type: outcome.type };
      }

      const prepared = outcome.candidates.map((c) => prepareCandidate(c, this.options.maxTranscriptChars));
      const result = await this.gate.ingest(source, prepared, startedAt);
      this.logger.info(`  -> ${result.added} new, ${result.skipped} skipped (duplicates)`);
      return {
        source: source.name,
        status: "ok",
        fetched: result.received,
        added: result.added,
        skipped: result.skipped,
        failed: result.failed,
      };
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Fetch failed for ${source.name}`, err);
      await this.recordFailure(source, startedAt, message);
      return { source: source.name, status: "failed", error: message };
    }
  }

  private async recordFailure(source: Source, startedAt: string, message: string): Promise<void> {
    try {
      await this.fetchLogs.append({
        sourceId: source.id,
        itemsFetched: 0,
        success: false,
        errorMessage: message,
        startedAt,
        completedAt: this.now().toISOString(),
      });
    } catch (err) {
      this.logger.error(`Could not record fetch failure for ${source.name}`, err);
    }
  }
}
