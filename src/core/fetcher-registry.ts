import type { FetchOutcome, FetchWindow, Source, SourceFetcher, SourceType } from "./types.js";

/** One fetch collaborator per source variant. */
export class FetcherRegistry {
  private fetchers = new Map<SourceType, SourceFetcher>();

  register(fetcher: SourceFetcher): void {
    this.fetchers.set(fetcher.type, fetcher);
  }

  /** Fetch candidates, or report that the source's variant has no fetcher. */
  async fetch(source: Source, window: FetchWindow): Promise<FetchOutcome> {
    const fetcher = this.fetchers.get(source.type);
    if (!fetcher) return { status: "unsupported", type: source.type };
    const candidates = await fetcher.fetch(source, window);
    return { status: "ok", candidates };
  }
}
