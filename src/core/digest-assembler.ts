import type { Logger } from "../logger.js";
import type { ContentItemStore } from "../stores/content-item-store.js";
import type { DigestStore } from "../stores/digest-store.js";
import type { SourceStore } from "../stores/source-store.js";
import { orderForDigest } from "../digest/order.js";
import { errorMessage } from "./errors.js";
import type { ContentItem, Digest } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DigestContext {
  windowStart: string;
  windowEnd: string;
  sourceNames: ReadonlyMap<number, string>;
}

export type DigestRenderer = (items: readonly ContentItem[], context: DigestContext) => string;

export interface ArtifactWriter {
  /** Writes the artifact without overwriting anything; returns its path. */
  write(content: string, date: Date): Promise<string>;
  discard(path: string): Promise<void>;
}

export interface DigestSelection {
  items: ContentItem[];
  windowStart: string;
  windowEnd: string;
}

export type DigestOutcome =
  | { status: "empty"; windowStart: string; windowEnd: string }
  | { status: "published"; digest: Digest; items: ContentItem[] };

export interface DigestAssemblerOptions {
  now?: () => Date;
  logger: Logger;
}

/**
 * Selects unpublished top-tier items, renders them, and publishes the
 * result exactly once.
 *
 * The window includes its lower bound: an item fetched exactly `days` days
 * before now is selected.
 */
export class DigestAssembler {
  private now: () => Date;
  private logger: Logger;

  constructor(
    private items: ContentItemStore,
    private digests: DigestStore,
    private sources: SourceStore,
    private render: DigestRenderer,
    private writer: ArtifactWriter,
    options: DigestAssemblerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  async select(days: number, now: Date = this.now()): Promise<DigestSelection> {
    const windowEnd = now.toISOString();
    const windowStart = new Date(now.getTime() - days * DAY_MS).toISOString();
    const candidates = await this.items.listDigestCandidates(windowStart);
    return { items: orderForDigest(candidates), windowStart, windowEnd };
  }

  async assemble(days: number): Promise<DigestOutcome> {
    const now = this.now();
    const { items, windowStart, windowEnd } = await this.select(days, now);
    if (items.length === 0) {
      this.logger.info("No A/S-tier content to publish");
      return { status: "empty", windowStart, windowEnd };
    }

    const sourceNames = new Map((await this.sources.list()).map((s) => [s.id, s.name] as const));
    const body = this.render(items, { windowStart, windowEnd, sourceNames });
    const artifactPath = await this.writer.write(body, now);
    this.logger.info(`Digest written to: ${artifactPath}`);

    const sTierCount = items.filter((it) => it.rating?.tier === "S").length;
    let digest: Digest;
    try {
      digest = await this.digests.publish(
        {
          windowStart,
          windowEnd,
          itemCount: items.length,
          sTierCount,
          aTierCount: items.length - sTierCount,
          artifactPath,
        },
        items.map((it) => it.id),
      );
    } catch (err) {
      this.logger.error(`Publication failed; removing ${artifactPath}`, err);
      await this.writer.discard(artifactPath).catch((discardErr: unknown) => {
        this.logger.error(`Could not remove ${artifactPath}: ${errorMessage(discardErr)}`);
      });
      throw err;
    }

    this.logger.info(
      `Published ${digest.itemCount} items (${digest.sTierCount} S-tier, ${digest.aTierCount} A-tier)`,
    );
    return { status: "published", digest, items };
  }
}
