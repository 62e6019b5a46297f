import { setTimeout as sleep } from "node:timers/promises";
import type { Logger } from "../logger.js";
import { composeRatingInput, type RatingClient } from "../rating/client.js";
import { extractRating } from "../rating/extract.js";
import type { ContentItemStore } from "../stores/content-item-store.js";
import { ParseError, TimeoutError, TransportError, errorMessage } from "./errors.js";
import type { ContentItem, Tier } from "./types.js";

export type RatingFailureKind = "parse" | "timeout" | "transport" | "other";

export type ItemRatingReport =
  | { itemId: number; title: string; status: "rated"; tier: Tier; reasoning: string }
  | { itemId: number; title: string; status: "already-rated" }
  | { itemId: number; title: string; status: "failed"; kind: RatingFailureKind; error: string };

export interface RatingServiceOptions {
  /** Minimum pause between consecutive calls to the rating client. */
  delayMs: number;
  now?: () => Date;
  wait?: (ms: number) => Promise<void>;
  logger: Logger;
}

function failureKind(err: unknown): RatingFailureKind {
  if (err instanceof ParseError) return "parse";
  if (err instanceof TimeoutError) return "timeout";
  if (err instanceof TransportError) return "transport";
  return "other";
}

/**
 * Rates unrated items one at a time. A failed attempt leaves the item
 * unrated for a later run; nothing is retried here.
 */
export class RatingService {
  private now: () => Date;
  private wait: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(
    private items: ContentItemStore,
    private client: RatingClient,
    private options: RatingServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
    this.wait = options.wait ?? ((ms) => sleep(ms));
    this.logger = options.logger;
  }

  async rateUnrated(limit: number): Promise<ItemRatingReport[]> {
    const items = await this.items.listUnrated(limit);
    if (items.length === 0) {
      this.logger.info("No unrated items to process");
      return [];
    }
    this.logger.info(`Rating ${items.length} item(s) with ${this.client.name}...`);
    return this.rateItems(items);
  }

  async rateItems(items: readonly ContentItem[]): Promise<ItemRatingReport[]> {
    const reports: ItemRatingReport[] = [];
    for (const [index, item] of items.entries()) {
      reports.push(await this.rateOne(item));
      if (index < items.length - 1) {
        await this.wait(this.options.delayMs);
      }
    }
    return reports;
  }

  private async rateOne(item: ContentItem): Promise<ItemRatingReport> {
    const base = { itemId: item.id, title: item.title };
    try {
      const output = await this.client.rate(composeRatingInput(item));
      const result = extractRating(output);
      const applied = await this.items.applyRating(item.id, {
        ...result,
        ratedAt: this.now().toISOString(),
      });
      if (!applied) {
        this.logger.warn(`Item ${item.id} was already rated; keeping the stored rating`);
        return { ...base, status: "already-rated" };
      }
      this.logger.info(`  -> ${result.tier}: ${item.title.slice(0, 60)}`);
      return { ...base, status: "rated", tier: result.tier, reasoning: result.reasoning };
    } catch (err) {
      this.logger.error(`Rating failed for item ${item.id} (${item.title.slice(0, 60)})`, err);
      return { ...base, status: "failed", kind: failureKind(err), error: errorMessage(err) };
    }
  }
}
