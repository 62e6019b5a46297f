import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { TransportError } from "../src/core/errors.js";
import { RatingService } from "../src/core/rating-service.js";
import type { RatingClient } from "../src/rating/client.js";
import { InMemoryContentItemStore } from "../src/stores/content-item-store.js";
import { NOW, fixedNow, newItem, recordingLogger } from "./helpers.js";

class ScriptedClient implements RatingClient {
  readonly name = "scripted";
  readonly inputs: string[] = [];

  constructor(private replies: Array<string | Error>) {}

  async rate(input: string): Promise<string> {
    this.inputs.push(input);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error("no scripted reply left");
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

const A_TIER = "A Tier: (Consume Original)\n\nExplanation:\n- clear and useful";

describe("RatingService", () => {
  let items: InMemoryContentItemStore;
  let wait: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    items = new InMemoryContentItemStore();
    wait = vi.fn(async (_ms: number) => {});
  });

  function serviceWith(client: RatingClient, delayMs = 2_000): RatingService {
    return new RatingService(items, client, { delayMs, now: fixedNow, wait, logger: recordingLogger() });
  }

  it("stores tier, reasoning and timestamp together", async () => {
    const item = await items.insert(newItem({ description: "About things", transcript: "words words" }));
    const client = new ScriptedClient([A_TIER]);

    const reports = await serviceWith(client).rateUnrated(10);

    expect(reports).toEqual([
      { itemId: item.id, title: "An article", status: "rated", tier: "A", reasoning: "clear and useful" },
    ]);
    expect((await items.get(item.id))?.rating).toEqual({
      tier: "A",
      reasoning: "clear and useful",
      ratedAt: NOW.toISOString(),
    });
    expect(client.inputs).toEqual(["Title: An article\n\nDescription: About things\n\nTranscript: words words"]);
  });

  it("rates the most recently fetched items first", async () => {
    await items.insert(newItem({ title: "Older", url: "https://example.com/1", fetchedAt: "2024-01-10T00:00:00.000Z" }));
    await items.insert(newItem({ title: "Newer", url: "https://example.com/2", fetchedAt: "2024-01-11T00:00:00.000Z" }));
    const client = new ScriptedClient([A_TIER]);

    await serviceWith(client).rateUnrated(1);

    expect(client.inputs).toEqual(["Title: Newer"]);
  });

  it("pauses between calls but not after the last", async () => {
    for (const n of [1, 2, 3]) {
      await items.insert(newItem({ url: `https://example.com/${n}` }));
    }

    await serviceWith(new ScriptedClient([A_TIER, A_TIER, A_TIER])).rateUnrated(10);

    expect(wait).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledWith(2_000);
  });

  it("does not pause after a single item", async () => {
    await items.insert(newItem({ url: "https://example.com/1" }));

    await serviceWith(new ScriptedClient([A_TIER]), 1).rateUnrated(10);

    expect(wait).not.toHaveBeenCalled();
  });

  it("pauses even at the smallest delay", async () => {
    await items.insert(newItem({ url: "https://example.com/1" }));
    await items.insert(newItem({ url: "https://example.com/2" }));

    await serviceWith(new ScriptedClient([A_TIER, A_TIER]), 1).rateUnrated(10);

    expect(wait).toHaveBeenCalledTimes(1);
    expect(wait).toHaveBeenCalledWith(1);
  });

  it("leaves an item unrated when the output cannot be parsed", async () => {
    const item = await items.insert(newItem());

    const [report] = await serviceWith(new ScriptedClient(["I liked it"])).rateUnrated(10);

    expect(report).toMatchObject({ itemId: item.id, status: "failed", kind: "parse" });
    expect((await items.get(item.id))?.rating).toBeNull();
  });

  it("classifies transport failures and continues with the next item", async () => {
    await items.insert(newItem({ url: "https://example.com/1", fetchedAt: "2024-01-11T00:00:00.000Z" }));
    await items.insert(newItem({ url: "https://example.com/2", fetchedAt: "2024-01-10T00:00:00.000Z" }));
    const client = new ScriptedClient([new TransportError("fabric exited with 1: boom"), A_TIER]);

    const reports = await serviceWith(client).rateUnrated(10);

    expect(reports.map((r) => r.status)).toEqual(["failed", "rated"]);
    expect(reports[0]).toMatchObject({ kind: "transport", error: "fabric exited with 1: boom" });
    expect((await items.get(1))?.rating).toBeNull();
    expect((await items.get(2))?.rating?.tier).toBe("A");
  });

  it("keeps an existing rating", async () => {
    const item = await items.insert(newItem());
    await items.applyRating(item.id, { tier: "S", reasoning: "first", ratedAt: NOW.toISOString() });

    const [report] = await serviceWith(new ScriptedClient([A_TIER])).rateItems([item]);

    expect(report).toEqual({ itemId: item.id, title: "An article", status: "already-rated" });
    expect((await items.get(item.id))?.rating?.tier).toBe("S");
  });

  it("does nothing when every item is rated", async () => {
    const client = new ScriptedClient([]);
    expect(await serviceWith(client).rateUnrated(10)).toEqual([]);
    expect(client.inputs).toEqual([]);
  });
});
