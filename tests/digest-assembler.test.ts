import { beforeEach, describe, expect, it } from "vitest";
import { DigestAssembler, type ArtifactWriter } from "../src/core/digest-assembler.js";
import { renderDigestMarkdown } from "../src/digest/render.js";
import { digestBaseName } from "../src/digest/vault-writer.js";
import { InMemoryContentItemStore } from "../src/stores/content-item-store.js";
import { InMemoryDigestStore } from "../src/stores/digest-store.js";
import { InMemorySourceStore } from "../src/stores/source-store.js";
import { fixedNow, insertRated, newItem, recordingLogger, sourceSeed } from "./helpers.js";

class MemoryWriter implements ArtifactWriter {
  readonly files = new Map<string, string>();

  async write(content: string, date: Date): Promise<string> {
    const path = `/vault/Reading List/${digestBaseName(date)}.md`;
    this.files.set(path, content);
    return path;
  }

  async discard(path: string): Promise<void> {
    this.files.delete(path);
  }
}

/** Marks the first item, then loses the connection. */
class InterruptedItemStore extends InMemoryContentItemStore {
  markPublished(ids: readonly number[], digestId: number): number {
    super.markPublished(ids.slice(0, 1), digestId);
    throw new Error("connection lost");
  }
}

describe("DigestAssembler", () => {
  let items: InMemoryContentItemStore;
  let digests: InMemoryDigestStore;
  let sources: InMemorySourceStore;
  let writer: MemoryWriter;

  function assembler(): DigestAssembler {
    return new DigestAssembler(items, digests, sources, renderDigestMarkdown, writer, {
      now: fixedNow,
      logger: recordingLogger(),
    });
  }

  function setUp(store: InMemoryContentItemStore): void {
    items = store;
    digests = new InMemoryDigestStore(items, fixedNow);
  }

  beforeEach(async () => {
    sources = new InMemorySourceStore();
    await sources.upsert(sourceSeed());
    writer = new MemoryWriter();
    setUp(new InMemoryContentItemStore());
  });

  it("orders S before A, then newest first, undated last", async () => {
    await insertRated(items, "A", { title: "A undated", url: "https://example.com/1" });
    await insertRated(items, "A", {
      title: "A recent",
      url: "https://example.com/2",
      publishedDate: "2024-01-10T00:00:00.000Z",
    });
    await insertRated(items, "S", {
      title: "S older",
      url: "https://example.com/3",
      publishedDate: "2024-01-05T00:00:00.000Z",
    });
    await insertRated(items, "B", { title: "B item", url: "https://example.com/4" });

    const outcome = await assembler().assemble(7);

    expect(outcome.status).toBe("published");
    if (outcome.status !== "published") return;
    expect(outcome.items.map((it) => it.title)).toEqual(["S older", "A recent", "A undated"]);
  });

  it("links every selected item to the new digest", async () => {
    const ids = [
      await insertRated(items, "S", { url: "https://example.com/1" }),
      await insertRated(items, "A", { url: "https://example.com/2" }),
    ];

    const outcome = await assembler().assemble(7);
    if (outcome.status !== "published") throw new Error(`unexpected ${outcome.status}`);

    expect(outcome.digest).toEqual({
      id: 1,
      windowStart: "2024-01-05T12:00:00.000Z",
      windowEnd: "2024-01-12T12:00:00.000Z",
      itemCount: 2,
      sTierCount: 1,
      aTierCount: 1,
      artifactPath: "/vault/Reading List/Curated Digest 2024-01-12.md",
      createdAt: "2024-01-12T12:00:00.000Z",
    });
    for (const id of ids) {
      expect((await items.get(id))?.digestId).toBe(1);
    }
    expect(await items.countByDigest(1)).toBe(2);
    expect([...writer.files.keys()]).toEqual(["/vault/Reading List/Curated Digest 2024-01-12.md"]);
  });

  it("never publishes an item twice", async () => {
    await insertRated(items, "S");
    await assembler().assemble(7);

    const second = await assembler().assemble(7);

    expect(second.status).toBe("empty");
    expect(await digests.list()).toHaveLength(1);
  });

  it("writes nothing when there is nothing to publish", async () => {
    await items.insert(newItem());
    await insertRated(items, "C", { url: "https://example.com/2" });

    const outcome = await assembler().assemble(7);

    expect(outcome).toEqual({
      status: "empty",
      windowStart: "2024-01-05T12:00:00.000Z",
      windowEnd: "2024-01-12T12:00:00.000Z",
    });
    expect(writer.files.size).toBe(0);
    expect(await digests.list()).toEqual([]);
  });

  it("includes an item fetched exactly at the window start", async () => {
    await insertRated(items, "A", {
      title: "On the boundary",
      url: "https://example.com/1",
      fetchedAt: "2024-01-05T12:00:00.000Z",
    });
    await insertRated(items, "A", {
      title: "Just outside",
      url: "https://example.com/2",
      fetchedAt: "2024-01-05T11:59:59.999Z",
    });

    const { items: selected } = await assembler().select(7);

    expect(selected.map((it) => it.title)).toEqual(["On the boundary"]);
  });

  it("rolls back and removes the artifact when publication fails midway", async () => {
    setUp(new InterruptedItemStore());
    const ids = [
      await insertRated(items, "S", { url: "https://example.com/1" }),
      await insertRated(items, "A", { url: "https://example.com/2" }),
    ];

    await expect(assembler().assemble(7)).rejects.toThrow("connection lost");

    expect(await digests.list()).toEqual([]);
    for (const id of ids) {
      expect((await items.get(id))?.digestId).toBeNull();
    }
    expect(writer.files.size).toBe(0);
  });

  it("names sources in the rendered digest", async () => {
    await insertRated(items, "S", { title: "Talk", url: "https://example.com/1" });

    await assembler().assemble(7);

    const [body] = [...writer.files.values()];
    expect(body?.split("\n")).toContain("- Source: Example Feed");
  });
});
