import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { VaultWriter, digestBaseName } from "../src/digest/vault-writer.js";

const DATE = new Date("2024-01-12T23:30:00.000Z");

describe("VaultWriter", () => {
  let root: string;
  let folder: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "vault-writer-"));
    folder = join(root, "Reading List");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("names digests by UTC date", () => {
    expect(digestBaseName(DATE)).toBe("Curated Digest 2024-01-12");
  });

  it("creates the folder and writes the digest", async () => {
    const path = await new VaultWriter(folder).write("# Digest\n", DATE);

    expect(path).toBe(join(folder, "Curated Digest 2024-01-12.md"));
    expect(await readFile(path, "utf-8")).toBe("# Digest\n");
    expect((await stat(path)).mode & 0o777).toBe(0o644);
  });

  it("never overwrites an existing digest", async () => {
    const writer = new VaultWriter(folder);

    const first = await writer.write("first", DATE);
    const second = await writer.write("second", DATE);
    const third = await writer.write("third", DATE);

    expect(second).toBe(join(folder, "Curated Digest 2024-01-12 (1).md"));
    expect(third).toBe(join(folder, "Curated Digest 2024-01-12 (2).md"));
    expect(await readFile(first, "utf-8")).toBe("first");
  });

  it("discards a written digest", async () => {
    const writer = new VaultWriter(folder);
    const path = await writer.write("gone soon", DATE);

    await writer.discard(path);

    await expect(stat(path)).rejects.toThrow();
    await expect(writer.discard(path)).resolves.toBeUndefined();
  });
});
