import { chmod, mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ArtifactWriter } from "../core/digest-assembler.js";

const FILE_MODE = 0o644;

export function digestBaseName(date: Date): string {
  return `Curated Digest ${date.toISOString().slice(0, 10)}`;
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "EEXIST";
}

/**
 * Writes digests into the vault's reading-list folder. An existing file is
 * never overwritten: "Curated Digest 2024-01-12.md" becomes
 * "Curated Digest 2024-01-12 (1).md", then "(2)", and so on.
 */
export class VaultWriter implements ArtifactWriter {
  constructor(private dir: string) {}

  async write(content: string, date: Date): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const base = digestBaseName(date);

    for (let counter = 0; ; counter++) {
      const name = counter === 0 ? `${base}.md` : `${base} (${counter}).md`;
      const path = join(this.dir, name);
      try {
        await writeFile(path, content, { encoding: "utf-8", flag: "wx", mode: FILE_MODE });
      } catch (err) {
        if (isAlreadyExists(err)) continue;
        throw err;
      }
      await chmod(path, FILE_MODE);
      return path;
    }
  }

  async discard(path: string): Promise<void> {
    await rm(path, { force: true });
  }
}
