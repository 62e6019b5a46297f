import { parseArgs } from "node:util";
import type { App } from "./app.js";
import { loadSources } from "./config.js";
import type { SourceSelection } from "./core/ingestion-service.js";
import { SOURCE_TYPES, isSourceType } from "./core/types.js";
import { initSchema } from "./db/index.js";
import {
  renderDigestOutcome,
  renderFetchReports,
  renderRatingReports,
  renderSourceList,
  renderStats,
} from "./mcp/render.js";
import { seedSources } from "./stores/source-store.js";

export const USAGE = `
vault-curator: fetch, rate and publish content to an Obsidian vault

Usage:
  vault-curator init                     Create tables and seed sources from SOURCES_FILE
  vault-curator sources                  List configured sources
  vault-curator fetch <name>             Fetch one source
  vault-curator fetch --all              Fetch every enabled source
  vault-curator fetch --type <type>      Fetch every enabled source of a type
  vault-curator rate [--limit <n>]       Rate unrated items
  vault-curator digest [--days <n>]      Publish a digest of S/A-tier items
  vault-curator stats                    Show item counts

Source types: ${SOURCE_TYPES.join(", ")}
`.trim();

export type Command =
  | { name: "help" }
  | { name: "init" }
  | { name: "sources" }
  | { name: "fetch"; selection: SourceSelection }
  | { name: "rate"; limit?: number }
  | { name: "digest"; days?: number }
  | { name: "stats" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new UsageError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseCommand(argv: readonly string[]): Command {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      all: { type: "boolean", default: false },
      type: { type: "string" },
      limit: { type: "string" },
      days: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });

  const [name, ...rest] = positionals;
  if (values.help || name === undefined || name === "help") return { name: "help" };

  switch (name) {
    case "init":
      return { name: "init" };
    case "sources":
      return { name: "sources" };
    case "stats":
      return { name: "stats" };
    case "fetch": {
      const [sourceName] = rest;
      if (sourceName) return { name: "fetch", selection: { kind: "name", name: sourceName } };
      if (values.type !== undefined) {
        if (!isSourceType(values.type)) {
          throw new UsageError(`Unknown source type "${values.type}" (expected one of ${SOURCE_TYPES.join(", ")})`);
        }
        return { name: "fetch", selection: { kind: "type", type: values.type } };
      }
      if (values.all) return { name: "fetch", selection: { kind: "all" } };
      throw new UsageError("fetch needs a source name, --all or --type <type>");
    }
    case "rate":
      return { name: "rate", limit: positiveInt("limit", values.limit) };
    case "digest":
      return { name: "digest", days: positiveInt("days", values.days) };
    default:
      throw new UsageError(`Unknown command "${name}"`);
  }
}

/** Runs one command and returns the text to print on stdout. */
export async function runCommand(command: Command, app: App): Promise<string> {
  switch (command.name) {
    case "help":
      return USAGE;
    case "init": {
      await initSchema(app.database.pool);
      const seeded = await seedSources(app.sources, loadSources(app.config.sourcesFile));
      return `Schema ready. Seeded ${seeded.length} source(s) from ${app.config.sourcesFile}.`;
    }
    case "sources":
      return renderSourceList(await app.sources.list());
    case "fetch": {
      const sources = await app.ingestion.selectSources(command.selection);
      return renderFetchReports(await app.ingestion.fetchSources(sources));
    }
    case "rate":
      return renderRatingReports(await app.rating.rateUnrated(command.limit ?? app.config.rating.batchSize));
    case "digest":
      return renderDigestOutcome(await app.digest.assemble(command.days ?? app.config.digest.days));
    case "stats":
      return renderStats(await app.items.stats());
  }
}
