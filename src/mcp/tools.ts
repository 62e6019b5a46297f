import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { App } from "../app.js";
import { errorMessage } from "../core/errors.js";
import type { SourceSelection } from "../core/ingestion-service.js";
import { SOURCE_TYPES } from "../core/types.js";
import {
  renderDigestOutcome,
  renderFetchReports,
  renderRatingReports,
  renderSourceList,
  renderStats,
} from "./render.js";

type ToolServices = Pick<App, "config" | "sources" | "items" | "ingestion" | "rating" | "digest">;

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

function failure(err: unknown) {
  return { content: [{ type: "text" as const, text: `Error: ${errorMessage(err)}` }], isError: true };
}

export function registerTools(server: McpServer, app: ToolServices): void {
  // ── list_sources ──────────────────────────────────────────────

  server.tool(
    "list_sources",
    "List configured content sources with their type, URL and last fetch time.",
    {
      type: z.enum(SOURCE_TYPES).optional().describe("Filter by source type"),
    },
    async (params) => {
      const sources = await app.sources.list({ type: params.type });
      return text(renderSourceList(sources));
    },
  );

  // ── fetch_sources ─────────────────────────────────────────────

  server.tool(
    "fetch_sources",
    "Fetch new items from sources and store them unrated. Give a source name, a type, or neither to fetch every enabled source.",
    {
      name: z.string().min(1).optional().describe("Fetch one source by name"),
      type: z.enum(SOURCE_TYPES).optional().describe("Fetch every enabled source of this type"),
    },
    async (params) => {
      try {
        const selection: SourceSelection = params.name
          ? { kind: "name", name: params.name }
          : params.type
            ? { kind: "type", type: params.type }
            : { kind: "all" };
        const sources = await app.ingestion.selectSources(selection);
        const reports = await app.ingestion.fetchSources(sources);
        return text(renderFetchReports(reports));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── rate_items ────────────────────────────────────────────────

  server.tool(
    "rate_items",
    "Rate unrated items with the configured rating tool, newest first.",
    {
      limit: z.number().int().min(1).max(100).optional().describe("Max items to rate (default RATING_BATCH_SIZE)"),
    },
    async (params) => {
      try {
        const reports = await app.rating.rateUnrated(params.limit ?? app.config.rating.batchSize);
        return text(renderRatingReports(reports));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── generate_digest ───────────────────────────────────────────

  server.tool(
    "generate_digest",
    "Publish unpublished S/A-tier items from the trailing window as a Markdown digest in the vault.",
    {
      days: z.number().int().min(1).max(365).optional().describe("Window length in days (default DIGEST_DAYS)"),
    },
    async (params) => {
      try {
        const outcome = await app.digest.assemble(params.days ?? app.config.digest.days);
        return text(renderDigestOutcome(outcome));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── get_stats ─────────────────────────────────────────────────

  server.tool(
    "get_stats",
    "Show item counts: total, rated, per tier, and S/A-tier items not yet in a digest.",
    {},
    async () => text(renderStats(await app.items.stats())),
  );
}
