import type { DigestOutcome } from "../core/digest-assembler.js";
import type { SourceFetchReport } from "../core/ingestion-service.js";
import type { ItemRatingReport } from "../core/rating-service.js";
import { TIERS, type ContentStats, type Source } from "../core/types.js";

// Plain-text views shared by the CLI and the MCP tools.

export function renderSourceList(sources: readonly Source[]): string {
  if (sources.length === 0) return "No sources configured. Run `init` to seed them from the sources file.";

  return sources
    .map((s) => {
      const fetched = s.lastFetchAt ? `last fetched ${s.lastFetchAt}` : "never fetched";
      const state = s.enabled ? "" : " [disabled]";
      return `• ${s.name} (${s.type}, id: ${s.id})${state}\n  ${s.url}\n  ${fetched}`;
    })
    .join("\n\n");
}

export function renderFetchReports(reports: readonly SourceFetchReport[]): string {
  if (reports.length === 0) return "No sources matched.";

  const lines = reports.map((r) => {
    switch (r.status) {
      case "ok":
        return `• ${r.source}: ${r.added} new, ${r.skipped} skipped` +
          (r.failed > 0 ? `, ${r.failed} failed` : "") +
          ` (${r.fetched} fetched)`;
      case "unsupported":
        return `• ${r.source}: no fetcher for type "${r.type}"`;
      case "failed":
        return `• ${r.source}: failed: ${r.error}`;
    }
  });
  const added = reports.reduce((sum, r) => sum + (r.status === "ok" ? r.added : 0), 0);
  return `${lines.join("\n")}\n\nTotal new items: ${added}`;
}

export function renderRatingReports(reports: readonly ItemRatingReport[]): string {
  if (reports.length === 0) return "No unrated items to process.";

  const lines = reports.map((r) => {
    switch (r.status) {
      case "rated":
        return `• [${r.tier}] ${r.title}\n  ${r.reasoning}`;
      case "already-rated":
        return `• ${r.title}: already rated, skipped`;
      case "failed":
        return `• ${r.title}: ${r.kind} error: ${r.error}`;
    }
  });
  const rated = reports.filter((r) => r.status === "rated").length;
  return `${lines.join("\n")}\n\nRated ${rated} of ${reports.length} item(s).`;
}

export function renderDigestOutcome(outcome: DigestOutcome): string {
  if (outcome.status === "empty") {
    return `No unpublished S/A-tier items fetched since ${outcome.windowStart}.`;
  }
  const { digest } = outcome;
  return `Published digest #${digest.id} with ${digest.itemCount} item(s) ` +
    `(${digest.sTierCount} S-tier, ${digest.aTierCount} A-tier).\n` +
    `Written to: ${digest.artifactPath}`;
}

export function renderStats(stats: ContentStats): string {
  const lines = [
    `Total items: ${stats.totalItems}`,
    `Rated: ${stats.ratedItems}`,
    `Unrated: ${stats.totalItems - stats.ratedItems}`,
  ];
  for (const tier of TIERS) {
    lines.push(`  ${tier}: ${stats.byRating[tier] ?? 0}`);
  }
  lines.push(`Unpublished S/A-tier: ${stats.unpublishedTopTier}`);
  return lines.join("\n");
}
