import type { DigestContext } from "../core/digest-assembler.js";
import type { ContentItem } from "../core/types.js";

function day(iso: string): string {
  return iso.slice(0, 10);
}

function escapeLinkText(text: string): string {
  return text.replace(/[[\]]/g, "\\$&");
}

function renderItem(item: ContentItem, sourceNames: ReadonlyMap<number, string>): string {
  const lines = [`### [${escapeLinkText(item.title)}](${item.url})`];
  const meta: string[] = [];
  const source = sourceNames.get(item.sourceId);
  if (source) meta.push(`- Source: ${source}`);
  if (item.publishedDate) meta.push(`- Published: ${day(item.publishedDate)}`);
  if (item.durationMinutes !== null) meta.push(`- Duration: ${item.durationMinutes} min`);
  if (meta.length > 0) lines.push("", ...meta);
  if (item.rating) lines.push("", `> ${item.rating.reasoning}`);
  return lines.join("\n");
}

/** Obsidian-flavoured Markdown for one digest, S-tier section first. */
export function renderDigestMarkdown(items: readonly ContentItem[], context: DigestContext): string {
  const counts = { S: 0, A: 0 };
  for (const item of items) {
    if (item.rating?.tier === "S") counts.S++;
    else if (item.rating?.tier === "A") counts.A++;
  }
  const title = `Curated Digest ${day(context.windowEnd)}`;

  const out = [
    "---",
    "type: digest",
    `window_start: ${day(context.windowStart)}`,
    `window_end: ${day(context.windowEnd)}`,
    `items: ${items.length}`,
    `s_tier: ${counts.S}`,
    `a_tier: ${counts.A}`,
    "tags: [digest, curated]",
    "---",
    "",
    `# ${title}`,
    "",
    `${items.length} item(s) from ${day(context.windowStart)} to ${day(context.windowEnd)} ` +
      `(${counts.S} S-tier, ${counts.A} A-tier).`,
  ];

  for (const tier of ["S", "A"] as const) {
    const section = items.filter((it) => it.rating?.tier === tier);
    if (section.length === 0) continue;
    out.push("", `## ${tier} Tier`);
    for (const item of section) {
      out.push("", renderItem(item, context.sourceNames));
    }
  }

  return out.join("\n") + "\n";
}
