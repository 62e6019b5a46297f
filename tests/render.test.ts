import { describe, expect, it } from "vitest";
import type { ContentItem } from "../src/core/types.js";
import { renderDigestMarkdown } from "../src/digest/render.js";

const RATED_AT = "2024-01-12T10:00:00.000Z";

const sItem: ContentItem = {
  id: 1,
  sourceId: 1,
  title: "Deep [Dive]",
  url: "https://example.com/s",
  description: null,
  transcript: null,
  publishedDate: "2024-01-05T00:00:00.000Z",
  durationMinutes: 42,
  rating: { tier: "S", reasoning: "Dense and original.", ratedAt: RATED_AT },
  digestId: null,
  fetchedAt: RATED_AT,
};

const aItem: ContentItem = {
  ...sItem,
  id: 2,
  sourceId: 2,
  title: "Notes",
  url: "https://example.com/a",
  publishedDate: null,
  durationMinutes: null,
  rating: { tier: "A", reasoning: "Useful.", ratedAt: RATED_AT },
};

describe("renderDigestMarkdown", () => {
  it("renders frontmatter and one section per tier", () => {
    const body = renderDigestMarkdown([sItem, aItem], {
      windowStart: "2024-01-05T12:00:00.000Z",
      windowEnd: "2024-01-12T12:00:00.000Z",
      sourceNames: new Map([[1, "Example Channel"]]),
    });

    expect(body).toBe(
      [
        "---",
        "type: digest",
        "window_start: 2024-01-05",
        "window_end: 2024-01-12",
        "items: 2",
        "s_tier: 1",
        "a_tier: 1",
        "tags: [digest, curated]",
        "---",
        "",
        "# Curated Digest 2024-01-12",
        "",
        "2 item(s) from 2024-01-05 to 2024-01-12 (1 S-tier, 1 A-tier).",
        "",
        "## S Tier",
        "",
        "### [Deep \\[Dive\\]](https://example.com/s)",
        "",
        "- Source: Example Channel",
        "- Published: 2024-01-05",
        "- Duration: 42 min",
        "",
        "> Dense and original.",
        "",
        "## A Tier",
        "",
        "### [Notes](https://example.com/a)",
        "",
        "> Useful.",
        "",
      ].join("\n"),
    );
  });

  it("omits a tier with no items", () => {
    const body = renderDigestMarkdown([aItem], {
      windowStart: "2024-01-05T12:00:00.000Z",
      windowEnd: "2024-01-12T12:00:00.000Z",
      sourceNames: new Map(),
    });

    const lines = body.split("\n");
    expect(lines).not.toContain("## S Tier");
    expect(lines).toContain("## A Tier");
  });
});
