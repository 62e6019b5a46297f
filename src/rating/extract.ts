import { ParseError } from "../core/errors.js";
import { isTier, type RatingResult, type Tier } from "../core/types.js";

export const MAX_REASONING_LENGTH = 500;
export const NO_EXPLANATION = "No explanation provided";

interface TierMatcher {
  name: string;
  pattern: RegExp;
}

/**
 * Tier matchers in precedence order. The first one that matches anywhere in
 * the output decides the tier.
 */
export const TIER_MATCHERS: readonly TierMatcher[] = [
  { name: "tier-label", pattern: /([SABCD])\s+Tier:/ },
  { name: "rating-label", pattern: /RATING:\s*([SABCD])/ },
];

/** Labels that close an explanation region. */
export const SECTION_LABELS = ["CONTENT SCORE:", "LABELS:", "RATING:"] as const;

const EXPLANATION_LABEL = "Explanation:";
const BULLET_PREFIX = /^(?:[-*•]\s*)+/;
const TIER_DESCRIPTION = /[SABCD]\s+Tier:\s*\(([^)]+)\)/;

function matchTier(output: string): Tier | null {
  for (const matcher of TIER_MATCHERS) {
    const letter = matcher.pattern.exec(output)?.[1];
    if (letter && isTier(letter)) return letter;
  }
  return null;
}

function explanationRegion(output: string): string | null {
  const start = output.indexOf(EXPLANATION_LABEL);
  if (start === -1) return null;

  const bodyStart = start + EXPLANATION_LABEL.length;
  let end = output.length;
  for (const label of SECTION_LABELS) {
    const at = output.indexOf(label, bodyStart);
    if (at !== -1 && at < end) end = at;
  }
  return output.slice(bodyStart, end);
}

function flattenBullets(region: string): string {
  return region
    .split(/\r?\n/)
    .map((line) => line.trim().replace(BULLET_PREFIX, "").trim())
    .filter(Boolean)
    .join(" ");
}

function extractReasoning(output: string): string {
  const region = explanationRegion(output);
  if (region !== null) {
    const prose = flattenBullets(region);
    if (prose) return prose;
  }

  const description = TIER_DESCRIPTION.exec(output)?.[1]?.trim();
  return description || NO_EXPLANATION;
}

/**
 * Pull a tier and its reasoning out of free-form rating-tool output.
 *
 * Accepts both the "B Tier: (...)" layout and the bare "RATING: B" layout.
 * Throws ParseError when neither is present; there is no default tier.
 */
export function extractRating(output: string): RatingResult {
  const tier = matchTier(output);
  if (!tier) {
    throw new ParseError("Could not parse rating from output", output);
  }

  return {
    tier,
    reasoning: extractReasoning(output).slice(0, MAX_REASONING_LENGTH),
  };
}
