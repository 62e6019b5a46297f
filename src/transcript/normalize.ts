export const TRUNCATION_MARKER = "...";

const METADATA_PREFIXES = ["Kind:", "Language:"];

function isCueText(line: string): boolean {
  if (!line) return false;
  if (line.startsWith("WEBVTT")) return false;
  if (line.includes("-->")) return false;
  return !METADATA_PREFIXES.some((prefix) => line.startsWith(prefix));
}

/**
 * Collapse caption cue lines into one bounded block of text.
 *
 * Header, timing and metadata lines are dropped, and a token equal to the
 * previous kept token is skipped. Only immediate repeats collapse: "a a b a"
 * becomes "a b a", and repeated multi-word phrases pass through untouched.
 */
export function normalizeTranscript(lines: Iterable<string>, maxChars: number): string {
  const kept: string[] = [];
  for (const raw of lines) {
    const line = raw.trim();
    if (isCueText(line)) kept.push(line);
  }

  const tokens = kept.join(" ").split(/\s+/).filter(Boolean);
  const words: string[] = [];
  for (const token of tokens) {
    if (words.length > 0 && words[words.length - 1] === token) continue;
    words.push(token);
  }

  const text = words.join(" ");
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars) + TRUNCATION_MARKER;
}

/** Normalize the full text of a caption file (e.g. WebVTT). */
export function normalizeCaptionText(captions: string, maxChars: number): string {
  return normalizeTranscript(captions.split(/\r?\n/), maxChars);
}
