import type { ContentItem } from "../core/types.js";

const MAX_DESCRIPTION_CHARS = 500;

/** The rating collaborator: plain text in, free-form rating text out. */
export interface RatingClient {
  readonly name: string;
  rate(input: string): Promise<string>;
}

export function composeRatingInput(item: Pick<ContentItem, "title" | "description" | "transcript">): string {
  const parts = [`Title: ${item.title}`];
  if (item.description) parts.push(`Description: ${item.description.slice(0, MAX_DESCRIPTION_CHARS)}`);
  if (item.transcript) parts.push(`Transcript: ${item.transcript}`);
  return parts.join("\n\n");
}
