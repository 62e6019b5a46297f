import { normalizeCaptionText } from "../transcript/normalize.js";
import type { CandidateItem, PreparedCandidate } from "./types.js";

/** Normalize a fetched candidate's captions and units before it reaches the gate. */
export function prepareCandidate(candidate: CandidateItem, maxTranscriptChars: number): PreparedCandidate {
  const transcript = candidate.captions ? normalizeCaptionText(candidate.captions, maxTranscriptChars) : "";
  return {
    title: candidate.title,
    url: candidate.url,
    description: candidate.description ?? null,
    transcript: transcript || null,
    publishedDate: candidate.uploadedAt ?? null,
    durationMinutes:
      candidate.durationSeconds !== undefined ? Math.floor(candidate.durationSeconds / 60) : null,
  };
}
