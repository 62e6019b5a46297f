// ── Source: a configured origin ──────────────────────────────────

export const SOURCE_TYPES = ["video-channel", "podcast", "feed"] as const;
export type SourceType = (typeof SOURCE_TYPES)[number];

export function isSourceType(value: string): value is SourceType {
  return (SOURCE_TYPES as readonly string[]).includes(value);
}

export interface Source {
  id: number;
  name: string;
  type: SourceType;
  url: string;
  enabled: boolean;
  lastFetchAt: string | null;
}

export interface SourceSeed {
  name: string;
  type: SourceType;
  url: string;
  enabled: boolean;
}

// ── Tiers ─────────────────────────────────────────────────────────

export const TIERS = ["S", "A", "B", "C", "D"] as const;
export type Tier = (typeof TIERS)[number];

export function isTier(value: string): value is Tier {
  return (TIERS as readonly string[]).includes(value);
}

export interface RatingResult {
  tier: Tier;
  reasoning: string;
}

/** Rating fields are stored together or not at all. */
export interface ContentRating extends RatingResult {
  ratedAt: string;
}

// ── ContentItem: the atom of the vault ───────────────────────────

export interface ContentItem {
  id: number;
  sourceId: number;
  title: string;
  url: string;
  description: string | null;
  transcript: string | null;
  publishedDate: string | null;
  durationMinutes: number | null;
  rating: ContentRating | null;
  /** Non-null exactly when the item has been published in a digest. */
  digestId: number | null;
  fetchedAt: string;
}

export type NewContentItem = Omit<ContentItem, "id" | "rating" | "digestId">;

// ── Candidates: fetched but not yet persisted ────────────────────

export interface CandidateItem {
  title: string;
  url: string;
  description?: string;
  /** Raw caption cue text (e.g. WebVTT), not yet normalized. */
  captions?: string;
  uploadedAt?: string;
  durationSeconds?: number;
}

/** A candidate whose transcript has already been normalized. */
export interface PreparedCandidate {
  title: string;
  url: string;
  description: string | null;
  transcript: string | null;
  publishedDate: string | null;
  durationMinutes: number | null;
}

// ── Fetch collaborator contract ──────────────────────────────────

export interface FetchWindow {
  daysBack: number;
  maxItems: number;
  timeoutMs: number;
}

export interface SourceFetcher {
  readonly type: SourceType;

  fetch(source: Source, window: FetchWindow): Promise<CandidateItem[]>;
}

export type FetchOutcome =
  | { status: "ok"; candidates: CandidateItem[] }
  | { status: "unsupported"; type: SourceType };

// ── Digests ───────────────────────────────────────────────────────

export interface Digest {
  id: number;
  windowStart: string;
  windowEnd: string;
  itemCount: number;
  sTierCount: number;
  aTierCount: number;
  artifactPath: string;
  createdAt: string;
}

export type DigestDraft = Omit<Digest, "id" | "createdAt">;

// ── Fetch logs ────────────────────────────────────────────────────

export interface FetchLogEntry {
  sourceId: number;
  itemsFetched: number;
  success: boolean;
  errorMessage?: string;
  startedAt: string;
  completedAt: string;
}

// ── Statistics ────────────────────────────────────────────────────

export interface ContentStats {
  totalItems: number;
  ratedItems: number;
  byRating: Partial<Record<Tier, number>>;
  unpublishedTopTier: number;
}
