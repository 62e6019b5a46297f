import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import type { CandidateItem, FetchWindow, Source, SourceFetcher } from "../core/types.js";
import { consoleLogger, type Logger } from "../logger.js";
import { runProcess } from "../process.js";

const MAX_DESCRIPTION_CHARS = 2_000;
const DAY_MS = 24 * 60 * 60 * 1000;

const VideoInfoSchema = z
  .object({
    _type: z.string().optional(),
    id: z.string().optional(),
    title: z.string().optional(),
    webpage_url: z.string().optional(),
    description: z.string().nullable().optional(),
    upload_date: z.string().optional(),
    duration: z.number().nullable().optional(),
  })
  .passthrough();

function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/** yt-dlp's YYYYMMDD upload date as an ISO timestamp at UTC midnight. */
export function parseUploadDate(value: string | undefined): string | undefined {
  const m = value?.match(/^(\d{4})(\d{2})(\d{2})$/);
  if (!m) return undefined;
  const [, y, mo, d] = m;
  const date = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d)));
  if (date.getUTCMonth() !== Number(mo) - 1 || date.getUTCDate() !== Number(d)) return undefined;
  return date.toISOString();
}

export function formatDateAfter(now: Date, daysBack: number): string {
  return new Date(now.getTime() - daysBack * DAY_MS).toISOString().slice(0, 10).replace(/-/g, "");
}

/**
 * Map one yt-dlp `.info.json` document to a candidate. Playlist documents and
 * entries without a video id yield null.
 */
export function parseVideoInfo(data: unknown, captions?: string): CandidateItem | null {
  const parsed = VideoInfoSchema.safeParse(data);
  if (!parsed.success) return null;
  const info = parsed.data;
  if (info._type === "playlist" || !info.id) return null;

  const candidate: CandidateItem = {
    title: info.title ?? "Unknown Title",
    url: info.webpage_url || videoUrl(info.id),
  };
  if (info.description) candidate.description = info.description.slice(0, MAX_DESCRIPTION_CHARS);
  if (captions) candidate.captions = captions;
  const uploadedAt = parseUploadDate(info.upload_date);
  if (uploadedAt) candidate.uploadedAt = uploadedAt;
  if (info.duration) candidate.durationSeconds = info.duration;
  return candidate;
}

export interface YouTubeChannelFetcherOptions {
  run?: typeof runProcess;
  now?: () => Date;
  logger?: Logger;
  binary?: string;
}

export class YouTubeChannelFetcher implements SourceFetcher {
  readonly type = "video-channel";

  private run: typeof runProcess;
  private now: () => Date;
  private logger: Logger;
  private binary: string;

  constructor(options: YouTubeChannelFetcherOptions = {}) {
    this.run = options.run ?? runProcess;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? consoleLogger;
    this.binary = options.binary ?? "yt-dlp";
  }

  buildArgs(channelUrl: string, outDir: string, window: FetchWindow): string[] {
    return [
      "--skip-download",
      "--write-info-json",
      "--write-auto-sub",
      "--sub-lang", "en",
      "--sub-format", "vtt",
      "--dateafter", formatDateAfter(this.now(), window.daysBack),
      "--playlist-end", String(window.maxItems),
      "--ignore-errors",
      "-o", join(outDir, "%(id)s.%(ext)s"),
      channelUrl,
    ];
  }

  async fetch(source: Source, window: FetchWindow): Promise<CandidateItem[]> {
    const outDir = await mkdtemp(join(tmpdir(), "vault-curator-"));
    try {
      const result = await this.run(this.binary, this.buildArgs(source.url, outDir, window), {
        timeoutMs: window.timeoutMs,
      });
      if (result.exitCode !== 0) {
        // --ignore-errors still leaves partial output worth reading.
        this.logger.warn(`${this.binary} exited with ${result.exitCode} for ${source.name}: ${result.stderr.trim()}`);
      }
      return await this.readOutput(outDir, window.maxItems);
    } finally {
      await rm(outDir, { recursive: true, force: true });
    }
  }

  private async readOutput(outDir: string, maxItems: number): Promise<CandidateItem[]> {
    const files = new Set(await readdir(outDir));
    const items: CandidateItem[] = [];

    for (const file of [...files].filter((f) => f.endsWith(".info.json")).sort()) {
      let data: unknown;
      try {
        data = JSON.parse(await readFile(join(outDir, file), "utf-8"));
      } catch (err) {
        this.logger.error(`Skipping unreadable ${file}`, err);
        continue;
      }

      const captionsFile = file.replace(/\.info\.json$/, ".en.vtt");
      const captions = files.has(captionsFile)
        ? await readFile(join(outDir, captionsFile), "utf-8")
        : undefined;
      const item = parseVideoInfo(data, captions);
      if (item) items.push(item);
    }

    // Newest uploads first; undated entries keep their place at the end.
    items.sort((a, b) => (b.uploadedAt ?? "").localeCompare(a.uploadedAt ?? ""));
    return items.slice(0, maxItems);
  }
}
