import { access, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  YouTubeChannelFetcher,
  formatDateAfter,
  parseUploadDate,
  parseVideoInfo,
} from "../src/adapters/youtube-channel.js";
import type { Source } from "../src/core/types.js";
import type { runProcess } from "../src/process.js";
import { fixedNow, recordingLogger } from "./helpers.js";

const SOURCE: Source = {
  id: 1,
  name: "Example Channel",
  type: "video-channel",
  url: "https://www.youtube.com/@example",
  enabled: true,
  lastFetchAt: null,
};

const WINDOW = { daysBack: 7, maxItems: 20, timeoutMs: 5_000 };

const OUTPUT: Record<string, unknown> = {
  "UCexample.info.json": { _type: "playlist", id: "UCexample", title: "Example Channel - Videos" },
  "vid1.info.json": {
    id: "vid1",
    title: "First video",
    description: "About the first video",
    upload_date: "20240110",
    duration: 600,
  },
  "vid2.info.json": {
    id: "vid2",
    title: "Second video",
    webpage_url: "https://www.youtube.com/watch?v=vid2",
    upload_date: "20240111",
  },
};

const CAPTIONS = "WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nhello there";

/** Stands in for yt-dlp: writes fixture files where the -o template points. */
function fakeYtDlp(exitCode = 0) {
  const calls: { args: string[]; outDir: string }[] = [];
  const run: typeof runProcess = async (_command, args) => {
    const outDir = dirname(args[args.indexOf("-o") + 1] ?? "");
    calls.push({ args, outDir });
    for (const [file, data] of Object.entries(OUTPUT)) {
      await writeFile(join(outDir, file), JSON.stringify(data));
    }
    await writeFile(join(outDir, "vid1.en.vtt"), CAPTIONS);
    return { stdout: "", stderr: exitCode === 0 ? "" : "ERROR: one video unavailable", exitCode };
  };
  return { run, calls };
}

describe("YouTubeChannelFetcher", () => {
  it("reads info files newest first and attaches captions", async () => {
    const { run, calls } = fakeYtDlp();
    const fetcher = new YouTubeChannelFetcher({ run, now: fixedNow, logger: recordingLogger() });

    const candidates = await fetcher.fetch(SOURCE, WINDOW);

    expect(candidates).toEqual([
      {
        title: "Second video",
        url: "https://www.youtube.com/watch?v=vid2",
        uploadedAt: "2024-01-11T00:00:00.000Z",
      },
      {
        title: "First video",
        url: "https://www.youtube.com/watch?v=vid1",
        description: "About the first video",
        captions: CAPTIONS,
        uploadedAt: "2024-01-10T00:00:00.000Z",
        durationSeconds: 600,
      },
    ]);
    expect(calls).toHaveLength(1);
    await expect(access(calls[0]?.outDir ?? "")).rejects.toThrow();
  });

  it("passes the lookback window to yt-dlp", async () => {
    const { run, calls } = fakeYtDlp();
    await new YouTubeChannelFetcher({ run, now: fixedNow, logger: recordingLogger() }).fetch(SOURCE, WINDOW);

    const args = calls[0]?.args ?? [];
    expect(args[args.indexOf("--dateafter") + 1]).toBe("20240105");
    expect(args[args.indexOf("--playlist-end") + 1]).toBe("20");
    expect(args).toContain("--skip-download");
    expect(args[args.length - 1]).toBe("https://www.youtube.com/@example");
  });

  it("caps the result at maxItems", async () => {
    const { run } = fakeYtDlp();
    const fetcher = new YouTubeChannelFetcher({ run, now: fixedNow, logger: recordingLogger() });

    const candidates = await fetcher.fetch(SOURCE, { ...WINDOW, maxItems: 1 });

    expect(candidates.map((c) => c.title)).toEqual(["Second video"]);
  });

  it("keeps partial output when yt-dlp exits with an error", async () => {
    const { run } = fakeYtDlp(1);
    const logger = recordingLogger();

    const candidates = await new YouTubeChannelFetcher({ run, now: fixedNow, logger }).fetch(SOURCE, WINDOW);

    expect(candidates).toHaveLength(2);
    expect(logger.lines).toEqual(["warn: yt-dlp exited with 1 for Example Channel: ERROR: one video unavailable"]);
  });
});

describe("yt-dlp helpers", () => {
  it("parses upload dates at UTC midnight", () => {
    expect(parseUploadDate("20240110")).toBe("2024-01-10T00:00:00.000Z");
    expect(parseUploadDate("20240231")).toBeUndefined();
    expect(parseUploadDate("2024-01-10")).toBeUndefined();
    expect(parseUploadDate(undefined)).toBeUndefined();
  });

  it("formats the date-after bound", () => {
    expect(formatDateAfter(new Date("2024-03-02T01:00:00.000Z"), 3)).toBe("20240228");
  });

  it("skips documents without a video id", () => {
    expect(parseVideoInfo({ title: "No id" })).toBeNull();
    expect(parseVideoInfo("not an object")).toBeNull();
  });

  it("truncates long descriptions", () => {
    const info = parseVideoInfo({ id: "x", description: "d".repeat(2_500) });
    expect(info?.description).toHaveLength(2_000);
    expect(info?.title).toBe("Unknown Title");
  });
});
