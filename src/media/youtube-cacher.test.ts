import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { newBareNote } from "../core/lifecycle.js";
import type { Note } from "../core/types.js";
import { setLogSink } from "../logger.js";
import { YtDlpCacher } from "./youtube-cacher.js";
import { YtDlpExitError, type YtDlpRunner } from "./yt-dlp.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const note: Note = {
  ...newBareNote({ platform: "youtube", canonicalId: "youtube:abcdefghijk" }),
  state: "caching_requested",
  metadata: { title: "Video", author: "Chan", publishedAt: "2021-03-01", tags: [], extra: { duration: 212 } },
};

function runner(result: (args: string[]) => string): YtDlpRunner & { calls: string[][] } {
  const calls: string[][] = [];
  return {
    calls,
    async run(args) {
      calls.push(args);
      return { stdout: result(args), stderr: "" };
    },
  };
}

let mediaDir: string;
let seasonDir: string;
let restoreSink: ((line: string) => void) | undefined;

beforeEach(async () => {
  mediaDir = await mkdtemp(join(tmpdir(), "media-"));
  seasonDir = join(mediaDir, "youtube", "Chan", "Season 2021");
  restoreSink = setLogSink(() => {});
});

afterEach(async () => {
  if (restoreSink) setLogSink(restoreSink);
  await rm(mediaDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Downloads
// ---------------------------------------------------------------------------

describe("YtDlpCacher", () => {
  it("downloads into the season folder and reports the printed path", async () => {
    const ytDlp = runner(() => `[download] 100%\n${join(seasonDir, "abcdefghijk.mp4")}\n`);

    const ref = await new YtDlpCacher(ytDlp, mediaDir).cache(note);

    expect(ref).toEqual({ localPath: join(seasonDir, "abcdefghijk.mp4"), duration: 212, format: "mp4" });
    const args = ytDlp.calls[0] ?? [];
    expect(args[args.indexOf("-o") + 1]).toBe(join(seasonDir, "%(id)s.%(ext)s"));
    expect(args[args.length - 1]).toBe("https://www.youtube.com/watch?v=abcdefghijk");
  });

  it("reuses a finished download and ignores partial files", async () => {
    await mkdir(seasonDir, { recursive: true });
    await writeFile(join(seasonDir, "abcdefghijk.mp4.part"), "partial");
    await writeFile(join(seasonDir, "abcdefghijk.webm"), "video");
    const ytDlp = runner(() => "");

    const ref = await new YtDlpCacher(ytDlp, mediaDir).cache(note);

    expect(ref).toEqual({ localPath: join(seasonDir, "abcdefghijk.webm"), duration: 212, format: "webm" });
    expect(ytDlp.calls).toEqual([]);
  });

  it("maps yt-dlp failures onto cache errors", async () => {
    const ytDlp: YtDlpRunner = {
      async run() {
        throw new YtDlpExitError(1, "ERROR: Requested format is not available");
      },
    };
    await expect(new YtDlpCacher(ytDlp, mediaDir).cache(note)).rejects.toMatchObject({
      kind: "Unsupported",
      message: "yt-dlp exited with code 1: ERROR: Requested format is not available",
    });
  });

  it("fails when yt-dlp leaves no file behind", async () => {
    await expect(new YtDlpCacher(runner(() => "\n"), mediaDir).cache(note)).rejects.toMatchObject({
      kind: "DownloadFailed",
      message: "yt-dlp finished without a file for abcdefghijk",
    });
  });
});
