import { mkdir, readdir } from "node:fs/promises";
import { join } from "node:path";
import { splitCanonicalId } from "../core/classifier.js";
import { CacheError, errorMessage } from "../core/errors.js";
import type { MediaCacher, MediaRef, Note } from "../core/types.js";
import { log } from "../logger.js";
import { episodeDir, extensionOf } from "./library.js";
import { YtDlpExitError, toYtDlpCacheError, type YtDlpRunner } from "./yt-dlp.js";

const FORMAT = "bestvideo[height<=720]+bestaudio/best[height<=720]";
const SKIP_SUFFIXES = [".part", ".ytdl", ".nfo", ".tmp"];

function durationOf(note: Note): number | undefined {
  const value = note.metadata?.extra.duration;
  return typeof value === "number" ? value : undefined;
}

async function existingDownload(dir: string, videoId: string): Promise<string | null> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
  const hit = names.find((n) => n.startsWith(`${videoId}.`) && !SKIP_SUFFIXES.some((s) => n.endsWith(s)));
  return hit ? join(dir, hit) : null;
}

/** Downloads a video with yt-dlp into the show/season folder, named by video id. */
export class YtDlpCacher implements MediaCacher {
  constructor(
    private ytDlp: YtDlpRunner,
    private mediaDir: string,
  ) {}

  async cache(note: Note, signal?: AbortSignal): Promise<MediaRef> {
    const { remoteId: videoId } = splitCanonicalId(note.canonicalId);
    const dir = episodeDir(this.mediaDir, "youtube", note);

    const existing = await existingDownload(dir, videoId);
    if (existing) {
      log.info("cache.exists", { canonicalId: note.canonicalId, path: existing });
      return { localPath: existing, duration: durationOf(note), format: extensionOf(existing) };
    }

    await mkdir(dir, { recursive: true });
    let stdout: string;
    try {
      ({ stdout } = await this.ytDlp.run(
        [
          "--no-playlist",
          "-f",
          FORMAT,
          "--merge-output-format",
          "mp4",
          "--add-metadata",
          "--embed-chapters",
          "-o",
          join(dir, "%(id)s.%(ext)s"),
          "--print",
          "after_move:filepath",
          "--no-simulate",
          `https://www.youtube.com/watch?v=${videoId}`,
        ],
        signal,
      ));
    } catch (err) {
      if (err instanceof YtDlpExitError) throw toYtDlpCacheError(err);
      throw new CacheError("DownloadFailed", errorMessage(err), { cause: err });
    }

    const printed = stdout.trim().split("\n").pop()?.trim();
    const localPath = printed || (await existingDownload(dir, videoId));
    if (!localPath) throw new CacheError("DownloadFailed", `yt-dlp finished without a file for ${videoId}`);

    log.info("cache.downloaded", { canonicalId: note.canonicalId, path: localPath });
    return { localPath, duration: durationOf(note), format: extensionOf(localPath) || "mp4" };
  }
}
