import { mkdir, open, rename, rm, stat } from "node:fs/promises";
import { join } from "node:path";
import { splitCanonicalId } from "../core/classifier.js";
import { CacheError, errorMessage, fetchErrorForStatus } from "../core/errors.js";
import { shortHash, slugify } from "../core/slug.js";
import type { MediaCacher, MediaRef, Note } from "../core/types.js";
import { USER_AGENT } from "../adapters/http.js";
import { log } from "../logger.js";
import { episodeDir, extensionOf } from "./library.js";

/** Large audio files; the limit covers the whole transfer, not just the first byte. */
const DOWNLOAD_TIMEOUT_MS = 30 * 60 * 1000;

export function episodeFileName(note: Note, audioUrl: string): string {
  const ext = extensionOf(new URL(audioUrl).pathname) || "mp3";
  const slug = slugify(note.metadata?.title ?? "", 60) || "episode";
  return `${slug}-${shortHash(note.canonicalId)}.${ext}`;
}

async function nonEmptyFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).size > 0;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/** Streams a podcast enclosure into the show/season folder, skipping files already on disk. */
export class PodcastCacher implements MediaCacher {
  constructor(
    private mediaDir: string,
    private timeoutMs = DOWNLOAD_TIMEOUT_MS,
  ) {}

  async cache(note: Note, signal?: AbortSignal): Promise<MediaRef> {
    const { remoteId: audioUrl } = splitCanonicalId(note.canonicalId);
    const dir = episodeDir(this.mediaDir, "podcasts", note);
    const filePath = join(dir, episodeFileName(note, audioUrl));
    const format = extensionOf(filePath);

    if (await nonEmptyFile(filePath)) {
      log.info("cache.exists", { canonicalId: note.canonicalId, path: filePath });
      return { localPath: filePath, format };
    }

    await mkdir(dir, { recursive: true });
    const tmp = `${filePath}.part`;
    try {
      const bytes = await this.download(audioUrl, tmp, signal);
      await rename(tmp, filePath);
      log.info("cache.downloaded", { canonicalId: note.canonicalId, path: filePath, bytes });
    } catch (err) {
      await rm(tmp, { force: true });
      if (err instanceof CacheError) throw err;
      throw new CacheError("DownloadFailed", `${audioUrl}: ${errorMessage(err)}`, { cause: err });
    }
    return { localPath: filePath, format };
  }

  private async download(url: string, dest: string, signal?: AbortSignal): Promise<number> {
    const signals = [AbortSignal.timeout(this.timeoutMs)];
    if (signal) signals.push(signal);

    const resp = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      redirect: "follow",
      signal: AbortSignal.any(signals),
    });
    if (!resp.ok) {
      const { message } = fetchErrorForStatus(resp.status, "Podcast download");
      throw new CacheError("DownloadFailed", message);
    }
    if (!resp.body) throw new CacheError("DownloadFailed", `${url}: empty response`);

    const file = await open(dest, "w");
    let written = 0;
    try {
      const reader = resp.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        await file.write(value);
        written += value.byteLength;
      }
    } finally {
      await file.close();
    }
    if (written === 0) throw new CacheError("DownloadFailed", `${url}: no bytes received`);
    return written;
  }
}
