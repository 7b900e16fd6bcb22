import { z } from "zod";
import { FetchError, errorMessage } from "../core/errors.js";
import { splitCanonicalId } from "../core/classifier.js";
import { slugify } from "../core/slug.js";
import type {
  FetchContext,
  FetchedMetadata,
  MediaCacher,
  MetadataFetcher,
  NoteMetadata,
  PlatformEntry,
} from "../core/types.js";
import { YtDlpExitError, toYtDlpFetchError, type YtDlpRunner } from "../media/yt-dlp.js";

const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/;

const YOUTUBE_HOSTS = new Set([
  "youtube.com",
  "www.youtube.com",
  "m.youtube.com",
  "music.youtube.com",
  "youtube-nocookie.com",
  "www.youtube-nocookie.com",
]);

// share links that wrap the real video URL in a query parameter
const WRAPPER_PATHS = new Set(["/redirect", "/oembed", "/attribution_link"]);

function validId(candidate: string | null | undefined): string | null {
  return candidate && VIDEO_ID.test(candidate) ? candidate : null;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

export function youtubeIdFromUrl(url: URL, depth = 0): string | null {
  const host = url.hostname.toLowerCase();
  if (host === "youtu.be" || host === "www.youtu.be") {
    return validId(url.pathname.split("/")[1]);
  }
  if (!YOUTUBE_HOSTS.has(host)) return null;

  if (WRAPPER_PATHS.has(url.pathname) && depth === 0) {
    const target = url.searchParams.get("url") ?? url.searchParams.get("q") ?? url.searchParams.get("u");
    if (!target) return null;
    try {
      return youtubeIdFromUrl(new URL(target, "https://www.youtube.com"), depth + 1);
    } catch {
      return null;
    }
  }

  if (url.pathname === "/watch") return validId(url.searchParams.get("v"));

  const m = /^\/(shorts|embed|live|v)\/([^/]+)/.exec(url.pathname);
  return m ? validId(m[2]) : null;
}

// ── yt-dlp --dump-json ───────────────────────────────────────────

const infoSchema = z.object({
  id: z.string(),
  title: z.string(),
  channel: z.string().nullish(),
  uploader: z.string().nullish(),
  channel_id: z.string().nullish(),
  upload_date: z.string().nullish(),
  timestamp: z.number().nullish(),
  duration: z.number().nullish(),
  thumbnail: z.string().nullish(),
  webpage_url: z.string().nullish(),
  tags: z.array(z.string()).nullish(),
});

export type YouTubeInfo = z.infer<typeof infoSchema>;

/** `20210301` → `2021-03-01`; anything else is dropped. */
export function uploadDateToIso(uploadDate: string | null | undefined): string | undefined {
  const m = uploadDate ? /^(\d{4})(\d{2})(\d{2})$/.exec(uploadDate) : null;
  return m ? `${m[1]}-${m[2]}-${m[3]}` : undefined;
}

export function infoToMetadata(info: YouTubeInfo): FetchedMetadata {
  const extra: Record<string, string | number> = {};
  if (info.channel_id) extra.channel_id = info.channel_id;
  if (info.duration != null) extra.duration = info.duration;
  if (info.thumbnail) extra.thumbnail = info.thumbnail;

  return {
    title: info.title,
    author: info.channel ?? info.uploader ?? undefined,
    publishedAt:
      info.timestamp != null ? new Date(info.timestamp * 1000).toISOString() : uploadDateToIso(info.upload_date),
    sourceUrl: info.webpage_url ?? videoUrl(info.id),
    extra,
  };
}

export class YouTubeFetcher implements MetadataFetcher {
  constructor(private ytDlp: YtDlpRunner) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    let stdout: string;
    try {
      ({ stdout } = await this.ytDlp.run(
        ["--dump-json", "--no-playlist", "--skip-download", videoUrl(remoteId)],
        ctx.signal,
      ));
    } catch (err) {
      if (err instanceof YtDlpExitError) throw toYtDlpFetchError(err);
      throw new FetchError("NetworkError", errorMessage(err), { cause: err });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch {
      throw new FetchError("NetworkError", `yt-dlp returned non-JSON output for ${remoteId}`);
    }
    const info = infoSchema.safeParse(raw);
    if (!info.success) {
      throw new FetchError("NetworkError", `yt-dlp returned unexpected metadata for ${remoteId}`);
    }
    return infoToMetadata(info.data);
  }
}

export function youtubeSeriesOf(metadata: NoteMetadata): string | undefined {
  const channelId = metadata.extra.channel_id;
  if (typeof channelId === "string" && channelId) return `youtube:${channelId}`;
  return metadata.author ? `youtube:${slugify(metadata.author)}` : undefined;
}

export function youtubePlatform(ytDlp: YtDlpRunner, cacher?: MediaCacher): PlatformEntry {
  return {
    platform: "youtube",
    displayName: "YouTube",
    description: "Videos and shorts. Metadata via yt-dlp; cacheable into the media library.",
    matchUrl: (url) => youtubeIdFromUrl(url),
    matchBare: (raw) => validId(raw),
    normalizeId: (id) => validId(id),
    fetcher: new YouTubeFetcher(ytDlp),
    cacher,
    streamUrl: videoUrl,
    seriesOf: youtubeSeriesOf,
  };
}
