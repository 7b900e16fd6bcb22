import RssParser from "rss-parser";
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
import { canonicalWebUrl } from "./web.js";

const AUDIO_EXTENSIONS = /\.(mp3|m4a|ogg|oga|opus|aac|wav|flac)$/i;

export function podcastEpisodeFromUrl(url: URL): string | null {
  return AUDIO_EXTENSIONS.test(url.pathname) ? canonicalWebUrl(url.href) : null;
}

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen).trimEnd() + "…";
}

export interface PodcastFetcherOptions {
  timeoutMs?: number;
}

/**
 * Episodes are looked up in their show's feed when the capture carried a
 * `feed_url` hint; otherwise the `title`/`channel` hints given at capture
 * time are the metadata.
 */
export class PodcastFetcher implements MetadataFetcher {
  private parser: RssParser;

  constructor(opts: PodcastFetcherOptions = {}) {
    this.parser = new RssParser({ timeout: opts.timeoutMs ?? 15_000 });
  }

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId: audioUrl } = splitCanonicalId(canonicalId);
    const feedUrl = ctx.hints.feed_url;
    if (feedUrl) return this.fromFeed(audioUrl, feedUrl);

    const title = ctx.hints.title;
    if (!title) {
      throw new FetchError("NotFound", `No feed_url or title hint for podcast episode ${audioUrl}`);
    }
    const extra: Record<string, string> = { audio_url: audioUrl };
    if (ctx.hints.description) extra.description = truncate(ctx.hints.description, 500);
    return {
      title,
      author: ctx.hints.channel,
      publishedAt: ctx.hints.published_at,
      sourceUrl: ctx.hints.page_url ?? audioUrl,
      extra,
    };
  }

  private async fromFeed(audioUrl: string, feedUrl: string): Promise<FetchedMetadata> {
    const feed = await this.parser.parseURL(feedUrl).catch((err: unknown) => {
      const msg = errorMessage(err);
      if (/status code 404/i.test(msg)) throw new FetchError("NotFound", `Podcast feed ${feedUrl}: ${msg}`);
      throw new FetchError("NetworkError", `Podcast feed ${feedUrl}: ${msg}`, { cause: err });
    });

    const item = feed.items.find((it) => {
      const enclosure = it.enclosure?.url;
      return enclosure !== undefined && canonicalWebUrl(enclosure) === audioUrl;
    });
    if (!item) throw new FetchError("NotFound", `Episode ${audioUrl} not in feed ${feedUrl}`);

    const extra: Record<string, string> = { audio_url: audioUrl, feed_url: feedUrl };
    const summary = item.contentSnippet ?? item.summary;
    if (summary) extra.description = truncate(summary, 500);
    if (item.enclosure?.type) extra.mime_type = item.enclosure.type;

    return {
      title: item.title ?? "(untitled)",
      author: feed.title ?? item.creator,
      publishedAt: item.isoDate ?? item.pubDate,
      sourceUrl: item.link ?? audioUrl,
      tags: item.categories ?? [],
      extra,
    };
  }
}

export function podcastSeriesOf(metadata: NoteMetadata): string | undefined {
  const slug = metadata.author ? slugify(metadata.author) : "";
  return slug ? `podcast:${slug}` : undefined;
}

export function podcastPlatform(opts: PodcastFetcherOptions = {}, cacher?: MediaCacher): PlatformEntry {
  return {
    platform: "podcast",
    displayName: "Podcast episode",
    description: "Audio episodes (direct enclosure URLs). Cacheable into the media library.",
    matchUrl: podcastEpisodeFromUrl,
    normalizeId: canonicalWebUrl,
    fetcher: new PodcastFetcher(opts),
    cacher,
    streamUrl: (audioUrl) => audioUrl,
    seriesOf: podcastSeriesOf,
  };
}
