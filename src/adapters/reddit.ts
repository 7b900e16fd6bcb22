import { z } from "zod";
import { FetchError } from "../core/errors.js";
import { splitCanonicalId } from "../core/classifier.js";
import type { FetchContext, FetchedMetadata, MetadataFetcher, PlatformEntry } from "../core/types.js";
import { getJson } from "./http.js";

const THREAD_ID = /^(?:t3_)?([a-z0-9]{2,12})$/i;

const REDDIT_HOSTS = new Set([
  "reddit.com",
  "www.reddit.com",
  "old.reddit.com",
  "new.reddit.com",
  "np.reddit.com",
  "m.reddit.com",
]);

function normalizeThreadId(raw: string): string | null {
  const m = THREAD_ID.exec(raw);
  return m ? m[1].toLowerCase() : null;
}

export function redditThreadFromUrl(url: URL): string | null {
  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split("/").filter(Boolean);
  if (host === "redd.it") return segments[0] ? normalizeThreadId(segments[0]) : null;
  if (!REDDIT_HOSTS.has(host)) return null;

  // /r/<sub>/comments/<id>/<slug>/ or /comments/<id>
  const at = segments.indexOf("comments");
  if (at === -1 || !segments[at + 1]) return null;
  if (at !== 0 && !(at === 2 && segments[0] === "r")) return null;
  return normalizeThreadId(segments[at + 1]);
}

const postSchema = z.object({
  title: z.string(),
  author: z.string().nullish(),
  subreddit: z.string(),
  score: z.number().optional(),
  num_comments: z.number().optional(),
  created_utc: z.number().optional(),
  url: z.string().nullish(),
  permalink: z.string(),
  is_self: z.boolean().optional(),
});

const listingSchema = z.array(
  z.object({
    data: z.object({
      children: z.array(z.object({ data: z.unknown() })),
    }),
  }),
);

export interface RedditFetcherOptions {
  timeoutMs?: number;
}

export class RedditFetcher implements MetadataFetcher {
  constructor(private opts: RedditFetcherOptions = {}) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    const listing = await getJson(`https://www.reddit.com/comments/${remoteId}.json?raw_json=1`, "Reddit", listingSchema, {
      signal: ctx.signal,
      timeoutMs: this.opts.timeoutMs,
    });

    const first = listing[0]?.data.children[0];
    if (!first) throw new FetchError("NotFound", `Reddit thread ${remoteId} not found`);
    const post = postSchema.safeParse(first.data);
    if (!post.success) throw new FetchError("NetworkError", `Reddit: unexpected post shape for ${remoteId}`);
    const p = post.data;

    const extra: Record<string, string | number> = { subreddit: p.subreddit };
    if (p.score !== undefined) extra.score = p.score;
    if (p.num_comments !== undefined) extra.comments = p.num_comments;
    if (p.url && !p.is_self) extra.linked_url = p.url;

    return {
      title: p.title,
      author: p.author ?? undefined,
      publishedAt: p.created_utc !== undefined ? new Date(p.created_utc * 1000).toISOString() : undefined,
      sourceUrl: `https://www.reddit.com${p.permalink}`,
      extra,
    };
  }
}

export function redditPlatform(opts: RedditFetcherOptions = {}): PlatformEntry {
  return {
    platform: "reddit",
    displayName: "Reddit",
    description: "Threads. Metadata from the public JSON listing.",
    matchUrl: redditThreadFromUrl,
    normalizeId: normalizeThreadId,
    fetcher: new RedditFetcher(opts),
  };
}
