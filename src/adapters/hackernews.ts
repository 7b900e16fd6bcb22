import { z } from "zod";
import { splitCanonicalId } from "../core/classifier.js";
import type { FetchContext, FetchedMetadata, MetadataFetcher, PlatformEntry } from "../core/types.js";
import { getJson } from "./http.js";

const ITEM_ID = /^\d+$/;

export function itemUrl(id: string): string {
  return `https://news.ycombinator.com/item?id=${id}`;
}

export function hackerNewsItemFromUrl(url: URL): string | null {
  if (url.hostname.toLowerCase() !== "news.ycombinator.com" || url.pathname !== "/item") return null;
  const id = url.searchParams.get("id");
  return id && ITEM_ID.test(id) ? id : null;
}

interface AlgoliaItem {
  id: number;
  type?: string | null;
  title?: string | null;
  author?: string | null;
  created_at?: string | null;
  url?: string | null;
  points?: number | null;
  children: AlgoliaItem[];
}

const itemSchema: z.ZodType<AlgoliaItem, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    id: z.number(),
    type: z.string().nullish(),
    title: z.string().nullish(),
    author: z.string().nullish(),
    created_at: z.string().nullish(),
    url: z.string().nullish(),
    points: z.number().nullish(),
    children: z.array(itemSchema).default([]),
  }),
);

export function countComments(item: AlgoliaItem): number {
  return item.children.reduce((sum, child) => sum + 1 + countComments(child), 0);
}

export interface HackerNewsFetcherOptions {
  timeoutMs?: number;
}

export class HackerNewsFetcher implements MetadataFetcher {
  constructor(private opts: HackerNewsFetcherOptions = {}) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    const item = await getJson(`https://hn.algolia.com/api/v1/items/${remoteId}`, "Hacker News", itemSchema, {
      signal: ctx.signal,
      timeoutMs: this.opts.timeoutMs,
    });

    const extra: Record<string, string | number> = {
      hn_url: itemUrl(remoteId),
      comments: countComments(item),
    };
    if (item.points != null) extra.points = item.points;
    if (item.type) extra.item_type = item.type;

    return {
      title: item.title ?? `Comment by ${item.author ?? "unknown"}`,
      author: item.author ?? undefined,
      publishedAt: item.created_at ?? undefined,
      sourceUrl: item.url ?? itemUrl(remoteId),
      extra,
    };
  }
}

export function hackerNewsPlatform(opts: HackerNewsFetcherOptions = {}): PlatformEntry {
  return {
    platform: "hackernews",
    displayName: "Hacker News",
    description: "Stories and comments. Metadata from the Algolia HN API.",
    matchUrl: hackerNewsItemFromUrl,
    normalizeId: (id) => (ITEM_ID.test(id) ? id : null),
    fetcher: new HackerNewsFetcher(opts),
  };
}
