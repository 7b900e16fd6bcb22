import { splitCanonicalId } from "../core/classifier.js";
import type { FetchedMetadata, MetadataFetcher, PlatformEntry } from "../core/types.js";

const GOOGLE_HOST = /^(www\.)?google\.[a-z]{2,3}(\.[a-z]{2})?$/i;

export function normalizeQuery(raw: string): string | null {
  const query = raw.trim().replace(/\s+/g, " ");
  return query ? query : null;
}

export function googleQueryFromUrl(url: URL): string | null {
  if (!GOOGLE_HOST.test(url.hostname) || url.pathname !== "/search") return null;
  const q = url.searchParams.get("q");
  return q ? normalizeQuery(q) : null;
}

export function searchUrl(query: string): string {
  return `https://www.google.com/search?q=${encodeURIComponent(query)}`;
}

/** Searches are remembered, not fetched: the query is the note. */
export class GoogleSearchFetcher implements MetadataFetcher {
  async fetch(canonicalId: string): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    return {
      title: remoteId,
      sourceUrl: searchUrl(remoteId),
      extra: { query: remoteId },
    };
  }
}

export function googleSearchPlatform(): PlatformEntry {
  return {
    platform: "google_search",
    displayName: "Google search",
    description: "Search queries saved for later. No remote fetch.",
    matchUrl: googleQueryFromUrl,
    normalizeId: normalizeQuery,
    fetcher: new GoogleSearchFetcher(),
  };
}
