import metascraper from "metascraper";
import metascraperAuthor from "metascraper-author";
import metascraperDate from "metascraper-date";
import metascraperDescription from "metascraper-description";
import metascraperPublisher from "metascraper-publisher";
import metascraperTitle from "metascraper-title";
import normalizeUrl from "normalize-url";
import { parseHttpUrl, parseOtherSchemeUrl, splitCanonicalId } from "../core/classifier.js";
import type { FetchContext, FetchedMetadata, MetadataFetcher, PlatformEntry } from "../core/types.js";
import { httpRequest } from "./http.js";

/** The URL form two equivalent links share: no hash, no tracking params, sorted query, no www. */
export function canonicalWebUrl(raw: string): string | null {
  const url = parseHttpUrl(raw);
  if (!url) return null;
  return normalizeUrl(url.href, {
    stripHash: true,
    stripWWW: true,
    removeQueryParameters: [/^utm_\w+/i, "ref", "fbclid", "gclid"],
    sortQueryParameters: true,
  });
}

/** Web notes also keep URLs under other schemes, minus the fragment. */
export function canonicalWebReference(raw: string): string | null {
  const web = canonicalWebUrl(raw);
  if (web) return web;
  const url = parseOtherSchemeUrl(raw);
  if (!url) return null;
  url.hash = "";
  return url.href;
}

function fileTitle(url: URL): string | undefined {
  const name = url.pathname.split("/").filter(Boolean).pop();
  return name ? decodeURIComponent(name) : undefined;
}

// ── Page metadata ────────────────────────────────────────────────

export interface PageMetadata {
  title?: string;
  description?: string;
  author?: string;
  siteName?: string;
  publishedAt?: string;
}

const MAX_HTML_CHARS = 512 * 1024;

const scraper = metascraper([
  metascraperAuthor(),
  metascraperDate(),
  metascraperDescription(),
  metascraperTitle(),
  metascraperPublisher(),
]);

function present(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

/** Open Graph, JSON-LD, Twitter cards and plain head tags, in metascraper's rule order. */
export async function extractPageMetadata(url: string, html: string): Promise<PageMetadata> {
  const metadata = await scraper({ url, html });
  return {
    title: present(metadata.title),
    description: present(metadata.description),
    author: present(metadata.author),
    siteName: present(metadata.publisher),
    publishedAt: present(metadata.date),
  };
}

export interface WebFetcherOptions {
  timeoutMs?: number;
}

export class WebFetcher implements MetadataFetcher {
  constructor(private opts: WebFetcherOptions = {}) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId: url } = splitCanonicalId(canonicalId);
    const target = new URL(url);
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      // nothing to read over HTTP; the link is the note
      return { title: fileTitle(target) ?? url, sourceUrl: url, extra: { scheme: target.protocol.slice(0, -1) } };
    }

    const resp = await httpRequest(url, `GET ${url}`, {
      headers: { Accept: "text/html,application/xhtml+xml" },
      signal: ctx.signal,
      timeoutMs: this.opts.timeoutMs,
    });

    const contentType = resp.headers.get("content-type") ?? "";
    if (!contentType.includes("html")) {
      await resp.body?.cancel();
      return { title: fileTitle(new URL(resp.url || url)) ?? url, sourceUrl: url, extra: { content_type: contentType } };
    }

    const html = (await resp.text()).slice(0, MAX_HTML_CHARS);
    const page = await extractPageMetadata(resp.url || url, html);
    const extra: Record<string, string> = {};
    if (page.description) extra.description = page.description;
    if (page.siteName) extra.site_name = page.siteName;

    return {
      title: page.title ?? url,
      author: page.author,
      publishedAt: page.publishedAt,
      sourceUrl: url,
      extra,
    };
  }
}

export function webPlatform(opts: WebFetcherOptions = {}): PlatformEntry {
  return {
    platform: "web",
    displayName: "Web page",
    description: "Any other URL. Title and description from the page head.",
    matchUrl: (url) => canonicalWebUrl(url.href),
    normalizeId: canonicalWebReference,
    fetcher: new WebFetcher(opts),
  };
}
