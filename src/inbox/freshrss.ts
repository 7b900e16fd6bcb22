import { z } from "zod";
import { FetchError } from "../core/errors.js";
import { splitCanonicalId } from "../core/classifier.js";
import type {
  FetchContext,
  FetchedMetadata,
  InboxSource,
  MetadataFetcher,
  PlatformEntry,
  ProcessedAction,
  RemoteInboxEntry,
} from "../core/types.js";
import { getJson, httpRequest, unconfigured } from "../adapters/http.js";
import type { Classify } from "./wallabag.js";

const STARRED = "user/-/state/com.google/starred";
const LABEL_PREFIX = "user/-/label/";
const PARSED_LABEL = `${LABEL_PREFIX}parsed`;
const ITEM_PREFIX = "tag:google.com,2005:reader/item/";
const PAGE_SIZE = 100;

export interface FreshRssCredentials {
  /** Google Reader API base, e.g. https://rss.example.org/api/greader.php */
  url: string;
  username: string;
  password: string;
  timeoutMs?: number;
}

const itemSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  author: z.string().nullish(),
  published: z.number().nullish(),
  alternate: z.array(z.object({ href: z.string() })).nullish(),
  canonical: z.array(z.object({ href: z.string() })).nullish(),
  enclosure: z.array(z.object({ href: z.string(), type: z.string().nullish() })).nullish(),
  categories: z.array(z.string()).default([]),
  origin: z
    .object({ title: z.string().nullish(), htmlUrl: z.string().nullish(), streamId: z.string().nullish() })
    .nullish(),
  summary: z.object({ content: z.string().nullish() }).nullish(),
});

export type FreshRssItem = z.infer<typeof itemSchema>;

const streamSchema = z.object({
  items: z.array(itemSchema).default([]),
  continuation: z.string().nullish(),
});

/** `tag:google.com,2005:reader/item/0005f1…` or the bare 16-digit hex form → lowercase hex. */
export function normalizeItemId(raw: string): string | null {
  const id = raw.startsWith(ITEM_PREFIX) ? raw.slice(ITEM_PREFIX.length) : raw;
  return /^[0-9a-f]{16}$/i.test(id) ? id.toLowerCase() : null;
}

// ── Item interpretation ──────────────────────────────────────────

/** `user/-/label/tech_rust` → `tech`, `rust`; always ends up including `inbox`. */
export function tagsFromCategories(categories: string[]): string[] {
  const tags: string[] = [];
  for (const category of categories) {
    const at = category.indexOf(LABEL_PREFIX);
    if (at === -1) continue;
    const label = category.slice(at + LABEL_PREFIX.length);
    if (label === "parsed") continue;
    for (const part of label.split("_")) {
      if (part && !tags.includes(part)) tags.push(part);
    }
  }
  if (!tags.includes("inbox")) tags.push("inbox");
  return tags;
}

export function hackerNewsCommentsUrl(item: FreshRssItem): string | undefined {
  const origin = item.origin;
  const fromHn = origin?.htmlUrl?.startsWith("https://news.ycombinator.com") || origin?.title === "Hacker News";
  if (!fromHn) return undefined;
  const m = /href="(https:\/\/news\.ycombinator\.com\/item\?id=\d+)"/.exec(item.summary?.content ?? "");
  return m ? m[1] : undefined;
}

export function stripHtml(html: string, maxLen = 500): string {
  return html.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim().slice(0, maxLen);
}

function publishedDate(seconds: number | null | undefined): string | undefined {
  return seconds ? new Date(seconds * 1000).toISOString().slice(0, 10) : undefined;
}

function itemUrl(item: FreshRssItem): string | undefined {
  return item.alternate?.[0]?.href ?? item.canonical?.[0]?.href;
}

/**
 * Maps a starred item to the inbox entry the reconciler captures:
 * Hacker News items point at their comment thread, `podcast`-labelled items
 * become podcast episodes, YouTube items labelled `news`/`feed` ask to be cached.
 */
export function toInboxEntry(item: FreshRssItem, source: string, classify: Classify): RemoteInboxEntry | null {
  const hexId = normalizeItemId(item.id);
  if (!hexId) return null;

  const tags = tagsFromCategories(item.categories);
  const hints: Record<string, string> = {};
  const published = publishedDate(item.published);
  if (published) hints.published_at = published;

  let reference = itemUrl(item) ?? `freshrss:${hexId}`;

  const comments = hackerNewsCommentsUrl(item);
  if (comments) {
    hints.comments_url = comments;
    if (itemUrl(item)) hints.linked_url = reference;
    reference = comments;
  }

  if (tags.includes("podcast")) {
    const audio = item.enclosure?.find((e) => !e.type || e.type.startsWith("audio/"))?.href;
    const pageUrl = itemUrl(item);
    if (pageUrl) hints.page_url = pageUrl;
    hints.title = item.title ?? "(untitled)";
    hints.channel = item.origin?.title ?? "Unknown";
    const description = stripHtml(item.summary?.content ?? "");
    if (description) hints.description = description;
    return {
      remoteId: item.id,
      source,
      reference: `podcast:${audio ?? reference}`,
      flag: "starred",
      resolved: false,
      tags: tags.filter((t) => t !== "podcast"),
      hints,
    };
  }

  // unclassifiable references fail later, during capture
  if ((tags.includes("news") || tags.includes("feed")) && classify(reference)?.platform === "youtube") {
    hints.cache = "true";
  }

  return { remoteId: item.id, source, reference, flag: "starred", resolved: false, tags, hints };
}

// ── API client ───────────────────────────────────────────────────

export class FreshRssClient {
  private auth: string | null = null;

  constructor(private creds: FreshRssCredentials) {}

  private get base(): string {
    return this.creds.url.replace(/\/+$/, "");
  }

  private async headers(signal?: AbortSignal): Promise<Record<string, string>> {
    if (!this.auth) {
      const resp = await httpRequest(`${this.base}/accounts/ClientLogin`, "FreshRSS login", {
        method: "POST",
        body: new URLSearchParams({ Email: this.creds.username, Passwd: this.creds.password }),
        signal,
        timeoutMs: this.creds.timeoutMs,
      });
      const line = (await resp.text()).split("\n").find((l) => l.startsWith("Auth="));
      if (!line) throw new FetchError("AuthFailure", "FreshRSS login: no Auth token in response");
      this.auth = line.slice("Auth=".length).trim();
    }
    return { Authorization: `GoogleLogin auth=${this.auth}` };
  }

  async starredPage(continuation: string | undefined, signal?: AbortSignal): Promise<z.infer<typeof streamSchema>> {
    const params = new URLSearchParams({ n: String(PAGE_SIZE) });
    if (continuation) params.set("c", continuation);
    return getJson(
      `${this.base}/reader/api/0/stream/contents/${STARRED}?${params}`,
      "FreshRSS starred",
      streamSchema,
      { headers: await this.headers(signal), signal, timeoutMs: this.creds.timeoutMs },
    );
  }

  async getItem(hexId: string, signal?: AbortSignal): Promise<FreshRssItem> {
    const params = new URLSearchParams({ i: `${ITEM_PREFIX}${hexId}` });
    const stream = await getJson(
      `${this.base}/reader/api/0/stream/items/contents?${params}`,
      `FreshRSS item ${hexId}`,
      streamSchema,
      { headers: await this.headers(signal), signal, timeoutMs: this.creds.timeoutMs },
    );
    const item = stream.items[0];
    if (!item) throw new FetchError("NotFound", `FreshRSS item ${hexId} not found`);
    return item;
  }

  /** `a` adds a tag, `r` removes one. */
  async editTag(itemId: string, op: "a" | "r", tag: string): Promise<void> {
    const resp = await httpRequest(`${this.base}/reader/api/0/edit-tag`, `FreshRSS edit-tag ${itemId}`, {
      method: "POST",
      headers: await this.headers(),
      body: new URLSearchParams({ i: itemId, [op]: tag }),
      timeoutMs: this.creds.timeoutMs,
    });
    const text = await resp.text();
    if (!text.includes("OK")) {
      throw new FetchError("NetworkError", `FreshRSS edit-tag ${itemId}: unexpected reply ${JSON.stringify(text.slice(0, 80))}`);
    }
  }
}

// ── Inbox source ─────────────────────────────────────────────────

export class FreshRssSource implements InboxSource {
  readonly name = "freshrss";

  constructor(
    private client: FreshRssClient,
    readonly onCapture: ProcessedAction,
    private classify: Classify,
  ) {}

  async *pull(signal?: AbortSignal): AsyncIterable<RemoteInboxEntry> {
    let continuation: string | undefined;
    do {
      const page = await this.client.starredPage(continuation, signal);
      for (const item of page.items) {
        if (item.categories.includes(PARSED_LABEL)) continue;
        const entry = toInboxEntry(item, this.name, this.classify);
        if (entry) yield entry;
      }
      continuation = page.items.length > 0 ? (page.continuation ?? undefined) : undefined;
    } while (continuation);
  }

  async markProcessed(remoteId: string, action: ProcessedAction): Promise<void> {
    if (action === "discard") await this.client.editTag(remoteId, "r", STARRED);
    else await this.client.editTag(remoteId, "a", PARSED_LABEL);
  }
}

// ── Platform entry: a feed item with no link of its own ──────────

export class FreshRssFetcher implements MetadataFetcher {
  constructor(private client: FreshRssClient) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    const item = await this.client.getItem(remoteId, ctx.signal);
    const extra: Record<string, string> = { freshrss_id: remoteId };
    if (item.origin?.title) extra.feed = item.origin.title;
    const summary = stripHtml(item.summary?.content ?? "");
    if (summary) extra.description = summary;

    return {
      title: item.title ?? "(untitled)",
      author: item.author ?? item.origin?.title ?? undefined,
      publishedAt: item.published ? new Date(item.published * 1000).toISOString() : undefined,
      sourceUrl: itemUrl(item),
      tags: tagsFromCategories(item.categories).filter((t) => t !== "inbox"),
      extra,
    };
  }
}

export function freshRssPlatform(client: FreshRssClient | null): PlatformEntry {
  return {
    platform: "freshrss",
    displayName: "FreshRSS",
    description: "Feed items captured from the reader (freshrss:<item id>).",
    normalizeId: normalizeItemId,
    fetcher: client ? new FreshRssFetcher(client) : unconfigured("FreshRSS"),
  };
}
