import { z } from "zod";
import { FetchError } from "../core/errors.js";
import { splitCanonicalId } from "../core/classifier.js";
import type {
  ClassifiedReference,
  FetchContext,
  FetchedMetadata,
  InboxSource,
  MetadataFetcher,
  PlatformEntry,
  ProcessedAction,
  RemoteInboxEntry,
} from "../core/types.js";
import { getJson, httpRequest, readJson, unconfigured } from "../adapters/http.js";

export const PARSED_TAG = "parsed";
const PAGE_SIZE = 30;
const ENTRY_ID = /^\d+$/;

export interface WallabagCredentials {
  host: string;
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
  timeoutMs?: number;
}

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number().optional(),
});

const entrySchema = z.object({
  id: z.number(),
  url: z.string().nullish(),
  title: z.string().nullish(),
  created_at: z.string().nullish(),
  published_at: z.string().nullish(),
  published_by: z.array(z.string()).nullish(),
  reading_time: z.number().nullish(),
  domain_name: z.string().nullish(),
  is_starred: z.union([z.number(), z.boolean()]).optional(),
  tags: z.array(z.object({ label: z.string() })).default([]),
});

export type WallabagEntry = z.infer<typeof entrySchema>;

const pageSchema = z.object({
  page: z.number(),
  pages: z.number(),
  _embedded: z.object({ items: z.array(entrySchema) }),
});

// ── API client ───────────────────────────────────────────────────

export class WallabagClient {
  private token: string | null = null;
  private tokenExpiresAt = 0;

  constructor(private creds: WallabagCredentials) {}

  get host(): string {
    return this.creds.host.replace(/\/+$/, "");
  }

  private async authenticate(signal?: AbortSignal): Promise<string> {
    if (this.token && Date.now() < this.tokenExpiresAt) return this.token;

    const body = new URLSearchParams({
      grant_type: "password",
      client_id: this.creds.clientId,
      client_secret: this.creds.clientSecret,
      username: this.creds.username,
      password: this.creds.password,
    });
    const resp = await httpRequest(`${this.host}/oauth/v2/token`, "Wallabag auth", {
      method: "POST",
      body,
      signal,
      timeoutMs: this.creds.timeoutMs,
    });
    const token = await readJson(resp, tokenSchema, "Wallabag auth");
    this.token = token.access_token;
    // refresh a minute early
    this.tokenExpiresAt = Date.now() + ((token.expires_in ?? 3600) - 60) * 1000;
    return this.token;
  }

  private async headers(signal?: AbortSignal): Promise<Record<string, string>> {
    return { Authorization: `Bearer ${await this.authenticate(signal)}` };
  }

  async listPage(page: number, signal?: AbortSignal): Promise<z.infer<typeof pageSchema>> {
    return getJson(
      `${this.host}/api/entries.json?page=${page}&perPage=${PAGE_SIZE}`,
      "Wallabag entries",
      pageSchema,
      { headers: await this.headers(signal), signal, timeoutMs: this.creds.timeoutMs },
    );
  }

  async getEntry(id: string, signal?: AbortSignal): Promise<WallabagEntry> {
    return getJson(`${this.host}/api/entries/${id}.json`, `Wallabag entry ${id}`, entrySchema, {
      headers: await this.headers(signal),
      signal,
      timeoutMs: this.creds.timeoutMs,
    });
  }

  async addTags(id: string, tags: string[]): Promise<void> {
    await httpRequest(`${this.host}/api/entries/${id}/tags.json`, `Wallabag tag ${id}`, {
      method: "POST",
      headers: { ...(await this.headers()), "Content-Type": "application/json" },
      body: JSON.stringify({ tags: tags.join(",") }),
      timeoutMs: this.creds.timeoutMs,
    });
  }

  async deleteEntry(id: string): Promise<void> {
    await httpRequest(`${this.host}/api/entries/${id}.json`, `Wallabag delete ${id}`, {
      method: "DELETE",
      headers: await this.headers(),
      timeoutMs: this.creds.timeoutMs,
    });
  }
}

// ── Inbox source ─────────────────────────────────────────────────

export type Classify = (raw: string) => ClassifiedReference | null;

/**
 * Every entry not yet tagged `parsed`. Links that belong to a dedicated
 * platform are captured under it; plain articles are captured as the
 * bookmark itself (`wallabag:<id>`) so the service's record is the metadata.
 */
export class WallabagSource implements InboxSource {
  readonly name = "wallabag";

  constructor(
    private client: WallabagClient,
    readonly onCapture: ProcessedAction,
    private classify: Classify,
  ) {}

  /**
   * Reads every page before yielding anything: discarding deletes entries
   * server-side, which would shift later ones onto pages already read.
   */
  async *pull(signal?: AbortSignal): AsyncIterable<RemoteInboxEntry> {
    const pending: WallabagEntry[] = [];
    for (let page = 1; ; page++) {
      const result = await this.client.listPage(page, signal);
      pending.push(...result._embedded.items);
      if (page >= result.pages || result._embedded.items.length === 0) break;
    }

    for (const entry of pending) {
      if (entry.tags.some((t) => t.label === PARSED_TAG)) continue;
      if (!entry.url) continue;
      yield {
        remoteId: String(entry.id),
        source: this.name,
        reference: this.referenceFor(entry.id, entry.url),
        flag: entry.is_starred ? "starred" : "unread",
        resolved: false,
        tags: ["inbox"],
        hints: {},
      };
    }
  }

  private referenceFor(id: number, url: string): string {
    const platform = this.classify(url)?.platform;
    return platform && platform !== "web" ? url : `wallabag:${id}`;
  }

  async markProcessed(remoteId: string, action: ProcessedAction): Promise<void> {
    if (action === "discard") await this.client.deleteEntry(remoteId);
    else await this.client.addTags(remoteId, [PARSED_TAG]);
  }
}

// ── Platform entry: a bookmark as a note ─────────────────────────

export class WallabagFetcher implements MetadataFetcher {
  constructor(private client: WallabagClient) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    const entry = await this.client.getEntry(remoteId, ctx.signal);
    if (!entry.url) throw new FetchError("NotFound", `Wallabag entry ${remoteId} has no URL`);

    const extra: Record<string, string | number> = { wallabag_id: entry.id };
    if (entry.reading_time != null) extra.reading_time = entry.reading_time;
    if (entry.domain_name) extra.domain = entry.domain_name;

    return {
      title: entry.title || entry.url,
      author: entry.published_by?.join(", ") || undefined,
      publishedAt: entry.published_at ?? entry.created_at ?? undefined,
      sourceUrl: entry.url,
      tags: entry.tags.map((t) => t.label).filter((l) => l !== PARSED_TAG),
      extra,
    };
  }
}

export function wallabagPlatform(client: WallabagClient | null): PlatformEntry {
  const host = client ? new URL(client.host).host.toLowerCase() : null;
  return {
    platform: "wallabag",
    displayName: "Wallabag",
    description: "Read-it-later bookmarks (wallabag:<id> or <host>/view/<id>).",
    matchUrl: (url) => {
      if (!host || url.host.toLowerCase() !== host) return null;
      const m = /\/view\/(\d+)\/?$/.exec(url.pathname);
      return m ? m[1] : null;
    },
    normalizeId: (id) => (ENTRY_ID.test(id) ? id : null),
    fetcher: client ? new WallabagFetcher(client) : unconfigured("Wallabag"),
  };
}
