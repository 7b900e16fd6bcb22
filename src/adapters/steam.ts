import { z } from "zod";
import { FetchError } from "../core/errors.js";
import { splitCanonicalId } from "../core/classifier.js";
import type { FetchContext, FetchedMetadata, MetadataFetcher, PlatformEntry } from "../core/types.js";
import { getJson } from "./http.js";

const APP_ID = /^\d+$/;

const STEAM_HOSTS = new Set(["store.steampowered.com", "steamcommunity.com"]);

export function steamAppFromUrl(url: URL): string | null {
  if (!STEAM_HOSTS.has(url.hostname.toLowerCase())) return null;
  const m = /^\/app\/(\d+)(?:\/|$)/.exec(url.pathname);
  return m ? m[1] : null;
}

const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];

function monthIndex(name: string): number {
  return MONTHS.indexOf(name.slice(0, 3).toLowerCase()) + 1;
}

function isoDate(year: string, month: number, day: string): string | undefined {
  if (month < 1) return undefined;
  return `${year}-${String(month).padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/**
 * Steam release dates are localized display strings: "9 Jul, 2013",
 * "Jul 9, 2013" or "July 9, 2013". "Coming soon" and quarters yield undefined.
 */
export function parseSteamDate(text: string): string | undefined {
  const value = text.trim();
  let m = /^(\d{1,2}) ([A-Za-z]+),? (\d{4})$/.exec(value);
  if (m) return isoDate(m[3], monthIndex(m[2]), m[1]);
  m = /^([A-Za-z]+) (\d{1,2}),? (\d{4})$/.exec(value);
  if (m) return isoDate(m[3], monthIndex(m[1]), m[2]);
  m = /^(\d{4})$/.exec(value);
  return m ? m[1] : undefined;
}

const appSchema = z.object({
  name: z.string(),
  developers: z.array(z.string()).optional(),
  publishers: z.array(z.string()).optional(),
  release_date: z.object({ coming_soon: z.boolean().optional(), date: z.string().optional() }).optional(),
  genres: z.array(z.object({ description: z.string() })).optional(),
  is_free: z.boolean().optional(),
  price_overview: z.object({ final_formatted: z.string() }).optional(),
  short_description: z.string().optional(),
  header_image: z.string().optional(),
});

const responseSchema = z.record(
  z.string(),
  z.object({ success: z.boolean(), data: z.unknown().optional() }),
);

export interface SteamFetcherOptions {
  timeoutMs?: number;
}

export class SteamFetcher implements MetadataFetcher {
  constructor(private opts: SteamFetcherOptions = {}) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    const body = await getJson(
      `https://store.steampowered.com/api/appdetails?appids=${remoteId}`,
      "Steam store",
      responseSchema,
      { signal: ctx.signal, timeoutMs: this.opts.timeoutMs },
    );

    const entry = body[remoteId];
    if (!entry || !entry.success) throw new FetchError("NotFound", `Steam app ${remoteId} not found`);
    const parsed = appSchema.safeParse(entry.data);
    if (!parsed.success) throw new FetchError("NetworkError", `Steam store: unexpected app shape for ${remoteId}`);
    const app = parsed.data;

    const extra: Record<string, string | boolean | string[]> = {};
    if (app.short_description) extra.description = app.short_description;
    if (app.publishers?.length) extra.publishers = app.publishers;
    if (app.genres?.length) extra.genres = app.genres.map((g) => g.description);
    if (app.is_free) extra.price = "Free";
    else if (app.price_overview) extra.price = app.price_overview.final_formatted;
    if (app.release_date?.coming_soon) extra.coming_soon = true;
    if (app.header_image) extra.header_image = app.header_image;

    return {
      title: app.name,
      author: app.developers?.join(", ") || undefined,
      publishedAt: app.release_date?.date ? parseSteamDate(app.release_date.date) : undefined,
      sourceUrl: `https://store.steampowered.com/app/${remoteId}/`,
      tags: [],
      extra,
    };
  }
}

export function steamPlatform(opts: SteamFetcherOptions = {}): PlatformEntry {
  return {
    platform: "steam",
    displayName: "Steam",
    description: "Store pages. Metadata from the Steam appdetails API.",
    matchUrl: steamAppFromUrl,
    normalizeId: (id) => (APP_ID.test(id) ? id : null),
    fetcher: new SteamFetcher(opts),
  };
}
