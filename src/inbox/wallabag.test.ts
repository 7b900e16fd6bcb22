import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import type { ClassifiedReference } from "../core/types.js";
import { WallabagClient, WallabagFetcher, WallabagSource } from "./wallabag.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const HOST = "https://wallabag.example.org";

function classify(raw: string): ClassifiedReference | null {
  if (raw.includes("youtube.com")) return { platform: "youtube", canonicalId: "youtube:dQw4w9WgXcQ" };
  return { platform: "web", canonicalId: `web:${raw}` };
}

function entry(id: number, url: string | null, extra: Record<string, unknown> = {}) {
  return { id, url, tags: [], ...extra };
}

const PAGES: Record<string, unknown> = {
  "1": {
    page: 1,
    pages: 2,
    _embedded: {
      items: [
        entry(1, "https://example.com/done", { tags: [{ label: "parsed" }] }),
        entry(2, "https://example.com/article", { is_starred: 1 }),
        entry(3, "https://www.youtube.com/watch?v=dQw4w9WgXcQ"),
        entry(4, null),
      ],
    },
  },
  "2": { page: 2, pages: 2, _embedded: { items: [entry(5, "https://example.com/other", { is_starred: false })] } },
};

let fetchSpy: MockInstance<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi.spyOn(globalThis, "fetch").mockImplementation(async (input, init) => {
    const url = new URL(String(input));
    if (url.pathname === "/oauth/v2/token") return Response.json({ access_token: "test-token", expires_in: 3600 });
    if (url.pathname === "/api/entries.json") return Response.json(PAGES[url.searchParams.get("page") ?? ""]);
    if (url.pathname === "/api/entries/2.json" && init?.method === "GET") {
      return Response.json({
        id: 2,
        url: "https://example.com/article",
        title: "An article",
        published_by: ["Ann", "Bo"],
        created_at: "2024-02-03T10:00:00+0000",
        reading_time: 7,
        domain_name: "example.com",
        tags: [{ label: "rust" }, { label: "parsed" }],
      });
    }
    return Response.json({});
  });
});

afterEach(() => {
  fetchSpy.mockRestore();
});

function client(): WallabagClient {
  return new WallabagClient({
    host: `${HOST}/`,
    clientId: "test-client",
    clientSecret: "test-secret",
    username: "reader",
    password: "test-password",
  });
}

// ---------------------------------------------------------------------------
// Source
// ---------------------------------------------------------------------------

describe("WallabagSource", () => {
  it("pulls unparsed entries, capturing plain articles as bookmarks", async () => {
    const pulled: [string, string, string][] = [];
    for await (const e of new WallabagSource(client(), "keep", classify).pull()) {
      pulled.push([e.remoteId, e.reference, e.flag]);
    }

    expect(pulled).toEqual([
      ["2", "wallabag:2", "starred"],
      ["3", "https://www.youtube.com/watch?v=dQw4w9WgXcQ", "unread"],
      ["5", "wallabag:5", "unread"],
    ]);
    const tokenCalls = fetchSpy.mock.calls.filter((c) => String(c[0]).endsWith("/oauth/v2/token"));
    expect(tokenCalls).toHaveLength(1);
    expect(fetchSpy.mock.calls[1]?.[1]?.headers).toMatchObject({ Authorization: "Bearer test-token" });
  });

  it("tags kept entries and deletes discarded ones", async () => {
    const wallabag = client();
    await new WallabagSource(wallabag, "keep", classify).markProcessed("2", "keep");
    await new WallabagSource(wallabag, "discard", classify).markProcessed("2", "discard");

    const writes = fetchSpy.mock.calls
      .filter((c) => !String(c[0]).endsWith("/oauth/v2/token"))
      .map((c) => [c[1]?.method, String(c[0]), c[1]?.body]);
    expect(writes).toEqual([
      ["POST", `${HOST}/api/entries/2/tags.json`, '{"tags":"parsed"}'],
      ["DELETE", `${HOST}/api/entries/2.json`, undefined],
    ]);
  });

  it("reaches every entry when each one is deleted as it is processed", async () => {
    let stored = Array.from({ length: 45 }, (_, i) => entry(i + 1, `https://example.com/a${i + 1}`));
    fetchSpy.mockImplementation(async (input, init) => {
      const url = new URL(String(input));
      if (url.pathname === "/oauth/v2/token") return Response.json({ access_token: "test-token" });
      if (url.pathname === "/api/entries.json") {
        const page = Number(url.searchParams.get("page"));
        const perPage = Number(url.searchParams.get("perPage"));
        return Response.json({
          page,
          pages: Math.max(1, Math.ceil(stored.length / perPage)),
          _embedded: { items: stored.slice((page - 1) * perPage, page * perPage) },
        });
      }
      const deleted = /^\/api\/entries\/(\d+)\.json$/.exec(url.pathname);
      if (deleted && init?.method === "DELETE") stored = stored.filter((e) => e.id !== Number(deleted[1]));
      return Response.json({});
    });

    const source = new WallabagSource(client(), "discard", classify);
    const seen: string[] = [];
    for await (const e of source.pull()) {
      seen.push(e.remoteId);
      await source.markProcessed(e.remoteId, "discard");
    }

    expect(seen).toHaveLength(45);
    expect(seen[44]).toBe("45");
    expect(stored).toEqual([]);
  });
});

describe("WallabagFetcher", () => {
  it("uses the bookmark as the note's metadata", async () => {
    expect(await new WallabagFetcher(client()).fetch("wallabag:2", { hints: {} })).toEqual({
      title: "An article",
      author: "Ann, Bo",
      publishedAt: "2024-02-03T10:00:00+0000",
      sourceUrl: "https://example.com/article",
      tags: ["rust"],
      extra: { wallabag_id: 2, reading_time: 7, domain: "example.com" },
    });
  });
});
