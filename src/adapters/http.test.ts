import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { z } from "zod";
import { FetchError } from "../core/errors.js";
import { getJson, httpRequest, unconfigured } from "./http.js";

let fetchSpy: MockInstance<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi.spyOn(globalThis, "fetch");
});

afterEach(() => {
  fetchSpy.mockRestore();
});

describe("httpRequest", () => {
  it("maps HTTP statuses onto fetch error kinds", async () => {
    fetchSpy.mockResolvedValueOnce(new Response("slow down", { status: 429 }));
    await expect(httpRequest("https://api.example.com/x", "Example")).rejects.toMatchObject({
      kind: "RateLimited",
      message: "Example 429: slow down",
    });

    fetchSpy.mockResolvedValueOnce(new Response("", { status: 403 }));
    await expect(httpRequest("https://api.example.com/x", "Example")).rejects.toMatchObject({
      kind: "AuthFailure",
      message: "Example 403",
    });

    fetchSpy.mockResolvedValueOnce(new Response("gone", { status: 410 }));
    await expect(httpRequest("https://api.example.com/x", "Example")).rejects.toMatchObject({ kind: "NotFound" });

    fetchSpy.mockResolvedValueOnce(new Response("oops", { status: 502 }));
    await expect(httpRequest("https://api.example.com/x", "Example")).rejects.toMatchObject({ kind: "NetworkError" });
  });

  it("wraps transport failures as network errors", async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));
    const err = await httpRequest("https://api.example.com/x", "Example").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FetchError);
    expect(err).toMatchObject({ kind: "NetworkError", message: "Example: fetch failed" });
  });

  it("sends the user agent and caller headers", async () => {
    fetchSpy.mockResolvedValueOnce(new Response("ok"));
    await httpRequest("https://api.example.com/x", "Example", { headers: { Accept: "text/plain" } });
    expect(fetchSpy.mock.calls[0]?.[1]).toMatchObject({
      method: "GET",
      headers: { "User-Agent": "mdcapture/1.0", Accept: "text/plain" },
    });
  });
});

describe("getJson", () => {
  const schema = z.object({ id: z.number() });

  it("validates the body against the schema", async () => {
    fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ id: 7 })));
    expect(await getJson("https://api.example.com/x", "Example", schema)).toEqual({ id: 7 });
  });

  it("names the first schema issue", async () => {
    fetchSpy.mockResolvedValueOnce(new Response(JSON.stringify({ id: "7" })));
    await expect(getJson("https://api.example.com/x", "Example", schema)).rejects.toMatchObject({
      kind: "NetworkError",
      message: "Example: unexpected response (id: Expected number, received string)",
    });
  });

  it("rejects bodies that are not JSON", async () => {
    fetchSpy.mockResolvedValueOnce(new Response("<html>"));
    await expect(getJson("https://api.example.com/x", "Example", schema)).rejects.toMatchObject({
      kind: "NetworkError",
    });
  });
});

describe("unconfigured", () => {
  it("fails every fetch as an auth failure", async () => {
    await expect(unconfigured("Wallabag").fetch("wallabag:1", { hints: {} })).rejects.toMatchObject({
      kind: "AuthFailure",
      message: "Wallabag is not configured",
    });
  });
});
