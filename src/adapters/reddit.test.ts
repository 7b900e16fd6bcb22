import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import { RedditFetcher, redditThreadFromUrl } from "./reddit.js";

let fetchSpy: MockInstance<typeof fetch>;

beforeEach(() => {
  fetchSpy = vi.spyOn(globalThis, "fetch");
});

afterEach(() => {
  fetchSpy.mockRestore();
});

function listing(children: unknown[]): Response {
  return new Response(JSON.stringify([{ data: { children } }, { data: { children: [] } }]));
}

describe("redditThreadFromUrl", () => {
  it("accepts thread URLs on every reddit host", () => {
    expect(redditThreadFromUrl(new URL("https://old.reddit.com/r/rust/comments/Abc123/title/"))).toBe("abc123");
    expect(redditThreadFromUrl(new URL("https://www.reddit.com/comments/abc123"))).toBe("abc123");
  });

  it("rejects subreddit and user pages", () => {
    expect(redditThreadFromUrl(new URL("https://www.reddit.com/r/rust/"))).toBeNull();
    expect(redditThreadFromUrl(new URL("https://www.reddit.com/user/someone/comments/abc123"))).toBeNull();
  });
});

describe("RedditFetcher", () => {
  it("reads the post from the thread listing", async () => {
    fetchSpy.mockResolvedValueOnce(
      listing([
        {
          kind: "t3",
          data: {
            title: "Announcing a crate",
            author: "someone",
            subreddit: "rust",
            score: 10,
            num_comments: 5,
            created_utc: 1609459200,
            url: "https://example.com/crate",
            permalink: "/r/rust/comments/abc123/announcing_a_crate/",
            is_self: false,
          },
        },
      ]),
    );

    const fetched = await new RedditFetcher().fetch("reddit:abc123", { hints: {} });
    expect(fetchSpy.mock.calls[0]?.[0]).toBe("https://www.reddit.com/comments/abc123.json?raw_json=1");
    expect(fetched).toEqual({
      title: "Announcing a crate",
      author: "someone",
      publishedAt: "2021-01-01T00:00:00.000Z",
      sourceUrl: "https://www.reddit.com/r/rust/comments/abc123/announcing_a_crate/",
      extra: { subreddit: "rust", score: 10, comments: 5, linked_url: "https://example.com/crate" },
    });
  });

  it("reports a missing thread as NotFound", async () => {
    fetchSpy.mockResolvedValueOnce(listing([]));
    await expect(new RedditFetcher().fetch("reddit:abc123", { hints: {} })).rejects.toMatchObject({
      kind: "NotFound",
      message: "Reddit thread abc123 not found",
    });
  });
});
