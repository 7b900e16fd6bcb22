import { z } from "zod";
import { FetchError, errorMessage, fetchErrorForStatus } from "../core/errors.js";
import { splitCanonicalId } from "../core/classifier.js";
import type { FetchContext, FetchedMetadata, MetadataFetcher, PlatformEntry } from "../core/types.js";
import { log } from "../logger.js";
import { DEFAULT_TIMEOUT_MS, USER_AGENT, readJson } from "./http.js";

const OWNER = /^[A-Za-z0-9](?:[A-Za-z0-9-]*[A-Za-z0-9])?$/;
const REPO = /^[A-Za-z0-9._-]+$/;

// first path segments on github.com that are site pages, not owners
const RESERVED_OWNERS = new Set([
  "about", "apps", "codespaces", "collections", "enterprise", "explore", "features",
  "issues", "login", "marketplace", "new", "notifications", "orgs", "pricing",
  "pulls", "search", "settings", "sponsors", "topics", "trending",
]);

export function normalizeRepoPath(owner: string, repo: string): string | null {
  const name = repo.replace(/\.git$/i, "");
  if (!OWNER.test(owner) || RESERVED_OWNERS.has(owner.toLowerCase())) return null;
  if (!REPO.test(name) || name.startsWith(".")) return null;
  return `${owner}/${name}`.toLowerCase();
}

export function githubRepoFromUrl(url: URL): string | null {
  const host = url.hostname.toLowerCase();
  if (host !== "github.com" && host !== "www.github.com") return null;
  const [owner, repo] = url.pathname.split("/").filter(Boolean);
  if (!owner || !repo) return null;
  return normalizeRepoPath(owner, repo);
}

function repoFromPath(raw: string): string | null {
  const parts = raw.split("/");
  if (parts.length !== 2) return null;
  return normalizeRepoPath(parts[0], parts[1]);
}

// ── REST client ──────────────────────────────────────────────────

const LOW_BUDGET = 10;

async function ghFetch(path: string, token: string | undefined, ctx: FetchContext, timeoutMs: number): Promise<Response> {
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "X-GitHub-Api-Version": "2022-11-28",
    "User-Agent": USER_AGENT,
  };
  if (token) headers.Authorization = `Bearer ${token}`;

  const signals = [AbortSignal.timeout(timeoutMs)];
  if (ctx.signal) signals.push(ctx.signal);

  let resp: Response;
  try {
    resp = await fetch(`https://api.github.com${path}`, { headers, signal: AbortSignal.any(signals) });
  } catch (err) {
    throw new FetchError("NetworkError", `GitHub API: ${errorMessage(err)}`, { cause: err });
  }

  const remaining = resp.headers.get("x-ratelimit-remaining");
  const reset = resp.headers.get("x-ratelimit-reset");
  const rateLimitReset = reset ? new Date(Number(reset) * 1000).toISOString() : undefined;

  if (!resp.ok) {
    // GitHub signals an exhausted budget with 403 rather than 429
    if ((resp.status === 403 || resp.status === 429) && remaining === "0") {
      throw new FetchError("RateLimited", `GitHub API rate limit exhausted, resets at ${rateLimitReset ?? "unknown"}`);
    }
    throw fetchErrorForStatus(resp.status, "GitHub API", (await resp.text().catch(() => "")).slice(0, 200));
  }

  if (remaining !== null && Number(remaining) < LOW_BUDGET) {
    log.warn("github.rate_budget_low", { remaining: Number(remaining), resetAt: rateLimitReset });
  }
  return resp;
}

const repoSchema = z.object({
  full_name: z.string(),
  description: z.string().nullish(),
  html_url: z.string(),
  owner: z.object({ login: z.string() }),
  stargazers_count: z.number(),
  forks_count: z.number(),
  topics: z.array(z.string()).optional(),
  language: z.string().nullish(),
  license: z.object({ spdx_id: z.string().nullish() }).nullish(),
  created_at: z.string().nullish(),
  pushed_at: z.string().nullish(),
  archived: z.boolean().optional(),
});

const languagesSchema = z.record(z.string(), z.number());

export interface GitHubFetcherOptions {
  token?: string;
  timeoutMs?: number;
}

export class GitHubFetcher implements MetadataFetcher {
  constructor(private opts: GitHubFetcherOptions = {}) {}

  async fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata> {
    const { remoteId } = splitCanonicalId(canonicalId);
    const timeoutMs = this.opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

    const repoResp = await ghFetch(`/repos/${remoteId}`, this.opts.token, ctx, timeoutMs);
    const repo = await readJson(repoResp, repoSchema, "GitHub API");

    const langResp = await ghFetch(`/repos/${remoteId}/languages`, this.opts.token, ctx, timeoutMs);
    const languages = await readJson(langResp, languagesSchema, "GitHub API");
    const byBytes = Object.entries(languages)
      .sort((a, b) => b[1] - a[1])
      .map(([name]) => name);

    const extra: Record<string, string | number | boolean | string[]> = {
      stars: repo.stargazers_count,
      forks: repo.forks_count,
      languages: byBytes,
    };
    if (repo.description) extra.description = repo.description;
    if (repo.language) extra.language = repo.language;
    if (repo.license?.spdx_id) extra.license = repo.license.spdx_id;
    if (repo.pushed_at) extra.pushed_at = repo.pushed_at;
    if (repo.archived) extra.archived = true;

    return {
      title: repo.full_name,
      author: repo.owner.login,
      publishedAt: repo.created_at ?? undefined,
      sourceUrl: repo.html_url,
      tags: repo.topics ?? [],
      extra,
    };
  }
}

export function githubPlatform(opts: GitHubFetcherOptions = {}): PlatformEntry {
  return {
    platform: "github",
    displayName: "GitHub",
    description: "Repositories (owner/repo). Metadata from the GitHub REST API.",
    matchUrl: githubRepoFromUrl,
    matchBare: repoFromPath,
    normalizeId: repoFromPath,
    fetcher: new GitHubFetcher(opts),
  };
}
