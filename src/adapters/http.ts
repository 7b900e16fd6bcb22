import type { ZodType, ZodTypeDef } from "zod";
import { FetchError, errorMessage, fetchErrorForStatus } from "../core/errors.js";
import type { MetadataFetcher } from "../core/types.js";

export const DEFAULT_TIMEOUT_MS = 15_000;
export const USER_AGENT = "mdcapture/1.0";

export interface HttpOptions {
  method?: string;
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  signal?: AbortSignal;
  timeoutMs?: number;
}

function truncate(text: string, maxLen: number): string {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen).trimEnd() + "…";
}

/**
 * `fetch` with a per-request timeout, mapping every failure onto a FetchError.
 * `what` names the remote in error messages ("GitHub API", "Reddit", …).
 */
export async function httpRequest(url: string, what: string, opts: HttpOptions = {}): Promise<Response> {
  const signals = [AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS)];
  if (opts.signal) signals.push(opts.signal);

  let resp: Response;
  try {
    resp = await fetch(url, {
      method: opts.method ?? "GET",
      headers: { "User-Agent": USER_AGENT, ...opts.headers },
      body: opts.body,
      signal: AbortSignal.any(signals),
    });
  } catch (err) {
    throw new FetchError("NetworkError", `${what}: ${errorMessage(err)}`, { cause: err });
  }

  if (!resp.ok) {
    const detail = await resp.text().catch(() => "");
    throw fetchErrorForStatus(resp.status, what, truncate(detail.trim(), 200));
  }
  return resp;
}

export async function readJson<T>(resp: Response, schema: ZodType<T, ZodTypeDef, unknown>, what: string): Promise<T> {
  let body: unknown;
  try {
    body = await resp.json();
  } catch (err) {
    throw new FetchError("NetworkError", `${what}: invalid JSON (${errorMessage(err)})`, { cause: err });
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unexpected shape";
    throw new FetchError("NetworkError", `${what}: unexpected response (${where})`);
  }
  return parsed.data;
}

export async function getJson<T>(
  url: string,
  what: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  opts: HttpOptions = {},
): Promise<T> {
  const resp = await httpRequest(url, what, {
    ...opts,
    headers: { Accept: "application/json", ...opts.headers },
  });
  return readJson(resp, schema, what);
}

/** Stands in for a service whose credentials are missing; every fetch is an auth failure. */
export function unconfigured(service: string): MetadataFetcher {
  return {
    async fetch() {
      throw new FetchError("AuthFailure", `${service} is not configured`);
    },
  };
}
