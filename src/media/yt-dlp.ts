import { spawn } from "node:child_process";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { CacheError, FetchError, type CacheErrorKind, type FetchErrorKind } from "../core/errors.js";
import { log } from "../logger.js";

export type YtDlpErrorType =
  | "network_error"
  | "geo_restriction"
  | "permission_error"
  | "video_unavailable"
  | "format_error"
  | "unknown_error";

export interface YtDlpResult {
  stdout: string;
  stderr: string;
}

/** Seam over the yt-dlp binary so fetchers and cachers can be tested without it. */
export interface YtDlpRunner {
  run(args: string[], signal?: AbortSignal): Promise<YtDlpResult>;
}

export class YtDlpExitError extends Error {
  constructor(
    readonly exitCode: number | null,
    readonly stderr: string,
  ) {
    super(`yt-dlp exited with code ${exitCode}: ${lastLine(stderr)}`);
    this.name = "YtDlpExitError";
  }

  get errorType(): YtDlpErrorType {
    return classifyYtDlpError(this.stderr);
  }
}

function lastLine(text: string): string {
  const lines = text.trim().split("\n");
  return lines[lines.length - 1] ?? "";
}

// ── stderr classification ────────────────────────────────────────

const patternsSchema = z.record(z.string(), z.array(z.string()));

const __dirname = dirname(fileURLToPath(import.meta.url));
const PATTERNS_PATH = resolve(__dirname, "..", "..", "data", "ytdlp-errors.json");

let patterns: [YtDlpErrorType, string[]][] | null = null;

const ORDER: YtDlpErrorType[] = [
  "network_error",
  "geo_restriction",
  "permission_error",
  "video_unavailable",
  "format_error",
];

function loadPatterns(): [YtDlpErrorType, string[]][] {
  if (!patterns) {
    const table = patternsSchema.parse(JSON.parse(readFileSync(PATTERNS_PATH, "utf-8")));
    patterns = ORDER.map((type) => [type, table[type] ?? []]);
  }
  return patterns;
}

/** First category whose pattern appears in the (lowercased) stderr wins. Geo checks run before unavailable ones. */
export function classifyYtDlpError(stderr: string): YtDlpErrorType {
  const haystack = stderr.toLowerCase();
  for (const [type, needles] of loadPatterns()) {
    if (needles.some((n) => haystack.includes(n))) return type;
  }
  return "unknown_error";
}

const FETCH_KIND: Record<YtDlpErrorType, FetchErrorKind> = {
  network_error: "NetworkError",
  geo_restriction: "AuthFailure",
  permission_error: "AuthFailure",
  video_unavailable: "NotFound",
  format_error: "NotFound",
  unknown_error: "NetworkError",
};

const CACHE_KIND: Record<YtDlpErrorType, CacheErrorKind> = {
  network_error: "DownloadFailed",
  geo_restriction: "DownloadFailed",
  permission_error: "DownloadFailed",
  video_unavailable: "DownloadFailed",
  format_error: "Unsupported",
  unknown_error: "DownloadFailed",
};

export function toYtDlpFetchError(err: YtDlpExitError): FetchError {
  return new FetchError(FETCH_KIND[err.errorType], err.message, { cause: err });
}

export function toYtDlpCacheError(err: YtDlpExitError): CacheError {
  return new CacheError(CACHE_KIND[err.errorType], err.message, { cause: err });
}

// ── Process runner ───────────────────────────────────────────────

export class SpawnYtDlpRunner implements YtDlpRunner {
  constructor(private binary = "yt-dlp") {}

  run(args: string[], signal?: AbortSignal): Promise<YtDlpResult> {
    return new Promise((resolvePromise, reject) => {
      const child = spawn(this.binary, args, { signal, stdio: ["ignore", "pipe", "pipe"] });

      let stdout = "";
      let stderr = "";

      child.stdout.on("data", (data: Buffer) => {
        stdout += data.toString();
      });

      child.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });

      child.on("close", (code) => {
        if (code === 0) {
          resolvePromise({ stdout, stderr });
          return;
        }
        const err = new YtDlpExitError(code, stderr);
        log.error("yt-dlp", err, { args, errorType: err.errorType, stderr: stderr.slice(-2000) });
        reject(err);
      });

      child.on("error", (error) => {
        reject(new Error(`Failed to spawn ${this.binary}: ${error.message}`, { cause: error }));
      });
    });
  }
}
