import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { ProcessedAction } from "./core/types.js";

// ── Environment ─────────────────────────────────────────────────
// Entry points load `.env` through dotenv before calling loadConfig.

const optional = z
  .string()
  .optional()
  .transform((v) => (v?.trim() ? v.trim() : undefined));

const action = z.enum(["keep", "discard"]);

const envSchema = z.object({
  MDCAPTURE_NOTES_DIR: optional,
  MDCAPTURE_MEDIA_DIR: optional,
  MDCAPTURE_DATA_DIR: optional,
  MDCAPTURE_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  MDCAPTURE_FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(15_000),
  MDCAPTURE_YTDLP: z.string().min(1).default("yt-dlp"),
  MDCAPTURE_PLAYER: z.string().min(1).default("mpv"),
  DATABASE_URL: optional,
  GITHUB_TOKEN: optional,
  WALLABAG_HOST: optional.pipe(z.string().url().optional()),
  WALLABAG_CLIENT_ID: optional,
  WALLABAG_CLIENT_SECRET: optional,
  WALLABAG_USERNAME: optional,
  WALLABAG_PASSWORD: optional,
  WALLABAG_ON_CAPTURE: action.default("keep"),
  FRESHRSS_URL: optional.pipe(z.string().url().optional()),
  FRESHRSS_USERNAME: optional,
  FRESHRSS_PASSWORD: optional,
  FRESHRSS_ON_CAPTURE: action.default("discard"),
});

export interface WallabagConfig {
  host: string;
  clientId: string;
  clientSecret: string;
  username: string;
  password: string;
  onCapture: ProcessedAction;
}

export interface FreshRssConfig {
  url: string;
  username: string;
  password: string;
  onCapture: ProcessedAction;
}

export interface Config {
  notesDir: string;
  mediaDir: string;
  dataDir: string;
  concurrency: number;
  fetchTimeoutMs: number;
  ytDlpBinary: string;
  playerBinary: string;
  databaseUrl?: string;
  githubToken?: string;
  /** Present only when every Wallabag credential is set. */
  wallabag?: WallabagConfig;
  /** Present only when every FreshRSS credential is set. */
  freshrss?: FreshRssConfig;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigError";
  }
}

function expandHome(path: string): string {
  return path === "~" || path.startsWith("~/") ? join(homedir(), path.slice(1)) : path;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;

  const wallabag: WallabagConfig | undefined =
    e.WALLABAG_HOST && e.WALLABAG_CLIENT_ID && e.WALLABAG_CLIENT_SECRET && e.WALLABAG_USERNAME && e.WALLABAG_PASSWORD
      ? {
          host: e.WALLABAG_HOST,
          clientId: e.WALLABAG_CLIENT_ID,
          clientSecret: e.WALLABAG_CLIENT_SECRET,
          username: e.WALLABAG_USERNAME,
          password: e.WALLABAG_PASSWORD,
          onCapture: e.WALLABAG_ON_CAPTURE,
        }
      : undefined;

  const freshrss: FreshRssConfig | undefined =
    e.FRESHRSS_URL && e.FRESHRSS_USERNAME && e.FRESHRSS_PASSWORD
      ? {
          url: e.FRESHRSS_URL,
          username: e.FRESHRSS_USERNAME,
          password: e.FRESHRSS_PASSWORD,
          onCapture: e.FRESHRSS_ON_CAPTURE,
        }
      : undefined;

  return {
    notesDir: resolve(expandHome(e.MDCAPTURE_NOTES_DIR ?? "~/notes/capture")),
    mediaDir: resolve(expandHome(e.MDCAPTURE_MEDIA_DIR ?? "~/Media")),
    dataDir: resolve(expandHome(e.MDCAPTURE_DATA_DIR ?? "~/.mdcapture")),
    concurrency: e.MDCAPTURE_CONCURRENCY,
    fetchTimeoutMs: e.MDCAPTURE_FETCH_TIMEOUT_MS,
    ytDlpBinary: e.MDCAPTURE_YTDLP,
    playerBinary: e.MDCAPTURE_PLAYER,
    databaseUrl: e.DATABASE_URL,
    githubToken: e.GITHUB_TOKEN,
    wallabag,
    freshrss,
  };
}
