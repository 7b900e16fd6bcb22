import { resolve } from "node:path";
import type { Config } from "./config.js";
import { createPlatformRegistry } from "./adapters/index.js";
import { CacheService } from "./core/cache-service.js";
import { CaptureService } from "./core/capture-service.js";
import { tryClassify } from "./core/classifier.js";
import { EpisodeReindexer } from "./core/episode-reindexer.js";
import { FetchDispatcher } from "./core/fetch-dispatcher.js";
import { SyncReconciler } from "./core/sync-reconciler.js";
import type { InboxSource } from "./core/types.js";
import { closeDb, getDb } from "./db/index.js";
import { FreshRssClient, FreshRssSource } from "./inbox/freshrss.js";
import { WallabagClient, WallabagSource } from "./inbox/wallabag.js";
import { NfoWriter } from "./media/nfo-writer.js";
import { PodcastCacher } from "./media/podcast-cacher.js";
import { YtDlpCacher } from "./media/youtube-cacher.js";
import { SpawnYtDlpRunner } from "./media/yt-dlp.js";
import { MarkdownNoteStore } from "./stores/markdown-note-store.js";
import type { NoteStore } from "./stores/note-store.js";
import { PgNoteStore } from "./stores/pg-note-store.js";
import { JsonSyncStateStore, PgSyncStateStore, type SyncStateStore } from "./stores/sync-state-store.js";

export interface App {
  service: CaptureService;
  notes: NoteStore;
  syncStates: SyncStateStore;
  /** Releases the database pool, if one was opened. */
  close(): Promise<void>;
}

/**
 * Wires the pipeline from configuration. Notes live as markdown files unless
 * DATABASE_URL points at Postgres; sync state follows the same choice.
 */
export function createApp(config: Config): App {
  // ── Stores ──────────────────────────────────────────────────

  let notes: NoteStore;
  let syncStates: SyncStateStore;
  if (config.databaseUrl) {
    const db = getDb(config.databaseUrl);
    notes = new PgNoteStore(db);
    syncStates = new PgSyncStateStore(db);
  } else {
    notes = new MarkdownNoteStore(config.notesDir);
    syncStates = new JsonSyncStateStore(resolve(config.dataDir, "sync-state.json"));
  }

  // ── Remote services ─────────────────────────────────────────

  const timeoutMs = config.fetchTimeoutMs;
  const wallabag = config.wallabag ? new WallabagClient({ ...config.wallabag, timeoutMs }) : null;
  const freshrss = config.freshrss ? new FreshRssClient({ ...config.freshrss, timeoutMs }) : null;
  const ytDlp = new SpawnYtDlpRunner(config.ytDlpBinary);

  // ── Platform registry ───────────────────────────────────────

  const registry = createPlatformRegistry({
    ytDlp,
    timeoutMs,
    githubToken: config.githubToken,
    youtubeCacher: new YtDlpCacher(ytDlp, config.mediaDir),
    podcastCacher: new PodcastCacher(config.mediaDir),
    wallabag,
    freshrss,
  });
  const classifyRef = (raw: string) => tryClassify(registry, raw);

  const sources: InboxSource[] = [];
  if (wallabag && config.wallabag) {
    sources.push(new WallabagSource(wallabag, config.wallabag.onCapture, classifyRef));
  }
  if (freshrss && config.freshrss) {
    sources.push(new FreshRssSource(freshrss, config.freshrss.onCapture, classifyRef));
  }

  // ── Core services ───────────────────────────────────────────

  const dispatcher = new FetchDispatcher(registry, notes);
  const reindexer = new EpisodeReindexer(notes, new NfoWriter());
  const cacheService = new CacheService(registry, notes, reindexer);
  const reconciler = new SyncReconciler(sources, registry, notes, dispatcher, syncStates);
  const service = new CaptureService(registry, notes, dispatcher, cacheService, reindexer, reconciler);

  return { service, notes, syncStates, close: closeDb };
}
