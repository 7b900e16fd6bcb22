// ── Platforms and lifecycle states ───────────────────────────────

export const PLATFORMS = [
  "youtube",
  "github",
  "reddit",
  "hackernews",
  "steam",
  "google_search",
  "podcast",
  "web",
  "wallabag",
  "freshrss",
] as const;

export type Platform = (typeof PLATFORMS)[number];

export const NOTE_STATES = ["bare", "parsed", "caching_requested", "cached", "failed"] as const;

export type NoteState = (typeof NOTE_STATES)[number];

export function isPlatform(value: string): value is Platform {
  return (PLATFORMS as readonly string[]).includes(value);
}

export function isNoteState(value: string): value is NoteState {
  return (NOTE_STATES as readonly string[]).includes(value);
}

// ── Note: the atom of the collection ─────────────────────────────

export type MetadataValue = string | number | boolean | string[];

export interface NoteMetadata {
  title: string;
  author?: string;
  /** ISO date or datetime; may be only a year or year-month when the source is vague. */
  publishedAt?: string;
  sourceUrl?: string;
  tags: string[];
  extra: Record<string, MetadataValue>;
}

export interface MediaRef {
  localPath: string;
  duration?: number;
  format: string;
}

export type FailureStage = "classify" | "fetch" | "cache";

export interface NoteFailure {
  stage: FailureStage;
  kind: string;
  message: string;
  at: string;
}

/** A header entry the note format does not own, kept as the exact lines it was read from. */
export interface RawHeaderEntry {
  key: string;
  raw: string;
}

export interface Note {
  canonicalId: string;
  platform: Platform;
  state: NoteState;
  tags: string[];
  hints: Record<string, string>;
  metadata?: NoteMetadata;
  mediaRef?: MediaRef;
  seriesKey?: string;
  seasonNumber?: number;
  episodeNumber?: number;
  failure?: NoteFailure;
  body: string;
  extraHeader: RawHeaderEntry[];
  capturedAt: string;
  updatedAt: string;
}

export interface ClassifiedReference {
  platform: Platform;
  canonicalId: string;
}

// ── Collaborator contracts ───────────────────────────────────────

export interface FetchContext {
  hints: Record<string, string>;
  signal?: AbortSignal;
}

export interface FetchedMetadata {
  title: string;
  author?: string;
  publishedAt?: string;
  sourceUrl?: string;
  tags?: string[];
  extra?: Record<string, MetadataValue>;
}

export interface MetadataFetcher {
  fetch(canonicalId: string, ctx: FetchContext): Promise<FetchedMetadata>;
}

export interface MediaCacher {
  cache(note: Note, signal?: AbortSignal): Promise<MediaRef>;
}

export interface PlayTarget {
  canonicalId: string;
  platform: Platform;
  /** The cached file, or a URL the player streams from. */
  location: string;
  cached: boolean;
}

export interface MediaPlayer {
  open(target: PlayTarget): Promise<void>;
}

/**
 * Receives every entry of an applied numbering plan. Implementations must be
 * idempotent because an interrupted reindex is repaired by running it again.
 */
export interface EpisodeSink {
  writeEpisode(note: Note): Promise<void>;
}

export interface PlatformEntry {
  readonly platform: Platform;
  readonly displayName: string;
  readonly description: string;
  /** Remote id to canonical id for URL input; `null` when the URL is not this platform's. */
  matchUrl?(url: URL): string | null;
  /** Bare (non-URL) input shapes this platform recognises without a prefix. */
  matchBare?(raw: string): string | null;
  /** Normalizes the part after `<platform>:`; `null` rejects it. */
  normalizeId(remoteId: string): string | null;
  readonly fetcher: MetadataFetcher;
  readonly cacher?: MediaCacher;
  /** What a player can open before the media is cached. */
  streamUrl?(remoteId: string): string;
  seriesOf?(metadata: NoteMetadata): string | undefined;
}

export interface PlatformDescriptor {
  platform: Platform;
  displayName: string;
  description: string;
  cacheable: boolean;
}

// ── Inbox sources ────────────────────────────────────────────────

export type ProcessedAction = "keep" | "discard";

export interface RemoteInboxEntry {
  remoteId: string;
  source: string;
  reference: string;
  flag: "starred" | "unread";
  resolved: boolean;
  tags: string[];
  hints: Record<string, string>;
}

export interface InboxSource {
  readonly name: string;
  readonly onCapture: ProcessedAction;
  pull(signal?: AbortSignal): AsyncIterable<RemoteInboxEntry>;
  markProcessed(remoteId: string, action: ProcessedAction): Promise<void>;
}

export interface SyncState {
  source: string;
  lastSyncAt: string;
  lastStatus: "ok" | "partial" | "error";
  consecutiveFailures: number;
  lastError?: string;
}

// ── Batch reporting ──────────────────────────────────────────────

export interface BatchFailure {
  canonicalId: string;
  kind: string;
  message: string;
}

export interface SeriesFailure {
  seriesKey: string;
  kind: string;
  message: string;
}

export interface BatchSummary {
  succeeded: number;
  failed: number;
  skipped: number;
  failures: BatchFailure[];
  cancelled: boolean;
  /** Series that could not be renumbered after their notes were cached. */
  seriesFailures?: SeriesFailure[];
}

export function emptySummary(): BatchSummary {
  return { succeeded: 0, failed: 0, skipped: 0, failures: [], cancelled: false };
}

export interface NoteFilter {
  platforms?: Platform[];
  states?: NoteState[];
  tags?: string[];
  seriesKey?: string;
}
