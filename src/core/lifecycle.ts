import { LifecycleError, CacheError } from "./errors.js";
import type {
  ClassifiedReference,
  FailureStage,
  FetchedMetadata,
  MediaRef,
  Note,
  NoteMetadata,
  NoteState,
} from "./types.js";

// ── Transition table ─────────────────────────────────────────────
// Forward-only, except the two manual retries back to bare.

export const TRANSITIONS: Readonly<Record<NoteState, readonly NoteState[]>> = {
  bare: ["parsed", "failed"],
  parsed: ["parsed", "failed", "caching_requested"],
  caching_requested: ["cached", "failed"],
  cached: ["bare"],
  failed: ["bare"],
};

export function canTransition(from: NoteState, to: NoteState): boolean {
  return TRANSITIONS[from].includes(to);
}

function assertTransition(note: Note, to: NoteState): void {
  if (!canTransition(note.state, to)) {
    throw new LifecycleError(`${note.canonicalId}: cannot go from ${note.state} to ${to}`);
  }
}

/** Union preserving first-seen order. */
export function mergeTags(...lists: (readonly string[] | undefined)[]): string[] {
  const out: string[] = [];
  for (const list of lists) {
    for (const tag of list ?? []) {
      if (tag && !out.includes(tag)) out.push(tag);
    }
  }
  return out;
}

// ── Creation ─────────────────────────────────────────────────────

export interface NewNoteOptions {
  tags?: string[];
  hints?: Record<string, string>;
  now?: Date;
}

export const DEFAULT_TAG = "inbox";

export function newBareNote(ref: ClassifiedReference, opts: NewNoteOptions = {}): Note {
  const now = (opts.now ?? new Date()).toISOString();
  return {
    canonicalId: ref.canonicalId,
    platform: ref.platform,
    state: "bare",
    tags: mergeTags(opts.tags?.length ? opts.tags : [DEFAULT_TAG]),
    hints: { ...opts.hints },
    body: "",
    extraHeader: [],
    capturedAt: now,
    updatedAt: now,
  };
}

// ── Transitions ──────────────────────────────────────────────────
// Each returns a new note; callers persist it with a single upsert so a
// transition is never half-applied.

/** bare|parsed → parsed. Re-parsing a parsed note replaces its metadata wholesale. */
export function markParsed(
  note: Note,
  fetched: FetchedMetadata,
  seriesOf?: (metadata: NoteMetadata) => string | undefined,
  now = new Date(),
): Note {
  assertTransition(note, "parsed");
  const metadata: NoteMetadata = {
    title: fetched.title,
    author: fetched.author,
    publishedAt: fetched.publishedAt ?? note.hints.published_at,
    sourceUrl: fetched.sourceUrl,
    tags: mergeTags(fetched.tags),
    extra: { ...fetched.extra },
  };
  return {
    ...note,
    state: "parsed",
    metadata,
    tags: mergeTags(note.tags, fetched.tags),
    seriesKey: seriesOf?.(metadata),
    failure: undefined,
    updatedAt: now.toISOString(),
  };
}

export function markFailed(
  note: Note,
  stage: FailureStage,
  failure: { kind: string; message: string },
  now = new Date(),
): Note {
  assertTransition(note, "failed");
  return {
    ...note,
    state: "failed",
    mediaRef: undefined,
    seasonNumber: undefined,
    episodeNumber: undefined,
    failure: { stage, kind: failure.kind, message: failure.message, at: now.toISOString() },
    updatedAt: now.toISOString(),
  };
}

/** parsed → caching_requested, only for platforms whose content is a media asset. */
export function requestCaching(note: Note, cacheable: boolean, now = new Date()): Note {
  if (!cacheable) {
    throw new CacheError("Unsupported", `${note.platform} notes have no media to cache`);
  }
  assertTransition(note, "caching_requested");
  return { ...note, state: "caching_requested", updatedAt: now.toISOString() };
}

/** The only way a note gains a media ref. */
export function markCached(note: Note, mediaRef: MediaRef, now = new Date()): Note {
  assertTransition(note, "cached");
  return { ...note, state: "cached", mediaRef: { ...mediaRef }, updatedAt: now.toISOString() };
}

/**
 * failed|cached → bare. Drops everything a parse or cache produced; keeps
 * what the capture supplied (tags, hints, body, user header fields).
 */
export function retry(note: Note, now = new Date()): Note {
  assertTransition(note, "bare");
  return {
    ...note,
    state: "bare",
    metadata: undefined,
    mediaRef: undefined,
    seriesKey: undefined,
    seasonNumber: undefined,
    episodeNumber: undefined,
    failure: undefined,
    updatedAt: now.toISOString(),
  };
}

export function applyNumbering(note: Note, season: number, episode: number, now = new Date()): Note {
  if (note.state !== "cached") {
    throw new LifecycleError(`${note.canonicalId}: only cached notes are numbered (state is ${note.state})`);
  }
  return { ...note, seasonNumber: season, episodeNumber: episode, updatedAt: now.toISOString() };
}

/** Checks the state-dependent field invariants; returns the first violation, if any. */
export function invariantViolation(note: Note): string | null {
  if ((note.state === "cached") !== (note.mediaRef !== undefined)) {
    return "media ref must be present exactly when the note is cached";
  }
  if ((note.state === "failed") !== (note.failure !== undefined)) {
    return "failure must be present exactly when the note is failed";
  }
  if (note.state === "bare" && note.metadata !== undefined) {
    return "bare notes carry no metadata";
  }
  if (note.state !== "cached" && (note.seasonNumber !== undefined || note.episodeNumber !== undefined)) {
    return "only cached notes carry episode numbering";
  }
  return null;
}
