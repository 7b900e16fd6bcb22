import type { CacheService } from "./cache-service.js";
import { classify, splitCanonicalId, tryClassify } from "./classifier.js";
import type { EpisodeReindexer, ReindexResult } from "./episode-reindexer.js";
import { CacheError, failureOf } from "./errors.js";
import { runBatch, type BatchOptions, type FetchDispatcher, type ItemOutcome } from "./fetch-dispatcher.js";
import { mergeTags, newBareNote, retry } from "./lifecycle.js";
import type { PlatformRegistry } from "./platform-registry.js";
import type { SyncReconciler, SyncReport } from "./sync-reconciler.js";
import {
  emptySummary,
  type BatchSummary,
  type Note,
  type NoteFilter,
  type NoteState,
  type PlatformDescriptor,
  type PlayTarget,
  type SeriesFailure,
} from "./types.js";
import { isFile } from "../media/library.js";
import { collect, type NoteStore } from "../stores/note-store.js";

export interface CaptureOptions extends BatchOptions {
  tags?: string[];
  hints?: Record<string, string>;
  /** Parse the captured notes straight away. */
  parse?: boolean;
}

export interface CaptureResult {
  /** Canonical ids in input order; unclassifiable references are left out. */
  canonicalIds: string[];
  summary: BatchSummary;
  /** Set when `parse` was requested. */
  parseSummary?: BatchSummary;
}

export interface ParseSelection {
  canonicalIds?: string[];
  /** Also refresh notes that are already parsed. */
  refresh?: boolean;
}

export interface CacheSelection {
  canonicalIds?: string[];
  /** Parsed notes carrying the `cache: "true"` hint, plus interrupted downloads. */
  requested?: boolean;
}

/** One facade over the pipeline for the CLI and the MCP tools. */
export class CaptureService {
  constructor(
    private registry: PlatformRegistry,
    private notes: NoteStore,
    private dispatcher: FetchDispatcher,
    private cacheService: CacheService,
    private reindexer: EpisodeReindexer,
    private reconciler: SyncReconciler,
  ) {}

  // ── Capture ──────────────────────────────────────────────────

  /**
   * Classifies each reference and stores a bare note for it. Re-capturing an
   * existing note only merges the new tags and hints; its state is kept.
   */
  async capture(references: string[], opts: CaptureOptions = {}): Promise<CaptureResult> {
    const summary = emptySummary();
    const canonicalIds: string[] = [];

    for (const raw of references) {
      if (opts.signal?.aborted) {
        summary.cancelled = true;
        summary.skipped++;
        continue;
      }
      try {
        const ref = classify(this.registry, raw);
        const existing = await this.notes.get(ref.canonicalId);
        if (existing) {
          await this.notes.upsert({
            ...existing,
            tags: mergeTags(existing.tags, opts.tags),
            hints: { ...existing.hints, ...opts.hints },
          });
          summary.skipped++;
        } else {
          await this.notes.upsert(newBareNote(ref, { tags: opts.tags, hints: opts.hints }));
          summary.succeeded++;
        }
        if (!canonicalIds.includes(ref.canonicalId)) canonicalIds.push(ref.canonicalId);
      } catch (err) {
        summary.failed++;
        summary.failures.push({ canonicalId: raw, ...failureOf(err) });
      }
    }

    if (!opts.parse) return { canonicalIds, summary };
    const captured = await this.resolve(canonicalIds, emptySummary());
    const parseSummary = await this.dispatcher.parseBatch(
      captured.filter((n) => n.state === "bare"),
      opts,
    );
    return { canonicalIds, summary, parseSummary };
  }

  // ── Parse ────────────────────────────────────────────────────

  async parse(selection: ParseSelection = {}, opts: BatchOptions = {}): Promise<BatchSummary> {
    const missing = emptySummary();
    let notes: Note[];
    if (selection.canonicalIds?.length) {
      notes = await this.resolve(selection.canonicalIds, missing);
    } else {
      const states: NoteState[] = selection.refresh ? ["bare", "parsed"] : ["bare"];
      notes = await collect(this.notes.list({ states }));
    }
    return combine(missing, await this.dispatcher.parseBatch(notes, opts));
  }

  // ── Sync ─────────────────────────────────────────────────────

  async sync(source: string, opts: BatchOptions = {}): Promise<SyncReport[]> {
    if (source === "all") return this.reconciler.syncAll(opts);
    return [await this.reconciler.syncSource(source, opts)];
  }

  inboxSources(): string[] {
    return this.reconciler.sourceNames();
  }

  // ── Cache ────────────────────────────────────────────────────

  /** Bare notes given by id are parsed first so they can be cached in one go. */
  async cache(selection: CacheSelection = {}, opts: BatchOptions = {}): Promise<BatchSummary> {
    const missing = emptySummary();
    let notes: Note[];
    if (selection.canonicalIds?.length) {
      notes = await this.resolve(selection.canonicalIds, missing);
    } else if (selection.requested) {
      notes = [];
      for await (const note of this.notes.list({ states: ["parsed", "caching_requested"] })) {
        if (note.state === "caching_requested" || note.hints.cache === "true") notes.push(note);
      }
    } else {
      return missing;
    }

    const seriesFailures = new Map<string, SeriesFailure>();
    const summary = await runBatch(
      notes,
      (note) => note.canonicalId,
      async (note, abort): Promise<ItemOutcome> => {
        if (note.state === "cached") return { outcome: "skipped" };
        const ready = note.state === "bare" ? await this.dispatcher.parse(note, abort) : note;
        if (ready.state === "failed") return { outcome: "failed", failure: ready.failure };
        const { note: result, reindexFailure } = await this.cacheService.cache(ready, abort);
        if (reindexFailure) seriesFailures.set(reindexFailure.seriesKey, reindexFailure);
        if (result.state === "cached") return { outcome: "ok" };
        return { outcome: "failed", failure: result.failure };
      },
      opts,
    );

    const combined = combine(missing, summary);
    if (seriesFailures.size > 0) {
      combined.seriesFailures = [...seriesFailures.values()].sort((a, b) => a.seriesKey.localeCompare(b.seriesKey));
    }
    return combined;
  }

  // ── Reindex ──────────────────────────────────────────────────

  async reindex(seriesKey?: string): Promise<ReindexResult[]> {
    if (!seriesKey) return this.reindexer.reindexAll();
    try {
      return [await this.reindexer.reindexSeries(seriesKey)];
    } catch (err) {
      return [{ seriesKey, episodes: 0, changed: 0, error: failureOf(err) }];
    }
  }

  // ── Retry ────────────────────────────────────────────────────

  async retry(canonicalIds: string[]): Promise<BatchSummary> {
    const summary = emptySummary();
    for (const note of await this.resolve(canonicalIds, summary)) {
      try {
        await this.notes.upsert(retry(note));
        summary.succeeded++;
      } catch (err) {
        summary.failed++;
        summary.failures.push({ canonicalId: note.canonicalId, ...failureOf(err) });
      }
    }
    return summary;
  }

  // ── Play ─────────────────────────────────────────────────────

  /**
   * The cached file while it is still on disk, otherwise the platform's
   * stream URL. Null when no note matches.
   */
  async playTarget(reference: string): Promise<PlayTarget | null> {
    const note = (await this.notes.get(reference)) ?? (await this.lookupByReference(reference));
    if (!note) return null;

    const base = { canonicalId: note.canonicalId, platform: note.platform };
    if (note.state === "cached" && note.mediaRef && (await isFile(note.mediaRef.localPath))) {
      return { ...base, location: note.mediaRef.localPath, cached: true };
    }
    const { remoteId } = splitCanonicalId(note.canonicalId);
    const stream = this.registry.get(note.platform).streamUrl?.(remoteId);
    if (!stream) throw new CacheError("Unsupported", `${note.platform} notes have no media to play`);
    return { ...base, location: stream, cached: false };
  }

  // ── Queries ──────────────────────────────────────────────────

  async list(filter: NoteFilter = {}): Promise<Note[]> {
    return collect(this.notes.list(filter));
  }

  async get(canonicalId: string): Promise<Note | null> {
    return this.notes.get(canonicalId);
  }

  platforms(): PlatformDescriptor[] {
    return this.registry.describeAll();
  }

  /** Looks notes up by id (or any reference that classifies to one); unknown ones count as failures. */
  private async resolve(references: string[], summary: BatchSummary): Promise<Note[]> {
    const found: Note[] = [];
    for (const reference of references) {
      const note = (await this.notes.get(reference)) ?? (await this.lookupByReference(reference));
      if (note) {
        found.push(note);
      } else {
        summary.failed++;
        summary.failures.push({ canonicalId: reference, kind: "UnknownNote", message: `No note for ${reference}` });
      }
    }
    return found;
  }

  private async lookupByReference(reference: string): Promise<Note | null> {
    const ref = tryClassify(this.registry, reference);
    return ref ? this.notes.get(ref.canonicalId) : null;
  }
}

/** Adds the counts of two summaries; failures are concatenated in order. */
export function combine(a: BatchSummary, b: BatchSummary): BatchSummary {
  return {
    succeeded: a.succeeded + b.succeeded,
    failed: a.failed + b.failed,
    skipped: a.skipped + b.skipped,
    failures: [...a.failures, ...b.failures],
    cancelled: a.cancelled || b.cancelled,
    ...(a.seriesFailures || b.seriesFailures
      ? { seriesFailures: [...(a.seriesFailures ?? []), ...(b.seriesFailures ?? [])] }
      : {}),
  };
}
