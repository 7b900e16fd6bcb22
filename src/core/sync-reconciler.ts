import { classify } from "./classifier.js";
import { failureOf } from "./errors.js";
import type { BatchOptions, FetchDispatcher } from "./fetch-dispatcher.js";
import { newBareNote } from "./lifecycle.js";
import type { PlatformRegistry } from "./platform-registry.js";
import {
  emptySummary,
  type BatchSummary,
  type InboxSource,
  type Note,
  type NoteState,
  type RemoteInboxEntry,
  type SyncState,
} from "./types.js";
import type { NoteStore } from "../stores/note-store.js";
import type { SyncStateStore } from "../stores/sync-state-store.js";
import { log } from "../logger.js";

export type SyncStatus = SyncState["lastStatus"] | "busy";

export interface SyncReport {
  source: string;
  status: SyncStatus;
  summary: BatchSummary;
  /** Set when the source itself could not be read. */
  error?: string;
}

const CAPTURED: readonly NoteState[] = ["parsed", "caching_requested", "cached"];

/**
 * Pulls each inbox source into the note store. An entry is marked processed
 * on its source only once its note has been parsed; anything else leaves it
 * in the inbox for the next pull.
 */
export class SyncReconciler {
  private syncing = new Set<string>();
  private sources = new Map<string, InboxSource>();

  constructor(
    sources: InboxSource[],
    private registry: PlatformRegistry,
    private notes: NoteStore,
    private dispatcher: FetchDispatcher,
    private syncStates: SyncStateStore,
  ) {
    for (const source of sources) this.sources.set(source.name, source);
  }

  sourceNames(): string[] {
    return [...this.sources.keys()];
  }

  // ── Entry points ────────────────────────────────────────────

  async syncSource(name: string, opts: BatchOptions = {}): Promise<SyncReport> {
    const source = this.sources.get(name);
    if (!source) {
      const known = this.sourceNames().join(", ") || "none configured";
      throw new Error(`Unknown inbox source: ${name} (available: ${known})`);
    }
    return this.syncOne(source, opts);
  }

  /** Sources run side by side; one outage never holds up the rest. */
  async syncAll(opts: BatchOptions = {}): Promise<SyncReport[]> {
    const sources = [...this.sources.values()];
    const settled = await Promise.allSettled(sources.map((s) => this.syncOne(s, opts)));
    return settled.map((outcome, i): SyncReport => {
      const source = sources[i]?.name ?? "";
      if (outcome.status === "fulfilled") return outcome.value;
      return { source, status: "error", summary: emptySummary(), error: failureOf(outcome.reason).message };
    });
  }

  // ── Core sync pipeline ──────────────────────────────────────

  /** Entries are taken one at a time; a stop request ends the run between entries. */
  private async syncOne(source: InboxSource, opts: BatchOptions): Promise<SyncReport> {
    if (this.syncing.has(source.name)) {
      return { source: source.name, status: "busy", summary: emptySummary() };
    }
    this.syncing.add(source.name);

    const summary = emptySummary();
    try {
      for await (const entry of source.pull(opts.abort)) {
        if (opts.signal?.aborted) {
          summary.cancelled = true;
          break;
        }
        await this.reconcileEntry(source, entry, summary, opts.abort);
      }
    } catch (err) {
      const msg = failureOf(err).message;
      log.error("sync.pull", err, { source: source.name });
      await this.recordState(source.name, "error", msg);
      return { source: source.name, status: "error", summary, error: msg };
    } finally {
      this.syncing.delete(source.name);
    }

    const status = summary.failed > 0 ? "partial" : "ok";
    await this.recordState(source.name, status, summary.failures[0]?.message);
    log.info("sync.done", {
      source: source.name,
      succeeded: summary.succeeded,
      failed: summary.failed,
      skipped: summary.skipped,
    });
    return { source: source.name, status, summary };
  }

  private async reconcileEntry(
    source: InboxSource,
    entry: RemoteInboxEntry,
    summary: BatchSummary,
    abort?: AbortSignal,
  ): Promise<void> {
    if (entry.resolved) {
      summary.skipped++;
      return;
    }

    let canonicalId = entry.reference;
    try {
      const ref = classify(this.registry, entry.reference);
      canonicalId = ref.canonicalId;

      let note: Note =
        (await this.notes.get(ref.canonicalId)) ??
        (await this.notes.upsert(newBareNote(ref, { tags: entry.tags, hints: entry.hints })));

      if (note.state === "bare") note = await this.dispatcher.parse(note, abort);

      if (!CAPTURED.includes(note.state)) {
        summary.failed++;
        const failure = note.failure ?? { kind: "NotCaptured", message: `note is ${note.state}` };
        summary.failures.push({ canonicalId, kind: failure.kind, message: failure.message });
        return;
      }

      await source.markProcessed(entry.remoteId, source.onCapture);
      summary.succeeded++;
    } catch (err) {
      summary.failed++;
      summary.failures.push({ canonicalId, ...failureOf(err) });
      log.warn("sync.entry_failed", { source: source.name, remoteId: entry.remoteId, ...failureOf(err) });
    }
  }

  private async recordState(sourceName: string, status: SyncState["lastStatus"], lastError?: string): Promise<void> {
    const prev = await this.syncStates.get(sourceName);
    await this.syncStates.save({
      source: sourceName,
      lastSyncAt: new Date().toISOString(),
      lastStatus: status,
      consecutiveFailures: status === "error" ? (prev?.consecutiveFailures ?? 0) + 1 : 0,
      lastError,
    });
  }
}
