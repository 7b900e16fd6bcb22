import { splitCanonicalId } from "./classifier.js";
import { Semaphore } from "./concurrency.js";
import { ClassificationError, FetchError, failureOf, toFetchError } from "./errors.js";
import { markFailed, markParsed } from "./lifecycle.js";
import type { PlatformRegistry } from "./platform-registry.js";
import { emptySummary, type BatchSummary, type Note, type NoteState } from "./types.js";
import type { NoteStore } from "../stores/note-store.js";
import { log } from "../logger.js";

export interface BatchOptions {
  concurrency?: number;
  /** Stops items from starting; items already running finish. */
  signal?: AbortSignal;
  /** Aborts items already running. */
  abort?: AbortSignal;
}

export type ItemOutcome =
  | { outcome: "ok" }
  | { outcome: "skipped" }
  | { outcome: "failed"; failure?: { kind: string; message: string } };

const PARSEABLE: readonly NoteState[] = ["bare", "parsed"];

export const DEFAULT_CONCURRENCY = 4;

/**
 * Shared batch runner: bounded parallelism, cancellation checked before each
 * item starts, one item's failure never touches another. Work in flight sees
 * only `abort`, never the stop signal.
 */
export async function runBatch<T>(
  items: readonly T[],
  idOf: (item: T) => string,
  work: (item: T, abort?: AbortSignal) => Promise<ItemOutcome>,
  opts: BatchOptions = {},
): Promise<BatchSummary> {
  const summary = emptySummary();
  const semaphore = new Semaphore(opts.concurrency ?? DEFAULT_CONCURRENCY);

  await Promise.allSettled(
    items.map((item) =>
      semaphore.run(async () => {
        const id = idOf(item);
        if (opts.signal?.aborted) {
          summary.cancelled = true;
          summary.skipped++;
          return;
        }
        try {
          const result = await work(item, opts.abort);
          if (result.outcome === "ok") summary.succeeded++;
          else if (result.outcome === "skipped") summary.skipped++;
          else {
            summary.failed++;
            const { kind, message } = result.failure ?? { kind: "Unexpected", message: "failed" };
            summary.failures.push({ canonicalId: id, kind, message });
          }
        } catch (err) {
          summary.failed++;
          summary.failures.push({ canonicalId: id, ...failureOf(err) });
          log.error("batch.item", err, { canonicalId: id });
        }
      }),
    ),
  );

  if (opts.signal?.aborted) summary.cancelled = true;
  summary.failures.sort((a, b) => a.canonicalId.localeCompare(b.canonicalId));
  return summary;
}

export class FetchDispatcher {
  constructor(
    private registry: PlatformRegistry,
    private notes: NoteStore,
  ) {}

  /**
   * Fetches metadata for one note and persists the outcome. Fetch failures
   * are recorded on the note, not thrown; notes outside bare/parsed come back
   * unchanged.
   */
  async parse(note: Note, signal?: AbortSignal): Promise<Note> {
    if (!PARSEABLE.includes(note.state)) return note;

    const entry = this.registry.get(note.platform);
    const { remoteId } = splitCanonicalId(note.canonicalId);
    if (entry.normalizeId(remoteId) === null) {
      const err = new ClassificationError("InvalidReference", note.canonicalId);
      return this.notes.upsert(markFailed(note, "classify", failureOf(err)));
    }

    try {
      const fetched = await entry.fetcher.fetch(note.canonicalId, { hints: note.hints, signal });
      const parsed = markParsed(note, fetched, (metadata) => entry.seriesOf?.(metadata));
      log.info("parse.ok", { canonicalId: note.canonicalId, title: fetched.title });
      return this.notes.upsert(parsed);
    } catch (err) {
      const fetchErr: FetchError = toFetchError(err);
      log.warn("parse.failed", { canonicalId: note.canonicalId, kind: fetchErr.kind, message: fetchErr.message });
      return this.notes.upsert(markFailed(note, "fetch", fetchErr));
    }
  }

  async parseBatch(notes: readonly Note[], opts: BatchOptions = {}): Promise<BatchSummary> {
    return runBatch(
      notes,
      (note) => note.canonicalId,
      async (note, abort): Promise<ItemOutcome> => {
        if (!PARSEABLE.includes(note.state)) return { outcome: "skipped" };
        const result = await this.parse(note, abort);
        if (result.state === "parsed") return { outcome: "ok" };
        return { outcome: "failed", failure: result.failure };
      },
      opts,
    );
  }
}
