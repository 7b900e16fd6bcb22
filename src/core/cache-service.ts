import type { EpisodeReindexer } from "./episode-reindexer.js";
import { CacheError, LifecycleError, failureOf, toCacheError } from "./errors.js";
import { markCached, markFailed, requestCaching } from "./lifecycle.js";
import type { PlatformRegistry } from "./platform-registry.js";
import type { Note, SeriesFailure } from "./types.js";
import type { NoteStore } from "../stores/note-store.js";
import { log } from "../logger.js";

export interface CacheOutcome {
  note: Note;
  /** The download stands even when its series cannot be renumbered. */
  reindexFailure?: SeriesFailure;
}

export class CacheService {
  constructor(
    private registry: PlatformRegistry,
    private notes: NoteStore,
    private reindexer: EpisodeReindexer,
  ) {}

  /**
   * parsed → caching_requested → cached | failed, each step persisted before
   * the next starts. A note left in caching_requested by an interrupted run
   * picks up at the download. Cached notes come back unchanged.
   */
  async cache(note: Note, signal?: AbortSignal): Promise<CacheOutcome> {
    if (note.state === "cached") return { note };

    let current = note;
    if (current.state === "parsed") {
      current = await this.notes.upsert(requestCaching(current, this.registry.isCacheable(current.platform)));
    }
    if (current.state !== "caching_requested") {
      throw new LifecycleError(`${note.canonicalId}: cannot cache a ${note.state} note`);
    }

    const cacher = this.registry.get(current.platform).cacher;
    if (!cacher) throw new CacheError("Unsupported", `${current.platform} notes have no media to cache`);

    try {
      const mediaRef = await cacher.cache(current, signal);
      current = await this.notes.upsert(markCached(current, mediaRef));
    } catch (err) {
      const cacheErr = toCacheError(err);
      log.warn("cache.failed", { canonicalId: note.canonicalId, kind: cacheErr.kind, message: cacheErr.message });
      return { note: await this.notes.upsert(markFailed(current, "cache", cacheErr)) };
    }

    const seriesKey = current.seriesKey;
    if (!seriesKey) return { note: current };

    let reindexFailure: SeriesFailure | undefined;
    try {
      await this.reindexer.reindexSeries(seriesKey);
    } catch (err) {
      log.error("cache.reindex", err, { seriesKey });
      reindexFailure = { seriesKey, ...failureOf(err) };
    }
    return { note: (await this.notes.get(current.canonicalId)) ?? current, reindexFailure };
  }
}
