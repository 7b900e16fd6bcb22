import { KeyedMutex } from "./concurrency.js";
import { ReindexError, failureOf } from "./errors.js";
import { applyNumbering } from "./lifecycle.js";
import { readPublished, UNDATED_SEASON } from "./published.js";
import type { EpisodeSink, Note } from "./types.js";
import { collect, type NoteStore } from "../stores/note-store.js";
import { log } from "../logger.js";

// ── Pure numbering ───────────────────────────────────────────────

export interface NumberedEpisode {
  canonicalId: string;
  season: number;
  episode: number;
}

export interface NumberingPlan {
  seriesKey: string;
  episodes: NumberedEpisode[];
}

interface Dated {
  note: Note;
  time: number | undefined;
}

function compareDated(a: Dated, b: Dated): number {
  if (a.time !== undefined && b.time !== undefined && a.time !== b.time) return a.time - b.time;
  if (a.time !== undefined && b.time === undefined) return -1;
  if (a.time === undefined && b.time !== undefined) return 1;
  return a.note.canonicalId < b.note.canonicalId ? -1 : a.note.canonicalId > b.note.canonicalId ? 1 : 0;
}

/**
 * Season = publish year; episode = rank within the season by publish time,
 * ties and unknown times ordered by canonical id, unknown times last. Notes
 * with no readable year land in season 0. Depends only on the input set, not
 * its order.
 */
export function computeNumbering(notes: readonly Note[], seriesKey: string): NumberingPlan {
  const seen = new Set<string>();
  for (const note of notes) {
    if (seen.has(note.canonicalId)) {
      throw new ReindexError("InconsistentSeriesData", seriesKey, `duplicate note ${note.canonicalId}`);
    }
    seen.add(note.canonicalId);
    if (note.seriesKey !== seriesKey) {
      throw new ReindexError(
        "InconsistentSeriesData",
        seriesKey,
        `${note.canonicalId} belongs to ${note.seriesKey ?? "no series"}`,
      );
    }
    if (note.state !== "cached") {
      throw new ReindexError("InconsistentSeriesData", seriesKey, `${note.canonicalId} is ${note.state}, not cached`);
    }
    if (!note.mediaRef) {
      throw new ReindexError("InconsistentSeriesData", seriesKey, `${note.canonicalId} is cached without media`);
    }
  }

  const seasons = new Map<number, Dated[]>();
  for (const note of notes) {
    const published = readPublished(note.metadata?.publishedAt);
    const season = published.year ?? UNDATED_SEASON;
    const bucket = seasons.get(season) ?? [];
    bucket.push({ note, time: published.time });
    seasons.set(season, bucket);
  }

  const episodes: NumberedEpisode[] = [];
  for (const season of [...seasons.keys()].sort((a, b) => a - b)) {
    const bucket = seasons.get(season) ?? [];
    bucket.sort(compareDated);
    bucket.forEach((d, i) => episodes.push({ canonicalId: d.note.canonicalId, season, episode: i + 1 }));
  }
  return { seriesKey, episodes };
}

// ── Apply ────────────────────────────────────────────────────────

export interface ReindexResult {
  seriesKey: string;
  episodes: number;
  /** Notes whose numbers were rewritten. */
  changed: number;
  error?: { kind: string; message: string };
}

export class EpisodeReindexer {
  private locks = new KeyedMutex();

  constructor(
    private notes: NoteStore,
    private sink?: EpisodeSink,
  ) {}

  /**
   * Snapshot, compute, apply. Only notes whose numbers differ are written,
   * so re-running after an interruption finishes the job. The sink sees every
   * episode on every run.
   */
  async reindexSeries(seriesKey: string): Promise<ReindexResult> {
    return this.locks.run(seriesKey, async () => {
      const members = await collect(this.notes.findBySeries(seriesKey));
      const cached = members.filter((n) => n.state === "cached");
      const plan = computeNumbering(cached, seriesKey);

      const byId = new Map(cached.map((n) => [n.canonicalId, n]));
      let changed = 0;
      for (const ep of plan.episodes) {
        const note = byId.get(ep.canonicalId);
        if (!note) continue;
        let current = note;
        if (note.seasonNumber !== ep.season || note.episodeNumber !== ep.episode) {
          current = await this.notes.upsert(applyNumbering(note, ep.season, ep.episode));
          changed++;
        }
        await this.sink?.writeEpisode(current);
      }

      if (changed > 0) log.info("reindex.applied", { seriesKey, episodes: plan.episodes.length, changed });
      return { seriesKey, episodes: plan.episodes.length, changed };
    });
  }

  /** Every series with cached notes; one series failing leaves the others alone. */
  async reindexAll(): Promise<ReindexResult[]> {
    const keys = new Set<string>();
    for await (const note of this.notes.list({ states: ["cached"] })) {
      if (note.seriesKey) keys.add(note.seriesKey);
    }

    const sorted = [...keys].sort();
    const settled = await Promise.allSettled(sorted.map((key) => this.reindexSeries(key)));
    return settled.map((outcome, i) => {
      const seriesKey = sorted[i] ?? "";
      if (outcome.status === "fulfilled") return outcome.value;
      log.error("reindex.series", outcome.reason, { seriesKey });
      return { seriesKey, episodes: 0, changed: 0, error: failureOf(outcome.reason) };
    });
  }
}

export function describeReindex(result: ReindexResult): string {
  if (result.error) return `${result.seriesKey}: ${result.error.kind}: ${result.error.message}`;
  return `${result.seriesKey}: ${result.episodes} episodes, ${result.changed} renumbered`;
}
