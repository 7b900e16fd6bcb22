import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InMemoryNoteStore, collect } from "../stores/note-store.js";
import { setLogSink } from "../logger.js";
import { EpisodeReindexer, computeNumbering, describeReindex } from "./episode-reindexer.js";
import { ReindexError } from "./errors.js";
import type { EpisodeSink, Note } from "./types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const SERIES = "youtube:UC1";

function episode(canonicalId: string, publishedAt: string | undefined, seriesKey = SERIES): Note {
  return {
    canonicalId,
    platform: "youtube",
    state: "cached",
    tags: ["inbox"],
    hints: {},
    metadata: { title: canonicalId, publishedAt, tags: [], extra: {} },
    mediaRef: { localPath: `/media/${canonicalId}.mp4`, format: "mp4" },
    seriesKey,
    body: "",
    extraHeader: [],
    capturedAt: "2024-01-01T00:00:00.000Z",
    updatedAt: "2024-01-01T00:00:00.000Z",
  };
}

function numbers(notes: Note[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const n of notes) out[n.canonicalId] = `${n.seasonNumber}x${n.episodeNumber}`;
  return out;
}

class RecordingSink implements EpisodeSink {
  written: string[] = [];
  async writeEpisode(note: Note): Promise<void> {
    this.written.push(`${note.canonicalId}@${note.seasonNumber}x${note.episodeNumber}`);
  }
}

let restoreSink: ((line: string) => void) | undefined;

beforeEach(() => {
  restoreSink = setLogSink(() => {});
});

afterEach(() => {
  if (restoreSink) setLogSink(restoreSink);
});

// ---------------------------------------------------------------------------
// computeNumbering
// ---------------------------------------------------------------------------

describe("computeNumbering", () => {
  it("numbers by publish year and date", () => {
    const plan = computeNumbering(
      [episode("yt:c", "2022-06-01"), episode("yt:a", "2021-01-15"), episode("yt:b", "2021-03-01")],
      SERIES,
    );
    expect(plan).toEqual({
      seriesKey: SERIES,
      episodes: [
        { canonicalId: "yt:a", season: 2021, episode: 1 },
        { canonicalId: "yt:b", season: 2021, episode: 2 },
        { canonicalId: "yt:c", season: 2022, episode: 1 },
      ],
    });
  });

  it("shifts later episodes when an earlier one joins the season", () => {
    const plan = computeNumbering(
      [
        episode("yt:a", "2021-01-15"),
        episode("yt:b", "2021-03-01"),
        episode("yt:c", "2022-06-01"),
        episode("yt:d", "2021-02-01"),
      ],
      SERIES,
    );
    expect(plan.episodes).toEqual([
      { canonicalId: "yt:a", season: 2021, episode: 1 },
      { canonicalId: "yt:d", season: 2021, episode: 2 },
      { canonicalId: "yt:b", season: 2021, episode: 3 },
      { canonicalId: "yt:c", season: 2022, episode: 1 },
    ]);
  });

  it("does not depend on input order", () => {
    const notes = [
      episode("yt:a", "2021-01-15"),
      episode("yt:b", "2021-01-15"),
      episode("yt:c", undefined),
      episode("yt:d", "20210110"),
    ];
    expect(computeNumbering([...notes].reverse(), SERIES)).toEqual(computeNumbering(notes, SERIES));
  });

  it("files undated episodes in season 0", () => {
    const plan = computeNumbering([episode("yt:b", undefined), episode("yt:a", "not a date"), episode("yt:c", "2020-01-01")], SERIES);
    expect(plan.episodes).toEqual([
      { canonicalId: "yt:a", season: 0, episode: 1 },
      { canonicalId: "yt:b", season: 0, episode: 2 },
      { canonicalId: "yt:c", season: 2020, episode: 1 },
    ]);
  });

  it("puts year-only dates after full dates of the same year", () => {
    const plan = computeNumbering(
      [episode("yt:y", "2021"), episode("yt:x", "2021-06"), episode("yt:z", "2021-12-31T23:00:00Z")],
      SERIES,
    );
    expect(plan.episodes.map((e) => `${e.canonicalId}:${e.season}x${e.episode}`)).toEqual([
      "yt:z:2021x1",
      "yt:x:2021x2",
      "yt:y:2021x3",
    ]);
  });

  it("rejects duplicates", () => {
    expect(() => computeNumbering([episode("yt:a", "2021-01-01"), episode("yt:a", "2021-01-01")], SERIES)).toThrow(
      "Series youtube:UC1: duplicate note yt:a",
    );
  });

  it("rejects notes from another series", () => {
    expect(() => computeNumbering([episode("yt:a", "2021-01-01", "youtube:UC2")], SERIES)).toThrow(
      "Series youtube:UC1: yt:a belongs to youtube:UC2",
    );
  });

  it("rejects notes that are not cached", () => {
    const pending: Note = { ...episode("yt:a", "2021-01-01"), state: "caching_requested", mediaRef: undefined };
    let caught: unknown;
    try {
      computeNumbering([pending], SERIES);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ReindexError);
    expect(caught).toMatchObject({ kind: "InconsistentSeriesData", seriesKey: SERIES });
  });
});

// ---------------------------------------------------------------------------
// EpisodeReindexer
// ---------------------------------------------------------------------------

describe("EpisodeReindexer", () => {
  it("writes numbers, then leaves them alone on a second run", async () => {
    const store = new InMemoryNoteStore();
    const sink = new RecordingSink();
    for (const n of [episode("yt:a", "2021-01-15"), episode("yt:b", "2021-03-01"), episode("yt:c", "2022-06-01")]) {
      await store.upsert(n);
    }
    const reindexer = new EpisodeReindexer(store, sink);

    expect(await reindexer.reindexSeries(SERIES)).toEqual({ seriesKey: SERIES, episodes: 3, changed: 3 });
    expect(await reindexer.reindexSeries(SERIES)).toEqual({ seriesKey: SERIES, episodes: 3, changed: 0 });
    expect(numbers(await collect(store.list()))).toEqual({ "yt:a": "2021x1", "yt:b": "2021x2", "yt:c": "2022x1" });
    expect(sink.written).toEqual([
      "yt:a@2021x1",
      "yt:b@2021x2",
      "yt:c@2022x1",
      "yt:a@2021x1",
      "yt:b@2021x2",
      "yt:c@2022x1",
    ]);
  });

  it("renumbers only the notes whose position moved", async () => {
    const store = new InMemoryNoteStore();
    for (const n of [episode("yt:a", "2021-01-15"), episode("yt:b", "2021-03-01"), episode("yt:c", "2022-06-01")]) {
      await store.upsert(n);
    }
    const reindexer = new EpisodeReindexer(store);
    await reindexer.reindexSeries(SERIES);

    await store.upsert(episode("yt:d", "2021-02-01"));
    expect(await reindexer.reindexSeries(SERIES)).toEqual({ seriesKey: SERIES, episodes: 4, changed: 2 });
    expect(numbers(await collect(store.list()))).toEqual({
      "yt:a": "2021x1",
      "yt:b": "2021x3",
      "yt:c": "2022x1",
      "yt:d": "2021x2",
    });
  });

  it("ignores series members that are not cached yet", async () => {
    const store = new InMemoryNoteStore();
    await store.upsert(episode("yt:a", "2021-01-15"));
    await store.upsert({ ...episode("yt:b", "2021-01-01"), state: "parsed", mediaRef: undefined });
    const result = await new EpisodeReindexer(store).reindexSeries(SERIES);
    expect(result).toEqual({ seriesKey: SERIES, episodes: 1, changed: 1 });
  });

  it("reports a broken series without stopping the others", async () => {
    const store = new InMemoryNoteStore();
    await store.upsert(episode("yt:a", "2021-01-15"));
    await store.upsert({ ...episode("pod:1", "2021-01-01", "podcast:broken"), mediaRef: undefined });

    const results = await new EpisodeReindexer(store).reindexAll();
    expect(results).toEqual([
      {
        seriesKey: "podcast:broken",
        episodes: 0,
        changed: 0,
        error: { kind: "InconsistentSeriesData", message: "Series podcast:broken: pod:1 is cached without media" },
      },
      { seriesKey: SERIES, episodes: 1, changed: 1 },
    ]);
    expect(results.map(describeReindex)).toEqual([
      "podcast:broken: InconsistentSeriesData: Series podcast:broken: pod:1 is cached without media",
      "youtube:UC1: 1 episodes, 1 renumbered",
    ]);
  });

  it("runs one reindex per series at a time", async () => {
    const store = new InMemoryNoteStore();
    await store.upsert(episode("yt:a", "2021-01-15"));
    const reindexer = new EpisodeReindexer(store);

    const [first, second] = await Promise.all([reindexer.reindexSeries(SERIES), reindexer.reindexSeries(SERIES)]);
    expect(first.changed + second.changed).toBe(1);
  });
});
