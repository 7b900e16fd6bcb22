import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createPlatformRegistry } from "../adapters/index.js";
import { CacheService } from "../core/cache-service.js";
import { CaptureService } from "../core/capture-service.js";
import { EpisodeReindexer } from "../core/episode-reindexer.js";
import { FetchDispatcher } from "../core/fetch-dispatcher.js";
import { SyncReconciler } from "../core/sync-reconciler.js";
import type { MediaPlayer, PlayTarget } from "../core/types.js";
import type { YtDlpRunner } from "../media/yt-dlp.js";
import { InMemoryNoteStore } from "../stores/note-store.js";
import { InMemorySyncStateStore } from "../stores/sync-state-store.js";
import { setLogSink } from "../logger.js";
import { EXIT_FAILED, EXIT_OK, EXIT_USAGE, USAGE, parseHints, runCli } from "./run.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const ytDlp: YtDlpRunner = {
  async run(args) {
    const id = new URL(args[args.length - 1] ?? "").searchParams.get("v") ?? "";
    const info = { id, title: `Video ${id}`, channel: "Chan", channel_id: "UC1", upload_date: "20210115" };
    return { stdout: JSON.stringify(info), stderr: "" };
  },
};

function setup() {
  const registry = createPlatformRegistry({ ytDlp });
  const notes = new InMemoryNoteStore();
  const dispatcher = new FetchDispatcher(registry, notes);
  const reindexer = new EpisodeReindexer(notes);
  const reconciler = new SyncReconciler([], registry, notes, dispatcher, new InMemorySyncStateStore());
  const service = new CaptureService(
    registry,
    notes,
    dispatcher,
    new CacheService(registry, notes, reindexer),
    reindexer,
    reconciler,
  );

  const played: PlayTarget[] = [];
  const player: MediaPlayer = {
    async open(target) {
      played.push(target);
    },
  };

  const out: string[] = [];
  const err: string[] = [];
  const run = (...argv: string[]) =>
    runCli(argv, { service, player, out: (line) => out.push(line), err: (line) => err.push(line) });
  return { notes, out, err, played, run };
}

let restoreSink: ((line: string) => void) | undefined;

beforeEach(() => {
  restoreSink = setLogSink(() => {});
});

afterEach(() => {
  if (restoreSink) setLogSink(restoreSink);
});

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

describe("runCli usage", () => {
  it("prints usage to stderr with no command", async () => {
    const { err, run } = setup();
    expect(await run()).toBe(EXIT_USAGE);
    expect(err).toEqual([USAGE]);
  });

  it("prints usage to stdout for --help", async () => {
    const { out, run } = setup();
    expect(await run("--help")).toBe(EXIT_OK);
    expect(out).toEqual([USAGE]);
  });

  it("rejects unknown options", async () => {
    const { err, run } = setup();
    expect(await run("list", "--bogus")).toBe(EXIT_USAGE);
    expect(err[1]).toBe(USAGE);
  });

  it("rejects unknown commands", async () => {
    const { err, run } = setup();
    expect(await run("frobnicate")).toBe(EXIT_USAGE);
    expect(err[0]).toBe("Unknown command: frobnicate");
  });

  it.each([
    [["capture"], "capture needs at least one reference"],
    [["cache"], "cache needs canonical ids or --requested"],
    [["retry"], "retry needs at least one canonical id"],
    [["reindex", "a", "b"], "reindex takes at most one series key"],
    [["show"], "show takes one canonical id"],
    [["play", "a", "b"], "play takes one canonical id"],
    [["sync"], "sync takes one source: all"],
    [["list", "--state", "archived"], "Unknown state: archived"],
    [["list", "--platform", "myspace"], "Unknown platform: myspace"],
    [["capture", "x", "--hint", "novalue"], '--hint expects key=value, got "novalue"'],
  ])("%j is a usage error", async (argv, message) => {
    const { err, run } = setup();
    expect(await run(...argv)).toBe(EXIT_USAGE);
    expect(err).toEqual([message, USAGE]);
  });
});

describe("parseHints", () => {
  it("splits at the first equals sign", () => {
    expect(parseHints(["title=a=b", " channel =Show"])).toEqual({ title: "a=b", channel: "Show" });
  });
});

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

describe("runCli commands", () => {
  it("captures references with tags and hints", async () => {
    const { notes, out, run } = setup();
    expect(await run("capture", "dQw4w9WgXcQ", "-t", "music", "--hint", "cache=true")).toBe(EXIT_OK);
    expect(out).toEqual(["youtube:dQw4w9WgXcQ", "succeeded: 1, failed: 0, skipped: 0"]);

    const note = await notes.get("youtube:dQw4w9WgXcQ");
    expect(note?.tags).toEqual(["music"]);
    expect(note?.hints).toEqual({ cache: "true" });
  });

  it("exits 1 when any reference fails", async () => {
    const { out, run } = setup();
    expect(await run("capture", "nope nope")).toBe(EXIT_FAILED);
    expect(out).toEqual([
      'succeeded: 0, failed: 1, skipped: 0\n  ✗ nope nope: InvalidReference: Cannot classify reference: "nope nope"',
    ]);
  });

  it("reports the parse summary after capture --parse", async () => {
    const { out, run } = setup();
    expect(await run("capture", "dQw4w9WgXcQ", "--parse")).toBe(EXIT_OK);
    expect(out).toEqual([
      "youtube:dQw4w9WgXcQ",
      "succeeded: 1, failed: 0, skipped: 0",
      "parse: succeeded: 1, failed: 0, skipped: 0",
    ]);
  });

  it("lists and shows notes", async () => {
    const { out, run } = setup();
    await run("capture", "dQw4w9WgXcQ", "google:rust");
    await run("parse", "google_search:rust");
    out.length = 0;

    expect(await run("list")).toBe(EXIT_OK);
    expect(out).toEqual(["google_search:rust [parsed] rust\nyoutube:dQw4w9WgXcQ [bare] (not parsed)"]);

    out.length = 0;
    expect(await run("list", "--state", "bare")).toBe(EXIT_OK);
    expect(out).toEqual(["youtube:dQw4w9WgXcQ [bare] (not parsed)"]);

    out.length = 0;
    expect(await run("show", "google_search:rust")).toBe(EXIT_OK);
    expect(out).toEqual([
      [
        "rust",
        "  Id: google_search:rust",
        "  Platform: google_search",
        "  State: parsed",
        "  Tags: inbox",
        "  Link: https://www.google.com/search?q=rust",
      ].join("\n"),
    ]);
  });

  it("exits 1 for a missing note", async () => {
    const { err, run } = setup();
    expect(await run("show", "hackernews:1")).toBe(EXIT_FAILED);
    expect(err).toEqual(["No note hackernews:1"]);
  });

  it("turns service errors into exit code 1", async () => {
    const { err, run } = setup();
    expect(await run("sync", "wallabag")).toBe(EXIT_FAILED);
    expect(err).toEqual(["Error: Unknown inbox source: wallabag (available: none configured)"]);
  });

  it("syncs nothing when no source is configured", async () => {
    const { out, run } = setup();
    expect(await run("sync", "all")).toBe(EXIT_OK);
    expect(out).toEqual(["No inbox sources configured."]);
  });

  it("caches, then reports the renumbered series", async () => {
    const { out, run } = setup();
    await run("capture", "dQw4w9WgXcQ");
    out.length = 0;

    // no cacher is wired in, so YouTube notes parse but cannot download
    expect(await run("cache", "youtube:dQw4w9WgXcQ")).toBe(EXIT_FAILED);
    expect(out).toEqual([
      "succeeded: 0, failed: 1, skipped: 0\n  ✗ youtube:dQw4w9WgXcQ: Unsupported: youtube notes have no media to cache",
    ]);

    out.length = 0;
    expect(await run("reindex")).toBe(EXIT_OK);
    expect(out).toEqual(["No series with cached episodes."]);
  });

  it("streams a note that is not cached yet", async () => {
    const { out, played, run } = setup();
    await run("capture", "dQw4w9WgXcQ");
    out.length = 0;

    expect(await run("play", "youtube:dQw4w9WgXcQ")).toBe(EXIT_OK);
    expect(played).toEqual([
      {
        canonicalId: "youtube:dQw4w9WgXcQ",
        platform: "youtube",
        location: "https://www.youtube.com/watch?v=dQw4w9WgXcQ",
        cached: false,
      },
    ]);
    expect(out).toEqual(["Playing youtube:dQw4w9WgXcQ: https://www.youtube.com/watch?v=dQw4w9WgXcQ (streaming)"]);
  });

  it("exits 1 when there is nothing to play", async () => {
    const { err, played, run } = setup();
    await run("capture", "google:rust");

    expect(await run("play", "hackernews:1")).toBe(EXIT_FAILED);
    expect(await run("play", "google_search:rust")).toBe(EXIT_FAILED);
    expect(err).toEqual(["No note hackernews:1", "Error: google_search notes have no media to play"]);
    expect(played).toEqual([]);
  });

  it("lists platforms", async () => {
    const { out, run } = setup();
    expect(await run("platforms")).toBe(EXIT_OK);
    expect(out[0]?.startsWith("• Google search [google_search]\n  Search queries saved for later. No remote fetch.")).toBe(
      true,
    );
  });
});
