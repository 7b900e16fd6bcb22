import { mkdir, mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { newBareNote } from "../core/lifecycle.js";
import type { Note } from "../core/types.js";
import { setLogSink } from "../logger.js";
import { NfoWriter, escapeXml, renderEpisodeNfo, renderTvShowNfo } from "./nfo-writer.js";

function cachedNote(localPath: string, publishedAt = "2021-03-01"): Note {
  return {
    ...newBareNote({ platform: "youtube", canonicalId: "youtube:abcdefghijk" }),
    state: "cached",
    metadata: {
      title: "Tom & Jerry <live>",
      author: "Chan",
      publishedAt,
      tags: [],
      extra: { description: "Plot" },
    },
    mediaRef: { localPath, duration: 185, format: "mp4" },
    seriesKey: "youtube:UC1",
    seasonNumber: 2021,
    episodeNumber: 2,
  };
}

describe("escapeXml", () => {
  it("escapes the five XML entities", () => {
    expect(escapeXml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&apos;&amp;&apos;&lt;/a&gt;");
  });
});

describe("renderEpisodeNfo", () => {
  it("renders episode details", () => {
    expect(renderEpisodeNfo(cachedNote("/m/ep.mp4"))).toBe(
      [
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>`,
        "<episodedetails>",
        "  <title>Tom &amp; Jerry &lt;live&gt;</title>",
        "  <showtitle>Chan</showtitle>",
        "  <season>2021</season>",
        "  <episode>2</episode>",
        "  <aired>2021-03-01</aired>",
        "  <plot>Plot</plot>",
        "  <runtime>3</runtime>",
        `  <uniqueid type="mdcapture" default="true">youtube:abcdefghijk</uniqueid>`,
        "</episodedetails>",
        "",
      ].join("\n"),
    );
  });

  it("leaves out the air date when only the year is known", () => {
    expect(renderEpisodeNfo(cachedNote("/m/ep.mp4", "2021"))).not.toContain("<aired>");
  });
});

describe("renderTvShowNfo", () => {
  it("names the show and its series key", () => {
    expect(renderTvShowNfo(cachedNote("/m/ep.mp4"))).toBe(
      [
        `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>`,
        "<tvshow>",
        "  <title>Chan</title>",
        `  <uniqueid type="mdcapture" default="true">youtube:UC1</uniqueid>`,
        "</tvshow>",
        "",
      ].join("\n"),
    );
  });
});

describe("NfoWriter", () => {
  let dir: string;
  let lines: string[];
  let restoreSink: ((line: string) => void) | undefined;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "nfo-"));
    lines = [];
    restoreSink = setLogSink((line) => lines.push(line));
  });

  afterEach(async () => {
    if (restoreSink) setLogSink(restoreSink);
    await rm(dir, { recursive: true, force: true });
  });

  it("writes sidecars beside the media and skips unchanged files", async () => {
    const seasonDir = join(dir, "Chan", "Season 2021");
    await mkdir(seasonDir, { recursive: true });
    const note = cachedNote(join(seasonDir, "abcdefghijk.mp4"));
    const writer = new NfoWriter();

    await writer.writeEpisode(note);
    await writer.writeEpisode(note);

    expect(await readFile(join(seasonDir, "abcdefghijk.nfo"), "utf-8")).toBe(renderEpisodeNfo(note));
    expect(await readFile(join(dir, "Chan", "tvshow.nfo"), "utf-8")).toBe(renderTvShowNfo(note));
    expect(lines.filter((l) => l.includes('"event":"nfo.written"'))).toHaveLength(1);
  });

  it("ignores notes without media", async () => {
    await new NfoWriter().writeEpisode({ ...cachedNote(join(dir, "x.mp4")), mediaRef: undefined });
    expect(lines).toEqual([]);
  });
});
