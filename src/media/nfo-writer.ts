import { readFile, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { readPublished } from "../core/published.js";
import type { EpisodeSink, Note } from "../core/types.js";
import { log } from "../logger.js";
import { showName } from "./library.js";

// ── Kodi/Jellyfin style .nfo sidecars ────────────────────────────

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function element(name: string, value: string | number | undefined, attrs = ""): string[] {
  if (value === undefined || value === "") return [];
  return [`  <${name}${attrs}>${escapeXml(String(value))}</${name}>`];
}

function airedDate(publishedAt: string | undefined): string | undefined {
  const { time } = readPublished(publishedAt);
  return time === undefined ? undefined : new Date(time).toISOString().slice(0, 10);
}

export function renderTvShowNfo(note: Note): string {
  return [
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>`,
    "<tvshow>",
    ...element("title", showName(note)),
    ...element("uniqueid", note.seriesKey, ` type="mdcapture" default="true"`),
    "</tvshow>",
    "",
  ].join("\n");
}

export function renderEpisodeNfo(note: Note): string {
  const plot = note.metadata?.extra.description;
  return [
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>`,
    "<episodedetails>",
    ...element("title", note.metadata?.title ?? note.canonicalId),
    ...element("showtitle", showName(note)),
    ...element("season", note.seasonNumber),
    ...element("episode", note.episodeNumber),
    ...element("aired", airedDate(note.metadata?.publishedAt)),
    ...element("plot", typeof plot === "string" ? plot : undefined),
    ...element("runtime", note.mediaRef?.duration !== undefined ? Math.round(note.mediaRef.duration / 60) : undefined),
    ...element("uniqueid", note.canonicalId, ` type="mdcapture" default="true"`),
    "</episodedetails>",
    "",
  ].join("\n");
}

async function writeIfChanged(path: string, content: string): Promise<boolean> {
  let current: string | null = null;
  try {
    current = await readFile(path, "utf-8");
  } catch (err) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
  }
  if (current === content) return false;
  await writeFile(path, content, "utf-8");
  return true;
}

/**
 * Writes `tvshow.nfo` in the show folder and `<media basename>.nfo` beside
 * each episode. Unchanged files are left alone, so repeated reindexing does
 * not touch mtimes media servers watch.
 */
export class NfoWriter implements EpisodeSink {
  async writeEpisode(note: Note): Promise<void> {
    if (!note.mediaRef) return;
    const mediaPath = note.mediaRef.localPath;
    const seasonDir = dirname(mediaPath);
    const showDir = dirname(seasonDir);

    const wroteShow = await writeIfChanged(join(showDir, "tvshow.nfo"), renderTvShowNfo(note));
    const episodeNfo = join(seasonDir, `${basename(mediaPath, extname(mediaPath))}.nfo`);
    const wroteEpisode = await writeIfChanged(episodeNfo, renderEpisodeNfo(note));
    if (wroteShow || wroteEpisode) {
      log.info("nfo.written", { canonicalId: note.canonicalId, path: episodeNfo });
    }
  }
}
