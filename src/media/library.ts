import { stat } from "node:fs/promises";
import { join } from "node:path";
import { seasonFolder, seasonFor } from "../core/published.js";
import { safeDirName } from "../core/slug.js";
import type { Note } from "../core/types.js";

// ── Media library layout ─────────────────────────────────────────
// <mediaDir>/<section>/<Show>/<Season YYYY | Specials>/<file>
// Show and season folders follow what media servers expect for TV shows.

export type LibrarySection = "youtube" | "podcasts";

export function showName(note: Note): string {
  return note.metadata?.author?.trim() || "Unknown";
}

export function showDir(mediaDir: string, section: LibrarySection, show: string): string {
  return join(mediaDir, section, safeDirName(show));
}

/** The season folder comes from the publish year, the same bucket the reindexer numbers within. */
export function episodeDir(mediaDir: string, section: LibrarySection, note: Note): string {
  return join(showDir(mediaDir, section, showName(note)), seasonFolder(seasonFor(note.metadata?.publishedAt)));
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

export function extensionOf(path: string): string {
  const m = /\.([A-Za-z0-9]{1,5})$/.exec(path);
  return m ? m[1].toLowerCase() : "";
}
