import { mkdir, readFile, readdir, rename, writeFile } from "node:fs/promises";
import { dirname, join, sep } from "node:path";
import { splitCanonicalId } from "../core/classifier.js";
import { NoteFormatError } from "../core/errors.js";
import { shortHash, slugify } from "../core/slug.js";
import type { Note, NoteFilter } from "../core/types.js";
import { log } from "../logger.js";
import { parseNoteDocument, serializeNote } from "../notes/note-document.js";
import { matchesFilter, mergeNote, restartable, type NoteStore } from "./note-store.js";

/**
 * `<platform>/<slug>.md`. The slug is the remote id when that is already
 * file-safe; otherwise a slug plus a hash of the canonical id keeps names
 * unique and stable.
 */
export function notePath(canonicalId: string): string {
  const { platform, remoteId } = splitCanonicalId(canonicalId);
  const slug = slugify(remoteId, 80);
  const stem = slug && slug === remoteId ? slug : `${slug || "note"}-${shortHash(canonicalId)}`;
  return join(platform || "unknown", `${stem}.md`);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** One markdown document per note under a notes directory. */
export class MarkdownNoteStore implements NoteStore {
  constructor(private rootDir: string) {}

  private pathFor(canonicalId: string): string {
    return join(this.rootDir, notePath(canonicalId));
  }

  private async readNote(path: string): Promise<Note | null> {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    return parseNoteDocument(text);
  }

  async get(canonicalId: string): Promise<Note | null> {
    const note = await this.readNote(this.pathFor(canonicalId));
    if (note && note.canonicalId !== canonicalId) {
      throw new NoteFormatError(`${this.pathFor(canonicalId)} holds ${note.canonicalId}, expected ${canonicalId}`);
    }
    return note;
  }

  async upsert(note: Note): Promise<Note> {
    const merged = mergeNote(await this.get(note.canonicalId), note);
    const path = this.pathFor(note.canonicalId);
    await mkdir(dirname(path), { recursive: true });
    const tmp = `${path}.tmp`;
    await writeFile(tmp, serializeNote(merged), "utf-8");
    await rename(tmp, path);
    return merged;
  }

  private async files(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.rootDir, { recursive: true });
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries
      .filter((p) => p.endsWith(".md") && !p.split(sep).some((part) => part.startsWith(".")))
      .sort();
  }

  list(filter: NoteFilter = {}): AsyncIterable<Note> {
    const store = this;
    return restartable(async function* () {
      for (const rel of await store.files()) {
        let note: Note | null;
        try {
          note = await store.readNote(join(store.rootDir, rel));
        } catch (err) {
          // hand-written markdown without a note header lives alongside captured notes
          if (!(err instanceof NoteFormatError)) throw err;
          log.warn("notes.unreadable", { path: rel, reason: err.message });
          continue;
        }
        if (note && matchesFilter(note, filter)) yield note;
      }
    });
  }

  findBySeries(seriesKey: string): AsyncIterable<Note> {
    return this.list({ seriesKey });
  }
}
