import type { Note, NoteFilter, RawHeaderEntry } from "../core/types.js";
import { mergeTags } from "../core/lifecycle.js";

export interface NoteStore {
  get(canonicalId: string): Promise<Note | null>;
  /** Merges into any stored note with the same canonical id and returns what was stored. */
  upsert(note: Note): Promise<Note>;
  /** Lazily produced; every iteration re-reads the store. */
  list(filter?: NoteFilter): AsyncIterable<Note>;
  findBySeries(seriesKey: string): AsyncIterable<Note>;
}

// ── Shared semantics ─────────────────────────────────────────────

/**
 * The incoming note is the lifecycle snapshot: state and everything derived
 * from it (metadata, media, numbering, failure) are taken as-is, absence
 * included. Accumulating fields merge: tags union, hints and unknown header
 * entries key-wise, earliest capture time, and the stored body unless the
 * incoming one has content.
 */
export function mergeNote(stored: Note | null, incoming: Note): Note {
  if (!stored) {
    return { ...incoming, tags: mergeTags(incoming.tags), extraHeader: [...incoming.extraHeader] };
  }
  return {
    ...incoming,
    tags: mergeTags(stored.tags, incoming.tags),
    hints: { ...stored.hints, ...incoming.hints },
    extraHeader: mergeHeaderEntries(stored.extraHeader, incoming.extraHeader),
    body: incoming.body || stored.body,
    capturedAt: earliest(stored.capturedAt, incoming.capturedAt),
  };
}

function mergeHeaderEntries(stored: RawHeaderEntry[], incoming: RawHeaderEntry[]): RawHeaderEntry[] {
  const out = stored.map((e) => ({ ...e }));
  for (const entry of incoming) {
    const at = entry.key ? out.findIndex((e) => e.key === entry.key) : out.findIndex((e) => e.raw === entry.raw);
    if (at === -1) out.push({ ...entry });
    else out[at] = { ...entry };
  }
  return out;
}

function earliest(a: string, b: string): string {
  if (!a) return b;
  if (!b) return a;
  return a <= b ? a : b;
}

export function matchesFilter(note: Note, filter: NoteFilter = {}): boolean {
  if (filter.platforms?.length && !filter.platforms.includes(note.platform)) return false;
  if (filter.states?.length && !filter.states.includes(note.state)) return false;
  if (filter.seriesKey !== undefined && note.seriesKey !== filter.seriesKey) return false;
  if (filter.tags?.length && !filter.tags.some((t) => note.tags.includes(t))) return false;
  return true;
}

/** Wraps a generator factory so each `for await` starts a fresh pass. */
export function restartable<T>(factory: () => AsyncGenerator<T>): AsyncIterable<T> {
  return { [Symbol.asyncIterator]: () => factory() };
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

// ── In-memory store (tests, embedding) ───────────────────────────

export class InMemoryNoteStore implements NoteStore {
  private notes = new Map<string, Note>();

  async get(canonicalId: string): Promise<Note | null> {
    const note = this.notes.get(canonicalId);
    return note ? structuredClone(note) : null;
  }

  async upsert(note: Note): Promise<Note> {
    const merged = mergeNote(this.notes.get(note.canonicalId) ?? null, structuredClone(note));
    this.notes.set(merged.canonicalId, merged);
    return structuredClone(merged);
  }

  list(filter: NoteFilter = {}): AsyncIterable<Note> {
    const notes = this.notes;
    return restartable(async function* () {
      const ids = [...notes.keys()].sort();
      for (const id of ids) {
        const note = notes.get(id);
        if (note && matchesFilter(note, filter)) yield structuredClone(note);
      }
    });
  }

  findBySeries(seriesKey: string): AsyncIterable<Note> {
    return this.list({ seriesKey });
  }

  async count(): Promise<number> {
    return this.notes.size;
  }
}
