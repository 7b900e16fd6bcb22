import { and, arrayOverlaps, asc, eq, gt, inArray, type SQL } from "drizzle-orm";
import type { Note, NoteFilter } from "../core/types.js";
import { getDb, schema, type Db } from "../db/index.js";
import { parseNoteDocument, serializeNote } from "../notes/note-document.js";
import { mergeNote, restartable, type NoteStore } from "./note-store.js";

const PAGE_SIZE = 200;

function rowToNote(row: typeof schema.notes.$inferSelect): Note {
  return parseNoteDocument(row.document);
}

function conditionsFor(filter: NoteFilter): SQL[] {
  const conditions: SQL[] = [];
  if (filter.platforms?.length) conditions.push(inArray(schema.notes.platform, filter.platforms));
  if (filter.states?.length) conditions.push(inArray(schema.notes.state, filter.states));
  if (filter.seriesKey !== undefined) conditions.push(eq(schema.notes.seriesKey, filter.seriesKey));
  if (filter.tags?.length) conditions.push(arrayOverlaps(schema.notes.tags, filter.tags));
  return conditions;
}

export class PgNoteStore implements NoteStore {
  constructor(private db: Db = getDb()) {}

  async get(canonicalId: string): Promise<Note | null> {
    const [row] = await this.db
      .select()
      .from(schema.notes)
      .where(eq(schema.notes.canonicalId, canonicalId))
      .limit(1);
    return row ? rowToNote(row) : null;
  }

  async upsert(note: Note): Promise<Note> {
    const merged = mergeNote(await this.get(note.canonicalId), note);
    const values = {
      canonicalId: merged.canonicalId,
      platform: merged.platform,
      state: merged.state,
      seriesKey: merged.seriesKey ?? null,
      seasonNumber: merged.seasonNumber ?? null,
      episodeNumber: merged.episodeNumber ?? null,
      tags: merged.tags,
      document: serializeNote(merged),
      updatedAt: new Date(merged.updatedAt || Date.now()),
    };

    await this.db
      .insert(schema.notes)
      .values(values)
      .onConflictDoUpdate({
        target: schema.notes.canonicalId,
        set: {
          state: values.state,
          seriesKey: values.seriesKey,
          seasonNumber: values.seasonNumber,
          episodeNumber: values.episodeNumber,
          tags: values.tags,
          document: values.document,
          updatedAt: values.updatedAt,
        },
      });
    return merged;
  }

  /** Keyset-paginated by canonical id, one page per round trip. */
  list(filter: NoteFilter = {}): AsyncIterable<Note> {
    const db = this.db;
    return restartable(async function* () {
      let after: string | null = null;
      for (;;) {
        const conditions = conditionsFor(filter);
        if (after !== null) conditions.push(gt(schema.notes.canonicalId, after));
        const rows = await db
          .select()
          .from(schema.notes)
          .where(conditions.length > 0 ? and(...conditions) : undefined)
          .orderBy(asc(schema.notes.canonicalId))
          .limit(PAGE_SIZE);
        for (const row of rows) yield rowToNote(row);
        const last = rows[rows.length - 1];
        if (!last || rows.length < PAGE_SIZE) return;
        after = last.canonicalId;
      }
    });
  }

  findBySeries(seriesKey: string): AsyncIterable<Note> {
    return this.list({ seriesKey });
  }
}
