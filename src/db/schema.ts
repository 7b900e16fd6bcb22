import { pgTable, text, varchar, timestamp, integer, index } from "drizzle-orm/pg-core";

// ── Notes ────────────────────────────────────────────────────────
// The serialized document is the source of truth; the other columns are
// copies of header fields for filtering.

export const notes = pgTable(
  "notes",
  {
    canonicalId: text("canonical_id").primaryKey(),
    platform: varchar("platform", { length: 32 }).notNull(),
    state: varchar("state", { length: 32 }).notNull(),
    seriesKey: text("series_key"),
    seasonNumber: integer("season_number"),
    episodeNumber: integer("episode_number"),
    tags: text("tags").array().notNull().default([]),
    document: text("document").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index("notes_state_idx").on(t.state),
    index("notes_series_key_idx").on(t.seriesKey),
  ],
);

// ── Inbox sync state ─────────────────────────────────────────────

export const syncState = pgTable("sync_state", {
  source: text("source").primaryKey(),
  lastSyncAt: timestamp("last_sync_at", { withTimezone: true }).notNull(),
  lastStatus: varchar("last_status", { length: 20 }).notNull().$type<"ok" | "partial" | "error">(),
  consecutiveFailures: integer("consecutive_failures").default(0).notNull(),
  lastError: text("last_error"),
});
