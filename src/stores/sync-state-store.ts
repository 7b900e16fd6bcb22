import { readFileSync, writeFileSync, mkdirSync, existsSync, renameSync } from "node:fs";
import { dirname } from "node:path";
import { eq } from "drizzle-orm";
import { z } from "zod";
import { errorMessage } from "../core/errors.js";
import type { SyncState } from "../core/types.js";
import { getDb, schema, type Db } from "../db/index.js";
import { log } from "../logger.js";

export interface SyncStateStore {
  get(source: string): Promise<SyncState | null>;
  save(state: SyncState): Promise<void>;
  all(): Promise<SyncState[]>;
}

export class PgSyncStateStore implements SyncStateStore {
  constructor(private db: Db = getDb()) {}

  async get(source: string): Promise<SyncState | null> {
    const [row] = await this.db
      .select()
      .from(schema.syncState)
      .where(eq(schema.syncState.source, source))
      .limit(1);
    return row ? rowToSyncState(row) : null;
  }

  async save(state: SyncState): Promise<void> {
    const values = {
      lastSyncAt: new Date(state.lastSyncAt),
      lastStatus: state.lastStatus,
      consecutiveFailures: state.consecutiveFailures,
      lastError: state.lastError ?? null,
    };
    await this.db
      .insert(schema.syncState)
      .values({ source: state.source, ...values })
      .onConflictDoUpdate({ target: schema.syncState.source, set: values });
  }

  async all(): Promise<SyncState[]> {
    const rows = await this.db.select().from(schema.syncState);
    return rows.map(rowToSyncState);
  }
}

function rowToSyncState(row: typeof schema.syncState.$inferSelect): SyncState {
  return {
    source: row.source,
    lastSyncAt: row.lastSyncAt.toISOString(),
    lastStatus: row.lastStatus,
    consecutiveFailures: row.consecutiveFailures,
    lastError: row.lastError ?? undefined,
  };
}

// ── JSON file store (default when no database is configured) ─────

const fileSchema = z.array(
  z.object({
    source: z.string(),
    lastSyncAt: z.string(),
    lastStatus: z.enum(["ok", "partial", "error"]),
    consecutiveFailures: z.number().int().nonnegative(),
    lastError: z.string().optional(),
  }),
);

export class JsonSyncStateStore implements SyncStateStore {
  private states = new Map<string, SyncState>();

  constructor(private filePath: string) {
    this.load();
  }

  private load(): void {
    if (!existsSync(this.filePath)) return;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      log.warn("sync_state.unreadable", { path: this.filePath, error: errorMessage(err) });
      return;
    }
    const parsed = fileSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn("sync_state.unreadable", { path: this.filePath, error: parsed.error.issues[0]?.message });
      return;
    }
    for (const s of parsed.data) {
      this.states.set(s.source, s);
    }
  }

  private persist(): void {
    const dir = dirname(this.filePath);
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
    const tmp = this.filePath + ".tmp";
    writeFileSync(tmp, JSON.stringify([...this.states.values()], null, 2));
    renameSync(tmp, this.filePath);
  }

  async get(source: string): Promise<SyncState | null> {
    return this.states.get(source) ?? null;
  }

  async save(state: SyncState): Promise<void> {
    this.states.set(state.source, state);
    this.persist();
  }

  async all(): Promise<SyncState[]> {
    return [...this.states.values()];
  }
}

export class InMemorySyncStateStore implements SyncStateStore {
  private states = new Map<string, SyncState>();

  async get(source: string): Promise<SyncState | null> {
    return this.states.get(source) ?? null;
  }

  async save(state: SyncState): Promise<void> {
    this.states.set(state.source, { ...state });
  }

  async all(): Promise<SyncState[]> {
    return [...this.states.values()];
  }
}
