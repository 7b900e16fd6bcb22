import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { CaptureService } from "../core/capture-service.js";
import type { BatchOptions } from "../core/fetch-dispatcher.js";
import { errorMessage } from "../core/errors.js";
import { NOTE_STATES, PLATFORMS } from "../core/types.js";
import type { SyncStateStore } from "../stores/sync-state-store.js";
import {
  renderNote,
  renderNoteList,
  renderPlatforms,
  renderReindexResults,
  renderSummary,
  renderSyncReports,
  renderSyncStates,
} from "./render.js";

function text(body: string) {
  return { content: [{ type: "text" as const, text: body }] };
}

function failure(err: unknown) {
  return text(`Error: ${errorMessage(err)}`);
}

export function registerTools(
  server: McpServer,
  service: CaptureService,
  syncStates: SyncStateStore,
  batch: BatchOptions = {},
): void {
  // ── capture_reference ─────────────────────────────────────────

  server.tool(
    "capture_reference",
    "File one or more links or ids (YouTube, GitHub owner/repo, Reddit, HN, Steam, podcasts, any web page) as notes. Returns their canonical ids.",
    {
      references: z.array(z.string()).min(1).describe("URLs or platform ids, e.g. 'https://youtu.be/…', 'gh:owner/repo', 'hn:123'"),
      tags: z.array(z.string()).optional().describe("Tags for the new notes (default 'inbox')"),
      hints: z.record(z.string(), z.string()).optional().describe("Capture-time facts, e.g. {title, channel} for podcast episodes"),
      parse: z.boolean().optional().describe("Fetch metadata right away (default false)"),
    },
    async (params) => {
      try {
        const result = await service.capture(params.references, {
          tags: params.tags,
          hints: params.hints,
          parse: params.parse,
          ...batch,
        });
        const parts = [`Captured: ${result.canonicalIds.join(", ") || "(nothing)"}`, renderSummary(result.summary)];
        if (result.parseSummary) parts.push(`Parse: ${renderSummary(result.parseSummary)}`);
        return text(parts.join("\n"));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── parse_notes ───────────────────────────────────────────────

  server.tool(
    "parse_notes",
    "Fetch metadata for notes. With no ids, every bare note is parsed.",
    {
      canonical_ids: z.array(z.string()).optional().describe("Notes to parse; omit for all bare notes"),
      refresh: z.boolean().optional().describe("Also refresh notes that are already parsed"),
    },
    async (params) => {
      try {
        const summary = await service.parse({ canonicalIds: params.canonical_ids, refresh: params.refresh }, batch);
        return text(renderSummary(summary));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── sync_inbox ────────────────────────────────────────────────

  server.tool(
    "sync_inbox",
    "Pull unprocessed entries from the configured inbox sources (wallabag, freshrss) into notes.",
    {
      source: z.string().optional().describe("Source name, or 'all' (default)"),
    },
    async (params) => {
      try {
        const reports = await service.sync(params.source ?? "all", batch);
        const states = await syncStates.all();
        return text(`${renderSyncReports(reports)}\n\n${renderSyncStates(states)}`);
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── cache_note ────────────────────────────────────────────────

  server.tool(
    "cache_note",
    "Download the media of parsed video or podcast notes into the media library, then renumber their series.",
    {
      canonical_ids: z.array(z.string()).optional().describe("Notes to cache"),
      requested: z.boolean().optional().describe("Cache every parsed note that asked for it"),
    },
    async (params) => {
      try {
        const summary = await service.cache({ canonicalIds: params.canonical_ids, requested: params.requested }, batch);
        return text(renderSummary(summary));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── reindex_series ────────────────────────────────────────────

  server.tool(
    "reindex_series",
    "Recompute season/episode numbers for a series of cached episodes (all series when omitted).",
    {
      series_key: z.string().optional().describe("e.g. 'youtube:UC…' or 'podcast:show-slug'"),
    },
    async (params) => {
      try {
        return text(renderReindexResults(await service.reindex(params.series_key)));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── retry_note ────────────────────────────────────────────────

  server.tool(
    "retry_note",
    "Send failed (or cached) notes back to bare so they can be parsed again.",
    {
      canonical_ids: z.array(z.string()).min(1).describe("Notes to reset"),
    },
    async (params) => {
      try {
        return text(renderSummary(await service.retry(params.canonical_ids)));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── list_notes ────────────────────────────────────────────────

  server.tool(
    "list_notes",
    "List notes, optionally filtered by state, platform, tag or series.",
    {
      states: z.array(z.enum(NOTE_STATES)).optional().describe("Lifecycle states to include"),
      platforms: z.array(z.enum(PLATFORMS)).optional().describe("Platforms to include"),
      tags: z.array(z.string()).optional().describe("Match notes carrying any of these tags"),
      series_key: z.string().optional().describe("Only notes of this series"),
      limit: z.number().int().min(1).max(500).optional().describe("Max notes to return (default 100)"),
    },
    async (params) => {
      try {
        const notes = await service.list({
          states: params.states,
          platforms: params.platforms,
          tags: params.tags,
          seriesKey: params.series_key,
        });
        return text(renderNoteList(notes.slice(0, params.limit ?? 100)));
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── get_note ──────────────────────────────────────────────────

  server.tool(
    "get_note",
    "Show one note with its metadata, media and failure details.",
    {
      canonical_id: z.string().describe("Canonical id, e.g. 'youtube:dQw4w9WgXcQ'"),
    },
    async (params) => {
      try {
        const note = await service.get(params.canonical_id);
        return text(note ? renderNote(note) : `No note ${params.canonical_id}.`);
      } catch (err) {
        return failure(err);
      }
    },
  );

  // ── list_platforms ────────────────────────────────────────────

  server.tool("list_platforms", "List the platforms references can be classified into.", {}, async () =>
    text(renderPlatforms(service.platforms())),
  );
}
