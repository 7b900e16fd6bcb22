import { describeReindex, type ReindexResult } from "../core/episode-reindexer.js";
import type { SyncReport } from "../core/sync-reconciler.js";
import type { BatchSummary, Note, PlatformDescriptor, SyncState } from "../core/types.js";

export function renderSummary(summary: BatchSummary): string {
  const lines = [`succeeded: ${summary.succeeded}, failed: ${summary.failed}, skipped: ${summary.skipped}`];
  for (const f of summary.failures) {
    lines.push(`  ✗ ${f.canonicalId}: ${f.kind}: ${f.message}`);
  }
  for (const f of summary.seriesFailures ?? []) {
    lines.push(`  ✗ series ${f.seriesKey} not renumbered: ${f.kind}: ${f.message}`);
  }
  if (summary.cancelled) lines.push("  (cancelled before all items started)");
  return lines.join("\n");
}

function noteTitle(note: Note): string {
  return note.metadata?.title ?? "(not parsed)";
}

export function renderNoteLine(note: Note): string {
  const numbering =
    note.seasonNumber !== undefined && note.episodeNumber !== undefined
      ? ` S${String(note.seasonNumber).padStart(2, "0")}E${String(note.episodeNumber).padStart(2, "0")}`
      : "";
  return `${note.canonicalId} [${note.state}]${numbering} ${noteTitle(note)}`;
}

export function renderNoteList(notes: Note[]): string {
  if (notes.length === 0) return "No notes found.";
  return notes.map(renderNoteLine).join("\n");
}

export function renderNote(note: Note): string {
  const lines = [
    `${noteTitle(note)}`,
    `  Id: ${note.canonicalId}`,
    `  Platform: ${note.platform}`,
    `  State: ${note.state}`,
    `  Tags: ${note.tags.join(", ") || "(none)"}`,
  ];
  const m = note.metadata;
  if (m?.author) lines.push(`  Author: ${m.author}`);
  if (m?.publishedAt) lines.push(`  Published: ${m.publishedAt}`);
  if (m?.sourceUrl) lines.push(`  Link: ${m.sourceUrl}`);
  if (note.seriesKey) lines.push(`  Series: ${note.seriesKey}`);
  if (note.seasonNumber !== undefined) lines.push(`  Season ${note.seasonNumber}, episode ${note.episodeNumber ?? "?"}`);
  if (note.mediaRef) lines.push(`  Media: ${note.mediaRef.localPath} (${note.mediaRef.format})`);
  if (note.failure) lines.push(`  Failed (${note.failure.stage}): ${note.failure.kind}: ${note.failure.message}`);
  if (note.body.trim()) lines.push("", note.body.trim());
  return lines.join("\n");
}

export function renderPlatforms(platforms: PlatformDescriptor[]): string {
  if (platforms.length === 0) return "No platforms registered.";
  return platforms
    .map((p) => `• ${p.displayName} [${p.platform}]${p.cacheable ? " (cacheable)" : ""}\n  ${p.description}`)
    .join("\n\n");
}

export function renderSyncReports(reports: SyncReport[]): string {
  if (reports.length === 0) return "No inbox sources configured.";
  return reports
    .map((r) => {
      const head = `${r.source}: ${r.status}${r.error ? ` (${r.error})` : ""}`;
      return `${head}\n${renderSummary(r.summary)}`;
    })
    .join("\n\n");
}

export function renderSyncStates(states: SyncState[]): string {
  if (states.length === 0) return "Never synced.";
  return states
    .map((s) => {
      const failures = s.consecutiveFailures > 0 ? `, ${s.consecutiveFailures} failures in a row` : "";
      return `• ${s.source}: ${s.lastStatus} (synced ${s.lastSyncAt}${failures})${s.lastError ? `\n  ${s.lastError}` : ""}`;
    })
    .join("\n");
}

export function renderReindexResults(results: ReindexResult[]): string {
  if (results.length === 0) return "No series with cached episodes.";
  return results.map(describeReindex).join("\n");
}
