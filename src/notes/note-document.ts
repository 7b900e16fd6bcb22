import { NoteFormatError } from "../core/errors.js";
import {
  isNoteState,
  isPlatform,
  type FailureStage,
  type MetadataValue,
  type Note,
  type NoteMetadata,
  type RawHeaderEntry,
} from "../core/types.js";

// ---------------------------------------------------------------------------
// Note document: a `---` delimited header of key/value lines, then the body.
//
// The header is the YAML subset the notes use (plain or double-quoted
// scalars, block lists, one level of nested mapping). Keys this module does
// not own are carried as their exact source lines and written back
// untouched, after the owned keys.
// ---------------------------------------------------------------------------

const FENCE = "---";

const OWNED_KEYS = [
  "canonical_id",
  "platform",
  "state",
  "tags",
  "title",
  "author",
  "published_at",
  "source_url",
  "metadata_tags",
  "extra",
  "hints",
  "series_key",
  "season_number",
  "episode_number",
  "media_path",
  "media_duration",
  "media_format",
  "failure_stage",
  "failure_kind",
  "failure_message",
  "failed_at",
  "captured_at",
  "updated_at",
] as const;

type OwnedKey = (typeof OWNED_KEYS)[number];

function isOwnedKey(key: string): key is OwnedKey {
  return (OWNED_KEYS as readonly string[]).includes(key);
}

// ---------------------------------------------------------------------------
// Scalars
// ---------------------------------------------------------------------------

type Scalar = string | number | boolean | null;

// plain scalars that a reader would take as something other than a string
const AMBIGUOUS = /^(?:true|false|yes|no|on|off|null|~|[-+]?\d+(?:\.\d+)?(?:e[-+]?\d+)?|0x[0-9a-f]+|\.inf|\.nan)$/i;
const PLAIN_START = /^[^\s\-?:,[\]{}#&*!|>'"%@`]/;

export function formatScalar(value: string | number | boolean): string {
  if (typeof value !== "string") return String(value);
  const plain =
    value.length > 0 &&
    PLAIN_START.test(value) &&
    !AMBIGUOUS.test(value) &&
    !value.includes(": ") &&
    !value.includes(" #") &&
    !/[\n\r\t]/.test(value) &&
    !/[\s:]$/.test(value);
  return plain ? value : JSON.stringify(value);
}

export function parseScalar(text: string): Scalar {
  const value = text.trim();
  if (value.startsWith('"')) {
    try {
      const parsed: unknown = JSON.parse(value);
      if (typeof parsed === "string") return parsed;
    } catch {
      throw new NoteFormatError(`Malformed quoted string: ${value}`);
    }
  }
  if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) {
    return value.slice(1, -1).replace(/''/g, "'");
  }
  if (value === "" || value === "~" || value === "null") return null;
  if (/^(true|false)$/i.test(value)) return value.toLowerCase() === "true";
  if (/^[-+]?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

function parseFlowList(text: string): Scalar[] | null {
  const value = text.trim();
  if (!value.startsWith("[") || !value.endsWith("]")) return null;
  const inner = value.slice(1, -1).trim();
  if (!inner) return [];
  return inner.split(",").map((part) => parseScalar(part));
}

// ---------------------------------------------------------------------------
// Header entries
// ---------------------------------------------------------------------------

interface HeaderEntry {
  key: string;
  /** Text after `key:` on the first line. */
  inline: string;
  /** Indented (or `- `) lines that follow. */
  children: string[];
  raw: string;
}

const KEY_LINE = /^([A-Za-z_][\w.-]*)\s*:(?:\s(.*)|)$/;

function isContinuation(line: string): boolean {
  return line === "" || /^\s/.test(line) || line.startsWith("- ") || line === "-";
}

function splitEntries(headerLines: string[]): HeaderEntry[] {
  const entries: HeaderEntry[] = [];
  for (const rawLine of headerLines) {
    const line = rawLine.replace(/\r$/, "");
    const last = entries[entries.length - 1];
    if (last && isContinuation(line)) {
      last.children.push(line);
      last.raw += `\n${rawLine}`;
      continue;
    }
    const m = KEY_LINE.exec(line);
    entries.push({
      key: m ? m[1] : "",
      inline: m ? (m[2] ?? "") : line,
      children: [],
      raw: rawLine,
    });
  }
  return entries;
}

function listItems(lines: string[]): Scalar[] {
  const items: Scalar[] = [];
  for (const line of lines) {
    if (!line.trim()) continue;
    const m = /^\s*-(?:\s+(.*))?$/.exec(line);
    if (!m) throw new NoteFormatError(`Expected a list item, got: ${line}`);
    items.push(parseScalar(m[1] ?? ""));
  }
  return items;
}

function readList(entry: HeaderEntry): Scalar[] {
  if (entry.inline.trim()) {
    const flow = parseFlowList(entry.inline);
    if (flow) return flow;
    // a single scalar where a list was expected
    return [parseScalar(entry.inline)];
  }
  return listItems(entry.children);
}

function readMap(entry: HeaderEntry): Map<string, Scalar | Scalar[]> {
  const out = new Map<string, Scalar | Scalar[]>();
  if (entry.inline.trim() && entry.inline.trim() !== "{}") {
    throw new NoteFormatError(`${entry.key}: expected a nested mapping`);
  }
  let current: { key: string; items: string[] } | null = null;
  const flush = () => {
    if (current) out.set(current.key, listItems(current.items));
    current = null;
  };
  for (const line of entry.children) {
    if (!line.trim()) continue;
    const m = /^ {2}([^\s:][^:]*?)\s*:(?:\s(.*)|)$/.exec(line);
    if (m) {
      flush();
      const rest = m[2] ?? "";
      if (rest.trim()) {
        const flow = parseFlowList(rest);
        out.set(m[1], flow ?? parseScalar(rest));
      } else {
        current = { key: m[1], items: [] };
      }
      continue;
    }
    if (current && /^\s+-/.test(line)) {
      current.items.push(line);
      continue;
    }
    throw new NoteFormatError(`${entry.key}: cannot read line ${JSON.stringify(line)}`);
  }
  flush();
  return out;
}

function scalarText(value: Scalar | Scalar[] | undefined): string | undefined {
  if (value === undefined || value === null || Array.isArray(value)) return undefined;
  return String(value);
}

function metadataValue(value: Scalar | Scalar[]): MetadataValue | undefined {
  if (Array.isArray(value)) return value.filter((v) => v !== null).map(String);
  return value === null ? undefined : value;
}

// ---------------------------------------------------------------------------
// Serialize
// ---------------------------------------------------------------------------

function pushScalar(lines: string[], key: string, value: string | number | boolean | undefined): void {
  if (value === undefined) return;
  lines.push(`${key}: ${formatScalar(value)}`);
}

function pushList(lines: string[], key: string, values: readonly string[], indent = ""): void {
  if (values.length === 0) {
    lines.push(`${indent}${key}: []`);
    return;
  }
  lines.push(`${indent}${key}:`);
  for (const v of values) lines.push(`${indent}  - ${formatScalar(v)}`);
}

function pushMap(lines: string[], key: string, map: Record<string, MetadataValue>): void {
  const keys = Object.keys(map);
  if (keys.length === 0) return;
  lines.push(`${key}:`);
  for (const k of keys) {
    const v = map[k];
    if (Array.isArray(v)) pushList(lines, k, v, "  ");
    else lines.push(`  ${k}: ${formatScalar(v)}`);
  }
}

export function serializeHeader(note: Note): string[] {
  const lines: string[] = [];
  pushScalar(lines, "canonical_id", note.canonicalId);
  pushScalar(lines, "platform", note.platform);
  pushScalar(lines, "state", note.state);
  pushList(lines, "tags", note.tags);

  const md = note.metadata;
  if (md) {
    pushScalar(lines, "title", md.title);
    pushScalar(lines, "author", md.author);
    pushScalar(lines, "published_at", md.publishedAt);
    pushScalar(lines, "source_url", md.sourceUrl);
    if (md.tags.length > 0) pushList(lines, "metadata_tags", md.tags);
    pushMap(lines, "extra", md.extra);
  }
  pushMap(lines, "hints", note.hints);

  pushScalar(lines, "series_key", note.seriesKey);
  pushScalar(lines, "season_number", note.seasonNumber);
  pushScalar(lines, "episode_number", note.episodeNumber);

  if (note.mediaRef) {
    pushScalar(lines, "media_path", note.mediaRef.localPath);
    pushScalar(lines, "media_duration", note.mediaRef.duration);
    pushScalar(lines, "media_format", note.mediaRef.format);
  }
  if (note.failure) {
    pushScalar(lines, "failure_stage", note.failure.stage);
    pushScalar(lines, "failure_kind", note.failure.kind);
    pushScalar(lines, "failure_message", note.failure.message);
    pushScalar(lines, "failed_at", note.failure.at);
  }

  pushScalar(lines, "captured_at", note.capturedAt);
  pushScalar(lines, "updated_at", note.updatedAt);

  for (const entry of note.extraHeader) lines.push(entry.raw);
  return lines;
}

export function serializeNote(note: Note): string {
  return `${FENCE}\n${serializeHeader(note).join("\n")}\n${FENCE}\n${note.body}`;
}

// ---------------------------------------------------------------------------
// Parse
// ---------------------------------------------------------------------------

function requireString(fields: Map<OwnedKey, HeaderEntry>, key: OwnedKey): string {
  const entry = fields.get(key);
  const value = entry ? scalarText(parseScalar(entry.inline)) : undefined;
  if (!value) throw new NoteFormatError(`Missing ${key}`);
  return value;
}

function optionalString(fields: Map<OwnedKey, HeaderEntry>, key: OwnedKey): string | undefined {
  const entry = fields.get(key);
  return entry ? scalarText(parseScalar(entry.inline)) : undefined;
}

function optionalNumber(fields: Map<OwnedKey, HeaderEntry>, key: OwnedKey, integer: boolean): number | undefined {
  const entry = fields.get(key);
  if (!entry) return undefined;
  const value = parseScalar(entry.inline);
  if (value === null) return undefined;
  if (typeof value !== "number" || (integer && !Number.isInteger(value))) {
    throw new NoteFormatError(`${key} must be ${integer ? "an integer" : "a number"}, got ${entry.inline}`);
  }
  return value;
}

function stringList(fields: Map<OwnedKey, HeaderEntry>, key: OwnedKey): string[] {
  const entry = fields.get(key);
  if (!entry) return [];
  return readList(entry)
    .filter((v) => v !== null)
    .map(String);
}

/**
 * Splits a document into header lines and body; `null` when there is no header.
 * Header lines keep a trailing `\r` so unknown entries re-emit with their own
 * terminator. The body is normalized to `\n`.
 */
export function splitDocument(text: string): { header: string[]; body: string } | null {
  const lines = text.split("\n");
  const isFence = (line: string): boolean => line.replace(/\r$/, "") === FENCE;
  if (lines.length < 2 || !isFence(lines[0])) return null;
  const close = lines.findIndex((line, i) => i > 0 && isFence(line));
  if (close === -1) return null;
  return {
    header: lines.slice(1, close),
    body: lines.slice(close + 1).join("\n").replace(/\r\n/g, "\n"),
  };
}

export function parseNoteDocument(text: string): Note {
  const doc = splitDocument(text);
  if (!doc) throw new NoteFormatError("Document has no --- header");

  const fields = new Map<OwnedKey, HeaderEntry>();
  const extraHeader: RawHeaderEntry[] = [];
  for (const entry of splitEntries(doc.header)) {
    if (isOwnedKey(entry.key) && !fields.has(entry.key)) fields.set(entry.key, entry);
    else extraHeader.push({ key: entry.key, raw: entry.raw });
  }

  const canonicalId = requireString(fields, "canonical_id");
  const platform = requireString(fields, "platform");
  const state = requireString(fields, "state");
  if (!isPlatform(platform)) throw new NoteFormatError(`${canonicalId}: unknown platform ${platform}`);
  if (!isNoteState(state)) throw new NoteFormatError(`${canonicalId}: unknown state ${state}`);

  let metadata: NoteMetadata | undefined;
  const title = optionalString(fields, "title");
  if (title !== undefined) {
    const extra: Record<string, MetadataValue> = {};
    const extraEntry = fields.get("extra");
    if (extraEntry) {
      for (const [k, v] of readMap(extraEntry)) {
        const value = metadataValue(v);
        if (value !== undefined) extra[k] = value;
      }
    }
    metadata = {
      title,
      author: optionalString(fields, "author"),
      publishedAt: optionalString(fields, "published_at"),
      sourceUrl: optionalString(fields, "source_url"),
      tags: stringList(fields, "metadata_tags"),
      extra,
    };
  }

  const hints: Record<string, string> = {};
  const hintsEntry = fields.get("hints");
  if (hintsEntry) {
    for (const [k, v] of readMap(hintsEntry)) {
      const value = scalarText(v);
      if (value !== undefined) hints[k] = value;
    }
  }

  const mediaPath = optionalString(fields, "media_path");
  const failureKind = optionalString(fields, "failure_kind");
  const failureStage = optionalString(fields, "failure_stage");
  const updatedAt = optionalString(fields, "updated_at");
  const capturedAt = optionalString(fields, "captured_at") ?? updatedAt ?? "";

  return {
    canonicalId,
    platform,
    state,
    tags: stringList(fields, "tags"),
    hints,
    metadata,
    mediaRef: mediaPath
      ? {
          localPath: mediaPath,
          duration: optionalNumber(fields, "media_duration", false),
          format: optionalString(fields, "media_format") ?? "",
        }
      : undefined,
    seriesKey: optionalString(fields, "series_key"),
    seasonNumber: optionalNumber(fields, "season_number", true),
    episodeNumber: optionalNumber(fields, "episode_number", true),
    failure: failureKind
      ? {
          stage: toStage(failureStage),
          kind: failureKind,
          message: optionalString(fields, "failure_message") ?? "",
          at: optionalString(fields, "failed_at") ?? "",
        }
      : undefined,
    body: doc.body,
    extraHeader,
    capturedAt,
    updatedAt: updatedAt ?? capturedAt,
  };
}

function toStage(value: string | undefined): FailureStage {
  return value === "cache" || value === "classify" ? value : "fetch";
}
