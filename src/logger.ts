import { MdCaptureError } from "./core/errors.js";

// ── Structured logging ───────────────────────────────────────────
// JSON lines on stderr. stdout belongs to command output and, for the MCP
// server, to the stdio transport.

type Level = "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface LogRecord {
  timestamp: string;
  level: Level;
  event: string;
  [key: string]: unknown;
}

type Sink = (line: string) => void;

let sink: Sink = (line) => console.error(line);
let quiet = process.env.MDCAPTURE_LOG_LEVEL === "error";

/** Redirects log output; returns the previous sink. Used by tests. */
export function setLogSink(next: Sink): Sink {
  const prev = sink;
  sink = next;
  return prev;
}

export function setQuiet(value: boolean): void {
  quiet = value;
}

function emit(level: Level, event: string, fields: LogFields): void {
  if (quiet && level !== "error") return;
  const record: LogRecord = { timestamp: new Date().toISOString(), level, event, ...fields };
  sink(JSON.stringify(record));
}

function describeError(err: unknown): LogFields {
  if (err instanceof MdCaptureError) {
    return { type: err.name, kind: err.kind, message: err.message };
  }
  if (err instanceof Error) {
    return { type: err.name, message: err.message };
  }
  return { type: typeof err, message: String(err) };
}

export const log = {
  info(event: string, fields: LogFields = {}): void {
    emit("info", event, fields);
  },

  warn(event: string, fields: LogFields = {}): void {
    emit("warn", event, fields);
  },

  error(context: string, err: unknown, fields: LogFields = {}): void {
    emit("error", context, { ...fields, error: describeError(err) });
  },
};
