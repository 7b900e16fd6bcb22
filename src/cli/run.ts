import { parseArgs } from "node:util";
import type { CaptureService } from "../core/capture-service.js";
import { errorMessage } from "../core/errors.js";
import {
  isNoteState,
  isPlatform,
  type BatchSummary,
  type MediaPlayer,
  type NoteState,
  type Platform,
} from "../core/types.js";
import {
  renderNote,
  renderNoteList,
  renderPlatforms,
  renderReindexResults,
  renderSummary,
  renderSyncReports,
} from "../mcp/render.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: mdcapture <command> [options]

Commands:
  capture <ref...> [--tag t]... [--hint k=v]... [--parse]
  parse [canonicalId...] [--all]
  sync <source|all>
  cache <canonicalId...> | cache --requested
  reindex [seriesKey]
  retry <canonicalId...>
  list [--state s]... [--platform p]... [--tag t]... [--series key]
  show <canonicalId>
  play <canonicalId>
  platforms`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export interface CliContext {
  service: CaptureService;
  out: (line: string) => void;
  err: (line: string) => void;
  /** Stops notes from starting. */
  signal?: AbortSignal;
  /** Aborts notes in progress. */
  abort?: AbortSignal;
  concurrency?: number;
  player?: MediaPlayer;
}

const OPTIONS = {
  tag: { type: "string", short: "t", multiple: true },
  hint: { type: "string", multiple: true },
  parse: { type: "boolean" },
  all: { type: "boolean" },
  requested: { type: "boolean" },
  state: { type: "string", multiple: true },
  platform: { type: "string", multiple: true },
  series: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

export function parseHints(pairs: string[] = []): Record<string, string> {
  const hints: Record<string, string> = {};
  for (const pair of pairs) {
    const at = pair.indexOf("=");
    if (at <= 0) throw new UsageError(`--hint expects key=value, got ${JSON.stringify(pair)}`);
    hints[pair.slice(0, at).trim()] = pair.slice(at + 1);
  }
  return hints;
}

function statesFrom(values: string[] = []): NoteState[] {
  return values.map((v) => {
    if (!isNoteState(v)) throw new UsageError(`Unknown state: ${v}`);
    return v;
  });
}

function platformsFrom(values: string[] = []): Platform[] {
  return values.map((v) => {
    if (!isPlatform(v)) throw new UsageError(`Unknown platform: ${v}`);
    return v;
  });
}

function summaryExit(summary: BatchSummary): number {
  return summary.failed > 0 || (summary.seriesFailures?.length ?? 0) > 0 ? EXIT_FAILED : EXIT_OK;
}

function parseCommandLine(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

/** Runs one command and returns the process exit code. */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err) {
    ctx.err(err instanceof Error ? err.message : String(err));
    ctx.err(USAGE);
    return EXIT_USAGE;
  }

  const { values, positionals } = parsed;
  const [command, ...args] = positionals;
  if (values.help) {
    ctx.out(USAGE);
    return EXIT_OK;
  }
  if (!command) {
    ctx.err(USAGE);
    return EXIT_USAGE;
  }

  const batch = { signal: ctx.signal, abort: ctx.abort, concurrency: ctx.concurrency };
  try {
    switch (command) {
      case "capture": {
        if (args.length === 0) throw new UsageError("capture needs at least one reference");
        const result = await ctx.service.capture(args, {
          ...batch,
          tags: values.tag,
          hints: parseHints(values.hint),
          parse: values.parse,
        });
        for (const id of result.canonicalIds) ctx.out(id);
        ctx.out(renderSummary(result.summary));
        if (result.parseSummary) {
          ctx.out(`parse: ${renderSummary(result.parseSummary)}`);
          return Math.max(summaryExit(result.summary), summaryExit(result.parseSummary));
        }
        return summaryExit(result.summary);
      }

      case "parse": {
        const summary = await ctx.service.parse({ canonicalIds: args, refresh: values.all }, batch);
        ctx.out(renderSummary(summary));
        return summaryExit(summary);
      }

      case "sync": {
        const [source, ...rest] = args;
        if (!source || rest.length > 0) {
          const known = ctx.service.inboxSources().join("|");
          throw new UsageError(`sync takes one source: ${known ? `${known}|` : ""}all`);
        }
        const reports = await ctx.service.sync(source, batch);
        ctx.out(renderSyncReports(reports));
        return reports.some((r) => r.status === "error" || r.status === "partial") ? EXIT_FAILED : EXIT_OK;
      }

      case "cache": {
        if (args.length === 0 && !values.requested) {
          throw new UsageError("cache needs canonical ids or --requested");
        }
        const summary = await ctx.service.cache({ canonicalIds: args, requested: values.requested }, batch);
        ctx.out(renderSummary(summary));
        return summaryExit(summary);
      }

      case "reindex": {
        if (args.length > 1) throw new UsageError("reindex takes at most one series key");
        const results = await ctx.service.reindex(args[0]);
        ctx.out(renderReindexResults(results));
        return results.some((r) => r.error) ? EXIT_FAILED : EXIT_OK;
      }

      case "retry": {
        if (args.length === 0) throw new UsageError("retry needs at least one canonical id");
        const summary = await ctx.service.retry(args);
        ctx.out(renderSummary(summary));
        return summaryExit(summary);
      }

      case "list": {
        const notes = await ctx.service.list({
          states: statesFrom(values.state),
          platforms: platformsFrom(values.platform),
          tags: values.tag,
          seriesKey: values.series,
        });
        ctx.out(renderNoteList(notes));
        return EXIT_OK;
      }

      case "show": {
        if (args.length !== 1) throw new UsageError("show takes one canonical id");
        const note = await ctx.service.get(args[0]);
        if (!note) {
          ctx.err(`No note ${args[0]}`);
          return EXIT_FAILED;
        }
        ctx.out(renderNote(note));
        return EXIT_OK;
      }

      case "play": {
        if (args.length !== 1) throw new UsageError("play takes one canonical id");
        if (!ctx.player) throw new Error("No media player configured");
        const target = await ctx.service.playTarget(args[0]);
        if (!target) {
          ctx.err(`No note ${args[0]}`);
          return EXIT_FAILED;
        }
        await ctx.player.open(target);
        ctx.out(`Playing ${target.canonicalId}: ${target.location}${target.cached ? "" : " (streaming)"}`);
        return EXIT_OK;
      }

      case "platforms":
        ctx.out(renderPlatforms(ctx.service.platforms()));
        return EXIT_OK;

      default:
        throw new UsageError(`Unknown command: ${command}`);
    }
  } catch (err) {
    if (err instanceof UsageError) {
      ctx.err(err.message);
      ctx.err(USAGE);
      return EXIT_USAGE;
    }
    ctx.err(`Error: ${errorMessage(err)}`);
    return EXIT_FAILED;
  }
}
