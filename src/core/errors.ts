// ── Error taxonomy ───────────────────────────────────────────────

export type ClassificationErrorKind = "InvalidReference";
export type FetchErrorKind = "NotFound" | "AuthFailure" | "NetworkError" | "RateLimited";
export type CacheErrorKind = "DownloadFailed" | "Unsupported";
export type ReindexErrorKind = "InconsistentSeriesData";

export abstract class MdCaptureError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ClassificationError extends MdCaptureError {
  constructor(
    readonly kind: ClassificationErrorKind,
    readonly reference: string,
  ) {
    super(`Cannot classify reference: ${JSON.stringify(reference)}`);
  }
}

export class FetchError extends MdCaptureError {
  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class CacheError extends MdCaptureError {
  constructor(
    readonly kind: CacheErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ReindexError extends MdCaptureError {
  constructor(
    readonly kind: ReindexErrorKind,
    readonly seriesKey: string,
    message: string,
  ) {
    super(`Series ${seriesKey}: ${message}`);
  }
}

export class LifecycleError extends MdCaptureError {
  readonly kind = "IllegalTransition";
}

export class NoteFormatError extends MdCaptureError {
  readonly kind = "InvalidDocument";
}

// ── Helpers ──────────────────────────────────────────────────────

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Anything a fetcher throws that is not a FetchError (timeouts, DNS, parse errors) is a network failure. */
export function toFetchError(err: unknown): FetchError {
  if (err instanceof FetchError) return err;
  return new FetchError("NetworkError", errorMessage(err), { cause: err });
}

export function toCacheError(err: unknown): CacheError {
  if (err instanceof CacheError) return err;
  return new CacheError("DownloadFailed", errorMessage(err), { cause: err });
}

export function failureOf(err: unknown): { kind: string; message: string } {
  if (err instanceof MdCaptureError) return { kind: err.kind, message: err.message };
  return { kind: "Unexpected", message: errorMessage(err) };
}

/** Maps an HTTP status to the fetch failure it stands for. */
export function fetchErrorForStatus(status: number, what: string, detail = ""): FetchError {
  const suffix = detail ? `: ${detail}` : "";
  if (status === 404 || status === 410) return new FetchError("NotFound", `${what} ${status}${suffix}`);
  if (status === 401 || status === 403) return new FetchError("AuthFailure", `${what} ${status}${suffix}`);
  if (status === 429) return new FetchError("RateLimited", `${what} ${status}${suffix}`);
  return new FetchError("NetworkError", `${what} ${status}${suffix}`);
}
