// src/services/errors.ts
// Error taxonomy for the country pipeline.

export class AtlasError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AtlasError";
  }
}

/** Network, connection or non-2xx failure. */
export class TransportError extends AtlasError {
  readonly url: string;
  readonly status?: number;
  readonly aborted: boolean;

  constructor(
    message: string,
    info: { url: string; status?: number; aborted?: boolean; cause?: unknown }
  ) {
    super(message, { cause: info.cause });
    this.name = "TransportError";
    this.url = info.url;
    this.status = info.status;
    this.aborted = info.aborted ?? false;
  }
}

/** Response body is not JSON or does not match the expected shape. */
export class DecodeError extends AtlasError {
  readonly url: string;
  readonly issues: string[];

  constructor(message: string, info: { url: string; issues?: string[]; cause?: unknown }) {
    super(message, { cause: info.cause });
    this.name = "DecodeError";
    this.url = info.url;
    this.issues = info.issues ?? [];
  }
}

export type FetchFailure = TransportError | DecodeError;

export class DirectoryFetchError extends AtlasError {
  override readonly cause: FetchFailure;

  constructor(cause: FetchFailure) {
    super(`Country directory fetch failed: ${cause.message}`, { cause });
    this.name = "DirectoryFetchError";
    this.cause = cause;
  }
}

export type AggregationErrorKind = "DirectoryUnavailable";

export class AggregationError extends AtlasError {
  readonly kind: AggregationErrorKind;
  override readonly cause: DirectoryFetchError;

  constructor(kind: AggregationErrorKind, cause: DirectoryFetchError) {
    super(`${kind}: ${cause.message}`, { cause });
    this.name = "AggregationError";
    this.kind = kind;
    this.cause = cause;
  }
}

export function isFetchFailure(err: unknown): err is FetchFailure {
  return err instanceof TransportError || err instanceof DecodeError;
}

function describeFailure(err: FetchFailure): string {
  if (err instanceof TransportError) {
    if (err.aborted) return "request was cancelled";
    if (err.status !== undefined) return `HTTP ${err.status}`;
    return "network unreachable";
  }
  return err.issues.length ? `unexpected response (${err.issues[0]})` : "unexpected response";
}

/**
 * Human-readable text for a pipeline failure, derived from its cause chain.
 */
export function describeError(err: unknown): string {
  if (err instanceof AggregationError) return describeError(err.cause);
  if (err instanceof DirectoryFetchError) {
    return `country directory unavailable (${describeFailure(err.cause)})`;
  }
  if (isFetchFailure(err)) return describeFailure(err);
  if (err instanceof Error && err.message) return err.message;
  return "unknown error";
}
