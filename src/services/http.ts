// src/services/http.ts
// Centralized fetch helper: one GET, abort support, typed errors and schema decoding.

import type { ZodType, ZodTypeDef } from "zod";
import { DecodeError, TransportError } from "./errors";

export type FetchJsonOptions<T> = {
  /** Cancels the request; an aborted call rejects with an aborted TransportError. */
  signal?: AbortSignal;
  /** Extra headers to merge. */
  headers?: Record<string, string>;
  /** Schema the parsed JSON must match. */
  schema: ZodType<T, ZodTypeDef, unknown>;
};

function isAbort(err: unknown, signal?: AbortSignal) {
  return signal?.aborted === true || (err instanceof Error && err.name === "AbortError");
}

/**
 * Fetch JSON and decode it.
 * - network failure or non-2xx status -> TransportError
 * - invalid JSON or schema mismatch -> DecodeError
 */
export async function fetchJson<T>(url: string, opt: FetchJsonOptions<T>): Promise<T> {
  const { signal, headers, schema } = opt;

  let res: Response;
  try {
    res = await fetch(url, {
      method: "GET",
      headers: { Accept: "application/json", ...headers },
      signal,
    });
  } catch (err) {
    if (isAbort(err, signal)) {
      throw new TransportError("Request aborted", { url, aborted: true, cause: err });
    }
    const msg = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Network error: ${msg}`, { url, cause: err });
  }

  if (!res.ok) {
    throw new TransportError(`HTTP ${res.status}`, { url, status: res.status });
  }

  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    if (isAbort(err, signal)) {
      throw new TransportError("Request aborted", { url, aborted: true, cause: err });
    }
    throw new DecodeError("Response is not valid JSON", { url, cause: err });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.length ? i.path.join(".") : "<root>"}: ${i.message}`
    );
    throw new DecodeError(`Response does not match the expected shape`, {
      url,
      issues,
      cause: parsed.error,
    });
  }
  return parsed.data;
}
