/**
 * HTTP transport on top of the global fetch
 */

import { TransientNetworkError } from "../errors";
import type { HttpRequest, HttpResponse, HttpTransport } from "../types/fetch";

const TRANSIENT_CODES = new Set([
  "ETIMEDOUT",
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

/** Certificate verification failures, retried like the codes above. */
const TLS_CODES = new Set([
  "UNABLE_TO_VERIFY_LEAF_SIGNATURE",
  "UNABLE_TO_GET_ISSUER_CERT_LOCALLY",
  "CERT_HAS_EXPIRED",
  "DEPTH_ZERO_SELF_SIGNED_CERT",
  "SELF_SIGNED_CERT_IN_CHAIN",
]);

/** Walks `cause` links looking for a Node/undici error code. */
export function errorCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null) return null;
  if ("code" in error && typeof error.code === "string") return error.code;
  if ("cause" in error) return errorCode(error.cause);
  return null;
}

/**
 * Maps a thrown fetch failure to TransientNetworkError when it is a timeout,
 * DNS, connection or TLS problem; anything else is returned unchanged.
 */
export function classifyTransportError(error: unknown, url: string): Error {
  if (error instanceof TransientNetworkError) return error;
  const err = error instanceof Error ? error : new Error(String(error));

  if (err.name === "AbortError" || err.name === "TimeoutError") {
    return new TransientNetworkError(`timeout fetching ${url}`, { cause: err });
  }
  const code = errorCode(err);
  if (code && (TRANSIENT_CODES.has(code) || TLS_CODES.has(code) || code.startsWith("ERR_TLS"))) {
    return new TransientNetworkError(`${code} fetching ${url}`, { cause: err });
  }
  return err;
}

export function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) return Math.max(0, seconds);
  const date = Date.parse(value);
  return Number.isFinite(date) ? Math.max(0, Math.ceil((date - Date.now()) / 1000)) : null;
}

async function withTimeout<T>(
  url: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await run(controller.signal);
  } catch (error) {
    throw classifyTransportError(error, url);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Default transport: follows redirects, resolves for any status code and
 * throws only on network-level failure.
 */
export const fetchTransport: HttpTransport = (request: HttpRequest): Promise<HttpResponse> =>
  withTimeout(request.url, request.timeoutMs, async (signal) => {
    const r = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      redirect: "follow",
      signal,
    });
    const body = await r.text();
    return {
      status: r.status,
      url: r.url || request.url,
      body,
      contentType: r.headers.get("content-type"),
      retryAfterSeconds: parseRetryAfter(r.headers.get("retry-after")),
    };
  });

export interface BinaryResponse {
  status: number;
  bytes: Buffer;
  contentType: string | null;
}

/** Fetches raw bytes (images, media). */
export function fetchBinary(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number,
): Promise<BinaryResponse> {
  return withTimeout(url, timeoutMs, async (signal) => {
    const r = await fetch(url, { headers, redirect: "follow", signal });
    return {
      status: r.status,
      bytes: Buffer.from(await r.arrayBuffer()),
      contentType: r.headers.get("content-type"),
    };
  });
}
