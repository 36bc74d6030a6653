/**
 * Pipeline error taxonomy
 *
 * Every error raised inside the crawl/sync pipeline carries a `kind` so the
 * item boundary can decide between "count and continue" and "abort the job".
 */

export type PipelineErrorKind =
  | "transient_network"
  | "challenge_detected"
  | "malformed_source"
  | "remote_catalog"
  | "configuration";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Timeouts, DNS/TLS failures, 429 and gateway-type 5xx responses. */
export class TransientNetworkError extends PipelineError {
  readonly kind = "transient_network";

  readonly status: number | null;
  /** Server-requested wait (Retry-After), when one was sent. */
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    options: { status?: number | null; retryAfterMs?: number | null; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.status = options.status ?? null;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }
}

/** Anti-bot interstitial returned instead of the page. */
export class ChallengeDetectedError extends PipelineError {
  readonly kind = "challenge_detected";

  constructor(
    message: string,
    public readonly marker: string,
  ) {
    super(message);
  }
}

export class MalformedSourceError extends PipelineError {
  readonly kind = "malformed_source";

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/** Non-2xx answer from the downstream catalog. */
export class RemoteCatalogError extends PipelineError {
  readonly kind = "remote_catalog";

  constructor(
    message: string,
    public readonly status: number,
    public readonly body: string,
  ) {
    super(message);
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = "configuration";
}

export function isFatal(error: unknown): boolean {
  return error instanceof ConfigurationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}
