/**
 * Render bridge: out-of-process headless browser behind a narrow port
 *
 * The pipeline depends only on `Renderer`. `RenderBridge` adds challenge
 * detection, retry/backoff and side-channel parsing on top of a
 * `RenderProcess`, which is the only piece that touches a real subprocess.
 */

import { CHALLENGE_MARKERS, NETWORK_ERROR_PATTERNS, RENDER_CONSTANTS } from "../constants";
import { AppConfig } from "../config/app-config";
import {
  ChallengeDetectedError,
  ConfigurationError,
  MalformedSourceError,
  type PipelineError,
  TransientNetworkError,
} from "../errors";
import type { JsonValue } from "../json/value";
import { Logger } from "../utils/logger";
import { DEFAULT_BACKOFF, exponentialBackoffMs, sleep, type BackoffOptions } from "../utils/retry";
import { extractSideChannel, stripSideChannel } from "./side-channel";

export interface RenderRequest {
  url: string;
  /** Selector or text the worker waits for before dumping the DOM. */
  waitHint?: string;
  timeoutMs?: number;
  /** Click through variant controls and report per-variant data out of band. */
  interactions?: boolean;
}

export interface RenderedPage {
  url: string;
  html: string;
  /** Parsed stderr blocks; authoritative for every non-default variant. */
  sideChannel: Record<string, JsonValue>;
  attempts: number;
}

export type RenderResult =
  | { ok: true; page: RenderedPage }
  | { ok: false; error: PipelineError; attempts: number };

/** The port the rest of the pipeline consumes. */
export interface Renderer {
  render(request: RenderRequest): Promise<RenderResult>;
}

export interface ProcessOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface ProcessArgs {
  url: string;
  waitHint: string;
  timeoutMs: number;
  interactions: boolean;
}

/** Runs the worker once. Rejects only with ConfigurationError. */
export interface RenderProcess {
  run(args: ProcessArgs): Promise<ProcessOutput>;
}

export function detectChallenge(html: string): string | null {
  for (const marker of CHALLENGE_MARKERS) {
    if (html.includes(marker)) return marker;
  }
  return null;
}

export function isNetworkFailure(stderr: string): boolean {
  return NETWORK_ERROR_PATTERNS.some((p) => stderr.includes(p));
}

export interface RenderBridgeOptions {
  maxAttempts?: number;
  timeoutMs?: number;
  backoff?: BackoffOptions;
  networkFloorMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class RenderBridge implements Renderer {
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly backoff: BackoffOptions;
  private readonly networkFloorMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly worker: RenderProcess,
    options: RenderBridgeOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? AppConfig.MAX_RETRIES);
    this.timeoutMs = options.timeoutMs ?? AppConfig.RENDER_TIMEOUT_MS;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.networkFloorMs = options.networkFloorMs ?? RENDER_CONSTANTS.NETWORK_ERROR_FLOOR_MS;
    this.sleep = options.sleep ?? sleep;
  }

  /** Rendered HTML only. */
  async renderHtml(url: string, waitHint?: string, timeoutMs?: number): Promise<RenderResult> {
    return this.render({ url, waitHint, timeoutMs });
  }

  /** Rendered HTML plus the side-channel blocks of an interactive run. */
  async renderWithInteractions(url: string, timeoutMs?: number): Promise<RenderResult> {
    return this.render({ url, timeoutMs, interactions: true });
  }

  /**
   * Renders one URL. Configuration problems are thrown; everything else is
   * retried up to the attempt ceiling and then returned as `ok: false`.
   */
  async render(request: RenderRequest): Promise<RenderResult> {
    const args: ProcessArgs = {
      url: request.url,
      waitHint: request.waitHint ?? "",
      timeoutMs: request.timeoutMs ?? this.timeoutMs,
      interactions: request.interactions ?? false,
    };

    let lastError: PipelineError = new TransientNetworkError(`render not attempted: ${request.url}`);

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const output = await this.worker.run(args);
      const outcome = this.evaluate(request.url, output, attempt);
      if (outcome.ok) return outcome;

      lastError = outcome.error;
      if (attempt === this.maxAttempts) break;

      const waitMs = this.waitFor(attempt, outcome.error, output);
      Logger.warn(`Render attempt ${attempt} failed, retrying`, {
        url: request.url,
        attempt,
        waitMs,
        error: outcome.error.message,
      });
      await this.sleep(waitMs);
    }

    return { ok: false, error: lastError, attempts: this.maxAttempts };
  }

  private waitFor(attempt: number, error: PipelineError, output: ProcessOutput): number {
    const standard = exponentialBackoffMs(attempt, this.backoff);
    if (error instanceof ChallengeDetectedError) return standard * 2;
    if (error instanceof TransientNetworkError && isNetworkFailure(output.stderr)) {
      return Math.max(standard, this.networkFloorMs);
    }
    return standard;
  }

  private evaluate(
    url: string,
    output: ProcessOutput,
    attempt: number,
  ): RenderResult {
    if (output.timedOut) {
      return fail(new TransientNetworkError(`render timed out: ${url}`), attempt);
    }
    if (output.exitCode !== 0) {
      const detail = stripSideChannel(output.stderr).slice(0, 500);
      return fail(
        new TransientNetworkError(`render exited with code ${output.exitCode}: ${detail}`),
        attempt,
      );
    }
    const html = output.stdout;
    if (!html.trim()) {
      return fail(new MalformedSourceError(`render returned empty HTML: ${url}`, "html"), attempt);
    }
    const marker = detectChallenge(html);
    if (marker) {
      return fail(new ChallengeDetectedError(`bot challenge detected: ${url}`, marker), attempt);
    }
    return {
      ok: true,
      page: { url, html, sideChannel: extractSideChannel(output.stderr), attempts: attempt },
    };
  }
}

function fail(error: PipelineError, attempts: number): RenderResult {
  return { ok: false, error, attempts };
}

/** Renderer used when no render command is configured. */
export class UnconfiguredRenderer implements Renderer {
  async render(request: RenderRequest): Promise<RenderResult> {
    throw new ConfigurationError(
      `RENDER_COMMAND is not set but ${request.url} requires the render bridge`,
    );
  }
}
