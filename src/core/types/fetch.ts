/**
 * Fetch-related types
 */

export interface FetchResult {
  readonly url: string;
  /** URL after redirects; null when no response was received. */
  readonly finalUrl: string | null;
  readonly statusCode: number | null;
  readonly body: string | null;
  readonly contentType: string | null;
  readonly error: string | null;
  readonly attempts: number;
}

export interface HttpRequest {
  url: string;
  method: "GET" | "POST";
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  url: string;
  body: string;
  contentType: string | null;
  retryAfterSeconds: number | null;
}

/** Raw transport; throws on network-level failure, resolves for any status. */
export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export const isSuccess = (r: FetchResult): r is FetchResult & { body: string } =>
  r.error === null && r.body !== null;
