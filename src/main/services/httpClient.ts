/**
 * HTTP Fetch Layer
 *
 * Thin wrapper over axios shared by every source client. Each call carries
 * the tool's User-Agent and a per-request timeout. Transient failures
 * (429, 5xx gateway/server errors, transport errors) are retried with
 * exponential backoff plus jitter, honoring Retry-After when the server
 * sends one. Any other 4xx fails immediately.
 */

import axios from 'axios';
import { APIError } from './errors';
import type { Logger } from './logger';
import { DEFAULT_HTTP_SETTINGS } from '../../shared/types';
import type { HttpSettings } from '../../shared/types';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Binary response body with its declared content type */
export interface BinaryResponse {
  data: Buffer;
  /** Lower-cased media type without parameters, '' when absent */
  contentType: string;
}

/** Query parameters appended to a request URL */
export type QueryParams = Record<string, string | number>;

/** Options for the HTTP client */
export interface HttpClientOptions extends Partial<HttpSettings> {
  /** User-Agent sent with every request */
  userAgent?: string;
  /** Sleep implementation (injectable for tests) */
  sleep?: (ms: number) => Promise<void>;
  /** Random source in [0, 1) used for jitter (injectable for tests) */
  random?: () => number;
  logger?: Logger | null;
}

// ─── Constants ────────────────────────────────────────────────────────────────

export const DEFAULT_USER_AGENT = 'tagfill/1.0 (+https://example.invalid/tagfill)';

/** Statuses that are worth another attempt */
const TRANSIENT_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

// ─── Axios Error Detection ──────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    headers?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

/**
 * Case-insensitive header lookup over axios' header bag or a plain object.
 * Returns null when the header is missing or not a string.
 */
export function readHeader(headers: unknown, name: string): string | null {
  if (headers === null || typeof headers !== 'object') return null;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  }
  return null;
}

/**
 * Parses a Retry-After value (delta seconds or HTTP date) into milliseconds.
 * Returns null for values that are neither.
 *
 * @param now - Reference time for HTTP-date values
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null) return null;
  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (isNaN(at)) return null;
  return Math.max(0, at - now);
}

/**
 * Delay before retry number `attempt` (0-based):
 * base * factor^attempt + random * jitter, capped at maxDelayMs.
 */
export function computeBackoff(
  attempt: number,
  settings: Pick<HttpSettings, 'baseDelayMs' | 'backoffFactor' | 'jitterMs' | 'maxDelayMs'>,
  random: () => number,
): number {
  const delay =
    settings.baseDelayMs * Math.pow(settings.backoffFactor, attempt) + random() * settings.jitterMs;
  return Math.min(settings.maxDelayMs, delay);
}

/** Strips parameters from a Content-Type value: "image/jpeg; q=1" → "image/jpeg" */
export function mediaType(contentType: string | null): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

// ─── Client ───────────────────────────────────────────────────────────────────

/**
 * Shared HTTP client with bounded retries.
 *
 * Usage:
 * ```typescript
 * const http = new HttpClient({ timeoutMs: 12_000 });
 * const tracks = parseItunesResults(await http.getJson('https://itunes.apple.com/search', { term: 'x' }));
 * const art = await http.getBinary(artworkUrl);
 * ```
 */
export class HttpClient {
  private readonly settings: HttpSettings;
  private readonly userAgent: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly logger: Logger | null;

  constructor(options: HttpClientOptions = {}) {
    this.settings = {
      timeoutMs: options.timeoutMs ?? DEFAULT_HTTP_SETTINGS.timeoutMs,
      maxAttempts: Math.max(1, options.maxAttempts ?? DEFAULT_HTTP_SETTINGS.maxAttempts),
      baseDelayMs: options.baseDelayMs ?? DEFAULT_HTTP_SETTINGS.baseDelayMs,
      backoffFactor: options.backoffFactor ?? DEFAULT_HTTP_SETTINGS.backoffFactor,
      jitterMs: options.jitterMs ?? DEFAULT_HTTP_SETTINGS.jitterMs,
      maxDelayMs: options.maxDelayMs ?? DEFAULT_HTTP_SETTINGS.maxDelayMs,
    };
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? null;
  }

  /**
   * GETs a JSON document. The body is returned as parsed by axios and must be
   * validated by the caller.
   *
   * @throws APIError on a non-transient status or after the last attempt
   */
  async getJson(url: string, params?: QueryParams, headers?: Record<string, string>): Promise<unknown> {
    const response = await this.request(url, () =>
      axios.get<unknown>(url, {
        params,
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json', ...headers },
        timeout: this.settings.timeoutMs,
        responseType: 'json',
      }),
    );
    return response.data;
  }

  /**
   * GETs a binary body (artwork). Redirects are followed.
   *
   * @throws APIError on a non-transient status or after the last attempt
   */
  async getBinary(url: string): Promise<BinaryResponse> {
    const response = await this.request(url, () =>
      axios.get<ArrayBuffer>(url, {
        headers: { 'User-Agent': this.userAgent },
        timeout: this.settings.timeoutMs,
        responseType: 'arraybuffer',
        maxRedirects: 5,
      }),
    );
    return {
      data: Buffer.from(response.data),
      contentType: mediaType(readHeader(response.headers, 'content-type')),
    };
  }

  /**
   * Runs `send` until it succeeds, a non-transient failure occurs or the
   * attempt budget is spent. Never sleeps after the final attempt.
   */
  private async request<T extends { headers: unknown }>(url: string, send: () => Promise<T>): Promise<T> {
    const { maxAttempts, maxDelayMs } = this.settings;
    let lastError: APIError | null = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      let retryAfterMs: number | null = null;
      try {
        return await send();
      } catch (error: unknown) {
        if (!isAxiosLikeError(error)) {
          throw new APIError(error instanceof Error ? error.message : String(error), {
            service: url,
            cause: error instanceof Error ? error : undefined,
          });
        }

        const status = error.response?.status;
        if (status !== undefined && !TRANSIENT_STATUSES.has(status)) {
          // 404 and other client errors are final
          throw new APIError(`HTTP ${status} for ${url}`, { statusCode: status, service: url, cause: error });
        }

        lastError = new APIError(
          status !== undefined ? `HTTP ${status} for ${url}` : `Request failed for ${url}: ${error.message}`,
          { statusCode: status, service: url, cause: error },
        );
        if (status !== undefined) {
          retryAfterMs = parseRetryAfter(readHeader(error.response?.headers, 'retry-after'));
        }
      }

      if (attempt === maxAttempts - 1) break;

      const delay =
        retryAfterMs !== null
          ? Math.min(maxDelayMs, retryAfterMs)
          : computeBackoff(attempt, this.settings, this.random);
      this.logger?.debug(`Retrying in ${Math.round(delay)}ms (attempt ${attempt + 2}/${maxAttempts})`, {
        step: 'http',
        cause: lastError.message,
      });
      await this.sleep(delay);
    }

    throw new APIError(
      `Request failed after ${maxAttempts} attempts: ${lastError?.message ?? url}`,
      { statusCode: lastError?.statusCode ?? undefined, service: url, cause: lastError ?? undefined },
    );
  }
}
