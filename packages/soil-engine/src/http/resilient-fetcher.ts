import { describeError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";

export type JsonObject = Record<string, unknown>;
export type QueryValue = string | number | boolean | readonly (string | number)[] | undefined;

export interface FetchRequest {
  endpoint: string;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  /**
   * Overrides the fetcher's default per-attempt timeout.
   */
  timeoutMs?: number;
  /**
   * Query parameter names whose values are masked in logs and reported URLs.
   */
  sensitiveParams?: readonly string[];
}

export interface FetchContext {
  /**
   * Request URL with sensitive parameters masked.
   */
  url: string;
  /**
   * ISO timestamp of the final attempt.
   */
  fetchedAt: string;
  attempts: number;
  /**
   * Message of the last failed attempt when the call did not succeed.
   */
  error?: string;
}

/**
 * Outcome of one logical call. On failure `payload` is always `{}`.
 */
export interface FetchResult {
  payload: JsonObject;
  ok: boolean;
  context: FetchContext;
}

export interface ResilientFetcherOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  now?: () => Date;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 2_000;
export const DEFAULT_TIMEOUT_MS = 30_000;

const REDACTED = "***";

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export class ResilientFetcher {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly timeoutMs: number;
  private readonly userAgent?: string;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ResilientFetcherOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent;
    this.fetchImpl = options.fetchImpl ?? globalFetch();
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Issues a GET with up to `maxRetries` attempts and linear backoff between
   * them. Resolves with `ok: false` instead of rejecting.
   */
  async fetch(request: FetchRequest): Promise<FetchResult> {
    let url: URL;
    try {
      url = buildUrl(request.endpoint, request.query);
    } catch (error) {
      return {
        payload: {},
        ok: false,
        context: {
          url: request.endpoint,
          fetchedAt: this.now().toISOString(),
          attempts: 0,
          error: describeError(error)
        }
      };
    }

    const reportedUrl = redactUrl(url, request.sensitiveParams ?? []);
    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    const headers: Record<string, string> = {
      Accept: "application/json",
      ...(this.userAgent ? { "User-Agent": this.userAgent } : {}),
      ...request.headers
    };

    let lastError = "";
    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      try {
        const payload = await this.attempt(url.toString(), headers, timeoutMs);
        return {
          payload,
          ok: true,
          context: { url: reportedUrl, fetchedAt: this.now().toISOString(), attempts: attempt }
        };
      } catch (error) {
        lastError = describeError(error);
        this.logger.warn(
          { url: reportedUrl, attempt, maxRetries: this.maxRetries, err: lastError },
          "Source request failed"
        );
        if (attempt < this.maxRetries) {
          await this.sleep(this.baseDelayMs * attempt);
        }
      }
    }

    return {
      payload: {},
      ok: false,
      context: {
        url: reportedUrl,
        fetchedAt: this.now().toISOString(),
        attempts: this.maxRetries,
        error: lastError
      }
    };
  }

  private async attempt(url: string, headers: Record<string, string>, timeoutMs: number): Promise<JsonObject> {
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers,
        signal: controller.signal
      });
      if (!response.ok) {
        throw new Error(`Request failed (${response.status} ${response.statusText})`);
      }
      const body: unknown = await response.json();
      if (!isJsonObject(body)) {
        throw new Error("Response body is not a JSON object");
      }
      return body;
    } catch (error) {
      if (controller.signal.aborted && controller.signal.reason instanceof Error) {
        throw controller.signal.reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}

export const createResilientFetcher = (options?: ResilientFetcherOptions): ResilientFetcher =>
  new ResilientFetcher(options);

function buildUrl(endpoint: string, query: Record<string, QueryValue> = {}): URL {
  const url = new URL(endpoint);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) {
        url.searchParams.append(key, String(item));
      }
    } else {
      url.searchParams.set(key, String(value));
    }
  }
  return url;
}

function redactUrl(url: URL, sensitiveParams: readonly string[]): string {
  if (sensitiveParams.length === 0) {
    return url.toString();
  }
  const copy = new URL(url.toString());
  for (const name of sensitiveParams) {
    if (copy.searchParams.has(name)) {
      copy.searchParams.set(name, REDACTED);
    }
  }
  return copy.toString();
}

function globalFetch(): typeof fetch {
  if (typeof fetch === "function") {
    return fetch.bind(globalThis);
  }
  throw new Error("fetch is not available in the current environment");
}
