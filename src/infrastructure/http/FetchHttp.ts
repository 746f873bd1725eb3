import type { Http, Request, Response } from "../../ports/Http";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";
import type { RunnerStatus } from "../../shared/job/RunnerStatus";
import { retry } from "../../shared/retry/retry";

export const DEFAULT_HTTP_CONNECTIONS = 8;

export type FetchHttpOptions = {
  maxConnections?: number;
  timeoutMs?: number;
  retries?: number;
  minRetryDelayMs?: number;
  maxRetryDelayMs?: number;
};

/**
 * Raised inside one attempt; `execute` turns the last one into a Failure.
 */
export class HttpRequestError extends Error {
  status?: number;
  statusPhrase?: string;
  isTimeout?: boolean;
  isBodyError?: boolean;
  retryDelayMs?: number;
  requestUrl?: string;

  constructor(message: string, fields: Partial<Omit<HttpRequestError, keyof Error>> = {}) {
    super(message);
    this.name = "HttpRequestError";
    Object.assign(this, fields);
  }
}

const toRequestError = (err: unknown, requestUrl: string): HttpRequestError =>
  err instanceof HttpRequestError
    ? err
    : new HttpRequestError(err instanceof Error ? err.message : String(err), { requestUrl });

// delta-seconds only; HTTP dates and out-of-range values fall back to backoff
const parseRetryAfterMs = (value: string | null): number | undefined => {
  if (value === null || !/^\d+$/.test(value.trim())) return undefined;
  const delayMs = Number(value.trim()) * 1000;
  return Number.isSafeInteger(delayMs) ? delayMs : undefined;
};

const basicAuth = (username: string, password: string) =>
  `Basic ${Buffer.from(`${username}:${password}`, "utf8").toString("base64")}`;

/** Origin, path and query only: never the userinfo part of the URL. */
export const safeUrl = (url: URL): string => `${url.origin}${url.pathname}${url.search}`;

export const shouldRetryRequest = (err: unknown) => {
  if (!(err instanceof HttpRequestError)) return true;
  if (err.isBodyError) return false;
  if (err.isTimeout) return true;

  const status = err.status;
  if (status === 429) {
    return { retry: true, delayMs: err.retryDelayMs };
  }
  if (typeof status === "number" && status >= 400 && status < 500) return false;
  if (typeof status === "number" && status >= 500) return true;
  if (typeof status === "number") return false;
  return true;
};

/**
 * Transport on native fetch (Node 20). At most `maxConnections` requests are
 * in flight at once; 5xx, 429, timeouts and socket errors are retried.
 */
export class FetchHttp implements Http {
  private readonly limit: Limiter;
  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly minRetryDelayMs: number;
  private readonly maxRetryDelayMs: number;

  constructor(opts: FetchHttpOptions = {}) {
    this.limit = createLimiter(opts.maxConnections ?? DEFAULT_HTTP_CONNECTIONS);
    this.timeoutMs = opts.timeoutMs ?? 30000;
    this.retries = opts.retries ?? 5;
    this.minRetryDelayMs = opts.minRetryDelayMs ?? 250;
    this.maxRetryDelayMs = opts.maxRetryDelayMs ?? 5000;
  }

  async execute<T>(request: Request<T>, runnerStatus?: RunnerStatus): Promise<Response<T>> {
    const safeRequestUrl = safeUrl(request.url);

    try {
      return await retry(() => this.limit(() => this.attempt(request, safeRequestUrl)), {
        retries: this.retries,
        minDelayMs: this.minRetryDelayMs,
        maxDelayMs: this.maxRetryDelayMs,
        shouldRetry: shouldRetryRequest,
        isCancelled: () => runnerStatus?.isCancelled() ?? false,
        onRetry: ({ attempt, maxAttempts, error }) => {
          const requestError = toRequestError(error, safeRequestUrl);
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.retry",
            status: requestError.status ?? null,
            url: requestError.requestUrl ?? safeRequestUrl,
            attempt,
            maxAttempts
          }));
        },
        onGiveUp: ({ attempt, maxAttempts, error, cancelled }) => {
          const requestError = toRequestError(error, safeRequestUrl);
          // eslint-disable-next-line no-console
          console.warn(JSON.stringify({
            event: "http.give_up",
            status: requestError.status ?? null,
            url: requestError.requestUrl ?? safeRequestUrl,
            attempt,
            maxAttempts,
            cancelled
          }));
        }
      });
    } catch (err) {
      const requestError = toRequestError(err, safeRequestUrl);
      return {
        ok: false,
        status: requestError.status ?? 0,
        statusPhrase: requestError.statusPhrase ?? "",
        error: requestError
      };
    }
  }

  private async attempt<T>(request: Request<T>, safeRequestUrl: string): Promise<Response<T>> {
    const headers: Record<string, string> = { ...request.headers };
    if (request.credentials) {
      headers.authorization = basicAuth(request.credentials.username, request.credentials.password);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      const res = await fetch(request.url, { method: request.method, headers, signal: controller.signal })
        .catch((err: unknown) => {
          if (controller.signal.aborted) {
            throw new HttpRequestError(`Request timeout after ${this.timeoutMs}ms`, {
              isTimeout: true,
              requestUrl: safeRequestUrl
            });
          }
          throw new HttpRequestError(err instanceof Error ? err.message : String(err), { requestUrl: safeRequestUrl });
        });

      if (!res.ok) {
        await res.text().catch(() => "");
        const retryAfter = res.headers.get("retry-after");
        throw new HttpRequestError(`Request failed: ${res.status}`, {
          status: res.status,
          statusPhrase: res.statusText,
          requestUrl: safeRequestUrl,
          retryDelayMs: res.status === 429 ? parseRetryAfterMs(retryAfter) : undefined
        });
      }

      let body: T;
      try {
        body = await request.readBody({
          text: () => res.text(),
          bytes: async () => new Uint8Array(await res.arrayBuffer())
        });
      } catch (err) {
        throw new HttpRequestError(err instanceof Error ? err.message : String(err), {
          status: res.status,
          statusPhrase: res.statusText,
          isBodyError: true,
          requestUrl: safeRequestUrl
        });
      }
      return { ok: true, status: res.status, body };
    } finally {
      clearTimeout(timeout);
    }
  }
}
