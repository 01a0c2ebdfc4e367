/**
 * HTTP client
 *
 * Thin wrapper over fetch that:
 * - Applies a per-request timeout (AbortSignal.timeout)
 * - Maps responses to the shared error classes (429 -> RateLimitError,
 *   5xx / timeout / connection failure -> TransientNetworkError, other 4xx -> ApiError)
 * - Runs each request through a RetryPolicy
 *
 * A request that may have landed is only retried when it is idempotent.
 * POST counts as non-idempotent unless the caller says otherwise, so an
 * ambiguous create is surfaced instead of being sent twice. A 429 is always
 * retried: the provider refused it before doing any work.
 */

import {
  ApiError,
  DataError,
  RateLimitError,
  TransientNetworkError,
  isRateLimitError,
  isTransientError,
} from "./errors.js";
import { setupLogger, type Logger } from "./logger.js";
import { RetryPolicy } from "./retry.js";

export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  headers?: Record<string, string>;
  body?: string | URLSearchParams;
  query?: Record<string, QueryValue>;
  /** Override the method-based idempotency guess */
  idempotent?: boolean;
}

export interface HttpClientOptions {
  fetchFn?: FetchFn;
  retry?: RetryPolicy;
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30000;
const IDEMPOTENT_METHODS: ReadonlySet<HttpMethod> = new Set(["GET", "PUT", "DELETE"]);

/**
 * Parse a Retry-After header given in seconds.
 */
export function parseRetryAfter(value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const seconds = parseInt(value, 10);
  return isNaN(seconds) || seconds < 0 ? null : seconds;
}

export function buildUrl(url: string, query?: Record<string, QueryValue>): string {
  if (!query) {
    return url;
  }
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target.toString();
}

function requestLabel(method: HttpMethod, url: string): string {
  return `${method} ${new URL(url).pathname}`;
}

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly retry: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(options: HttpClientOptions = {}) {
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? setupLogger("http");
    this.retry = options.retry ?? new RetryPolicy({}, undefined, this.logger);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async request(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<Response> {
    return this.execute(method, url, options, async (response) => response);
  }

  /**
   * Send a request and parse its JSON body. A body that is not JSON is a
   * DataError; a body read cut short counts as a transient failure.
   */
  async requestJson(method: HttpMethod, url: string, options: RequestOptions = {}): Promise<unknown> {
    const text = await this.execute(method, url, options, async (response): Promise<string | null> =>
      response.status === 204 ? null : this.readBody(response)
    );
    if (text === null) {
      return null;
    }
    try {
      const data: unknown = JSON.parse(text);
      return data;
    } catch (error) {
      throw new DataError(`${requestLabel(method, url)} returned a non-JSON body`, { cause: error });
    }
  }

  private async execute<T>(
    method: HttpMethod,
    url: string,
    options: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const target = buildUrl(url, options.query);
    const idempotent = options.idempotent ?? IDEMPOTENT_METHODS.has(method);

    return this.retry.execute(
      requestLabel(method, target),
      async () => read(await this.send(method, target, options)),
      idempotent ? isTransientError : isRateLimitError
    );
  }

  private async readBody(response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.toTransient(error);
    }
  }

  private toTransient(error: unknown): TransientNetworkError {
    if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
      return new TransientNetworkError(`Request timed out after ${this.timeoutMs}ms`, null, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new TransientNetworkError(`Network error: ${reason}`, null, { cause: error });
  }

  private async send(method: HttpMethod, url: string, options: RequestOptions): Promise<Response> {
    this.logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: options.headers,
        body: options.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw this.toTransient(error);
    }

    if (response.status < 400) {
      return response;
    }

    const text = await this.readBody(response);
    if (response.status === 429) {
      throw new RateLimitError(parseRetryAfter(response.headers.get("Retry-After")));
    }
    if (response.status >= 500) {
      throw new TransientNetworkError(`HTTP ${response.status}: ${text}`, response.status);
    }
    throw new ApiError(response.status, text);
  }
}
