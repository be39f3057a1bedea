// ---------------------------------------------------------------------------
// JSON-over-HTTP transport shared by the user source and every backend
//
// - Injectable FetchFn so tests never touch the network
// - Non-2xx answers and unparseable bodies become BackendApiError
// - Every request is optionally written to the audit log
// - Per-request timeout; there is no retry layer
// ---------------------------------------------------------------------------

import type { z } from 'zod';
import type { AuditLog } from './audit';
import { BackendApiError, describeError } from './errors';
import type { Logger } from './logger';

/**
 * Injectable fetch function.  In production this is globalThis.fetch; in
 * tests it is replaced with a mock.
 */
export type FetchFn = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
}

export interface HttpClientOptions {
  /** Name used in errors, logs and audit rows. */
  backend: string;
  baseUrl: string;
  /** Produces the Authorization header value; called before each request. */
  authorize: () => Promise<string>;
  headers?: Record<string, string>;
  fetchFn?: FetchFn;
  timeoutMs?: number;
  audit?: AuditLog;
  logger: Logger;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class HttpClient {
  private readonly fetchFn: FetchFn;
  private readonly baseUrl: string;

  constructor(private readonly options: HttpClientOptions) {
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  get backend(): string {
    return this.options.backend;
  }

  /** GET and validate the JSON body. */
  async get<T>(
    path: string,
    schema: ResponseSchema<T>,
    query?: Record<string, QueryValue>,
  ): Promise<T> {
    return this.requestJson('GET', path, schema, { query });
  }

  /** Send a request and validate the JSON body of the answer. */
  async requestJson<T>(
    method: string,
    path: string,
    schema: ResponseSchema<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    const { status, text } = await this.execute(method, path, options, async (response) => ({
      status: response.status,
      text: await response.text(),
    }));

    let json: unknown;
    try {
      json = text.length > 0 ? JSON.parse(text) : null;
    } catch {
      throw new BackendApiError(
        this.options.backend,
        method,
        path,
        status,
        `non-JSON response: ${text.substring(0, 200)}`,
      );
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new BackendApiError(
        this.options.backend,
        method,
        path,
        status,
        `unexpected response body: ${parsed.error.message}`,
      );
    }
    return parsed.data;
  }

  /** Send a request whose answer body is irrelevant (201/204 mutations). */
  async send(method: string, path: string, options: RequestOptions = {}): Promise<void> {
    // Drain so the connection can be reused
    await this.execute(method, path, options, (response) => response.arrayBuffer());
  }

  // ── Internals ───────────────────────────────────────────────────────────

  /**
   * Sends the request and reads the answer through `consume`.  The audit row
   * is written once the body has been read, or once the request has failed.
   */
  private async execute<T>(
    method: string,
    path: string,
    options: RequestOptions,
    consume: (response: Response) => Promise<T>,
  ): Promise<T> {
    const url = this.buildUrl(path, options.query);
    const headers = new Headers(this.options.headers);
    headers.set('Accept', 'application/json');
    headers.set('Authorization', await this.options.authorize());
    if (options.body !== undefined) headers.set('Content-Type', 'application/json');

    this.options.logger.debug({ method, url }, 'HTTP request');
    const startTime = Date.now();

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (err) {
      const detail = describeError(err);
      await this.audit(method, url, options.body, null, startTime, detail);
      throw new BackendApiError(this.options.backend, method, path, null, detail, { cause: err });
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => 'Unknown error');
      await this.audit(method, url, options.body, response.status, startTime, detail);
      throw new BackendApiError(this.options.backend, method, path, response.status, detail);
    }

    let result: T;
    try {
      result = await consume(response);
    } catch (err) {
      const detail = `reading response body failed: ${describeError(err)}`;
      await this.audit(method, url, options.body, response.status, startTime, detail);
      throw new BackendApiError(this.options.backend, method, path, response.status, detail, {
        cause: err,
      });
    }

    await this.audit(method, url, options.body, response.status, startTime);
    return result;
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private async audit(
    method: string,
    url: string,
    body: unknown,
    status: number | null,
    startTime: number,
    error?: string,
  ): Promise<void> {
    if (!this.options.audit) return;
    await this.options.audit.record({
      backend: this.options.backend,
      method,
      url,
      requestBody: body,
      responseStatus: status,
      durationMs: Date.now() - startTime,
      error,
    });
  }
}
