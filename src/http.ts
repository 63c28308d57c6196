/**
 * @module http
 *
 * Thin request wrapper over the Node.js built-in `fetch` (Node 18+).
 *
 * Adds default headers (including a `user-agent` identifying the client),
 * JSON body serialization and a per-request timeout via `AbortController`.
 * Requests are issued once; there is no retry.
 */

import { TilesetsError } from './errors.js';
import { VERSION } from './version.js';

/**
 * Configuration options for {@link HttpClient}.
 */
export interface HttpClientOptions {
  /**
   * Default headers sent with every request.
   */
  headers?: Record<string, string>;
  /**
   * Per-request timeout in milliseconds. A request that does not complete
   * within this window is aborted.
   *
   * @defaultValue 30000
   */
  timeout?: number;
  /**
   * Value of the `user-agent` header.
   *
   * @defaultValue `tileset-client/<version>`
   */
  userAgent?: string;
}

/** Methods that accept a multipart body. */
export type UploadMethod = 'POST' | 'PUT';

interface RequestOptions {
  body?: string | FormData;
  headers?: Record<string, string>;
}

/**
 * HTTP client for the tiling service.
 *
 * Every method resolves with the raw `Response`, whatever its status; use
 * {@link expectStatus} to turn unexpected statuses into errors.
 *
 * @example
 * ```typescript
 * const http = new HttpClient({ timeout: 15_000 });
 * const response = await http.get(urls.sourceList());
 * await expectStatus(response, 200);
 * ```
 */
export class HttpClient {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;

  constructor(options?: HttpClientOptions) {
    this.timeout = options?.timeout ?? 30_000;
    this.headers = {
      'user-agent': options?.userAgent ?? `tileset-client/${VERSION}`,
      ...options?.headers,
    };
  }

  get(url: string): Promise<Response> {
    return this.request('GET', url);
  }

  /** POST, with a JSON body when `body` is given. */
  post(url: string, body?: unknown): Promise<Response> {
    return this.request('POST', url, jsonBody(body));
  }

  /** PATCH, with a JSON body when `body` is given. */
  patch(url: string, body?: unknown): Promise<Response> {
    return this.request('PATCH', url, jsonBody(body));
  }

  put(url: string, body: unknown): Promise<Response> {
    return this.request('PUT', url, jsonBody(body));
  }

  delete(url: string): Promise<Response> {
    return this.request('DELETE', url);
  }

  /**
   * Send a multipart form. `fetch` writes the `content-type` boundary.
   */
  upload(url: string, form: FormData, method: UploadMethod = 'POST'): Promise<Response> {
    return this.request(method, url, { body: form });
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private async request(method: string, url: string, options: RequestOptions = {}): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await fetch(url, {
        method,
        headers: { ...this.headers, ...options.headers },
        body: options.body,
        signal: controller.signal,
      });
    } catch (err) {
      throw new TilesetsError(`${method} ${redactToken(url)} failed`, { cause: err });
    } finally {
      clearTimeout(timer);
    }
  }
}

function jsonBody(body: unknown): RequestOptions {
  if (body === undefined || body === null) return {};
  return {
    body: JSON.stringify(body),
    headers: { 'content-type': 'application/json' },
  };
}

/** Replace the `access_token` query value so URLs can be logged. */
export function redactToken(url: string): string {
  return url.replace(/access_token=[^&]*/, 'access_token=REDACTED');
}

/**
 * Resolve when `response.status` is one of `statuses`.
 *
 * @throws {TilesetsError} Carrying the response body as message and the
 *   status code, otherwise.
 */
export async function expectStatus(response: Response, ...statuses: number[]): Promise<void> {
  if (statuses.includes(response.status)) return;
  const text = await response.text();
  throw new TilesetsError(text || `Unexpected HTTP ${response.status}`, { status: response.status });
}
