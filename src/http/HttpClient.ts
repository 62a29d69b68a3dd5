/**
 * HTTP client shared by the discovery service and the updaters
 * Fixed per-request timeout and default headers (client identification)
 */
import { HttpRequestError } from '../core/errors.js';
import { APP_NAME, APP_VERSION } from '../core/version.js';

export type FetchFn = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetchFn?: FetchFn;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
}

export class HttpClient {
  readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly fetchFn: FetchFn;

  constructor(options: HttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.headers = { ...options.headers };
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
  }

  /**
   * Issue a GET request. Rejects with HttpRequestError on transport failure;
   * any HTTP status, success or not, resolves.
   */
  async get(url: string | URL, options: HttpRequestOptions = {}): Promise<Response> {
    const target = url.toString();

    try {
      return await this.fetchFn(target, {
        method: 'GET',
        headers: { ...this.headers, ...options.headers },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === 'TimeoutError';
      const reason = timedOut ? `timed out after ${this.timeoutMs}ms` : error instanceof Error ? error.message : String(error);
      throw new HttpRequestError(`GET ${redactUrl(target)} failed: ${reason}`, redactUrl(target), timedOut, { cause: error });
    }
  }
}

/**
 * Client identification sent to providers:
 * `<name>/<platform>-<arch>-v<version> <contact>`
 */
export function buildUserAgent(contactEmail?: string): string {
  const agent = `${APP_NAME}/${process.platform}-${process.arch}-v${APP_VERSION}`;
  return contactEmail ? `${agent} ${contactEmail}` : agent;
}

export function basicAuthorization(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, 'utf-8').toString('base64')}`;
}

function redactUrl(url: string): string {
  return url.replace(/\/\/[^/@]*@/, '//');
}
