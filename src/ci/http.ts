/**
 * Minimal JSON-over-HTTP client shared by the dispatcher transport, the
 * worker runtime and the commit observer.
 */

import { Errors, describeError } from '../core/errors';

export interface HttpResponse {
  status: number;
  body: unknown;
}

export class JsonHttpClient {
  private baseUrl: string;

  constructor(baseUrl: string, private readonly timeoutMs = 10000) {
    this.baseUrl = baseUrl.replace(/\/$/, '');
  }

  get url(): string {
    return this.baseUrl;
  }

  /**
   * Send a request and return status and parsed body. Non-2xx statuses are
   * returned, not thrown; a connection failure rejects with the network
   * error's message.
   */
  async send(method: string, path: string, body?: unknown): Promise<HttpResponse> {
    const url = `${this.baseUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new NetworkError(`${method} ${url}: ${describeError(error)}`);
    }

    const text = await response.text();
    let parsed: unknown = null;
    if (text) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = text;
      }
    }

    return { status: response.status, body: parsed };
  }

  /**
   * Like `send`, but any status >= 400 becomes a REQUEST_FAILED error
   */
  async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const response = await this.send(method, path, body);
    if (response.status >= 400) {
      const detail = typeof response.body === 'string' ? response.body : JSON.stringify(response.body);
      throw Errors.requestFailed(method, `${this.baseUrl}${path}`, response.status, detail);
    }
    return response.body;
  }
}

/**
 * The peer could not be reached at all
 */
export class NetworkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}
