import fetch, { RequestInit } from 'node-fetch';
import { UpstreamUnavailableError } from '../lib/errors.js';

export type FetchFn = typeof fetch;

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  text: string;
}

export interface WikiHttpOptions {
  userAgent: string;
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export class WikiHttpService {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: WikiHttpOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Issues one GET and returns the raw status and body. Only transport
   * failures and timeouts throw; status handling is left to the caller.
   */
  async get(baseUrl: string, params: Record<string, string>): Promise<HttpResponse> {
    const url = new URL(baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const init: RequestInit = {
        method: 'GET',
        headers: {
          'User-Agent': this.options.userAgent,
          'Api-User-Agent': this.options.userAgent,
          'Accept': 'application/json',
        },
        signal: controller.signal,
        follow: 5,
      };

      const response = await this.fetchFn(url.toString(), init);
      const text = await response.text();

      return {
        url: url.toString(),
        status: response.status,
        ok: response.ok,
        text,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new UpstreamUnavailableError(
          `Request to ${url.host} timed out after ${this.options.timeoutMs}ms`,
          { cause: error }
        );
      }
      throw new UpstreamUnavailableError(
        `Request to ${url.host} failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  static parseJson(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch {
      return null;
    }
  }

  /**
   * Pulls the human-readable reason out of an error body: FastAPI `detail`,
   * MediaWiki `error.info`, a generic `message`, or the trimmed text itself.
   */
  static upstreamDetail(text: string): string | null {
    const body = WikiHttpService.parseJson(text);
    if (body && typeof body === 'object') {
      if ('detail' in body && typeof body.detail === 'string') {
        return body.detail;
      }
      if ('error' in body && body.error && typeof body.error === 'object' && 'info' in body.error && typeof body.error.info === 'string') {
        return body.error.info;
      }
      if ('message' in body && typeof body.message === 'string') {
        return body.message;
      }
    }
    const trimmed = text.trim();
    return trimmed ? trimmed : null;
  }
}
