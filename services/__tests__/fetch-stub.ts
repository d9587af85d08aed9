import { Headers, Response } from 'node-fetch';
import { AsOfError } from '../../lib/errors.js';
import type { FetchFn } from '../wiki-http.service.js';

export interface RecordedRequest {
  url: URL;
  headers: Headers;
}

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

export const textResponse = (body: string, status: number): Response =>
  new Response(body, { status, headers: { 'content-type': 'text/plain' } });

/** Replays the given responses in order and records every request. */
export function stubFetch(...responses: Array<Response | Error>) {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    requests.push({ url: new URL(String(input)), headers: new Headers(init?.headers) });
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${String(input)}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { fetchFn, requests };
}

export async function captureError(promise: Promise<unknown>): Promise<AsOfError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AsOfError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected the promise to reject');
}
