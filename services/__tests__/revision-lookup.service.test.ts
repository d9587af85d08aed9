import { describe, expect, it } from 'vitest';
import { EnforcerRevisionLookup, MediaWikiRevisionLookup } from '../revision-lookup.service.js';
import { WikiHttpService } from '../wiki-http.service.js';
import { captureError, jsonResponse, stubFetch, textResponse } from './fetch-stub.js';
import type { Response } from 'node-fetch';

const API_URL = 'https://en.wikipedia.org/w/api.php';

const mediaWikiLookup = (...responses: Array<Response | Error>) => {
  const stub = stubFetch(...responses);
  const http = new WikiHttpService({ userAgent: 'wiki-asof-test/1.0', timeoutMs: 1000, fetchFn: stub.fetchFn });
  const lookup = new MediaWikiRevisionLookup(http, {
    apiUrl: API_URL,
    revisionFloor: '2001-01-01T00:00:00Z',
    maxLagSeconds: 5,
  });
  return { lookup, requests: stub.requests };
};

describe('MediaWikiRevisionLookup', () => {
  it('queries the newest revision older than the bound and follows redirects', async () => {
    const { lookup, requests } = mediaWikiLookup(
      jsonResponse({
        batchcomplete: true,
        query: {
          redirects: [{ from: 'Global warming', to: 'Climate change' }],
          pages: [
            {
              pageid: 5042951,
              ns: 0,
              title: 'Climate change',
              revisions: [{ revid: 933000001, parentid: 932999000, timestamp: '2019-12-31T22:10:05Z' }],
            },
          ],
        },
      })
    );

    const result = await lookup.lookup({ title: 'Global warming', upperBoundInstant: '2020-01-01T23:59:59Z' });

    expect(result).toEqual({
      revisionId: 933000001,
      revisionTimestamp: '2019-12-31T22:10:05Z',
      canonicalTitle: 'Climate change',
    });

    const params = requests[0].url.searchParams;
    expect(`${requests[0].url.origin}${requests[0].url.pathname}`).toBe(API_URL);
    expect(params.get('action')).toBe('query');
    expect(params.get('prop')).toBe('revisions');
    expect(params.get('titles')).toBe('Global warming');
    expect(params.get('rvlimit')).toBe('1');
    expect(params.get('rvdir')).toBe('older');
    expect(params.get('rvstart')).toBe('2020-01-01T23:59:59Z');
    expect(params.get('rvend')).toBe('2001-01-01T00:00:00Z');
    expect(params.get('rvprop')).toBe('ids|timestamp');
    expect(params.get('redirects')).toBe('1');
    expect(params.get('formatversion')).toBe('2');
    expect(params.get('maxlag')).toBe('5');
  });

  it('reports missing pages as NoRevisionFound', async () => {
    const { lookup } = mediaWikiLookup(
      jsonResponse({ query: { pages: [{ ns: 0, title: 'Nonexistent page xyz', missing: true }] } })
    );

    const error = await captureError(
      lookup.lookup({ title: 'Nonexistent page xyz', upperBoundInstant: '2020-01-01T23:59:59Z' })
    );

    expect(error.code).toBe('NoRevisionFound');
    expect(error.message).toBe("No revision for 'Nonexistent page xyz' at or before 2020-01-01T23:59:59Z.");
  });

  it('reports pages created after the bound as NoRevisionFound', async () => {
    const { lookup } = mediaWikiLookup(jsonResponse({ query: { pages: [{ pageid: 1, ns: 0, title: 'Young page' }] } }));

    const error = await captureError(lookup.lookup({ title: 'Young page', upperBoundInstant: '2005-06-01T23:59:59Z' }));

    expect(error.code).toBe('NoRevisionFound');
  });

  it('surfaces the upstream reason for 403 responses', async () => {
    const { lookup } = mediaWikiLookup(
      textResponse('Please set a user-agent and respect our robot policy', 403)
    );

    const error = await captureError(lookup.lookup({ title: 'Climate change', upperBoundInstant: '2020-01-01T23:59:59Z' }));

    expect(error.code).toBe('UpstreamForbidden');
    expect(error.status).toBe(403);
    expect(error.message).toBe('Upstream refused the request: Please set a user-agent and respect our robot policy');
    expect(error.retryable).toBe(false);
  });

  it('treats other non-2xx statuses as UpstreamUnavailable', async () => {
    const { lookup } = mediaWikiLookup(textResponse('upstream connect error', 503));

    const error = await captureError(lookup.lookup({ title: 'Climate change', upperBoundInstant: '2020-01-01T23:59:59Z' }));

    expect(error.code).toBe('UpstreamUnavailable');
    expect(error.status).toBe(503);
    expect(error.message).toBe('Revision lookup failed with HTTP 503: upstream connect error');
  });

  it('treats a malformed instant rejected by the API as UpstreamRejected', async () => {
    const { lookup } = mediaWikiLookup(
      jsonResponse({ error: { code: 'badtimestamp', info: 'Invalid value "yesterday" for timestamp parameter "rvstart".' } })
    );

    const error = await captureError(lookup.lookup({ title: 'Climate change', upperBoundInstant: 'yesterdayZ' }));

    expect(error.code).toBe('UpstreamRejected');
    expect(error.message).toBe(
      'Wikipedia API rejected the revision query (badtimestamp: Invalid value "yesterday" for timestamp parameter "rvstart".)'
    );
  });

  it('treats replication lag back-off as UpstreamUnavailable', async () => {
    const { lookup } = mediaWikiLookup(jsonResponse({ error: { code: 'maxlag', info: 'Waiting for a database server: 7 seconds lagged.' } }));

    const error = await captureError(lookup.lookup({ title: 'Climate change', upperBoundInstant: '2020-01-01T23:59:59Z' }));

    expect(error.code).toBe('UpstreamUnavailable');
  });

  it('treats an unreadable body as UpstreamUnavailable', async () => {
    const { lookup } = mediaWikiLookup(textResponse('<html>maintenance</html>', 200));

    const error = await captureError(lookup.lookup({ title: 'Climate change', upperBoundInstant: '2020-01-01T23:59:59Z' }));

    expect(error.code).toBe('UpstreamUnavailable');
    expect(error.message).toBe('Unexpected revision lookup response from en.wikipedia.org');
  });
});

describe('EnforcerRevisionLookup', () => {
  const enforcerLookup = (...responses: Array<Response | Error>) => {
    const stub = stubFetch(...responses);
    const http = new WikiHttpService({ userAgent: 'wiki-asof-test/1.0', timeoutMs: 1000, fetchFn: stub.fetchFn });
    return { lookup: new EnforcerRevisionLookup(http, 'http://127.0.0.1:8008'), requests: stub.requests };
  };

  it('reads the oldid_before answer', async () => {
    const { lookup, requests } = enforcerLookup(
      jsonResponse({
        title: 'Climate change',
        rev_id: 933000001,
        rev_time: '2019-12-31T22:10:05Z',
        oldid_url: 'https://en.wikipedia.org/w/index.php?oldid=933000001',
      })
    );

    const result = await lookup.lookup({ title: 'Climate change', upperBoundInstant: '2020-01-01T23:59:59Z' });

    expect(result).toEqual({
      revisionId: 933000001,
      revisionTimestamp: '2019-12-31T22:10:05Z',
      canonicalTitle: 'Climate change',
    });
    expect(requests[0].url.pathname).toBe('/wiki/oldid_before');
    expect(requests[0].url.searchParams.get('title')).toBe('Climate change');
    expect(requests[0].url.searchParams.get('t_query')).toBe('2020-01-01T23:59:59Z');
  });

  it('maps 404 to NoRevisionFound', async () => {
    const { lookup } = enforcerLookup(jsonResponse({ detail: "No revision for 'Sandbox' ≤ 2001-02-01" }, 404));

    const error = await captureError(lookup.lookup({ title: 'Sandbox', upperBoundInstant: '2001-02-01T23:59:59Z' }));

    expect(error.code).toBe('NoRevisionFound');
    expect(error.status).toBe(404);
  });

  it('maps 403 to UpstreamForbidden with the service detail', async () => {
    const { lookup } = enforcerLookup(jsonResponse({ detail: 'Forbidden. Use a descriptive User-Agent.' }, 403));

    const error = await captureError(lookup.lookup({ title: 'Sandbox', upperBoundInstant: '2020-01-01T23:59:59Z' }));

    expect(error.code).toBe('UpstreamForbidden');
    expect(error.message).toBe('Upstream refused the request: Forbidden. Use a descriptive User-Agent.');
  });
});
