import { z } from 'zod';
import {
  NoRevisionFoundError,
  UpstreamForbiddenError,
  UpstreamRejectedError,
  UpstreamUnavailableError,
} from '../lib/errors.js';
import {
  RevisionLookup,
  RevisionLookupRequest,
  RevisionLookupResult,
} from '../types/wiki-asof.types.js';
import { HttpResponse, WikiHttpService } from './wiki-http.service.js';

const MediaWikiErrorSchema = z.object({
  code: z.string(),
  info: z.string().optional(),
});

const RevisionQueryResponseSchema = z.object({
  error: MediaWikiErrorSchema.optional(),
  query: z
    .object({
      pages: z
        .array(
          z.object({
            title: z.string().optional(),
            missing: z.boolean().optional(),
            invalid: z.boolean().optional(),
            revisions: z
              .array(
                z.object({
                  revid: z.number().int(),
                  timestamp: z.string(),
                })
              )
              .optional(),
          })
        )
        .optional(),
    })
    .optional(),
});

const EnforcerResponseSchema = z.object({
  title: z.string(),
  rev_id: z.coerce.number().int().positive(),
  rev_time: z.string(),
  oldid_url: z.string().optional(),
});

/** MediaWiki reports lag back-off inside a 200 body; that one is transient. */
const TRANSIENT_API_ERRORS = new Set(['maxlag', 'readonly', 'internal_api_error_DBQueryError']);

function checkStatus(response: HttpResponse): void {
  if (response.status === 403) {
    throw new UpstreamForbiddenError(WikiHttpService.upstreamDetail(response.text));
  }
  if (!response.ok) {
    throw new UpstreamUnavailableError(
      `Revision lookup failed with HTTP ${response.status}: ${WikiHttpService.upstreamDetail(response.text) ?? 'no body'}`,
      { status: response.status }
    );
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: HttpResponse): T {
  const parsed = schema.safeParse(WikiHttpService.parseJson(response.text));
  if (!parsed.success) {
    throw new UpstreamUnavailableError(`Unexpected revision lookup response from ${new URL(response.url).host}`, {
      status: response.status,
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export interface MediaWikiRevisionLookupOptions {
  apiUrl: string;
  revisionFloor: string;
  maxLagSeconds: number;
}

/**
 * Asks the MediaWiki action API for the newest revision at or before the
 * bound, walking backwards no further than the configured floor.
 */
export class MediaWikiRevisionLookup implements RevisionLookup {
  constructor(
    private readonly http: WikiHttpService,
    private readonly options: MediaWikiRevisionLookupOptions
  ) {}

  async lookup({ title, upperBoundInstant }: RevisionLookupRequest): Promise<RevisionLookupResult> {
    const response = await this.http.get(this.options.apiUrl, {
      action: 'query',
      prop: 'revisions',
      titles: title,
      rvlimit: '1',
      rvdir: 'older',
      rvstart: upperBoundInstant,
      rvend: this.options.revisionFloor,
      rvprop: 'ids|timestamp',
      redirects: '1',
      format: 'json',
      formatversion: '2',
      maxlag: String(this.options.maxLagSeconds),
    });

    if (response.status === 404) {
      throw new NoRevisionFoundError(title, upperBoundInstant, { status: 404 });
    }
    checkStatus(response);

    const data = parseBody(RevisionQueryResponseSchema, response);

    if (data.error) {
      const detail = `${data.error.code}: ${data.error.info ?? 'no details'}`;
      if (TRANSIENT_API_ERRORS.has(data.error.code)) {
        throw new UpstreamUnavailableError(`Wikipedia API is temporarily unavailable (${detail})`);
      }
      throw new UpstreamRejectedError(`Wikipedia API rejected the revision query (${detail})`);
    }

    const page = data.query?.pages?.[0];
    const revision = page?.revisions?.[0];
    if (!page || page.missing || page.invalid || !revision) {
      throw new NoRevisionFoundError(title, upperBoundInstant);
    }

    return {
      revisionId: revision.revid,
      revisionTimestamp: revision.timestamp,
      canonicalTitle: page.title ?? title,
    };
  }
}

/**
 * Delegates the lookup to a standalone "oldid before" service that answers
 * `GET /wiki/oldid_before?title=&t_query=` with 403 and 404 semantics.
 */
export class EnforcerRevisionLookup implements RevisionLookup {
  constructor(
    private readonly http: WikiHttpService,
    private readonly baseUrl: string
  ) {}

  async lookup({ title, upperBoundInstant }: RevisionLookupRequest): Promise<RevisionLookupResult> {
    const endpoint = new URL('wiki/oldid_before', this.baseUrl.endsWith('/') ? this.baseUrl : `${this.baseUrl}/`);
    const response = await this.http.get(endpoint.toString(), {
      title,
      t_query: upperBoundInstant,
    });

    if (response.status === 404) {
      throw new NoRevisionFoundError(title, upperBoundInstant, { status: 404 });
    }
    checkStatus(response);

    const data = parseBody(EnforcerResponseSchema, response);
    return {
      revisionId: data.rev_id,
      revisionTimestamp: data.rev_time,
      canonicalTitle: data.title,
    };
  }
}
