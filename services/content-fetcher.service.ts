import { z } from 'zod';
import { ContentFetchFailedError } from '../lib/errors.js';
import { Logger, silentLogger } from '../obs/logger.js';
import {
  ContentFormat,
  ContentPayload,
  ContentSource,
  RevisionContent,
  SectionRef,
} from '../types/wiki-asof.types.js';
import { HtmlUtils } from '../utils/html.utils.js';
import { WikiHttpService } from './wiki-http.service.js';

const ParseResponseSchema = z.object({
  error: z
    .object({
      code: z.string(),
      info: z.string().optional(),
    })
    .optional(),
  parse: z
    .object({
      title: z.string().optional(),
      text: z.string().optional(),
      sections: z
        .array(
          z.object({
            index: z.union([z.string(), z.number()]).transform(String),
            level: z.union([z.string(), z.number()]).transform(String),
            line: z.string(),
            anchor: z.string(),
            byteoffset: z.number().nullable().optional(),
          })
        )
        .optional(),
    })
    .optional(),
});

/**
 * Fetches rendered markup for one exact revision through `action=parse`.
 */
export class MediaWikiContentSource implements ContentSource {
  constructor(
    private readonly http: WikiHttpService,
    private readonly apiUrl: string
  ) {}

  async fetchRevision(revisionId: number, format: ContentFormat): Promise<RevisionContent> {
    const response = await this.http.get(this.apiUrl, {
      action: 'parse',
      oldid: String(revisionId),
      prop: format === 'html' ? 'text|sections' : 'text',
      format: 'json',
      formatversion: '2',
    });

    if (!response.ok) {
      throw new ContentFetchFailedError(
        revisionId,
        `HTTP ${response.status}: ${WikiHttpService.upstreamDetail(response.text) ?? 'no body'}`,
        { status: response.status }
      );
    }

    const parsed = ParseResponseSchema.safeParse(WikiHttpService.parseJson(response.text));
    if (!parsed.success) {
      throw new ContentFetchFailedError(revisionId, 'unexpected response shape', {
        status: response.status,
        cause: parsed.error,
      });
    }

    const { error, parse } = parsed.data;
    if (error) {
      throw new ContentFetchFailedError(revisionId, `${error.code}: ${error.info ?? 'no details'}`, {
        status: response.status,
      });
    }
    if (!parse) {
      throw new ContentFetchFailedError(revisionId, 'response carried no parse output', { status: response.status });
    }

    const sections: SectionRef[] = (parse.sections ?? []).map((section) => ({
      index: section.index,
      level: section.level,
      line: section.line,
      anchor: section.anchor,
      byteOffset: section.byteoffset ?? null,
    }));

    return {
      title: parse.title ?? null,
      html: parse.text ?? '',
      sections,
    };
  }
}

export interface ContentFetcherOptions {
  maxTextChars: number;
  truncationMarker: string;
}

export interface FetchedContent {
  title: string | null;
  payload: ContentPayload;
}

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;

export class ContentFetcher {
  constructor(
    private readonly source: ContentSource,
    private readonly options: ContentFetcherOptions,
    private readonly logger: Logger = silentLogger
  ) {}

  async fetch(revisionId: number, format: ContentFormat): Promise<FetchedContent> {
    const content = await this.source.fetchRevision(revisionId, format);

    if (format === 'html') {
      return {
        title: content.title,
        payload: {
          format,
          body: content.html,
          truncated: false,
          sections: content.sections,
          originalChars: content.html.length,
          extractChars: content.html.length,
        },
      };
    }

    const text = HtmlUtils.toPlainText(content.html);
    const payload = ContentFetcher.truncate(text, this.options);

    if (payload.truncated) {
      this.logger.info('Truncated plain-text extract', {
        rev_id: revisionId,
        original_chars: payload.originalChars,
        extract_chars: payload.extractChars,
        max_chars: this.options.maxTextChars,
      });
    }

    return { title: content.title, payload };
  }

  /** Cuts `text` at the budget and appends the marker when it is over. */
  static truncate(text: string, options: ContentFetcherOptions): ContentPayload {
    const truncated = text.length > options.maxTextChars;
    let cut = options.maxTextChars;
    // Never end the extract on the high half of a surrogate pair.
    if (truncated && isHighSurrogate(text.charCodeAt(cut - 1))) {
      cut -= 1;
    }
    const body = truncated ? text.slice(0, cut) + options.truncationMarker : text;

    return {
      format: 'text',
      body,
      truncated,
      sections: [],
      originalChars: text.length,
      extractChars: body.length,
    };
  }
}
