import { AppConfig } from '../config/config.js';
import { Logger, silentLogger } from '../obs/logger.js';
import { ContentFetcher, MediaWikiContentSource } from '../services/content-fetcher.service.js';
import { EnforcerRevisionLookup, MediaWikiRevisionLookup } from '../services/revision-lookup.service.js';
import { RevisionResolver } from '../services/revision-resolver.service.js';
import { FetchFn, WikiHttpService } from '../services/wiki-http.service.js';
import {
  AsOfResult,
  ContentFormat,
  ContentSource,
  RevisionLookup,
  ToolResult,
} from '../types/wiki-asof.types.js';
import { ReferenceUtils } from '../utils/reference.utils.js';
import { TimestampUtils } from '../utils/timestamp.utils.js';
import { describeError, isAsOfError, MissingTimestampError } from './errors.js';
import { assembleResult, Resolution, serializeResult } from './result-assembler.js';

export const TOOL_NAME = 'wikipedia_read_asof';

export interface AsOfReaderDeps {
  revisionLookup: RevisionLookup;
  contentSource: ContentSource;
  logger?: Logger;
  clock?: () => Date;
}

export interface ReadOptions {
  format?: ContentFormat;
}

/**
 * Resolve-then-fetch pipeline. Holds no per-request state, so one instance
 * serves concurrent calls.
 */
export class AsOfReader {
  private readonly resolver: RevisionResolver;
  private readonly fetcher: ContentFetcher;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(
    private readonly config: AppConfig,
    deps: AsOfReaderDeps
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.clock = deps.clock ?? (() => new Date());
    this.resolver = new RevisionResolver(deps.revisionLookup, config.wiki.permalinkBase, this.logger);
    this.fetcher = new ContentFetcher(
      deps.contentSource,
      {
        maxTextChars: config.content.maxTextChars,
        truncationMarker: config.content.truncationMarker,
      },
      this.logger
    );
  }

  /** Wires the MediaWiki-backed capabilities described by `config`. */
  static fromConfig(config: AppConfig, logger: Logger = silentLogger, fetchFn?: FetchFn): AsOfReader {
    const http = new WikiHttpService({
      userAgent: config.wiki.userAgent,
      timeoutMs: config.http.timeoutMs,
      fetchFn,
    });

    const enforcerBaseUrl = config.revisionLookup.enforcerBaseUrl;
    const revisionLookup: RevisionLookup = enforcerBaseUrl
      ? new EnforcerRevisionLookup(http, enforcerBaseUrl)
      : new MediaWikiRevisionLookup(http, {
          apiUrl: config.wiki.apiUrl,
          revisionFloor: config.wiki.revisionFloor,
          maxLagSeconds: config.wiki.maxLagSeconds,
        });

    return new AsOfReader(config, {
      revisionLookup,
      contentSource: new MediaWikiContentSource(http, config.wiki.apiUrl),
      logger,
    });
  }

  /** Throws `AsOfError` subclasses on failure. */
  async read(queryOrUrl: string, asOfTimestamp?: string | null, options: ReadOptions = {}): Promise<AsOfResult> {
    const format = options.format ?? this.config.content.defaultFormat;
    const reference = ReferenceUtils.parse(queryOrUrl);
    const rawTimestamp = asOfTimestamp?.trim() ? asOfTimestamp : null;

    let resolution: Resolution;

    if (reference.pinnedRevisionId !== null) {
      resolution = {
        kind: 'pinned',
        revisionId: reference.pinnedRevisionId,
        permalink: this.resolver.permalinkFor(reference.pinnedRevisionId),
      };
    } else if (reference.title !== null) {
      if (rawTimestamp === null && this.config.asOf.requireTimestamp) {
        throw new MissingTimestampError();
      }
      const query = TimestampUtils.normalize(rawTimestamp, this.clock());
      const revision = await this.resolver.resolve(reference.title, query.normalizedInstant);
      resolution = { kind: 'temporal', query, revision };
    } else {
      // ReferenceUtils.parse never yields an empty reference; keep the union exhaustive.
      throw new Error(`Unusable reference for "${queryOrUrl}"`);
    }

    const revisionId = resolution.kind === 'pinned' ? resolution.revisionId : resolution.revision.revisionId;
    const fetched = await this.fetcher.fetch(revisionId, format);

    return assembleResult({
      queryOrUrl,
      asOfTimestamp: rawTimestamp,
      reference,
      resolution,
      contentTitle: fetched.title,
      content: fetched.payload,
    });
  }

  /** Tool boundary: never throws, always answers `{ output, error }`. */
  async readAsOf(queryOrUrl: string, asOfTimestamp?: string | null, options: ReadOptions = {}): Promise<ToolResult> {
    try {
      const result = await this.read(queryOrUrl, asOfTimestamp, options);
      return { output: serializeResult(result), error: null };
    } catch (error) {
      this.logger.warn('As-of read failed', {
        query_or_url: queryOrUrl,
        t_query: asOfTimestamp ?? null,
        code: isAsOfError(error) ? error.code : 'Unexpected',
        status: isAsOfError(error) ? error.status ?? null : null,
        error: error instanceof Error ? error.message : String(error),
      });
      return { output: null, error: `${TOOL_NAME} error: ${describeError(error)}` };
    }
  }
}
