import {
  AsOfQuery,
  AsOfResult,
  ContentPayload,
  DocumentReference,
  ResolvedRevision,
} from '../types/wiki-asof.types.js';

export type Resolution =
  | {
      kind: 'temporal';
      query: AsOfQuery;
      revision: ResolvedRevision;
    }
  | {
      kind: 'pinned';
      revisionId: number;
      permalink: string;
    };

export interface AssembleInput {
  queryOrUrl: string;
  asOfTimestamp: string | null;
  reference: DocumentReference;
  resolution: Resolution;
  /** Page title reported alongside the content; names pinned revisions. */
  contentTitle: string | null;
  content: ContentPayload;
}

/**
 * Merges the normalizer, resolver and fetcher outputs. Pure and total: every
 * failure has already surfaced by the time this runs.
 */
export function assembleResult(input: AssembleInput): AsOfResult {
  const { reference, resolution, contentTitle } = input;

  const revision: ResolvedRevision =
    resolution.kind === 'temporal'
      ? resolution.revision
      : Object.freeze({
          revisionId: resolution.revisionId,
          revisionTimestamp: null,
          canonicalTitle: contentTitle ?? reference.title ?? `oldid ${resolution.revisionId}`,
          permalink: resolution.permalink,
        });

  return Object.freeze({
    input: Object.freeze({ queryOrUrl: input.queryOrUrl, asOfTimestamp: input.asOfTimestamp }),
    provenance: resolution.kind,
    reference: Object.freeze({ ...reference }),
    query: resolution.kind === 'temporal' ? Object.freeze({ ...resolution.query }) : null,
    revision,
    content: Object.freeze({ ...input.content, sections: [...input.content.sections] }),
  });
}

export function serializeResult(result: AsOfResult): string {
  const { content } = result;
  return JSON.stringify({
    input: {
      query_or_url: result.input.queryOrUrl,
      as_of: result.input.asOfTimestamp,
    },
    provenance: result.provenance,
    resolved: {
      title: result.revision.canonicalTitle,
      rev_id: result.revision.revisionId,
      rev_time: result.revision.revisionTimestamp,
      permalink: result.revision.permalink,
      as_of_instant: result.query?.normalizedInstant ?? null,
    },
    content: {
      format: content.format,
      [content.format]: content.body,
      sections: content.sections.map((section) => ({
        index: section.index,
        level: section.level,
        line: section.line,
        anchor: section.anchor,
        byte_offset: section.byteOffset,
      })),
      truncated: content.truncated,
      original_chars: content.originalChars,
      extract_chars: content.extractChars,
    },
  });
}
