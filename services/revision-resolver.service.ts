import { NoRevisionFoundError } from '../lib/errors.js';
import { Logger, silentLogger } from '../obs/logger.js';
import { ResolvedRevision, RevisionLookup } from '../types/wiki-asof.types.js';
import { TimestampUtils } from '../utils/timestamp.utils.js';

export class RevisionResolver {
  constructor(
    private readonly lookup: RevisionLookup,
    private readonly permalinkBase: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async resolve(title: string, normalizedInstant: string): Promise<ResolvedRevision> {
    const candidate = await this.lookup.lookup({ title, upperBoundInstant: normalizedInstant });

    if (TimestampUtils.isAfter(candidate.revisionTimestamp, normalizedInstant)) {
      this.logger.warn('Discarding revision newer than the as-of bound', {
        title,
        rev_id: candidate.revisionId,
        rev_time: candidate.revisionTimestamp,
        bound: normalizedInstant,
      });
      throw new NoRevisionFoundError(title, normalizedInstant);
    }

    const resolved: ResolvedRevision = Object.freeze({
      revisionId: candidate.revisionId,
      revisionTimestamp: candidate.revisionTimestamp,
      canonicalTitle: candidate.canonicalTitle || title,
      permalink: this.permalinkFor(candidate.revisionId),
    });

    this.logger.debug('Resolved revision', {
      title,
      canonical_title: resolved.canonicalTitle,
      rev_id: resolved.revisionId,
      rev_time: resolved.revisionTimestamp,
      bound: normalizedInstant,
    });

    return resolved;
  }

  permalinkFor(revisionId: number): string {
    return RevisionResolver.buildPermalink(this.permalinkBase, revisionId);
  }

  static buildPermalink(permalinkBase: string, revisionId: number): string {
    const url = new URL(permalinkBase);
    url.search = '';
    url.searchParams.set('oldid', String(revisionId));
    return url.toString();
  }
}
