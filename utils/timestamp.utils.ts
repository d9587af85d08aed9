import { AsOfQuery } from '../types/wiki-asof.types.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const EXPLICIT_ZONE = /(?:[Zz]|[+-]\d{2}:?\d{2})$/;
const END_OF_DAY = 'T23:59:59Z';

export class TimestampUtils {
  /**
   * Turns a user-supplied date or date-time into the upper bound used for the
   * revision search. A bare date means "any edit made during that UTC day".
   * No validation happens here; a malformed instant is rejected upstream.
   */
  static normalize(raw: string | null | undefined, now: Date = new Date()): AsOfQuery {
    const value = raw?.trim() ?? '';

    if (!value) {
      return {
        rawTimestamp: null,
        normalizedInstant: TimestampUtils.toIsoDate(now) + END_OF_DAY,
      };
    }

    return {
      rawTimestamp: value,
      normalizedInstant: TimestampUtils.normalizeInstant(value),
    };
  }

  static normalizeInstant(value: string): string {
    if (DATE_ONLY.test(value)) {
      return value + END_OF_DAY;
    }
    if (EXPLICIT_ZONE.test(value)) {
      return value;
    }
    return value + 'Z';
  }

  static toIsoDate(date: Date): string {
    return date.toISOString().slice(0, 10);
  }

  /** Both sides must parse; otherwise the comparison is left to upstream. */
  static isAfter(candidate: string, bound: string): boolean {
    const candidateMs = Date.parse(candidate);
    const boundMs = Date.parse(bound);
    if (Number.isNaN(candidateMs) || Number.isNaN(boundMs)) {
      return false;
    }
    return candidateMs > boundMs;
  }
}
