import { InvalidReferenceError } from '../lib/errors.js';
import { DocumentReference } from '../types/wiki-asof.types.js';

const URL_PATTERN = /^https?:\/\//i;
const REVISION_ID_PATTERN = /^\d+$/;
const ARTICLE_SEGMENT = '/wiki/';
const PERCENT_ESCAPE_PATTERN = /%[0-9A-Fa-f]{2}/;

export class ReferenceUtils {
  static isUrl(input: string): boolean {
    return URL_PATTERN.test(input.trim());
  }

  /**
   * Accepts a page title or a Wikipedia URL. An `oldid` query parameter wins
   * over any title in the same URL, since it already fixes the content.
   */
  static parse(input: string): DocumentReference {
    const trimmed = input.trim();

    if (!ReferenceUtils.isUrl(trimmed)) {
      if (!trimmed) {
        throw new InvalidReferenceError(input);
      }
      return { title: trimmed, pinnedRevisionId: null };
    }

    let url: URL;
    try {
      url = new URL(trimmed);
    } catch (error) {
      throw new InvalidReferenceError(input, error);
    }

    const pinnedRevisionId = ReferenceUtils.parseRevisionId(url.searchParams.get('oldid'));
    if (pinnedRevisionId !== null) {
      return { title: null, pinnedRevisionId };
    }

    const title = ReferenceUtils.titleFromPath(url.pathname, input) ?? ReferenceUtils.titleFromQuery(url.searchParams);
    if (!title) {
      throw new InvalidReferenceError(input);
    }

    return { title, pinnedRevisionId: null };
  }

  static parseRevisionId(raw: string | null): number | null {
    if (raw === null) {
      return null;
    }
    const value = raw.trim();
    if (!REVISION_ID_PATTERN.test(value)) {
      return null;
    }
    const id = Number(value);
    return Number.isSafeInteger(id) && id > 0 ? id : null;
  }

  static normalizeTitle(raw: string): string {
    return raw.replace(/_/g, ' ').trim();
  }

  private static titleFromPath(pathname: string, input: string): string | null {
    const at = pathname.indexOf(ARTICLE_SEGMENT);
    if (at === -1) {
      return null;
    }

    const raw = pathname.slice(at + ARTICLE_SEGMENT.length);
    let decoded: string;
    try {
      decoded = decodeURIComponent(raw);
    } catch (error) {
      throw new InvalidReferenceError(input, error);
    }

    const title = ReferenceUtils.normalizeTitle(decoded);
    return title || null;
  }

  private static titleFromQuery(params: URLSearchParams): string | null {
    const raw = params.get('title');
    if (raw === null) {
      return null;
    }
    const title = ReferenceUtils.normalizeTitle(ReferenceUtils.decodeEscapes(raw));
    return title || null;
  }

  /**
   * Titles never contain `%XX`, so any escape left after query decoding was
   * encoded twice (`title=AT%2526T`). A sequence that is not valid UTF-8 is
   * kept as written.
   */
  private static decodeEscapes(value: string): string {
    if (!PERCENT_ESCAPE_PATTERN.test(value)) {
      return value;
    }
    try {
      return decodeURIComponent(value);
    } catch {
      return value;
    }
  }
}
