import { describe, expect, it } from 'vitest';
import { AsOfError } from '../../lib/errors.js';
import { ReferenceUtils } from '../reference.utils.js';

const parseError = (input: string): AsOfError => {
  try {
    ReferenceUtils.parse(input);
  } catch (error) {
    if (error instanceof AsOfError) return error;
    throw error;
  }
  throw new Error(`Expected "${input}" to be rejected`);
};

describe('ReferenceUtils.parse', () => {
  it('trims bare titles', () => {
    expect(ReferenceUtils.parse('  Climate change \n')).toEqual({ title: 'Climate change', pinnedRevisionId: null });
  });

  it('keeps underscores in bare titles as typed', () => {
    expect(ReferenceUtils.parse('Climate_change')).toEqual({ title: 'Climate_change', pinnedRevisionId: null });
  });

  it('pins the revision when the URL carries oldid', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?oldid=123456')).toEqual({
      title: null,
      pinnedRevisionId: 123456,
    });
  });

  it('lets oldid win over a title in the same URL', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?title=Climate_change&oldid=933000001')).toEqual({
      title: null,
      pinnedRevisionId: 933000001,
    });
    expect(ReferenceUtils.parse('https://en.wikipedia.org/wiki/Climate_change?oldid=42')).toEqual({
      title: null,
      pinnedRevisionId: 42,
    });
  });

  it('decodes article paths and turns underscores into spaces', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/wiki/Climate_change')).toEqual({
      title: 'Climate change',
      pinnedRevisionId: null,
    });
    expect(ReferenceUtils.parse('https://en.wikipedia.org/wiki/Caf%C3%A9_au_lait')).toEqual({
      title: 'Café au lait',
      pinnedRevisionId: null,
    });
    expect(ReferenceUtils.parse('https://en.m.wikipedia.org/wiki/AC/DC#History')).toEqual({
      title: 'AC/DC',
      pinnedRevisionId: null,
    });
  });

  it('falls back to the title query parameter', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?title=Climate_change&action=history')).toEqual({
      title: 'Climate change',
      pinnedRevisionId: null,
    });
  });

  it('decodes a title query parameter that was encoded twice', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?title=AT%2526T')).toEqual({
      title: 'AT&T',
      pinnedRevisionId: null,
    });
  });

  it('keeps a literal percent sign and undecodable escapes in the title query parameter', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?title=100%25_growth').title).toBe('100% growth');
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?title=%25E2%2582').title).toBe('%E2%82');
  });

  it('ignores a non-numeric oldid', () => {
    expect(ReferenceUtils.parse('https://en.wikipedia.org/w/index.php?title=Sandbox&oldid=prev')).toEqual({
      title: 'Sandbox',
      pinnedRevisionId: null,
    });
  });

  it('rejects empty input and URLs without a title or oldid', () => {
    expect(parseError('   ').code).toBe('InvalidReference');
    expect(parseError('https://en.wikipedia.org/').code).toBe('InvalidReference');
    expect(parseError('https://en.wikipedia.org/wiki/').code).toBe('InvalidReference');
    expect(parseError('https://en.wikipedia.org/w/index.php?oldid=abc').code).toBe('InvalidReference');
  });

  it('rejects broken percent-escapes', () => {
    const error = parseError('https://en.wikipedia.org/wiki/%E0%A4%A');
    expect(error.code).toBe('InvalidReference');
    expect(error.message).toBe('Could not parse a title or oldid from "https://en.wikipedia.org/wiki/%E0%A4%A".');
  });
});

describe('ReferenceUtils.parseRevisionId', () => {
  it('accepts positive integers only', () => {
    expect(ReferenceUtils.parseRevisionId('123456')).toBe(123456);
    expect(ReferenceUtils.parseRevisionId(' 7 ')).toBe(7);
    expect(ReferenceUtils.parseRevisionId('0')).toBeNull();
    expect(ReferenceUtils.parseRevisionId('-5')).toBeNull();
    expect(ReferenceUtils.parseRevisionId('12.5')).toBeNull();
    expect(ReferenceUtils.parseRevisionId('')).toBeNull();
    expect(ReferenceUtils.parseRevisionId(null)).toBeNull();
  });
});
