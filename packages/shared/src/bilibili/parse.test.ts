import { describe, it, expect } from 'vitest';
import { cleanText, parseCount, parseDuration, parseTimestamp, splitTags } from './parse.js';

describe('cleanText', () => {
  it('removes keyword highlight markup', () => {
    expect(cleanText('如何提高<em class="keyword">执行力</em>？')).toBe('如何提高执行力？');
  });

  it('decodes named and numeric entities', () => {
    expect(cleanText('Tips &amp; Tricks &#39;2024&#39; &#x4E2D;')).toBe("Tips & Tricks '2024' 中");
  });

  it('leaves numeric entities outside the code point range alone', () => {
    expect(cleanText('坚持&#99999999;执行')).toBe('坚持&#99999999;执行');
    expect(cleanText('a &#x110000; b')).toBe('a &#x110000; b');
  });

  it('leaves surrogate code points alone', () => {
    expect(cleanText('x&#xD800;y')).toBe('x&#xD800;y');
  });

  it('leaves unknown entities alone', () => {
    expect(cleanText('a &bogus; b')).toBe('a &bogus; b');
  });
});

describe('parseDuration', () => {
  it('parses minutes and seconds', () => {
    expect(parseDuration('5:30')).toBe(330);
  });

  it('parses minutes above an hour', () => {
    expect(parseDuration('75:02')).toBe(4502);
  });

  it('parses hours, minutes, and seconds', () => {
    expect(parseDuration('1:02:03')).toBe(3723);
  });

  it('accepts seconds as a number', () => {
    expect(parseDuration(184)).toBe(184);
  });

  it('returns null for unparseable input', () => {
    expect(parseDuration('')).toBeNull();
    expect(parseDuration('abc')).toBeNull();
    expect(parseDuration('12')).toBeNull();
    expect(parseDuration(undefined)).toBeNull();
    expect(parseDuration(-3)).toBeNull();
  });
});

describe('parseCount', () => {
  it('parses numbers and numeric strings', () => {
    expect(parseCount(1234)).toBe(1234);
    expect(parseCount('987')).toBe(987);
  });

  it('expands 万 and 亿 suffixes', () => {
    expect(parseCount('1.5万')).toBe(15_000);
    expect(parseCount('2亿')).toBe(200_000_000);
  });

  it('treats hidden counters as zero', () => {
    expect(parseCount('--')).toBe(0);
    expect(parseCount(null)).toBe(0);
    expect(parseCount(-5)).toBe(0);
  });
});

describe('parseTimestamp', () => {
  it('converts unix seconds', () => {
    expect(parseTimestamp(1_700_000_000)?.toISOString()).toBe('2023-11-14T22:13:20.000Z');
  });

  it('returns null for zero or missing values', () => {
    expect(parseTimestamp(0)).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
    expect(parseTimestamp('oops')).toBeNull();
  });
});

describe('splitTags', () => {
  it('splits and trims comma separated tags', () => {
    expect(splitTags('职场, 执行力,,效率 ')).toEqual(['职场', '执行力', '效率']);
  });
});
