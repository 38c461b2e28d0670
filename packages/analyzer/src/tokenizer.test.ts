import { describe, it, expect } from 'vitest';
import { Tokenizer } from './tokenizer.js';

describe('Tokenizer', () => {
  it('keeps lowercased word-like tokens and drops numbers and stop words', () => {
    const tokenizer = new Tokenizer();
    expect(tokenizer.tokenize('Time management tips for 2024!')).toEqual(['time', 'management', 'tips']);
  });

  it('drops single-character tokens', () => {
    expect(new Tokenizer().tokenize('a b cd')).toEqual(['cd']);
  });

  it('keeps repeated tokens', () => {
    expect(new Tokenizer().tokenize('focus, focus')).toEqual(['focus', 'focus']);
  });

  it('adds configured stop words case-insensitively', () => {
    const tokenizer = new Tokenizer({ stopWords: ['Tips'] });
    expect(tokenizer.tokenize('time management tips')).toEqual(['time', 'management']);
  });

  it('segments Chinese text without emitting stop words or single characters', () => {
    const tokens = new Tokenizer().tokenize('这个视频教你如何提升执行力');
    expect(tokens).not.toContain('视频');
    expect(tokens).not.toContain('如何');
    for (const token of tokens) expect([...token].length).toBeGreaterThanOrEqual(2);
  });

  it('returns nothing for empty text', () => {
    expect(new Tokenizer().tokenize('')).toEqual([]);
  });
});
