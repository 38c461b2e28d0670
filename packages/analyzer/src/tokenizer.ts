import { defaultStopWords } from './data.js';

const segmenter = new Intl.Segmenter('zh', { granularity: 'word' });
const NUMERIC = /^[\p{N}.,%]+$/u;

export interface TokenizerOptions {
  /** Added to the built-in stop words */
  stopWords?: readonly string[];
  minLength?: number;
}

export class Tokenizer {
  private readonly stopWords: ReadonlySet<string>;
  private readonly minLength: number;

  constructor(options: TokenizerOptions = {}) {
    this.stopWords = new Set([
      ...defaultStopWords(),
      ...(options.stopWords ?? []).map((w) => w.toLowerCase()),
    ]);
    this.minLength = options.minLength ?? 2;
  }

  /** Word-like segments, lowercased, minus short, numeric and stop-word tokens. Duplicates kept. */
  tokenize(text: string): string[] {
    const tokens: string[] = [];
    for (const { segment, isWordLike } of segmenter.segment(text.toLowerCase())) {
      if (!isWordLike) continue;
      if ([...segment].length < this.minLength) continue;
      if (NUMERIC.test(segment)) continue;
      if (this.stopWords.has(segment)) continue;
      tokens.push(segment);
    }
    return tokens;
  }
}
