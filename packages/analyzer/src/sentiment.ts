import type { MergedRecord, ScoredRecord, SentimentLabel, SentimentResult } from '@vidtrend/shared';
import { defaultLexicon, type SentimentLexicon } from './data.js';

/** Lexicon-based sentiment scoring for short Chinese/English titles and descriptions */

export interface SentimentOptions {
  positiveThreshold?: number;
  negativeThreshold?: number;
  lexicon?: SentimentLexicon;
}

type TermKind = 'positive' | 'negative' | 'negator';

const NEUTRAL: SentimentResult = { label: 'neutral', score: 0 };
const ASCII_WORD = /^[a-z0-9]+$/;
const ASCII_CHAR = /[a-z0-9]/;

export class SentimentScorer {
  readonly positiveThreshold: number;
  readonly negativeThreshold: number;
  private readonly terms = new Map<string, TermKind>();
  private readonly maxTermLength: number;

  constructor(options: SentimentOptions = {}) {
    this.positiveThreshold = options.positiveThreshold ?? 0.25;
    this.negativeThreshold = options.negativeThreshold ?? -0.25;
    if (this.negativeThreshold >= this.positiveThreshold) {
      throw new RangeError(
        `negativeThreshold (${this.negativeThreshold}) must be below positiveThreshold (${this.positiveThreshold})`,
      );
    }

    const lexicon = options.lexicon ?? defaultLexicon();
    // Polarity terms win over negators with the same spelling
    for (const term of lexicon.negators) this.terms.set(term.toLowerCase(), 'negator');
    for (const term of lexicon.negative) this.terms.set(term.toLowerCase(), 'negative');
    for (const term of lexicon.positive) this.terms.set(term.toLowerCase(), 'positive');
    this.maxTermLength = Math.max(0, ...[...this.terms.keys()].map((t) => t.length));
  }

  score(text: string): SentimentResult {
    const { positive, negative } = this.count(text.toLowerCase());
    if (positive + negative === 0) return NEUTRAL;

    const score = (positive - negative) / (positive + negative);
    return { label: this.label(score), score };
  }

  label(score: number): SentimentLabel {
    if (score >= this.positiveThreshold) return 'positive';
    if (score <= this.negativeThreshold) return 'negative';
    return 'neutral';
  }

  /** Longest-match scan. A negator directly before a term (whitespace aside) flips it. */
  private count(text: string): { positive: number; negative: number } {
    let positive = 0;
    let negative = 0;
    let negated = false;
    let i = 0;

    while (i < text.length) {
      if (/\s/.test(text[i])) {
        i++;
        continue;
      }

      const match = this.matchAt(text, i);
      if (!match) {
        negated = false;
        i++;
        continue;
      }

      if (match.kind === 'negator') {
        negated = true;
      } else {
        const isPositive = (match.kind === 'positive') !== negated;
        if (isPositive) positive++;
        else negative++;
        negated = false;
      }
      i += match.term.length;
    }

    return { positive, negative };
  }

  private matchAt(text: string, start: number): { term: string; kind: TermKind } | null {
    const longest = Math.min(this.maxTermLength, text.length - start);
    for (let len = longest; len > 0; len--) {
      const term = text.slice(start, start + len);
      const kind = this.terms.get(term);
      if (kind === undefined) continue;
      // English terms only match whole words
      if (ASCII_WORD.test(term) && !isWordBoundary(text, start, start + len)) continue;
      return { term, kind };
    }
    return null;
  }
}

function isWordBoundary(text: string, start: number, end: number): boolean {
  const before = start > 0 ? text[start - 1] : '';
  const after = end < text.length ? text[end] : '';
  return !ASCII_CHAR.test(before) && !ASCII_CHAR.test(after);
}

export function sentimentText(record: Pick<MergedRecord, 'title' | 'description'>): string {
  return `${record.title} ${record.description}`.trim();
}

export function scoreRecords(records: readonly MergedRecord[], scorer: SentimentScorer): ScoredRecord[] {
  return records.map((record) => ({ ...record, sentiment: scorer.score(sentimentText(record)) }));
}
