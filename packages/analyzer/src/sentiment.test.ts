import { describe, it, expect } from 'vitest';
import type { MergedRecord } from '@vidtrend/shared';
import { SentimentScorer, scoreRecords } from './sentiment.js';

const lexicon = {
  positive: ['好', '不错', 'great'],
  negative: ['差', 'bad'],
  negators: ['不', 'not'],
};

function makeMerged(title: string, description = ''): MergedRecord {
  return {
    bvid: `BV${title}`,
    aid: 0,
    title,
    description,
    tags: [],
    authorId: 'a',
    authorName: 'A',
    publishedAt: null,
    durationSeconds: null,
    views: 0,
    likes: 0,
    coins: 0,
    favorites: 0,
    shares: 0,
    comments: 0,
    danmaku: 0,
    category: '',
    url: '',
    sourceKeyword: 'k',
    fetchedAt: new Date('2024-01-01T00:00:00Z'),
    keywords: ['k'],
    firstSeenAt: new Date('2024-01-01T00:00:00Z'),
    sightings: 1,
  };
}

describe('SentimentScorer', () => {
  const scorer = new SentimentScorer({ lexicon });

  it('returns neutral zero for empty text or no lexicon hit', () => {
    expect(scorer.score('')).toEqual({ label: 'neutral', score: 0 });
    expect(scorer.score('今天开会')).toEqual({ label: 'neutral', score: 0 });
  });

  it('scores the balance of positive and negative hits', () => {
    expect(scorer.score('好')).toEqual({ label: 'positive', score: 1 });
    expect(scorer.score('差')).toEqual({ label: 'negative', score: -1 });
    expect(scorer.score('好 差')).toEqual({ label: 'neutral', score: 0 });

    const mostlyGood = scorer.score('好好差');
    expect(mostlyGood.score).toBeCloseTo(1 / 3);
    expect(mostlyGood.label).toBe('positive');
  });

  it('flips a term preceded by a negator', () => {
    expect(scorer.score('不好')).toEqual({ label: 'negative', score: -1 });
    expect(scorer.score('not bad')).toEqual({ label: 'positive', score: 1 });
  });

  it('prefers the longest match over a negator prefix', () => {
    expect(scorer.score('不错')).toEqual({ label: 'positive', score: 1 });
  });

  it('only negates the term directly after the negator', () => {
    expect(scorer.score('不看 好')).toEqual({ label: 'positive', score: 1 });
  });

  it('matches English terms on word boundaries only', () => {
    expect(scorer.score('greatness badge')).toEqual({ label: 'neutral', score: 0 });
    expect(scorer.score('GREAT!')).toEqual({ label: 'positive', score: 1 });
  });

  it('labels consistently with the configured thresholds', () => {
    const strict = new SentimentScorer({ lexicon, positiveThreshold: 0.5, negativeThreshold: -0.5 });
    const texts = ['好', '差', '好好差', '好差差', '好差', '不好 好 好', ''];
    for (const text of texts) {
      const { label, score } = strict.score(text);
      expect(score).toBeGreaterThanOrEqual(-1);
      expect(score).toBeLessThanOrEqual(1);
      if (score >= 0.5) expect(label).toBe('positive');
      else if (score <= -0.5) expect(label).toBe('negative');
      else expect(label).toBe('neutral');
    }
  });

  it('rejects thresholds that overlap', () => {
    expect(() => new SentimentScorer({ lexicon, positiveThreshold: 0, negativeThreshold: 0 })).toThrow(RangeError);
  });

  it('is deterministic', () => {
    expect(scorer.score('好差好 not great')).toEqual(scorer.score('好差好 not great'));
  });
});

describe('SentimentScorer with the built-in lexicon', () => {
  const scorer = new SentimentScorer();

  it('reads self-improvement titles as positive', () => {
    expect(scorer.score('坚持自律，效率提升')).toEqual({ label: 'positive', score: 1 });
  });

  it('reads procrastination titles as negative', () => {
    expect(scorer.score('拖延焦虑')).toEqual({ label: 'negative', score: -1 });
  });

  it('handles negated negatives', () => {
    expect(scorer.score('不焦虑')).toEqual({ label: 'positive', score: 1 });
  });
});

describe('scoreRecords', () => {
  it('scores title and description together', () => {
    const scorer = new SentimentScorer({ lexicon });
    const [record] = scoreRecords([makeMerged('好', '差 差 差')], scorer);
    expect(record.sentiment).toEqual({ label: 'negative', score: -0.5 });
    expect(record.title).toBe('好');
  });
});
