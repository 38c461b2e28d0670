import { describe, it, expect } from 'vitest';
import { planQueries, toTimeWindow } from './planner.js';

const BASE = {
  dateRange: { start: '2024-01-01', end: '2024-12-31', utcOffset: '+00:00' },
  maxResultsPerKeyword: 1000,
  pageSize: 20,
  maxPagesPerQuery: 50,
};

describe('toTimeWindow', () => {
  it('covers whole days inclusively at the given offset', () => {
    const window = toTimeWindow({ start: '2024-01-01', end: '2024-01-31', utcOffset: '+00:00' });
    expect(window.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(window.end.toISOString()).toBe('2024-01-31T23:59:59.999Z');
  });

  it('reads calendar days in Beijing time by default', () => {
    const window = toTimeWindow({ start: '2019-01-01', end: '2025-12-31' });
    expect(window.start.toISOString()).toBe('2018-12-31T16:00:00.000Z');
    expect(window.end.toISOString()).toBe('2025-12-31T15:59:59.999Z');
    expect(window.start.getTime() / 1000).toBe(1_546_272_000);
    expect((window.end.getTime() + 1) / 1000).toBe(1_767_196_800);
  });

  it('includes the first hours of the first day and excludes the hours after the last', () => {
    const window = toTimeWindow({ start: '2019-01-01', end: '2025-12-31' });
    const earlyFirstDay = Date.parse('2019-01-01T03:00:00+08:00');
    const afterLastDay = Date.parse('2026-01-01T03:00:00+08:00');
    expect(earlyFirstDay).toBeGreaterThanOrEqual(window.start.getTime());
    expect(afterLastDay).toBeGreaterThan(window.end.getTime());
  });

  it('rejects an inverted range', () => {
    expect(() => toTimeWindow({ start: '2024-02-01', end: '2024-01-01' })).toThrow(RangeError);
  });
});

describe('planQueries', () => {
  it('creates one unit per keyword when pagination can reach the cap', () => {
    const units = planQueries({ ...BASE, keywords: ['执行力', '时间管理'] });
    expect(units).toHaveLength(2);
    expect(units.map((u) => u.keyword)).toEqual(['执行力', '时间管理']);
    expect(units[0].maxResults).toBe(1000);
    expect(units[0].window.start.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(units[0].window.end.toISOString()).toBe('2024-12-31T23:59:59.999Z');
  });

  it('splits the range when the cap exceeds what one query reaches', () => {
    const units = planQueries({ ...BASE, keywords: ['执行力'], maxResultsPerKeyword: 2500 });
    expect(units).toHaveLength(3);
    expect(units.map((u) => u.maxResults)).toEqual([834, 834, 834]);
    expect(units.map((u) => [u.window.start.toISOString(), u.window.end.toISOString()])).toEqual([
      ['2024-01-01T00:00:00.000Z', '2024-05-01T23:59:59.999Z'],
      ['2024-05-02T00:00:00.000Z', '2024-08-31T23:59:59.999Z'],
      ['2024-09-01T00:00:00.000Z', '2024-12-31T23:59:59.999Z'],
    ]);
  });

  it('orders keywords as configured and sub-windows ascending', () => {
    const units = planQueries({ ...BASE, keywords: ['B', 'A'], maxResultsPerKeyword: 2000 });
    expect(units.map((u) => `${u.keyword}:${u.window.start.toISOString().slice(0, 10)}`)).toEqual([
      'B:2024-01-01',
      'B:2024-07-02',
      'A:2024-01-01',
      'A:2024-07-02',
    ]);
  });

  it('never splits below one day', () => {
    const units = planQueries({
      ...BASE,
      keywords: ['执行力'],
      dateRange: { start: '2024-03-01', end: '2024-03-02', utcOffset: '+00:00' },
      maxResultsPerKeyword: 10_000,
    });
    expect(units).toHaveLength(2);
    expect(units[0].maxResults).toBe(5000);
  });

  it('trims, drops empty and duplicate keywords', () => {
    const units = planQueries({ ...BASE, keywords: [' 执行力 ', '', '执行力', '效率'] });
    expect(units.map((u) => u.keyword)).toEqual(['执行力', '效率']);
  });

  it('returns no units for an empty keyword list', () => {
    expect(planQueries({ ...BASE, keywords: [] })).toEqual([]);
  });

  it('is deterministic', () => {
    const input = { ...BASE, keywords: ['执行力', '效率'], maxResultsPerKeyword: 3000 };
    expect(planQueries(input)).toEqual(planQueries(input));
  });
});
