import { describe, expect, it } from 'vitest';

import { countUnreadableDates, filterByPeriod, narrowToRange } from '../filter';

import type { RecordLike } from '../../types';

const records: RecordLike[] = [
  { date: '2026-01-31', steps: 1 },
  { date: '2026-01-24', steps: 2 },
  { date: '2026-01-23', steps: 3 },
  { date: '2026-01-01', steps: 4 },
  { date: '2025-12-31', steps: 5 },
  { date: 'garbage', steps: 6 },
];

const stepsOf = (rows: RecordLike[]) => rows.map((row) => row.steps);

describe('filterByPeriod', () => {
  it('keeps the trailing week including the cutoff day', () => {
    expect(stepsOf(filterByPeriod(records, 'week', '2026-01-31'))).toEqual([1, 2]);
  });

  it('keeps the trailing 30 days for month', () => {
    expect(stepsOf(filterByPeriod(records, 'month', '2026-01-31'))).toEqual([1, 2, 3, 4]);
  });

  it('keeps everything for all, unreadable dates included', () => {
    const kept = filterByPeriod(records, 'all', '2026-01-31');
    expect(kept).toHaveLength(records.length);
    expect(kept).not.toBe(records);
  });

  it('does not narrow when today cannot be read', () => {
    expect(filterByPeriod(records, 'week', 'not-a-day')).toHaveLength(records.length);
  });
});

describe('narrowToRange', () => {
  it('keeps an inclusive window', () => {
    const kept = narrowToRange(records, { end: '2026-01-24', start: '2026-01-01' });
    expect(stepsOf(kept)).toEqual([2, 3, 4]);
  });

  it('swaps an inverted window', () => {
    const kept = narrowToRange(records, { end: '2026-01-01', start: '2026-01-24' });
    expect(stepsOf(kept)).toEqual([2, 3, 4]);
  });

  it('ignores a selection missing a bound', () => {
    expect(narrowToRange(records, { end: null, start: '2026-01-24' })).toHaveLength(records.length);
    expect(narrowToRange(records, null)).toHaveLength(records.length);
  });
});

describe('countUnreadableDates', () => {
  it('counts records whose date cannot be read', () => {
    expect(countUnreadableDates([...records, {}, { date: 20_260_101 }])).toBe(3);
  });
});
