import { describe, expect, it } from 'vitest';

import {
  DEFAULT_VIEW,
  availableGroupings,
  buildDashboard,
  goalProgress,
  latestWeight,
  resolveGrouping,
} from '../dashboard';

import type { HealthRecordDto } from '../../types';

const record = (date: string, values: Partial<HealthRecordDto> = {}): HealthRecordDto => ({
  date,
  flights_climbed: 0,
  kcals: 0,
  km: 0,
  recorded_at: `${date}T21:00:00+01:00`,
  steps: 0,
  weight: null,
  ...values,
});

// Newest first, the order the store returns
const history: HealthRecordDto[] = [
  record('2026-01-31', { flights_climbed: 10, kcals: 250, km: 4, recorded_at: '2026-01-31T20:00:00+01:00', steps: 5000 }),
  record('2026-01-30', { flights_climbed: 60, kcals: 600, km: 9, steps: 12_000, weight: 71.5 }),
  record('2026-01-20', { kcals: 400, km: 6, steps: 8000 }),
  record('2025-12-15', { flights_climbed: 5, kcals: 150, km: 2, steps: 3000, weight: 73 }),
];

describe('groupings', () => {
  it('offers groupings per period', () => {
    expect(availableGroupings('week')).toEqual(['day']);
    expect(availableGroupings('month')).toEqual(['day', 'week']);
    expect(availableGroupings('year')).toEqual(['day', 'week', 'month']);
    expect(availableGroupings('all')).toEqual(['day', 'week', 'month']);
  });

  it('falls back when the requested grouping is not offered', () => {
    expect(resolveGrouping('week', 'month')).toBe('day');
    expect(resolveGrouping('month', 'month')).toBe('week');
    expect(resolveGrouping('year', 'week')).toBe('week');
    expect(resolveGrouping('all')).toBe('day');
  });

  it('defaults to the last 30 days by day, newest first', () => {
    expect(DEFAULT_VIEW).toEqual({
      groupBy: 'day',
      period: 'month',
      selection: null,
      sort: { column: 'date', direction: 'desc' },
    });
  });
});

describe('latestWeight', () => {
  it('takes the most recent positive weight across all dates', () => {
    expect(latestWeight(history)).toBe(71.5);
    expect(latestWeight([{ date: '2026-01-01', weight: 0 }, { date: '2026-01-02' }])).toBeNull();
  });
});

describe('goalProgress', () => {
  it('caps each goal at 100 percent', () => {
    expect(
      goalProgress(
        { flights_climbed: 75, kcals: 250, km: 12, steps: 2500 },
        { flights_climbed: 50, kcals: 500, km: 8, steps: 10_000 },
      ),
    ).toEqual({ flights_climbed: 100, kcals: 50, km: 100, steps: 25 });
  });

  it('is zero without a record', () => {
    expect(goalProgress(null)).toEqual({ flights_climbed: 0, kcals: 0, km: 0, steps: 0 });
  });
});

describe('buildDashboard', () => {
  it('builds the week view', () => {
    const summary = buildDashboard(
      history,
      { groupBy: 'month', period: 'week', selection: null, sort: { column: 'steps', direction: 'desc' } },
      '2026-01-31',
    );

    expect(summary.view.groupBy).toBe('day');
    expect(summary.availableGroupings).toEqual(['day']);
    expect(summary.series.keys).toEqual(['2026-01-30', '2026-01-31']);
    expect(summary.series.steps).toEqual([12_000, 5000]);
    expect(summary.series.weight).toEqual([71.5, null]);
    expect(summary.stats.steps).toEqual({ avg: 8500, max: 12_000, min: 5000, total: 17_000 });
    expect(summary.daysTracked).toBe(2);
    expect(summary.latestWeight).toBe(71.5);
    expect(summary.rows.map((row) => row.date)).toEqual(['2026-01-30', '2026-01-20', '2026-01-31', '2025-12-15']);
    expect(summary.lastUpdated).toBe('2026-01-31T20:00:00+01:00');
    expect(summary.today).toEqual(history[0]);
    expect(summary.goalProgress).toEqual({ flights_climbed: 20, kcals: 50, km: 50, steps: 50 });
  });

  it('narrows statistics to the selection but not the series', () => {
    const summary = buildDashboard(
      history,
      {
        groupBy: 'month',
        period: 'all',
        selection: { end: '2026-01-31', start: '2026-01-01' },
        sort: { column: 'date', direction: 'desc' },
      },
      '2026-01-31',
    );

    expect(summary.series.keys).toEqual(['2025-12', '2026-01']);
    expect(summary.series.steps[1]).toBeCloseTo(25_000 / 3);
    expect(summary.series.flights_climbed).toEqual([5, 35]);
    expect(summary.series.weight).toEqual([73, 71.5]);
    expect(summary.stats.steps.total).toBe(25_000);
    expect(summary.daysTracked).toBe(3);
    expect(summary.rows.map((row) => row.date)).toEqual(['2026-01-31', '2026-01-30', '2026-01-20', '2025-12-15']);
  });

  it('reports no progress when today has no record', () => {
    const summary = buildDashboard(history, DEFAULT_VIEW, '2026-02-05');

    expect(summary.today).toBeNull();
    expect(summary.goalProgress).toEqual({ flights_climbed: 0, kcals: 0, km: 0, steps: 0 });
    expect(summary.series.keys).toEqual(['2026-01-20', '2026-01-30', '2026-01-31']);
  });

  it('handles an empty history', () => {
    const summary = buildDashboard([], DEFAULT_VIEW, '2026-02-05');

    expect(summary.series.keys).toEqual([]);
    expect(summary.stats.km).toEqual({ avg: 0, max: 0, min: 0, total: 0 });
    expect(summary.lastUpdated).toBeNull();
    expect(summary.latestWeight).toBeNull();
    expect(summary.daysTracked).toBe(0);
  });
});
