import { describe, expect, it } from 'vitest';

import { mergeSubmission, toHealthRecordDto } from '../HealthRecord';

import type { HealthRecord } from '../../types';

const stored: HealthRecord = {
  date: '2026-01-05',
  flightsClimbed: 50,
  kcals: 500.5,
  km: 8.2,
  recordedAt: '2026-01-05T11:00:00+01:00',
  steps: 10_000,
  weight: 72.4,
};

describe('mergeSubmission', () => {
  it('starts a new day with no flights and no weight', () => {
    expect(mergeSubmission(undefined, { kcals: 20, km: 0.3, steps: 400 }, '2026-01-06', '2026-01-06T08:00:00+01:00')).toEqual({
      date: '2026-01-06',
      flightsClimbed: 0,
      kcals: 20,
      km: 0.3,
      recordedAt: '2026-01-06T08:00:00+01:00',
      steps: 400,
      weight: null,
    });
  });

  it('replaces required metrics even when they go down', () => {
    const merged = mergeSubmission(stored, { kcals: 100, km: 1, steps: 2000 }, stored.date, '2026-01-05T22:00:00+01:00');

    expect(merged.steps).toBe(2000);
    expect(merged.kcals).toBe(100);
    expect(merged.km).toBe(1);
    expect(merged.recordedAt).toBe('2026-01-05T22:00:00+01:00');
  });

  it('keeps optional metrics that were not sent', () => {
    const merged = mergeSubmission(stored, { kcals: 1, km: 1, steps: 1 }, stored.date, stored.recordedAt);

    expect(merged.flightsClimbed).toBe(50);
    expect(merged.weight).toBe(72.4);
  });

  it('overwrites optional metrics that were sent', () => {
    const merged = mergeSubmission(
      stored,
      { flightsClimbed: 0, kcals: 1, km: 1, steps: 1, weight: 71.9 },
      stored.date,
      stored.recordedAt,
    );

    expect(merged.flightsClimbed).toBe(0);
    expect(merged.weight).toBe(71.9);
  });
});

describe('toHealthRecordDto', () => {
  it('uses the wire field names', () => {
    expect(toHealthRecordDto(stored)).toEqual({
      date: '2026-01-05',
      flights_climbed: 50,
      kcals: 500.5,
      km: 8.2,
      recorded_at: '2026-01-05T11:00:00+01:00',
      steps: 10_000,
      weight: 72.4,
    });
  });
});
