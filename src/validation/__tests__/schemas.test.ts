import { describe, expect, it } from 'vitest';

import { ValidationError } from '../../utils/errors';
import { parseHealthDataQuery, parseSubmission, parseSummaryQuery } from '../schemas';

describe('parseSubmission', () => {
  it('maps the wire fields to a submission', () => {
    expect(parseSubmission({ flights_climbed: 50, kcals: 500.5, km: 8.2, steps: 10_000 })).toEqual({
      flightsClimbed: 50,
      kcals: 500.5,
      km: 8.2,
      steps: 10_000,
      weight: undefined,
    });
  });

  it('reads numeric text, including a decimal comma', () => {
    expect(parseSubmission({ kcals: '512,7', km: ' 8.4 ', steps: '10234', weight: '72,5' })).toEqual({
      flightsClimbed: undefined,
      kcals: 512.7,
      km: 8.4,
      steps: 10_234,
      weight: 72.5,
    });
  });

  it('truncates counts', () => {
    const submission = parseSubmission({ flights_climbed: 12.9, kcals: 1, km: 1, steps: 100.9 });
    expect(submission.steps).toBe(100);
    expect(submission.flightsClimbed).toBe(12);
  });

  it.each([null, '', '  ', 0, '0', '0.0', '0,0', '0.00'])('treats weight %j as not weighed', (weight) => {
    expect(parseSubmission({ kcals: 1, km: 1, steps: 1, weight }).weight).toBeUndefined();
  });

  it.each([null, '', ' '])('treats flights %j as not sent', (flights) => {
    expect(parseSubmission({ flights_climbed: flights, kcals: 1, km: 1, steps: 1 }).flightsClimbed).toBeUndefined();
  });

  it('keeps the day when weight is a zero written as text', () => {
    expect(parseSubmission({ kcals: '250,5', km: '3.2', steps: '4200', weight: '0,0' })).toEqual({
      flightsClimbed: undefined,
      kcals: 250.5,
      km: 3.2,
      steps: 4200,
      weight: undefined,
    });
  });

  it('names a missing required field', () => {
    expect(() => parseSubmission({ kcals: 2, steps: 1 })).toThrow('Invalid submission: km: km is required');
  });

  it('rejects non-numeric values', () => {
    expect(() => parseSubmission({ kcals: 2, km: 3, steps: 'abc' })).toThrow('steps must be a number');
  });

  it('rejects negative values', () => {
    expect(() => parseSubmission({ kcals: 2, km: 3, steps: -5 })).toThrow(ValidationError);
    expect(() => parseSubmission({ kcals: '-2', km: 3, steps: 5 })).toThrow(ValidationError);
    expect(() => parseSubmission({ kcals: 2, km: 3, steps: 5, weight: -70 })).toThrow(ValidationError);
  });

  it('lists every rejected field in the issues', () => {
    try {
      parseSubmission(undefined);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['steps', 'kcals', 'km']);
      }
    }
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseSubmission('steps=1')).toThrow(ValidationError);
  });
});

describe('parseHealthDataQuery', () => {
  it('accepts today in any case', () => {
    expect(parseHealthDataQuery({ date: 'TODAY' })).toEqual({ date: 'TODAY' });
  });

  it('accepts a bounded range', () => {
    expect(parseHealthDataQuery({ date_end: '2026-01-31', date_start: '2026-01-01' })).toEqual({
      date_end: '2026-01-31',
      date_start: '2026-01-01',
    });
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseHealthDataQuery({ date_start: '2026-02-30' })).toThrow(
      'Invalid query: date_start: Expected an existing YYYY-MM-DD date',
    );
  });
});

describe('parseSummaryQuery', () => {
  it('fills in the defaults', () => {
    expect(parseSummaryQuery({})).toEqual({
      groupBy: undefined,
      period: 'month',
      selection: null,
      sort: { column: 'date', direction: 'desc' },
    });
  });

  it('only selects when both bounds are given', () => {
    expect(parseSummaryQuery({ start: '2026-01-01' }).selection).toBeNull();
    expect(parseSummaryQuery({ end: '2026-01-31', group_by: 'week', start: '2026-01-01' })).toEqual({
      groupBy: 'week',
      period: 'month',
      selection: { end: '2026-01-31', start: '2026-01-01' },
      sort: { column: 'date', direction: 'desc' },
    });
  });

  it('rejects unknown options', () => {
    expect(() => parseSummaryQuery({ period: 'decade' })).toThrow(ValidationError);
    expect(() => parseSummaryQuery({ sort: 'mood' })).toThrow(ValidationError);
  });
});
