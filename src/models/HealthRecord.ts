import type { HealthRecord, HealthRecordDto, HealthSubmission } from '../types';

/**
 * Outbound shape for the dashboard and the mobile client.
 */
export const toHealthRecordDto = (record: HealthRecord): HealthRecordDto => ({
  date: record.date,
  steps: record.steps,
  kcals: record.kcals,
  km: record.km,
  flights_climbed: record.flightsClimbed,
  weight: record.weight,
  recorded_at: record.recordedAt,
});

/**
 * Apply a submission to the day's current record.
 *
 * Required metrics are always replaced, so a later, smaller reading lowers
 * the day's totals. Optional metrics left out of the submission keep their
 * stored value; a brand new record starts them at 0 flights and no weight.
 */
export const mergeSubmission = (
  existing: HealthRecord | undefined,
  submission: HealthSubmission,
  date: string,
  recordedAt: string,
): HealthRecord => ({
  date,
  steps: submission.steps,
  kcals: submission.kcals,
  km: submission.km,
  flightsClimbed: submission.flightsClimbed ?? existing?.flightsClimbed ?? 0,
  weight: submission.weight ?? existing?.weight ?? null,
  recordedAt,
});
