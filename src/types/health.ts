/**
 * Daily health record type definitions.
 */

/**
 * One row per calendar day, as the application uses it internally.
 */
export interface HealthRecord {
  /** Calendar date in the reference timezone, YYYY-MM-DD */
  date: string;
  steps: number;
  kcals: number;
  km: number;
  flightsClimbed: number;
  /** Kilograms; null when not measured that day */
  weight: number | null;
  /** ISO 8601 timestamp with an explicit offset, e.g. 2026-01-05T21:14:03+01:00 */
  recordedAt: string;
}

/**
 * A validated submission from the mobile client.
 * Optional fields left undefined keep the stored value on update.
 */
export interface HealthSubmission {
  steps: number;
  kcals: number;
  km: number;
  flightsClimbed?: number;
  weight?: number;
}

/**
 * Outbound record shape shared with the dashboard.
 */
export interface HealthRecordDto {
  date: string;
  steps: number;
  kcals: number;
  km: number;
  flights_climbed: number;
  weight: number | null;
  recorded_at: string;
}

/**
 * Inclusive date bounds (YYYY-MM-DD); either side may be open.
 */
export interface DateRange {
  from?: string;
  to?: string;
}

export interface SubmitResult {
  record: HealthRecord;
  /** Total rows in the store after the write */
  rowCount: number;
  /** True when the submission created the day's record */
  created: boolean;
}
