import { mergeSubmission } from '../models/HealthRecord';
import { parseSubmission } from '../validation/schemas';
import { debugStorage, debugValidation } from '../utils/debugLogger';
import { formatRecordedAt, getTodayKey } from '../utils/dateUtilities';
import { ValidationError, errorMessage } from '../utils/errors';

import type { HealthRecordStore } from '../storage';
import type { HealthSubmission, SubmitResult } from '../types';
import type { Logger } from '../utils/logger';

export interface SubmitContext {
  store: HealthRecordStore;
  /** IANA zone deciding which calendar day the submission belongs to */
  timeZone: string;
  now?: () => Date;
  log?: Logger;
}

/**
 * Record today's metrics: create the day's row or overwrite it in place.
 *
 * @throws ValidationError when a required metric is missing or not numeric
 * @throws StorageError when the database write fails
 */
export const submitDailyMetrics = (raw: unknown, context: SubmitContext): SubmitResult => {
  const { log, store, timeZone } = context;
  const timer = log?.startTimer('submitDailyMetrics');

  let submission: HealthSubmission;
  try {
    submission = parseSubmission(raw);
  } catch (error) {
    if (error instanceof ValidationError && log) {
      debugValidation(log, raw, error.issues);
    }
    timer?.end('warn', 'Submission rejected', { error: errorMessage(error) });
    throw error;
  }

  const instant = (context.now ?? (() => new Date()))();
  const today = getTodayKey(timeZone, instant);
  const recordedAt = formatRecordedAt(instant, timeZone);

  try {
    const result = store.upsertDay(today, (existing) => {
      if (log) {
        debugStorage(log, existing ? 'Replacing day record' : 'Creating day record', {
          date: today,
          previous: existing,
        });
      }
      return mergeSubmission(existing, submission, today, recordedAt);
    });

    timer?.end('info', result.created ? 'Day record created' : 'Day record updated', {
      date: today,
      rowCount: result.rowCount,
      steps: result.record.steps,
    });

    return result;
  } catch (error) {
    timer?.end('error', 'Failed to save submission', { date: today, error: errorMessage(error) });
    throw error;
  }
};
