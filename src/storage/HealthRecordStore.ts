import { and, count, desc, eq, gte, lte } from 'drizzle-orm';

import { StorageError, ValidationError } from '../utils/errors';
import { healthRecords } from './schema';

import type { DateRange, HealthRecord, SubmitResult } from '../types';
import type { HealthDatabase } from './database';
import type { HealthRecordRow, NewHealthRecordRow } from './schema';

/**
 * Persistence seam for daily health records. One row per date.
 */
export interface HealthRecordStore {
  /**
   * Atomically read the day's record, let `merge` compute the next state,
   * and write it back with insert-or-update by date.
   */
  upsertDay(date: string, merge: (existing: HealthRecord | undefined) => HealthRecord): SubmitResult;

  findByDate(date: string): HealthRecord | undefined;

  /**
   * Records sorted by date descending, optionally bounded (inclusive).
   */
  findAll(range?: DateRange): HealthRecord[];

  count(): number;
}

function rowToRecord(row: HealthRecordRow): HealthRecord {
  return {
    date: row.date,
    flightsClimbed: row.flightsClimbed,
    kcals: row.kcals,
    km: row.km,
    recordedAt: row.recordedAt,
    steps: row.steps,
    weight: row.weight,
  };
}

function recordToRow(record: HealthRecord): NewHealthRecordRow {
  return {
    date: record.date,
    flightsClimbed: record.flightsClimbed,
    kcals: record.kcals,
    km: record.km,
    recordedAt: record.recordedAt,
    steps: record.steps,
    weight: record.weight,
  };
}

export class SqliteHealthRecordStore implements HealthRecordStore {
  constructor(private readonly db: HealthDatabase) {}

  count(): number {
    return this.guard('count', () => this.db.select({ value: count() }).from(healthRecords).get()?.value ?? 0);
  }

  findAll(range: DateRange = {}): HealthRecord[] {
    return this.guard('findAll', () =>
      this.db
        .select()
        .from(healthRecords)
        .where(
          and(
            range.from ? gte(healthRecords.date, range.from) : undefined,
            range.to ? lte(healthRecords.date, range.to) : undefined,
          ),
        )
        .orderBy(desc(healthRecords.date))
        .all()
        .map(rowToRecord),
    );
  }

  findByDate(date: string): HealthRecord | undefined {
    return this.guard('findByDate', () => {
      const row = this.db.select().from(healthRecords).where(eq(healthRecords.date, date)).get();
      return row ? rowToRecord(row) : undefined;
    });
  }

  upsertDay(date: string, merge: (existing: HealthRecord | undefined) => HealthRecord): SubmitResult {
    return this.guard('upsertDay', () =>
      this.db.transaction(
        (tx) => {
          const existingRow = tx.select().from(healthRecords).where(eq(healthRecords.date, date)).get();
          const existing = existingRow ? rowToRecord(existingRow) : undefined;

          const record = merge(existing);
          if (record.date !== date) {
            throw new ValidationError(`Merged record is dated ${record.date}, expected ${date}`);
          }

          const row = recordToRow(record);
          tx.insert(healthRecords)
            .values(row)
            .onConflictDoUpdate({
              set: {
                flightsClimbed: row.flightsClimbed,
                kcals: row.kcals,
                km: row.km,
                recordedAt: row.recordedAt,
                steps: row.steps,
                weight: row.weight,
              },
              target: healthRecords.date,
            })
            .run();

          const rowCount = tx.select({ value: count() }).from(healthRecords).get()?.value ?? 0;
          return { created: existing === undefined, record, rowCount };
        },
        { behavior: 'immediate' },
      ),
    );
  }

  /**
   * Run a driver call, reporting driver failures as StorageError.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof StorageError || error instanceof ValidationError) throw error;
      throw new StorageError(`Storage operation ${operation} failed`, { cause: error });
    }
  }
}
