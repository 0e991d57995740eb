import { integer, real, sqliteTable, text } from 'drizzle-orm/sqlite-core';

import { StorageConfig } from '../config';

export const healthRecords = sqliteTable(StorageConfig.tableName, {
  date: text('date').primaryKey(),
  steps: integer('steps').notNull(),
  kcals: real('kcals').notNull(),
  km: real('km').notNull(),
  flightsClimbed: integer('flights_climbed').notNull().default(0),
  weight: real('weight'),
  recordedAt: text('recorded_at').notNull(),
});

export type HealthRecordRow = typeof healthRecords.$inferSelect;
export type NewHealthRecordRow = typeof healthRecords.$inferInsert;

export const schema = {
  healthRecords,
};
