import { openDatabase } from './database';
import { SqliteHealthRecordStore } from './HealthRecordStore';

import type { HealthRecordStore } from './HealthRecordStore';

export interface OpenedStore {
  store: HealthRecordStore;
  close: () => void;
}

/**
 * Open the SQLite file (or ':memory:') and wrap it in a record store.
 */
export function createHealthRecordStore(filename?: string): OpenedStore {
  const handle = openDatabase(filename);
  return {
    close: handle.close,
    store: new SqliteHealthRecordStore(handle.db),
  };
}

export { openDatabase } from './database';
export type { DatabaseHandle, HealthDatabase } from './database';
export { SqliteHealthRecordStore } from './HealthRecordStore';
export type { HealthRecordStore } from './HealthRecordStore';
