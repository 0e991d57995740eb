import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createHealthRecordStore } from '../../storage';
import { Logger } from '../../utils/logger';
import { runBackup, startBackupScheduler } from '../backupScheduler';

import type { HealthRecord } from '../../types';

const cronMock = vi.hoisted(() => ({
  schedule: vi.fn(),
  stop: vi.fn(),
  validate: vi.fn((expression: string) => expression.trim().split(/\s+/).length === 5),
}));

vi.mock('node-cron', () => ({
  default: {
    schedule: cronMock.schedule,
    validate: cronMock.validate,
  },
}));

const rowsIn = (filename: string): number => {
  const sqlite = new Database(filename, { fileMustExist: true, readonly: true });
  try {
    return sqlite.prepare('SELECT date FROM health_records').all().length;
  } finally {
    sqlite.close();
  }
};

const record = (date: string): HealthRecord => ({
  date,
  flightsClimbed: 3,
  kcals: 210,
  km: 2.4,
  recordedAt: `${date}T20:00:00+01:00`,
  steps: 3100,
  weight: null,
});

describe('runBackup', () => {
  let directory: string;
  let sourcePath: string;
  const log = new Logger('backup-test');

  const addDay = (date: string) => {
    const { close, store } = createHealthRecordStore(sourcePath);
    try {
      store.upsertDay(date, () => record(date));
    } finally {
      close();
    }
  };

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(tmpdir(), 'health-backup-'));
    sourcePath = path.join(directory, 'health_records.db');
  });

  afterEach(async () => {
    await fs.rm(directory, { force: true, recursive: true });
  });

  it('skips a database that does not exist yet', async () => {
    await expect(runBackup({ log, sourcePath })).resolves.toEqual({
      backupPath: `${sourcePath}.bk`,
      outcome: 'missing',
      sourcePath,
    });
  });

  it('writes a new copy only when the database changed', async () => {
    addDay('2026-01-05');

    expect((await runBackup({ log, sourcePath })).outcome).toBe('copied');
    expect(rowsIn(`${sourcePath}.bk`)).toBe(1);

    expect((await runBackup({ log, sourcePath })).outcome).toBe('unchanged');

    addDay('2026-01-06');
    expect((await runBackup({ log, sourcePath })).outcome).toBe('copied');
    expect(rowsIn(`${sourcePath}.bk`)).toBe(2);
    expect((await fs.readdir(directory)).sort()).toEqual(['health_records.db', 'health_records.db.bk']);
  });

  it('takes a consistent snapshot while the database is open for writing', async () => {
    const { close, store } = createHealthRecordStore(sourcePath);
    try {
      store.upsertDay('2026-01-05', () => record('2026-01-05'));

      const backupPath = path.join(directory, 'copy.db');
      const result = await runBackup({ backupPath, log, sourcePath });

      expect(result).toEqual({ backupPath, outcome: 'copied', sourcePath });
      expect(rowsIn(backupPath)).toBe(1);
    } finally {
      close();
    }
  });
});

describe('startBackupScheduler', () => {
  const log = new Logger('backup-test');

  beforeEach(() => {
    cronMock.schedule.mockReset();
    cronMock.stop.mockReset();
    cronMock.schedule.mockReturnValue({ stop: cronMock.stop });
  });

  it('rejects an invalid cron expression', () => {
    expect(() => startBackupScheduler({ log, sourcePath: 'unused.db' }, 'every hour')).toThrow(
      'Invalid backup cron expression: "every hour"',
    );
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });

  it('schedules backups and stops the task', () => {
    const scheduler = startBackupScheduler({ log, sourcePath: 'unused.db' }, '0 * * * *');

    expect(cronMock.schedule).toHaveBeenCalledWith('0 * * * *', expect.any(Function));

    scheduler.stop();
    expect(cronMock.stop).toHaveBeenCalledTimes(1);
  });

  it('logs a failed run instead of throwing from the tick', async () => {
    const errorSpy = vi.spyOn(log, 'error').mockImplementation(() => undefined);
    // A directory cannot be opened as a database
    startBackupScheduler(
      { backupPath: path.join(tmpdir(), 'unwritten-health.db.bk'), log, sourcePath: tmpdir() },
      '0 * * * *',
    );

    const [, tick] = cronMock.schedule.mock.calls[0];
    expect(typeof tick).toBe('function');
    if (typeof tick === 'function') tick();

    await vi.waitFor(() => {
      expect(errorSpy).toHaveBeenCalledWith('Backup run failed', expect.any(Error), {
        error: expect.any(String),
      });
    });
  });
});
