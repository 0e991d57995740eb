/**
 * Scheduled copy of the database file.
 *
 * Snapshots go through SQLite's online backup API, so a copy taken while the
 * server is writing is still a consistent database. The snapshot replaces the
 * previous copy only when its contents differ.
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';

import Database from 'better-sqlite3';
import cron from 'node-cron';

import { BackupConfig } from '../config';
import { errorMessage } from '../utils/errors';
import { logger as defaultLogger } from '../utils/logger';

import type { Logger } from '../utils/logger';

export type BackupOutcome = 'copied' | 'missing' | 'unchanged';

export interface BackupOptions {
  sourcePath: string;
  backupPath?: string;
  log?: Logger;
}

export interface BackupResult {
  outcome: BackupOutcome;
  sourcePath: string;
  backupPath: string;
}

async function hashFile(filePath: string): Promise<string | undefined> {
  try {
    const content = await fs.readFile(filePath);
    return createHash('sha256').update(content).digest('hex');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return undefined;
    throw error;
  }
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

async function snapshot(sourcePath: string, targetPath: string): Promise<void> {
  const sqlite = new Database(sourcePath, { fileMustExist: true, readonly: true });
  try {
    await sqlite.backup(targetPath);
  } finally {
    sqlite.close();
  }
}

/**
 * Snapshot the database to its backup path if it changed since the last copy.
 */
export async function runBackup(options: BackupOptions): Promise<BackupResult> {
  const { sourcePath } = options;
  const backupPath = options.backupPath ?? `${sourcePath}${BackupConfig.suffix}`;
  const log = options.log ?? defaultLogger;

  if (!(await fileExists(sourcePath))) {
    log.warn('Database file not found, skipping backup', { sourcePath });
    return { backupPath, outcome: 'missing', sourcePath };
  }

  const pendingPath = `${backupPath}.tmp`;
  try {
    await snapshot(sourcePath, pendingPath);

    const snapshotHash = await hashFile(pendingPath);
    if (snapshotHash === (await hashFile(backupPath))) {
      log.info('No changes since last backup, skipping', { backupPath });
      return { backupPath, outcome: 'unchanged', sourcePath };
    }

    await fs.rename(pendingPath, backupPath);
    log.info('Database backed up', { backupPath, sha256: snapshotHash?.slice(0, 12) });
    return { backupPath, outcome: 'copied', sourcePath };
  } finally {
    await fs.rm(pendingPath, { force: true });
  }
}

export interface BackupScheduler {
  stop: () => void;
}

/**
 * Run `runBackup` on a cron schedule. A failed run is logged and the
 * schedule carries on.
 *
 * @throws Error if the cron expression is invalid
 */
export function startBackupScheduler(
  options: BackupOptions,
  cronExpression: string = BackupConfig.cronExpression,
): BackupScheduler {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid backup cron expression: "${cronExpression}"`);
  }

  const log = options.log ?? defaultLogger;
  const task = cron.schedule(cronExpression, () => {
    runBackup(options).catch((error: unknown) => {
      log.error('Backup run failed', error, { error: errorMessage(error) });
    });
  });

  log.info('Backup scheduler started', { cronExpression, sourcePath: options.sourcePath });

  return {
    stop: () => {
      task.stop();
      log.info('Backup scheduler stopped');
    },
  };
}
