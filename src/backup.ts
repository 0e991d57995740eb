import { BackupConfig, StorageConfig } from './config';
import { runBackup, startBackupScheduler } from './jobs/backupScheduler';
import { logger } from './utils/logger';

try {
  const scheduler = startBackupScheduler({ sourcePath: StorageConfig.dbPath }, BackupConfig.cronExpression);

  // One pass at startup so a fresh deployment has a copy straight away
  await runBackup({ sourcePath: StorageConfig.dbPath });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, stopping backup scheduler`);
    scheduler.stop();
  };

  process.on('SIGTERM', () => {
    shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    shutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to start backup scheduler', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
