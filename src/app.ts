import { AuthConfig, ServerConfig, StorageConfig, TimeConfig } from './config';
import { createApp } from './server';
import { createHealthRecordStore } from './storage';
import { isValidTimeZone } from './utils/dateUtilities';
import { logger } from './utils/logger';

import type { Server } from 'node:http';

/**
 * Validate environment at startup. Fails fast on bad configuration.
 */
function validateEnv(): void {
  const writeToken = AuthConfig.writeToken;
  if (writeToken !== undefined && !writeToken.startsWith(AuthConfig.tokenPrefix)) {
    throw new Error(`WRITE_TOKEN must start with "${AuthConfig.tokenPrefix}"`);
  }
  if (!isValidTimeZone(TimeConfig.referenceTimeZone)) {
    throw new Error(`HEALTH_TIMEZONE "${TimeConfig.referenceTimeZone}" is not a known IANA timezone`);
  }
}

let server: Server | undefined;
let closeStore: (() => void) | undefined;

const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  // Force exit if connections do not drain (unref to not block process exit)
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional forced shutdown
    process.exit(1);
  }, ServerConfig.shutdownTimeoutMs).unref();

  const finish = () => {
    closeStore?.();
    logger.info('Server closed');
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
    process.exit(0);
  };

  if (server) {
    server.close(finish);
  } else {
    finish();
  }
};

try {
  validateEnv();

  const { close, store } = createHealthRecordStore(StorageConfig.dbPath);
  closeStore = close;

  const app = createApp({
    store,
    timeZone: TimeConfig.referenceTimeZone,
    writeToken: AuthConfig.writeToken,
  });

  server = app.listen(ServerConfig.port, ServerConfig.host, () => {
    logger.info('Server started', {
      dbPath: StorageConfig.dbPath,
      host: ServerConfig.host,
      nodeEnv: process.env.NODE_ENV ?? 'development',
      port: ServerConfig.port,
      timeZone: TimeConfig.referenceTimeZone,
      writeAuth: AuthConfig.writeToken !== undefined,
    });
  });

  process.on('SIGTERM', () => {
    gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    gracefulShutdown('SIGINT');
  });
} catch (error) {
  logger.error('Failed to initialize server', error);
  // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
  process.exit(1);
}
