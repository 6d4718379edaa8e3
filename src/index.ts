import { Server } from 'node:http';

import { createApp } from './app';
import { configurationExplanation, loadConfig } from './config';
import { WriteQueue } from './queue/WriteQueue';
import { createGracefulShutdown } from './shutdown';
import { ClickHouseMetricStore, createClickHouseClient } from './storage';
import { ConfigError } from './utils/errors';
import { logger } from './utils/logger';

import type { AppConfig } from './config';

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

async function start(config: AppConfig): Promise<void> {
  const store = new ClickHouseMetricStore({
    client: createClickHouseClient(config.clickhouse),
    config: config.clickhouse,
    log: logger,
  });
  await store.init();

  const queue = new WriteQueue({
    concurrency: config.writer.concurrency,
    jobTimeoutMs: config.writer.jobTimeoutMs,
    log: logger,
    maxQueueSize: config.writer.maxQueueSize,
  });

  const app = createApp({ log: logger, queue, server: config.server, store, writer: config.writer });
  const { host, port, shutdownTimeoutMs } = config.server;

  const server = app.listen(port, host, () => {
    logger.info('Server started', {
      database: config.clickhouse.database,
      host,
      layout: config.clickhouse.schemaLayout,
      port,
    });
  });

  const gracefulShutdown = createGracefulShutdown({
    closeServer: () => closeServer(server),
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Intentional server shutdown
    exit: (code) => process.exit(code),
    log: logger,
    queue,
    store,
    timeoutMs: shutdownTimeoutMs,
  });

  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT');
  });
}

function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(configurationExplanation(error));
      // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
      process.exit(1);
    }
    throw error;
  }

  logger.configure(config.log);
  start(config).catch((error: unknown) => {
    logger.error('Failed to initialize server', error);
    // eslint-disable-next-line n/no-process-exit, unicorn/no-process-exit -- Fatal startup error
    process.exit(1);
  });
}

main();
