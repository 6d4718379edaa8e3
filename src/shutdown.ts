import type { ShutdownResult } from './queue/WriteQueue';
import type { Logger } from './utils/logger';

export interface ShutdownDependencies {
  closeServer: () => Promise<void>;
  exit: (code: number) => void;
  log: Logger;
  queue: { shutdown: (timeoutMs: number) => Promise<ShutdownResult> };
  store: { close: () => Promise<void> };
  /** Budget for in-flight writes; the forced exit fires at twice this. */
  timeoutMs: number;
}

/**
 * Build the SIGTERM/SIGINT handler: stop the HTTP server, drain the write
 * queue, close the store, exit 0. Repeated signals are ignored.
 */
export function createGracefulShutdown(deps: ShutdownDependencies): (signal: string) => Promise<void> {
  const { closeServer, exit, log, queue, store, timeoutMs } = deps;
  let shuttingDown = false;

  return async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info(`Received ${signal}, shutting down gracefully...`);

    // The queue gets the first timeoutMs to abort and discard; this is the backstop
    const forced = setTimeout(() => {
      log.error('Forced shutdown after timeout');
      exit(1);
    }, 2 * timeoutMs);
    forced.unref();

    try {
      await closeServer();
      log.info('Server closed');
      const drained = await queue.shutdown(timeoutMs);
      log.info('Write queue drained', { ...drained });
      await store.close();
      clearTimeout(forced);
      exit(0);
    } catch (error) {
      clearTimeout(forced);
      log.error('Shutdown failed', error);
      exit(1);
    }
  };
}
