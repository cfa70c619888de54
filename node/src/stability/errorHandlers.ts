// Process-level error handlers and graceful shutdown

import type { Server } from 'http';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';

export type ShutdownHook = () => Promise<void>;

let serverInstance: Server | null = null;
const shutdownHooks: ShutdownHook[] = [];
let shuttingDown = false;

/**
 * Set server instance for graceful shutdown
 */
export function setServerInstance(server: Server): void {
  serverInstance = server;
}

/** Runs before exit, in registration order (e.g. saving the index snapshot). */
export function onShutdown(hook: ShutdownHook): void {
  shutdownHooks.push(hook);
}

export function setupUnhandledRejectionHandler(): void {
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('process:unhandled_rejection', {
      err: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });

    // In production, log and continue; elsewhere fail fast
    if (process.env.NODE_ENV !== 'production') {
      process.exit(1);
    }
  });
}

export function setupUncaughtExceptionHandler(): void {
  process.on('uncaughtException', (error: Error) => {
    logger.error('process:uncaught_exception', { err: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException', 1);
  });
}

export function setupGracefulShutdown(): void {
  const signals: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info('process:signal', { signal });
      void gracefulShutdown(signal, 0);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) logger.warn('process:server_close_failed', { err: err.message });
      resolve();
    });
  });
}

async function gracefulShutdown(reason: string, exitCode: number): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('process:shutdown', { reason });

  // Give ongoing requests time to complete
  const forced = setTimeout(() => {
    logger.error('process:forced_shutdown', { afterMs: 15_000 });
    process.exit(1);
  }, 15_000);
  forced.unref();

  let code = exitCode;
  try {
    if (serverInstance) await closeServer(serverInstance);
    for (const hook of shutdownHooks) {
      await hook();
    }
    logger.info('process:cleanup_complete');
  } catch (error) {
    logger.error('process:shutdown_failed', { err: errorMessage(error) });
    code = 1;
  } finally {
    clearTimeout(forced);
  }
  process.exit(code);
}
