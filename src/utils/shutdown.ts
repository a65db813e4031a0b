import { createLogger } from './logger';
import { toErrorMessage } from './errors';

const logger = createLogger('shutdown');

export interface Stoppable {
  stop(): Promise<void>;
}

export interface Closable {
  close(): Promise<void>;
}

let isShuttingDown = false;

/**
 * Stops the servers first so no new sessions arrive, then releases the app's
 * sessions, audio capture and database handles. Exits the process.
 */
export async function gracefulShutdown(server: Stoppable, app: Closable, timeoutMs: number = 30000): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress');
    return;
  }

  isShuttingDown = true;
  logger.info('Starting graceful shutdown...');

  const shutdownTimeout = setTimeout(() => {
    logger.error('Shutdown timeout reached, forcing exit');
    process.exit(1);
  }, timeoutMs);

  try {
    logger.info('Stopping server...');
    await server.stop();

    logger.info('Closing sessions and services...');
    await app.close();

    clearTimeout(shutdownTimeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Error during shutdown', { error: toErrorMessage(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}
