import dotenv from 'dotenv';
import { createApp } from './app/wiring';
import { loadConfig } from './config';
import { BidscopeServer } from './server';
import { toErrorMessage } from './utils/errors';
import { createLogger } from './utils/logger';
import { gracefulShutdown } from './utils/shutdown';

dotenv.config();
const logger = createLogger('main');

async function main(): Promise<void> {
  logger.info('Starting bidscope...');

  const config = loadConfig();
  const app = await createApp(config);

  const server = new BidscopeServer(config.server, app.sessions, app.health);
  await server.start();

  const shutdownHandler = (): void => {
    logger.info('Shutting down bidscope...');
    void gracefulShutdown(server, app);
  };

  process.on('SIGTERM', shutdownHandler);
  process.on('SIGINT', shutdownHandler);

  const status = server.getStatus();
  logger.info('bidscope is running', {
    api: `http://${config.server.host}:${status.httpPort ?? config.server.port}`,
    websocket: `ws://${config.server.host}:${status.wsPort ?? config.server.wsPort}`,
    framesDir: config.capture.framesDir,
  });
}

main().catch((error: unknown) => {
  logger.error('Failed to start bidscope', { error: toErrorMessage(error) });
  process.exit(1);
});
