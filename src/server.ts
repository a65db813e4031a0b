import http from 'http';
import { createAPIRouter, type HealthProvider } from './api/router';
import { AnalysisWebSocketServer } from './api/websocket';
import type { SessionManager } from './session/SessionManager';
import { toErrorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

const logger = createLogger('server');

export interface ServerConfig {
  host: string;
  port: number;
  wsPort: number;
}

function isAddressInUse(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EADDRINUSE';
}

export class BidscopeServer {
  private httpServer?: http.Server;
  private wsServer?: AnalysisWebSocketServer;
  private isRunning = false;
  private actualHttpPort?: number;

  constructor(
    private readonly config: ServerConfig,
    private readonly sessions: SessionManager,
    private readonly health: HealthProvider
  ) {}

  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Server is already running');
      return;
    }

    try {
      this.wsServer = new AnalysisWebSocketServer(this.sessions);
      await this.wsServer.start(this.config.wsPort, this.config.host);

      await this.tryStartHttpOnPort(this.config.port, this.config.host);

      this.isRunning = true;
      logger.info('HTTP server listening', {
        host: this.config.host,
        port: this.actualHttpPort ?? this.config.port,
      });
    } catch (error) {
      logger.error('Failed to start server', { error: toErrorMessage(error) });
      await this.wsServer?.stop();
      throw error;
    }
  }

  private async tryStartHttpOnPort(port: number, host: string): Promise<void> {
    const apiRouter = createAPIRouter(this.sessions, this.health);

    const attemptListen = (p: number) =>
      new Promise<http.Server>((resolve, reject) => {
        const server = http.createServer((req, res) => {
          apiRouter(req, res).catch((error: unknown) => {
            logger.error('Request handler failed', { url: req.url, error: toErrorMessage(error) });
            if (!res.headersSent) {
              res.writeHead(500);
            }
            res.end();
          });
        });
        const onError = (err: NodeJS.ErrnoException) => {
          server.removeListener('listening', onListening);
          reject(err);
        };
        const onListening = () => {
          server.removeListener('error', onError);
          const address = server.address();
          this.actualHttpPort = typeof address === 'object' && address !== null ? address.port : p;
          resolve(server);
        };
        server.once('error', onError);
        server.once('listening', onListening);
        server.listen(p, host);
      });

    const candidates = [port, port + 1, port + 2, port + 3, 0]; // 0 = random
    for (const candidate of candidates) {
      try {
        this.httpServer = await attemptListen(candidate);
        return;
      } catch (error) {
        if (!isAddressInUse(error)) throw error;
        logger.warn('HTTP port in use, trying next', { port: candidate });
      }
    }
    throw new Error('No available ports found for HTTP server');
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info('Stopping server...');

    if (this.wsServer) {
      await this.wsServer.stop();
      this.wsServer = undefined;
    }

    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
      this.httpServer = undefined;
    }

    this.isRunning = false;
    logger.info('Server stopped');
  }

  getStatus(): { running: boolean; uptime: number; httpPort?: number; wsPort?: number } {
    return {
      running: this.isRunning,
      uptime: process.uptime(),
      httpPort: this.actualHttpPort,
      wsPort: this.wsServer?.getActualPort(),
    };
  }
}
