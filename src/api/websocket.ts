import { v4 as uuidv4 } from 'uuid';
import WebSocket from 'ws';
import type { ResultTransport, StatusLevel } from '../core/transport/ResultTransportPort';
import type { AnalysisBundle } from '../core/types';
import { parseClientMessage, type ClientMessage, type ServerMessage } from '../schemas/messages';
import type { AnalysisSession, SessionManager } from '../session/SessionManager';
import { toErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('websocket');

const PING_INTERVAL_MS = 30_000;

function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function sendError(ws: WebSocket, message: string, id?: string): void {
  sendMessage(ws, { type: 'error', payload: { message }, id });
}

function isAddressInUse(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EADDRINUSE';
}

/**
 * Delivers one session's output to its viewer's socket.
 */
export class WebSocketTransport implements ResultTransport {
  constructor(
    private readonly ws: WebSocket,
    private readonly sessionId: string
  ) {}

  sendFrame(frameIndex: number, image: Buffer, mimeType: string): void {
    sendMessage(this.ws, {
      type: 'frame',
      payload: { sessionId: this.sessionId, frameIndex, mimeType, image: image.toString('base64') },
    });
  }

  sendResult(bundle: AnalysisBundle): void {
    sendMessage(this.ws, { type: 'analysis_result', payload: bundle });
  }

  sendStatus(level: StatusLevel, message: string, details: Record<string, unknown> = {}): void {
    if (level === 'error') {
      sendMessage(this.ws, { type: 'error', payload: { ...details, sessionId: this.sessionId, message } });
      return;
    }
    sendMessage(this.ws, {
      type: 'status',
      payload: { ...details, sessionId: this.sessionId, level, message },
    });
  }
}

export class AnalysisWebSocketServer {
  private wss?: WebSocket.Server;
  private readonly clients = new Map<string, { ws: WebSocket; session: AnalysisSession }>();
  private actualPort?: number;

  constructor(private readonly sessions: SessionManager) {}

  async start(port: number, host?: string): Promise<void> {
    const wss = await this.listenWithFallback(port, host);
    this.wss = wss;

    wss.on('connection', (ws: WebSocket) => {
      const clientId = uuidv4();
      const session = this.sessions.create(new WebSocketTransport(ws, clientId), clientId);
      this.clients.set(clientId, { ws, session });

      logger.info('WebSocket client connected', { clientId });

      sendMessage(ws, {
        type: 'connected',
        payload: { clientId, sessionId: session.id, timestamp: new Date().toISOString() },
      });

      const pingInterval = setInterval(() => {
        if (ws.readyState === WebSocket.OPEN) {
          ws.ping();
        }
      }, PING_INTERVAL_MS);

      ws.on('pong', () => {
        logger.debug('Pong received', { clientId });
      });

      ws.on('message', (data: WebSocket.RawData) => {
        const parsed = parseClientMessage(data.toString());
        if (!parsed.ok) {
          sendError(ws, parsed.error);
          return;
        }
        this.handleMessage(session, parsed.message, ws).catch((error: unknown) => {
          logger.error('Error handling message', { clientId, type: parsed.message.type, error: toErrorMessage(error) });
          sendError(ws, toErrorMessage(error), parsed.message.id);
        });
      });

      ws.on('close', () => {
        logger.info('WebSocket client disconnected', { clientId });
        clearInterval(pingInterval);
        this.clients.delete(clientId);
        this.sessions.remove(clientId).catch((error: unknown) => {
          logger.error('Failed to close session', { clientId, error: toErrorMessage(error) });
        });
      });

      ws.on('error', (error) => {
        logger.error('WebSocket error', { clientId, error: toErrorMessage(error) });
      });
    });
  }

  getActualPort(): number | undefined {
    return this.actualPort;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) {
      return;
    }
    this.wss = undefined;

    this.clients.forEach(({ ws }) => ws.close());
    this.clients.clear();

    await new Promise<void>((resolve) => {
      wss.close(() => resolve());
    });
    logger.info('WebSocket server stopped');
  }

  private async handleMessage(session: AnalysisSession, message: ClientMessage, ws: WebSocket): Promise<void> {
    logger.debug('Message received', { sessionId: session.id, type: message.type });

    switch (message.type) {
      case 'ping':
        sendMessage(ws, { type: 'pong', id: message.id });
        break;

      case 'start_analysis': {
        const started = await session.start();
        if (!started) {
          sendError(ws, 'Analysis already running', message.id);
          break;
        }
        sendMessage(ws, { type: 'analysis_started', payload: { sessionId: session.id }, id: message.id });
        break;
      }

      case 'stop_analysis':
        await session.stop();
        sendMessage(ws, {
          type: 'analysis_stopped',
          payload: { sessionId: session.id, message: 'Analysis stopped', stats: session.getStats() },
          id: message.id,
        });
        break;

      case 'get_history':
        sendMessage(ws, {
          type: 'history',
          payload: { sessionId: session.id, entries: session.getHistory(message.payload?.limit) },
          id: message.id,
        });
        break;
    }
  }

  private async listenWithFallback(port: number, host?: string): Promise<WebSocket.Server> {
    const candidates = [port, port + 1, port + 2, 0]; // 0 = any available port
    for (const candidate of candidates) {
      try {
        const wss = await this.createServer(candidate, host);
        const address = wss.address();
        this.actualPort = typeof address === 'object' ? address.port : candidate;
        if (candidate !== port) {
          logger.warn('WebSocket port in use, started on fallback port', { requested: port, port: this.actualPort });
        } else {
          logger.info('WebSocket server listening', { port: this.actualPort });
        }
        return wss;
      } catch (error) {
        if (!isAddressInUse(error)) {
          throw error;
        }
        logger.warn('WebSocket port in use, trying next', { port: candidate });
      }
    }
    throw new Error('No available ports found for WebSocket server');
  }

  private createServer(port: number, host?: string): Promise<WebSocket.Server> {
    return new Promise((resolve, reject) => {
      const server = new WebSocket.Server({ port, host });
      server.once('listening', () => resolve(server));
      server.once('error', reject);
    });
  }
}
