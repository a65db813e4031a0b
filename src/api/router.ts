import type { IncomingMessage, ServerResponse } from 'http';
import { NotFoundError, ValidationError, isAppError, toErrorMessage } from '../utils/errors';
import type { SessionManager } from '../session/SessionManager';
import { createLogger } from '../utils/logger';

const logger = createLogger('api-router');

const HISTORY_PATH = /^\/api\/session\/([^/]+)\/history\/?$/;

export interface HealthReport {
  status: 'ok' | 'degraded';
  uptimeSeconds: number;
  activeSessions: number;
  services: Record<string, boolean>;
  engines: Record<string, string>;
  /** Counters per component, e.g. recognizer requests or cache hits. */
  stats: Record<string, Record<string, unknown>>;
}

export type HealthProvider = () => Promise<Omit<HealthReport, 'uptimeSeconds' | 'activeSessions'>>;

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(statusCode, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
  });
  res.end(payload);
}

function decodeSessionId(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch (error) {
    throw new ValidationError('session id is not a valid URI component', { sessionId: raw, error: toErrorMessage(error) });
  }
}

function parseLimit(raw: string | null): number | undefined {
  if (raw === null) return undefined;
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer', { limit: raw });
  }
  return limit;
}

export function createAPIRouter(sessions: SessionManager, health: HealthProvider) {
  return async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const pathname = url.pathname;
    const method = req.method ?? 'GET';

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      if (method !== 'GET') {
        throw new NotFoundError(`${method} ${pathname}`);
      }

      if (pathname === '/api/health') {
        const report = await health();
        sendJson(res, 200, {
          ...report,
          uptimeSeconds: Math.round(process.uptime()),
          activeSessions: sessions.size,
        } satisfies HealthReport);
        return;
      }

      const historyMatch = HISTORY_PATH.exec(pathname);
      if (historyMatch) {
        const sessionId = decodeSessionId(historyMatch[1]);
        if (!sessions.isKnown(sessionId)) {
          throw new NotFoundError('Session', sessionId);
        }
        const entries = sessions.history.getSession(sessionId, parseLimit(url.searchParams.get('limit')));
        sendJson(res, 200, { sessionId, count: entries.length, entries });
        return;
      }

      throw new NotFoundError(`Route ${pathname}`);
    } catch (error) {
      if (isAppError(error)) {
        if (error.statusCode >= 500) {
          logger.error('Request failed', { method, pathname, error: error.message });
        }
        sendJson(res, error.statusCode, {
          error: error.message,
          code: error.code,
          correlationId: error.correlationId,
        });
        return;
      }
      logger.error('Unhandled request error', { method, pathname, error: toErrorMessage(error) });
      sendJson(res, 500, { error: 'Internal server error' });
    }
  };
}
