/**
 * Capped per-session log of analysis bundles.
 */

import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { SessionHistoryStore } from '../core/history/HistoryPort';
import type { AnalysisBundle } from '../core/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('session-history');

export const DEFAULT_HISTORY_CAP = 50;
export const DEFAULT_MAX_SESSIONS = 100;

/**
 * History of finished sessions stays readable until `maxSessions` newer sessions
 * have logged; the least recently written session goes first.
 */
export class MemorySessionHistory implements SessionHistoryStore {
  private readonly sessions = new Map<string, AnalysisBundle[]>();

  constructor(
    private readonly cap: number = DEFAULT_HISTORY_CAP,
    private readonly maxSessions: number = DEFAULT_MAX_SESSIONS
  ) {}

  log(sessionId: string, bundle: AnalysisBundle): void {
    const entries = this.sessions.get(sessionId) ?? [];
    entries.unshift(bundle);
    if (entries.length > this.cap) {
      entries.length = this.cap;
    }
    // re-insert so Map order tracks the last write
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, entries);

    for (const oldest of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) break;
      this.sessions.delete(oldest);
      logger.debug('Evicted session history', { sessionId: oldest });
    }
  }

  getSession(sessionId: string, limit: number = this.cap): AnalysisBundle[] {
    return (this.sessions.get(sessionId) ?? []).slice(0, limit);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId);
  }

  close(): void {
    this.sessions.clear();
  }
}

interface HistoryRow {
  bundle: string;
}

export class SqliteSessionHistory implements SessionHistoryStore {
  private readonly db: Database.Database;

  constructor(
    dbPath: string,
    private readonly cap: number = DEFAULT_HISTORY_CAP
  ) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS analysis_history (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        session_id TEXT NOT NULL,
        frame_index INTEGER NOT NULL,
        recommendation TEXT NOT NULL,
        bundle TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_history_session ON analysis_history(session_id, id);
    `);
    logger.info('Session history opened', { dbPath, cap });
  }

  log(sessionId: string, bundle: AnalysisBundle): void {
    const insert = this.db.prepare(
      'INSERT INTO analysis_history (session_id, frame_index, recommendation, bundle, created_at) VALUES (?, ?, ?, ?, ?)'
    );
    const prune = this.db.prepare(`
      DELETE FROM analysis_history
      WHERE session_id = ? AND id NOT IN (
        SELECT id FROM analysis_history WHERE session_id = ? ORDER BY id DESC LIMIT ?
      )
    `);

    this.db.transaction(() => {
      insert.run(
        sessionId,
        bundle.frameIndex,
        bundle.signalResult.recommendation,
        JSON.stringify(bundle),
        bundle.timestamp
      );
      prune.run(sessionId, sessionId, this.cap);
    })();
  }

  getSession(sessionId: string, limit: number = this.cap): AnalysisBundle[] {
    const rows = this.db
      .prepare<[string, number], HistoryRow>(
        'SELECT bundle FROM analysis_history WHERE session_id = ? ORDER BY id DESC LIMIT ?'
      )
      .all(sessionId, Math.min(limit, this.cap));
    return rows.map((row) => parseBundle(row.bundle));
  }

  hasSession(sessionId: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>(
        'SELECT 1 AS found FROM analysis_history WHERE session_id = ? LIMIT 1'
      )
      .get(sessionId);
    return row !== undefined;
  }

  clear(sessionId: string): void {
    this.db.prepare('DELETE FROM analysis_history WHERE session_id = ?').run(sessionId);
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

// Rows are only ever written by `log`, from a typed bundle.
function parseBundle(raw: string): AnalysisBundle {
  const bundle: AnalysisBundle = JSON.parse(raw);
  return bundle;
}
