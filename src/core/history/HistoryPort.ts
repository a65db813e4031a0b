import type { AnalysisBundle } from '../types';

export interface SessionHistoryStore {
  /** Append a bundle, pruning the oldest entries beyond the per-session cap. */
  log(sessionId: string, bundle: AnalysisBundle): void;

  /** Newest first. */
  getSession(sessionId: string, limit?: number): AnalysisBundle[];

  hasSession(sessionId: string): boolean;

  clear(sessionId: string): void;

  close(): void;
}
