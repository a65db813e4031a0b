import type { AnalysisBundle } from '../types';

export type StatusLevel = 'info' | 'scanning' | 'error';

/**
 * Delivery side of one viewer session.
 */
export interface ResultTransport {
  sendFrame(frameIndex: number, image: Buffer, mimeType: string): void;
  sendResult(bundle: AnalysisBundle): void;
  sendStatus(level: StatusLevel, message: string, details?: Record<string, unknown>): void;
}
