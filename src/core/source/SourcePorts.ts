import type { AudioChunk, Frame } from '../types';

/**
 * Supplies captured frames. `next` resolves with `undefined` once the signal aborts
 * or the source is stopped.
 */
export interface FrameSource {
  start(): Promise<void>;
  next(signal?: AbortSignal): Promise<Frame | undefined>;
  stop(): Promise<void>;
  isRunning(): boolean;
}

/**
 * Supplies fixed-duration PCM chunks (signed 16-bit little endian).
 */
export interface AudioSource {
  start(): Promise<void>;
  nextChunk(signal?: AbortSignal): Promise<AudioChunk | undefined>;
  stop(): Promise<void>;
}
