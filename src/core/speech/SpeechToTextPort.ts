import type { AudioChunk } from '../types';

export interface TranscriptionResult {
  text: string;
  language?: string;
}

export interface SpeechToTextPort {
  readonly name: string;

  /** Rejects when the model or endpoint cannot be used. Called once at startup. */
  initialize(): Promise<void>;

  transcribe(chunk: AudioChunk, options?: { signal?: AbortSignal }): Promise<TranscriptionResult>;
}
