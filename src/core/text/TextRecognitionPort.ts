import type { TextFragment } from '../types';

/**
 * One OCR backend in the recognizer's fallback chain.
 */
export interface TextRecognitionEngine {
  readonly name: string;

  /**
   * Load models / probe the backend. Rejects when the engine cannot be used;
   * the recognizer then moves on to the next engine in the chain.
   */
  initialize(): Promise<void>;

  recognize(image: Buffer): Promise<TextFragment[]>;

  terminate(): Promise<void>;
}
