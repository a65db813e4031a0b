/**
 * TextRecognizer - ranked OCR engine chain with region-split recognition.
 *
 * The first engine whose `initialize()` succeeds is kept for the lifetime of the
 * recognizer. `recognize()` never rejects: any failure yields an empty,
 * zero-confidence result tagged with the active engine.
 */

import type { ImageProcessorPort } from '../core/image/ImageProcessorPort';
import type { TextRecognitionEngine } from '../core/text/TextRecognitionPort';
import { emptyAttributes, type RecognizedText, type TextFragment } from '../core/types';
import { createLogger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';
import { parseItemAttributes } from './attributes';

const logger = createLogger('text-recognizer');

export const NO_ENGINE = 'none';

export interface TextRecognizerOptions {
  dualRegion: boolean;
  titleFraction: number;
}

export function joinFragments(fragments: TextFragment[]): string {
  return fragments
    .map((f) => f.text.trim())
    .filter(Boolean)
    .join(' ');
}

export function meanConfidence(fragments: TextFragment[]): number {
  if (fragments.length === 0) return 0;
  const total = fragments.reduce((sum, f) => sum + f.confidence, 0);
  return Math.min(1, Math.max(0, total / fragments.length));
}

export function emptyRecognition(engine: string): RecognizedText {
  return {
    fragments: [],
    text: '',
    priceText: '',
    attributes: emptyAttributes(),
    confidence: 0,
    engine,
  };
}

export class TextRecognizer {
  private selection?: Promise<TextRecognitionEngine | undefined>;
  private active?: TextRecognitionEngine;
  private totalRequests = 0;
  private errorCount = 0;
  private lastError?: string;

  constructor(
    private readonly engines: TextRecognitionEngine[],
    private readonly images: ImageProcessorPort,
    private readonly options: TextRecognizerOptions
  ) {}

  /**
   * Select the engine. Safe to call more than once; selection happens only the first time.
   */
  async initialize(): Promise<string> {
    if (!this.selection) {
      this.selection = this.selectEngine();
    }
    const engine = await this.selection;
    return engine?.name ?? NO_ENGINE;
  }

  get engineName(): string {
    return this.active?.name ?? NO_ENGINE;
  }

  async recognize(image: Buffer): Promise<RecognizedText> {
    const engineName = await this.initialize();
    const engine = this.active;
    if (!engine) {
      return emptyRecognition(engineName);
    }

    this.totalRequests++;
    try {
      let fragments: TextFragment[];
      let priceFragments: TextFragment[];

      if (this.options.dualRegion) {
        const regions = await this.images.splitRegions(image, this.options.titleFraction);
        // Both regions are dispatched at once. A tesseract worker still runs them one
        // after the other; the vision engine's HTTP calls overlap.
        const [title, price] = await Promise.all([
          engine.recognize(regions.title),
          engine.recognize(regions.price),
        ]);
        fragments = [...title, ...price];
        priceFragments = price;
      } else {
        fragments = await engine.recognize(image);
        priceFragments = fragments;
      }

      const text = joinFragments(fragments);
      return {
        fragments,
        text,
        priceText: joinFragments(priceFragments),
        attributes: parseItemAttributes(text),
        confidence: meanConfidence(fragments),
        engine: engine.name,
      };
    } catch (error) {
      this.errorCount++;
      this.lastError = toErrorMessage(error);
      logger.warn('Recognition failed, returning empty result', {
        engine: engine.name,
        error: this.lastError,
      });
      return emptyRecognition(engine.name);
    }
  }

  getStats(): { engine: string; totalRequests: number; errorCount: number; lastError?: string } {
    return {
      engine: this.engineName,
      totalRequests: this.totalRequests,
      errorCount: this.errorCount,
      lastError: this.lastError,
    };
  }

  async terminate(): Promise<void> {
    const engine = this.active;
    this.active = undefined;
    this.selection = undefined;
    if (engine) {
      await engine.terminate();
    }
  }

  private async selectEngine(): Promise<TextRecognitionEngine | undefined> {
    for (const engine of this.engines) {
      try {
        await engine.initialize();
        this.active = engine;
        logger.info('OCR engine selected', { engine: engine.name });
        return engine;
      } catch (error) {
        logger.warn('OCR engine unavailable, trying next', {
          engine: engine.name,
          error: toErrorMessage(error),
        });
      }
    }
    logger.error('No OCR engine available');
    return undefined;
  }
}
