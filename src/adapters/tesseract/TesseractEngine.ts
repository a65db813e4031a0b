/**
 * Tesseract.js OCR engine. Primary engine of the recognizer chain.
 */

import path from 'path';
import { createWorker, PSM, type Worker } from 'tesseract.js';
import type { ImageProcessorPort } from '../../core/image/ImageProcessorPort';
import type { TextRecognitionEngine } from '../../core/text/TextRecognitionPort';
import type { TextFragment } from '../../core/types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('tesseract-engine');

export interface TesseractEngineConfig {
  language: string;
  pageSegMode: number;
  langPath?: string;
}

const TRAINEDDATA_VARIANT = '4.0.0_best_int';

/**
 * Language data ships as `@tesseract.js-data/<language>` on npm. Without a langPath
 * tesseract.js would fetch the same files from a CDN on first run.
 */
export function defaultLangPath(language: string, resolve: (id: string) => string = require.resolve): string {
  const manifest = resolve(`@tesseract.js-data/${language}/package.json`);
  return path.join(path.dirname(manifest), TRAINEDDATA_VARIANT);
}

function toPageSegMode(mode: number): PSM {
  return Object.values(PSM).find((value) => value === String(mode)) ?? PSM.SINGLE_BLOCK;
}

export class TesseractEngine implements TextRecognitionEngine {
  readonly name = 'tesseract';
  private worker: Worker | null = null;

  constructor(
    private readonly config: TesseractEngineConfig,
    private readonly images: ImageProcessorPort
  ) {}

  async initialize(): Promise<void> {
    if (this.worker) return;

    const langPath = this.config.langPath ?? defaultLangPath(this.config.language);
    const worker = await createWorker(this.config.language, 1, {
      langPath,
      logger: (m) => {
        if (m.status === 'recognizing text') {
          logger.debug(`Tesseract progress: ${Math.round(m.progress * 100)}%`);
        }
      },
    });

    await worker.setParameters({
      tessedit_pageseg_mode: toPageSegMode(this.config.pageSegMode),
      preserve_interword_spaces: '1',
    });

    this.worker = worker;
    logger.info('Tesseract worker initialized', {
      language: this.config.language,
      langPath,
      psm: this.config.pageSegMode,
    });
  }

  async recognize(image: Buffer): Promise<TextFragment[]> {
    if (!this.worker) {
      throw new Error('Tesseract worker not initialized');
    }

    const prepared = await this.images.prepareForOcr(image);
    const { data } = await this.worker.recognize(prepared);

    const lines = (data.lines ?? [])
      .map((line) => ({ text: line.text.trim(), confidence: line.confidence / 100 }))
      .filter((line) => line.text.length > 0);

    if (lines.length > 0) {
      return lines;
    }

    const text = data.text.trim();
    return text ? [{ text, confidence: data.confidence / 100 }] : [];
  }

  async terminate(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
      logger.info('Tesseract worker terminated');
    }
  }
}
