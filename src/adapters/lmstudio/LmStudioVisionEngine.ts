/**
 * Vision-language model used as a secondary OCR engine when tesseract cannot start.
 */

import { z } from 'zod';
import type { TextRecognitionEngine } from '../../core/text/TextRecognitionPort';
import type { TextFragment } from '../../core/types';
import { createLogger } from '../../utils/logger';
import { extractJson, type LmStudioClient } from './LmStudioClient';

const logger = createLogger('lmstudio-vision');

// Lines without a reported confidence get this value
const DEFAULT_LINE_CONFIDENCE = 0.6;

const TranscriptionSchema = z.object({
  lines: z.array(
    z.union([
      z.string(),
      z.object({
        text: z.string(),
        confidence: z.number().min(0).max(1).optional(),
      }),
    ])
  ),
});

const SYSTEM_PROMPT =
  'You transcribe text from screenshots of live trading card auctions. ' +
  'Copy every visible line exactly as printed, including prices, timers and grading labels. ' +
  'Reply ONLY with compact JSON: {"lines":[{"text":"...","confidence":0.0-1.0}]}';

function imageMimeType(image: Buffer): string {
  if (image[0] === 0xff && image[1] === 0xd8) return 'image/jpeg';
  if (image.subarray(0, 4).toString('ascii') === 'RIFF') return 'image/webp';
  return 'image/png';
}

export function parseVisionLines(content: string): TextFragment[] {
  const parsed = TranscriptionSchema.safeParse(extractJson(content));
  if (parsed.success) {
    return parsed.data.lines
      .map((line) =>
        typeof line === 'string'
          ? { text: line.trim(), confidence: DEFAULT_LINE_CONFIDENCE }
          : { text: line.text.trim(), confidence: line.confidence ?? DEFAULT_LINE_CONFIDENCE }
      )
      .filter((line) => line.text.length > 0);
  }

  // Plain-text reply: one fragment per line
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('```'))
    .map((text) => ({ text, confidence: DEFAULT_LINE_CONFIDENCE }));
}

export class LmStudioVisionEngine implements TextRecognitionEngine {
  readonly name = 'vision';

  constructor(
    private readonly client: LmStudioClient | undefined,
    private readonly model: string,
    private readonly timeoutMs: number
  ) {}

  async initialize(): Promise<void> {
    if (!this.client) {
      throw new Error('No language model endpoint configured');
    }
    await this.client.ensureAvailable('vision model');
    logger.info('Vision OCR ready', { endpoint: this.client.endpoint, model: this.model });
  }

  async recognize(image: Buffer): Promise<TextFragment[]> {
    if (!this.client) {
      throw new Error('Vision engine not initialized');
    }

    const content = await this.client.chat(
      this.model,
      [
        { role: 'system', content: SYSTEM_PROMPT },
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Transcribe this image:' },
            { type: 'image_url', image_url: { url: `data:${imageMimeType(image)};base64,${image.toString('base64')}` } },
          ],
        },
      ],
      { temperature: 0.02, maxTokens: 400, timeoutMs: this.timeoutMs }
    );

    return parseVisionLines(content);
  }

  async terminate(): Promise<void> {}
}
