import type { TextRecognitionEngine } from '../../core/text/TextRecognitionPort';
import type { TextFragment } from '../../core/types';

/**
 * Last engine in the chain. Returns a fixed demo reading so the rest of the
 * pipeline can run on a machine without any OCR backend.
 */
export const PLACEHOLDER_FRAGMENTS: readonly TextFragment[] = [
  { text: '2023', confidence: 0.95 },
  { text: 'Topps', confidence: 0.9 },
  { text: 'Mike Trout', confidence: 0.88 },
  { text: 'PSA 10', confidence: 0.92 },
  { text: '#27', confidence: 0.85 },
];

export class PlaceholderEngine implements TextRecognitionEngine {
  readonly name = 'placeholder';

  async initialize(): Promise<void> {}

  async recognize(_image: Buffer): Promise<TextFragment[]> {
    return PLACEHOLDER_FRAGMENTS.map((fragment) => ({ ...fragment }));
  }

  async terminate(): Promise<void> {}
}
