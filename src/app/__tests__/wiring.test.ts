import { PlaceholderEngine } from '../../adapters/placeholder/PlaceholderEngine';
import { AdvisoryService } from '../../advisory/AdvisoryService';
import { SpeechTranscriber } from '../../audio/SpeechTranscriber';
import type { ImageProcessorPort } from '../../core/image/ImageProcessorPort';
import type { LanguageModelPort } from '../../core/llm/LanguageModelPort';
import { MemoryPriceCache } from '../../pricing/priceCache';
import { PriceResolver } from '../../pricing/PriceResolver';
import { TextRecognizer } from '../../recognition/TextRecognizer';
import { createHealthProvider } from '../wiring';

const images: ImageProcessorPort = {
  splitRegions: async (image) => ({ title: image, price: image }),
  prepareForOcr: async (image) => image,
};

const llm: LanguageModelPort = {
  name: 'fake-llm',
  compactQuery: async () => 'query',
  advise: async () => {
    throw new Error('not consulted');
  },
  healthCheck: async () => ({ healthy: false, error: 'offline' }),
};

describe('createHealthProvider', () => {
  test('should report service state and component counters', async () => {
    const recognizer = new TextRecognizer([new PlaceholderEngine()], images, { dualRegion: false, titleFraction: 0.65 });
    await recognizer.recognize(Buffer.from('frame'));
    const advisory = new AdvisoryService(llm, 60);
    const priceCache = new MemoryPriceCache();
    priceCache.get('missing');

    const health = createHealthProvider({
      recognizer,
      transcriber: new SpeechTranscriber(undefined, undefined, { queueCapacity: 2, staleAfterMs: 0 }),
      resolver: new PriceResolver(undefined, undefined, {
        cacheTtlHours: 1,
        failureTtlSeconds: 1,
        fuzzyThreshold: 60,
        queryMaxLength: 60,
      }),
      llm,
      advisory,
      priceCache,
    });

    await expect(health()).resolves.toEqual({
      status: 'degraded',
      services: { ocr: true, audio: false, pricing: false, llm: false, advisory: true },
      engines: { ocr: 'placeholder', audio: 'none', llm: 'fake-llm' },
      stats: {
        recognizer: { engine: 'placeholder', totalRequests: 1, errorCount: 0 },
        transcriber: { chunksTranscribed: 0, transcriptionErrors: 0, droppedChunks: 0, queued: 0 },
        advisory: { requests: 0, failures: 0, cached: 0 },
        priceCache: { keys: 0, hits: 0, misses: 1 },
      },
    });

    advisory.close();
    priceCache.close();
  });
});
