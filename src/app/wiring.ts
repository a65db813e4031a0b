import { AdvisoryService } from '../advisory/AdvisoryService';
import { EbaySoldListings } from '../adapters/ebay/EbaySoldListings';
import { LmStudioClient } from '../adapters/lmstudio/LmStudioClient';
import { LmStudioLanguageModel } from '../adapters/lmstudio/LmStudioLanguageModel';
import { LmStudioVisionEngine } from '../adapters/lmstudio/LmStudioVisionEngine';
import { PlaceholderEngine } from '../adapters/placeholder/PlaceholderEngine';
import { TesseractEngine } from '../adapters/tesseract/TesseractEngine';
import { WhisperTranscriber } from '../adapters/whisper/WhisperTranscriber';
import type { HealthProvider, HealthReport } from '../api/router';
import { SpeechTranscriber } from '../audio/SpeechTranscriber';
import type { Config, OcrEngineName } from '../config';
import type { SessionHistoryStore } from '../core/history/HistoryPort';
import type { ImageProcessorPort } from '../core/image/ImageProcessorPort';
import type { LanguageModelPort } from '../core/llm/LanguageModelPort';
import type { SoldListingsPort } from '../core/listings/SoldListingsPort';
import type { PriceCache } from '../core/pricing/PriceCachePort';
import type { TextRecognitionEngine } from '../core/text/TextRecognitionPort';
import { FfmpegAudioSource } from '../platform/audio/ffmpeg';
import { SharpImageProcessor } from '../platform/imageio/sharp';
import { FolderFrameSource } from '../platform/source/folder';
import { MemoryPriceCache, SqlitePriceCache } from '../pricing/priceCache';
import { PriceResolver } from '../pricing/PriceResolver';
import { NO_ENGINE, TextRecognizer } from '../recognition/TextRecognizer';
import { MemorySessionHistory, SqliteSessionHistory } from '../session/SessionHistory';
import { SessionManager } from '../session/SessionManager';
import { SignalEngine } from '../signals/SignalEngine';
import { createLogger } from '../utils/logger';
import { Mutex } from '../utils/mutex';

const logger = createLogger('wiring');

/**
 * Composition root. This is the ONLY place that imports concrete adapters.
 */
export interface App {
  sessions: SessionManager;
  recognizer: TextRecognizer;
  transcriber: SpeechTranscriber;
  resolver: PriceResolver;
  health: HealthProvider;
  close(): Promise<void>;
}

function createEngine(
  name: OcrEngineName,
  config: Config,
  images: ImageProcessorPort,
  client: LmStudioClient | undefined
): TextRecognitionEngine {
  switch (name) {
    case 'tesseract':
      return new TesseractEngine(
        { language: config.ocr.language, pageSegMode: config.ocr.pageSegMode, langPath: config.ocr.langPath },
        images
      );
    case 'vision':
      return new LmStudioVisionEngine(client, config.llm.visionModel, config.llm.timeoutMs);
    case 'placeholder':
      return new PlaceholderEngine();
  }
}

async function probeLanguageModel(
  client: LmStudioClient | undefined,
  config: Config
): Promise<LanguageModelPort | undefined> {
  if (!client) {
    logger.warn('No language model endpoint configured: query compaction and advisory disabled');
    return undefined;
  }
  const health = await client.healthCheck();
  if (!health.healthy) {
    logger.warn('Language model unreachable: query compaction and advisory disabled', {
      endpoint: client.endpoint,
      error: health.error,
    });
    return undefined;
  }
  logger.info('Language model ready', { endpoint: client.endpoint, model: config.llm.model });
  return new LmStudioLanguageModel(client, config.llm.model, config.llm.timeoutMs);
}

function createSoldListings(config: Config): SoldListingsPort | undefined {
  const appId = config.soldListings.appId;
  if (!appId) {
    logger.warn('No sold-listings credentials configured: pricing disabled');
    return undefined;
  }
  return new EbaySoldListings({
    appId,
    baseUrl: config.soldListings.baseUrl,
    categoryId: config.soldListings.categoryId,
    pageSize: config.soldListings.pageSize,
    timeoutMs: config.soldListings.timeoutMs,
  });
}

export interface HealthParts {
  recognizer: TextRecognizer;
  transcriber: SpeechTranscriber;
  resolver: PriceResolver;
  llm?: LanguageModelPort;
  advisory?: AdvisoryService;
  client?: LmStudioClient;
  priceCache?: PriceCache;
}

export function createHealthProvider(parts: HealthParts): HealthProvider {
  const { recognizer, transcriber, resolver, llm, advisory, client, priceCache } = parts;

  return async () => {
    const services: Record<string, boolean> = {
      ocr: recognizer.engineName !== NO_ENGINE,
      audio: transcriber.isAvailable,
      pricing: resolver.isAvailable,
      llm: llm ? (await llm.healthCheck()).healthy : false,
      advisory: advisory?.isAvailable ?? false,
    };
    const stats: HealthReport['stats'] = {
      recognizer: recognizer.getStats(),
      transcriber: transcriber.getStats(),
    };
    if (advisory) stats.advisory = advisory.getStats();
    if (client) stats.llm = client.getStats();
    if (priceCache) stats.priceCache = priceCache.stats();

    return {
      status: services.ocr && services.pricing ? 'ok' : 'degraded',
      services,
      engines: {
        ocr: recognizer.engineName,
        audio: transcriber.isAvailable ? 'whisper' : 'none',
        llm: llm?.name ?? 'none',
      },
      stats,
    };
  };
}

export async function createApp(config: Config): Promise<App> {
  logger.info('Initializing ports/adapters...');

  const images = new SharpImageProcessor();
  const client = config.llm.baseUrl ? new LmStudioClient(config.llm.baseUrl, config.llm.apiKey) : undefined;
  const llm = await probeLanguageModel(client, config);

  const recognizer = new TextRecognizer(
    config.ocr.engines.map((name) => createEngine(name, config, images, client)),
    images,
    { dualRegion: config.capture.dualRegion, titleFraction: config.capture.titleFraction }
  );
  const engine = await recognizer.initialize();

  const transcriber = config.audio.enabled
    ? new SpeechTranscriber(
        new WhisperTranscriber({
          baseUrl: config.transcription.baseUrl,
          apiKey: config.transcription.apiKey,
          model: config.transcription.model,
          language: config.transcription.language,
          timeoutMs: config.transcription.timeoutMs,
        }),
        new FfmpegAudioSource({
          ffmpegPath: config.audio.ffmpegPath,
          inputFormat: config.audio.inputFormat,
          input: config.audio.input,
          sampleRate: config.audio.sampleRate,
          chunkSeconds: config.audio.chunkSeconds,
        }),
        { queueCapacity: config.audio.queueCapacity, staleAfterMs: config.audio.staleAfterMs }
      )
    : new SpeechTranscriber(undefined, undefined, {
        queueCapacity: config.audio.queueCapacity,
        staleAfterMs: config.audio.staleAfterMs,
      });
  await transcriber.start();

  const resolver = new PriceResolver(createSoldListings(config), llm, {
    cacheTtlHours: config.pricing.cacheTtlHours,
    failureTtlSeconds: config.pricing.failureTtlSeconds,
    fuzzyThreshold: config.pricing.fuzzyThreshold,
    queryMaxLength: config.pricing.queryMaxLength,
  });

  const advisory =
    config.advisory.enabled && llm ? new AdvisoryService(llm, config.advisory.cacheTtlSeconds) : undefined;

  const history: SessionHistoryStore = config.history.dbPath
    ? new SqliteSessionHistory(config.history.dbPath, config.history.cap)
    : new MemorySessionHistory(config.history.cap, config.history.maxSessions);

  const sharedCache = config.pricing.cachePath ? new SqlitePriceCache(config.pricing.cachePath) : undefined;

  const sessions = new SessionManager({
    recognizer,
    transcriber,
    resolver,
    signals: new SignalEngine(config.pricing.minimumComparables),
    advisory,
    history,
    createFrameSource: () =>
      new FolderFrameSource({ watchPath: config.capture.framesDir, maxBacklog: config.capture.maxBacklog }),
    createPriceCache: () => new MemoryPriceCache(),
    sharedPricing: sharedCache ? { priceCache: sharedCache, priceLock: new Mutex() } : undefined,
    orchestrator: {
      fps: config.capture.fps,
      processEveryN: config.capture.processEveryN,
      scanningStatusEvery: config.capture.scanningStatusEvery,
    },
    continuityTtlMs: config.continuity.ttlMs,
  });

  logger.info('Ports ready', {
    ocr: engine,
    audio: transcriber.isAvailable,
    pricing: resolver.isAvailable,
    llm: llm?.name ?? 'none',
    priceCache: sharedCache ? 'sqlite' : 'memory',
    history: config.history.dbPath ? 'sqlite' : 'memory',
  });

  const health = createHealthProvider({
    recognizer,
    transcriber,
    resolver,
    llm,
    advisory,
    client,
    priceCache: sharedCache,
  });

  return {
    sessions,
    recognizer,
    transcriber,
    resolver,
    health,
    async close(): Promise<void> {
      await sessions.closeAll();
      await transcriber.stop();
      await recognizer.terminate();
      advisory?.close();
      sharedCache?.close();
      history.close();
    },
  };
}
