import { z } from 'zod';
import { ValidationError } from './utils/errors';

export const OCR_ENGINE_NAMES = ['tesseract', 'vision', 'placeholder'] as const;
export type OcrEngineName = (typeof OCR_ENGINE_NAMES)[number];

// Zod schema for complete config validation
const ConfigSchema = z.object({
  env: z.enum(['development', 'production', 'test']).default('development'),

  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.number().int().min(0).max(65535).default(8000),
    wsPort: z.number().int().min(0).max(65535).default(8001),
  }),

  capture: z.object({
    framesDir: z.string().min(1).default('./data/frames'),
    fps: z.number().positive().max(60).default(5),
    processEveryN: z.number().int().min(1).default(3),
    maxBacklog: z.number().int().min(1).default(10),
    dualRegion: z.boolean().default(true),
    titleFraction: z.number().min(0.1).max(0.9).default(0.65),
    scanningStatusEvery: z.number().int().min(1).default(30),
  }),

  ocr: z.object({
    engines: z.array(z.enum(OCR_ENGINE_NAMES)).min(1).default([...OCR_ENGINE_NAMES]),
    language: z.string().min(1).default('eng'),
    pageSegMode: z.number().int().min(0).max(13).default(6),
    /** Directory holding `<language>.traineddata.gz`; defaults to the @tesseract.js-data package. */
    langPath: z.string().min(1).optional(),
  }),

  audio: z.object({
    enabled: z.boolean().default(true),
    ffmpegPath: z.string().min(1).default('ffmpeg'),
    inputFormat: z.string().min(1).default('pulse'),
    input: z.string().min(1).default('default'),
    chunkSeconds: z.number().positive().max(60).default(7),
    sampleRate: z.number().int().min(8000).default(16000),
    queueCapacity: z.number().int().min(1).default(4),
    staleAfterMs: z.number().int().min(0).default(30000),
  }),

  transcription: z.object({
    baseUrl: z.string().url().optional(),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('whisper-1'),
    language: z.string().min(2).default('en'),
    timeoutMs: z.number().int().min(1000).default(30000),
  }),

  llm: z.object({
    baseUrl: z.string().url().optional(),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).default('qwen2.5-7b-instruct'),
    visionModel: z.string().min(1).default('qwen2.5-vl-7b-instruct'),
    timeoutMs: z.number().int().min(500).default(8000),
  }),

  soldListings: z.object({
    appId: z.string().min(1).optional(),
    baseUrl: z.string().url().default('https://svcs.ebay.com/services/search/FindingService/v1'),
    categoryId: z.string().min(1).default('212'),
    pageSize: z.number().int().min(1).max(100).default(25),
    timeoutMs: z.number().int().min(1000).default(10000),
  }),

  pricing: z.object({
    cacheTtlHours: z.number().positive().default(24),
    failureTtlSeconds: z.number().int().min(0).default(300),
    cachePath: z.string().default(''),
    fuzzyThreshold: z.number().min(0).max(100).default(60),
    minimumComparables: z.number().int().min(1).default(3),
    queryMaxLength: z.number().int().min(10).default(60),
  }),

  continuity: z.object({
    ttlMs: z.number().int().min(0).default(30000),
  }),

  history: z.object({
    dbPath: z.string().default(''),
    cap: z.number().int().min(1).default(50),
    /** In-memory store only: sessions kept before the least recently written is evicted. */
    maxSessions: z.number().int().min(1).default(100),
  }),

  advisory: z.object({
    enabled: z.boolean().default(true),
    cacheTtlSeconds: z.number().int().min(0).default(120),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function num(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return Number(raw);
}

function bool(env: Env, key: string): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function str(env: Env, key: string): string | undefined {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? undefined : raw.trim();
}

function list(env: Env, key: string): string[] | undefined {
  const raw = str(env, key);
  return raw?.split(',').map((s) => s.trim()).filter(Boolean);
}

function rawConfigFromEnv(env: Env) {
  return {
    env: str(env, 'NODE_ENV'),
    server: {
      host: str(env, 'HOST'),
      port: num(env, 'API_PORT'),
      wsPort: num(env, 'WS_PORT'),
    },
    capture: {
      framesDir: str(env, 'FRAMES_DIR'),
      fps: num(env, 'CAPTURE_FPS'),
      processEveryN: num(env, 'PROCESS_EVERY_N_FRAMES'),
      maxBacklog: num(env, 'FRAME_BACKLOG'),
      dualRegion: bool(env, 'OCR_DUAL_REGION'),
      titleFraction: num(env, 'OCR_TITLE_FRACTION'),
      scanningStatusEvery: num(env, 'SCANNING_STATUS_EVERY'),
    },
    ocr: {
      engines: list(env, 'OCR_ENGINES'),
      language: str(env, 'OCR_LANGUAGE'),
      pageSegMode: num(env, 'OCR_PSM'),
      langPath: str(env, 'OCR_LANG_PATH'),
    },
    audio: {
      enabled: bool(env, 'AUDIO_ENABLED'),
      ffmpegPath: str(env, 'FFMPEG_PATH'),
      inputFormat: str(env, 'AUDIO_INPUT_FORMAT'),
      input: str(env, 'AUDIO_INPUT'),
      chunkSeconds: num(env, 'AUDIO_CHUNK_SECONDS'),
      sampleRate: num(env, 'AUDIO_SAMPLE_RATE'),
      queueCapacity: num(env, 'AUDIO_QUEUE_CAPACITY'),
      staleAfterMs: num(env, 'AUDIO_STALE_AFTER_MS'),
    },
    transcription: {
      baseUrl: str(env, 'TRANSCRIPTION_BASE_URL'),
      apiKey: str(env, 'TRANSCRIPTION_API_KEY'),
      model: str(env, 'TRANSCRIPTION_MODEL'),
      language: str(env, 'TRANSCRIPTION_LANGUAGE'),
      timeoutMs: num(env, 'TRANSCRIPTION_TIMEOUT_MS'),
    },
    llm: {
      baseUrl: str(env, 'LLM_BASE_URL'),
      apiKey: str(env, 'LLM_API_KEY'),
      model: str(env, 'LLM_MODEL'),
      visionModel: str(env, 'LLM_VISION_MODEL'),
      timeoutMs: num(env, 'LLM_TIMEOUT_MS'),
    },
    soldListings: {
      appId: str(env, 'EBAY_APP_ID'),
      baseUrl: str(env, 'EBAY_FINDING_URL'),
      categoryId: str(env, 'EBAY_CATEGORY_ID'),
      pageSize: num(env, 'EBAY_PAGE_SIZE'),
      timeoutMs: num(env, 'EBAY_TIMEOUT_MS'),
    },
    pricing: {
      cacheTtlHours: num(env, 'PRICE_CACHE_TTL_HOURS'),
      failureTtlSeconds: num(env, 'PRICE_FAILURE_TTL_SECONDS'),
      cachePath: str(env, 'PRICE_CACHE_PATH'),
      fuzzyThreshold: num(env, 'FUZZY_MATCH_THRESHOLD'),
      minimumComparables: num(env, 'MIN_COMPARABLES'),
      queryMaxLength: num(env, 'QUERY_MAX_LENGTH'),
    },
    continuity: {
      ttlMs: num(env, 'CONTINUITY_TTL_MS'),
    },
    history: {
      dbPath: str(env, 'HISTORY_DB_PATH'),
      cap: num(env, 'HISTORY_CAP'),
      maxSessions: num(env, 'HISTORY_MAX_SESSIONS'),
    },
    advisory: {
      enabled: bool(env, 'ADVISORY_ENABLED'),
      cacheTtlSeconds: num(env, 'ADVISORY_CACHE_TTL_SECONDS'),
    },
  };
}

/**
 * Build the validated configuration from an environment map.
 * Callers load `.env` first; this function has no side effects.
 */
export function loadConfig(env: Env = process.env): Config {
  const result = ConfigSchema.safeParse(rawConfigFromEnv(env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
