/**
 * Speech-to-text over an OpenAI-compatible `/v1/audio/transcriptions` endpoint
 * (OpenAI, a local whisper.cpp server, LM Studio, ...).
 */

import axios, { type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { z } from 'zod';
import type { SpeechToTextPort, TranscriptionResult } from '../../core/speech/SpeechToTextPort';
import type { AudioChunk } from '../../core/types';
import { encodeWav } from '../../audio/wav';
import { ExternalServiceError, ServiceUnavailableError, toErrorMessage } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('whisper-transcriber');

const TranscriptionResponseSchema = z.object({
  text: z.string(),
  language: z.string().optional(),
});

export interface WhisperConfig {
  baseUrl?: string;
  apiKey?: string;
  model: string;
  language: string;
  timeoutMs: number;
}

export class WhisperTranscriber implements SpeechToTextPort {
  readonly name = 'whisper';
  private readonly api?: AxiosInstance;

  constructor(private readonly config: WhisperConfig) {
    if (config.baseUrl) {
      this.api = axios.create({
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        headers: config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {},
      });
    }
  }

  async initialize(): Promise<void> {
    if (!this.api) {
      throw new ServiceUnavailableError('transcription', 'TRANSCRIPTION_BASE_URL not configured');
    }
    try {
      await this.api.get('/v1/models', { timeout: 5000 });
    } catch (error) {
      throw new ServiceUnavailableError('transcription', toErrorMessage(error));
    }
    logger.info('Transcription endpoint ready', { baseUrl: this.config.baseUrl, model: this.config.model });
  }

  async transcribe(chunk: AudioChunk, options: { signal?: AbortSignal } = {}): Promise<TranscriptionResult> {
    if (!this.api) {
      throw new ServiceUnavailableError('transcription', 'not configured');
    }

    const form = new FormData();
    form.append('file', encodeWav(chunk.pcm, chunk.sampleRate, chunk.channels), {
      filename: 'chunk.wav',
      contentType: 'audio/wav',
    });
    form.append('model', this.config.model);
    form.append('language', this.config.language);
    form.append('response_format', 'json');

    try {
      const response = await this.api.post<unknown>('/v1/audio/transcriptions', form, {
        headers: form.getHeaders(),
        signal: options.signal,
        maxBodyLength: Infinity,
      });

      const parsed = TranscriptionResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error('Unexpected transcription response shape');
      }
      return { text: parsed.data.text.trim(), language: parsed.data.language };
    } catch (error) {
      throw new ExternalServiceError('transcription', error);
    }
  }
}
