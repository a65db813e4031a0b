/**
 * SpeechTranscriber - background capture and transcription of the seller's voice.
 *
 * Two loops share a drop-oldest queue: the capture loop never waits on
 * transcription, and the frame pipeline only ever reads the latest snapshot.
 */

import type { SpeechToTextPort } from '../core/speech/SpeechToTextPort';
import type { AudioSource } from '../core/source/SourcePorts';
import {
  emptySpokenAttributes,
  type AudioChunk,
  type AudioStatus,
  type SpokenAttributes,
  type TranscriptSnapshot,
} from '../core/types';
import { DropOldestQueue } from '../utils/boundedQueue';
import { toErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sleep } from '../utils/sleep';
import { parseSpokenAttributes, spokenConfidence } from './spokenAttributes';

const logger = createLogger('speech-transcriber');

export interface SpeechTranscriberOptions {
  queueCapacity: number;
  /** Snapshots older than this fuse with zero weight. 0 disables the check. */
  staleAfterMs: number;
  captureBackoffMs?: number;
}

type ServiceState = 'uninitialized' | 'ready' | 'unavailable';

export class SpeechTranscriber {
  private readonly queue: DropOldestQueue<AudioChunk>;
  private state: ServiceState = 'uninitialized';
  private initializing?: Promise<boolean>;
  private controller?: AbortController;
  private loops?: Promise<void>;
  private latest: TranscriptSnapshot = {
    transcript: '',
    attributes: emptySpokenAttributes(),
    confidence: 0,
    active: false,
    updatedAt: null,
  };
  private chunksTranscribed = 0;
  private transcriptionErrors = 0;

  constructor(
    private readonly stt: SpeechToTextPort | undefined,
    private readonly source: AudioSource | undefined,
    private readonly options: SpeechTranscriberOptions,
    private readonly now: () => number = Date.now
  ) {
    this.queue = new DropOldestQueue<AudioChunk>(options.queueCapacity);
  }

  /** Probe the speech model once. Resolves false when the service is unavailable. */
  initialize(): Promise<boolean> {
    if (!this.initializing) {
      this.initializing = this.probe();
    }
    return this.initializing;
  }

  get isAvailable(): boolean {
    return this.state === 'ready';
  }

  get isRunning(): boolean {
    return this.controller !== undefined;
  }

  async start(): Promise<void> {
    const stt = this.stt;
    const source = this.source;
    if (!(await this.initialize()) || !stt || !source) {
      return;
    }
    if (this.controller) {
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    try {
      await source.start();
    } catch (error) {
      this.controller = undefined;
      throw error;
    }
    this.latest = { ...this.latest, active: true };

    this.loops = Promise.all([
      this.captureLoop(source, controller.signal),
      this.transcriptionLoop(stt, controller.signal),
    ]).then(() => undefined);

    logger.info('Speech transcriber started', {
      engine: stt.name,
      queueCapacity: this.options.queueCapacity,
    });
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = undefined;
    controller.abort();

    await this.source?.stop();
    await this.loops;
    this.loops = undefined;
    this.queue.clear();
    this.latest = { ...this.latest, active: false };

    logger.info('Speech transcriber stopped', {
      chunksTranscribed: this.chunksTranscribed,
      droppedChunks: this.queue.droppedCount,
    });
  }

  /** Non-blocking read of the last published snapshot. */
  getLatest(): TranscriptSnapshot {
    return { ...this.latest, attributes: { ...this.latest.attributes } };
  }

  /**
   * Attributes and the confidence they should carry into fusion right now.
   * Inactive, unavailable or stale snapshots contribute nothing.
   */
  fusionInput(now: number = this.now()): { attributes: SpokenAttributes; confidence: number } {
    const latest = this.getLatest();
    if (!latest.active || latest.updatedAt === null || this.isStale(latest.updatedAt, now)) {
      return { attributes: latest.attributes, confidence: 0 };
    }
    return { attributes: latest.attributes, confidence: latest.confidence };
  }

  getStatus(now: number = this.now()): AudioStatus {
    return {
      available: this.isAvailable,
      active: this.latest.active,
      transcript: this.latest.transcript,
      confidence: this.latest.confidence,
      ageMs: this.latest.updatedAt === null ? null : Math.max(0, now - this.latest.updatedAt),
    };
  }

  getStats(): { chunksTranscribed: number; transcriptionErrors: number; droppedChunks: number; queued: number } {
    return {
      chunksTranscribed: this.chunksTranscribed,
      transcriptionErrors: this.transcriptionErrors,
      droppedChunks: this.queue.droppedCount,
      queued: this.queue.size,
    };
  }

  private isStale(updatedAt: number, now: number): boolean {
    return this.options.staleAfterMs > 0 && now - updatedAt > this.options.staleAfterMs;
  }

  private async probe(): Promise<boolean> {
    if (!this.stt || !this.source) {
      this.state = 'unavailable';
      logger.warn('Speech transcription disabled: no engine or audio source configured');
      return false;
    }
    try {
      await this.stt.initialize();
      this.state = 'ready';
      return true;
    } catch (error) {
      this.state = 'unavailable';
      logger.warn('Speech model unavailable; audio channel disabled', {
        engine: this.stt.name,
        error: toErrorMessage(error),
      });
      return false;
    }
  }

  private async captureLoop(source: AudioSource, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        const chunk = await source.nextChunk(signal);
        if (!chunk) {
          break;
        }
        const evicted = this.queue.push(chunk);
        if (evicted) {
          logger.debug('Audio queue full, dropped oldest chunk', { dropped: this.queue.droppedCount });
        }
      } catch (error) {
        if (signal.aborted) break;
        logger.warn('Audio capture failed, backing off', { error: toErrorMessage(error) });
        await sleep(this.options.captureBackoffMs ?? 1000, signal);
      }
    }
  }

  private async transcriptionLoop(stt: SpeechToTextPort, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const chunk = await this.queue.take(signal);
      if (!chunk) {
        break;
      }

      try {
        const result = await stt.transcribe(chunk, { signal });
        if (signal.aborted) break;

        const attributes = parseSpokenAttributes(result.text);
        this.latest = {
          transcript: result.text,
          attributes,
          confidence: spokenConfidence(attributes),
          active: true,
          updatedAt: chunk.startedAt + chunk.durationMs,
        };
        this.chunksTranscribed++;
        logger.debug('Transcript published', {
          transcript: result.text,
          confidence: this.latest.confidence,
        });
      } catch (error) {
        if (signal.aborted) break;
        this.transcriptionErrors++;
        logger.warn('Transcription failed', { error: toErrorMessage(error) });
      }
    }
  }
}
