/**
 * ffmpeg-backed audio source: records the configured input device as 16-bit mono PCM
 * and cuts it into fixed-duration chunks.
 */

import { spawn, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import type { AudioSource } from '../../core/source/SourcePorts';
import type { AudioChunk } from '../../core/types';
import { pcmDurationMs } from '../../audio/wav';
import { DropOldestQueue } from '../../utils/boundedQueue';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ffmpeg-audio');

export interface FfmpegAudioConfig {
  ffmpegPath: string;
  /** ffmpeg demuxer, e.g. pulse, alsa, avfoundation, dshow */
  inputFormat: string;
  input: string;
  sampleRate: number;
  chunkSeconds: number;
}

const CHANNELS = 1;
const BYTES_PER_SAMPLE = 2;

export class FfmpegAudioSource implements AudioSource {
  private process?: ChildProcessByStdio<null, Readable, Readable>;
  private readonly chunks = new DropOldestQueue<AudioChunk | Error>(2);
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private chunkStartedAt = 0;
  private running = false;

  constructor(private readonly config: FfmpegAudioConfig) {}

  private get chunkBytes(): number {
    return Math.round(this.config.sampleRate * this.config.chunkSeconds) * BYTES_PER_SAMPLE * CHANNELS;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.spawnRecorder();
  }

  async nextChunk(signal?: AbortSignal): Promise<AudioChunk | undefined> {
    if (!this.running) return undefined;
    if (!this.process) {
      this.spawnRecorder();
    }

    const item = await this.chunks.take(signal);
    if (item instanceof Error) {
      throw item;
    }
    return item;
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    const child = this.process;
    this.process = undefined;
    if (child && child.exitCode === null) {
      await new Promise<void>((resolve) => {
        child.once('exit', () => resolve());
        child.kill('SIGTERM');
      });
    }
    this.resetPending();
    this.chunks.clear();
  }

  private spawnRecorder(): void {
    const args = [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.config.inputFormat,
      '-i',
      this.config.input,
      '-ac',
      String(CHANNELS),
      '-ar',
      String(this.config.sampleRate),
      '-f',
      's16le',
      'pipe:1',
    ];

    const child = spawn(this.config.ffmpegPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    this.process = child;
    this.resetPending();
    logger.info('Audio recorder started', { input: this.config.input, format: this.config.inputFormat });

    child.stdout.on('data', (data: Buffer) => this.append(data));
    child.stderr.on('data', (data: Buffer) => {
      logger.debug('ffmpeg stderr', { line: data.toString().trim() });
    });
    child.on('error', (error) => {
      this.handleExit(child, error);
    });
    child.on('exit', (code, signal) => {
      this.handleExit(child, new Error(`ffmpeg exited (code ${code ?? 'null'}, signal ${signal ?? 'none'})`));
    });
  }

  private handleExit(child: ChildProcessByStdio<null, Readable, Readable>, error: Error): void {
    if (this.process !== child) return;
    this.process = undefined;
    if (this.running) {
      logger.warn('Audio recorder stopped unexpectedly', { error: error.message });
      this.chunks.push(error);
    }
  }

  private append(data: Buffer): void {
    if (this.pendingBytes === 0) {
      this.chunkStartedAt = Date.now();
    }
    this.pending.push(data);
    this.pendingBytes += data.length;

    while (this.pendingBytes >= this.chunkBytes) {
      const all = Buffer.concat(this.pending);
      const pcm = all.subarray(0, this.chunkBytes);
      const rest = all.subarray(this.chunkBytes);

      this.chunks.push({
        pcm,
        sampleRate: this.config.sampleRate,
        channels: CHANNELS,
        startedAt: this.chunkStartedAt,
        durationMs: pcmDurationMs(pcm.length, this.config.sampleRate, CHANNELS),
      });

      this.pending = rest.length > 0 ? [rest] : [];
      this.pendingBytes = rest.length;
      this.chunkStartedAt = Date.now();
    }
  }

  private resetPending(): void {
    this.pending = [];
    this.pendingBytes = 0;
  }
}
