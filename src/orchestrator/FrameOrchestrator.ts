/**
 * FrameOrchestrator - per-session frame loop.
 *
 * Every frame goes out as a preview; every Nth frame runs the full chain
 * recognize → auction parse → fuse → continuity → price → signal → advisory,
 * strictly in that order, and the bundle goes to the transport and history.
 * A failing frame is reported to the viewer and the loop moves on.
 */

import type { SessionHistoryStore } from '../core/history/HistoryPort';
import type { FrameSource } from '../core/source/SourcePorts';
import type { ResultTransport } from '../core/transport/ResultTransportPort';
import {
  isResolved,
  type Advisory,
  type AnalysisBundle,
  type AuctionInfo,
  type Frame,
  type Identity,
} from '../core/types';
import { formatAdvisory, type AdvisoryService } from '../advisory/AdvisoryService';
import type { SpeechTranscriber } from '../audio/SpeechTranscriber';
import { fuse } from '../fusion/IdentityFuser';
import { PerformanceClock } from '../platform/clock/perf';
import type { PriceResolver } from '../pricing/PriceResolver';
import { parseAuctionInfo } from '../recognition/attributes';
import type { TextRecognizer } from '../recognition/TextRecognizer';
import type { SessionContext } from '../session/SessionContext';
import type { SignalEngine } from '../signals/SignalEngine';
import { toErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { sleep } from '../utils/sleep';

const logger = createLogger('frame-orchestrator');

export const SCANNING_MESSAGE = 'Scanning for cards...';

export type TranscriptFeed = Pick<SpeechTranscriber, 'fusionInput' | 'getStatus'>;

export interface OrchestratorDeps {
  source: FrameSource;
  recognizer: Pick<TextRecognizer, 'recognize'>;
  transcriber: TranscriptFeed;
  resolver: Pick<PriceResolver, 'resolve'>;
  signals: Pick<SignalEngine, 'score'>;
  advisory?: Pick<AdvisoryService, 'advise'>;
  transport: ResultTransport;
  history: SessionHistoryStore;
}

export interface OrchestratorOptions {
  fps: number;
  processEveryN: number;
  scanningStatusEvery: number;
}

export interface OrchestratorStats {
  framesSeen: number;
  framesProcessed: number;
  bundlesSent: number;
  errors: number;
}

/** 0.4 for a name, 0.2 each for year, grade and a live bid. */
export function detectionConfidence(identity: Identity, auction: AuctionInfo): number {
  let confidence = 0;
  if (identity.name) confidence += 0.4;
  if (identity.year) confidence += 0.2;
  if (identity.grade) confidence += 0.2;
  if (auction.currentBid > 0) confidence += 0.2;
  return Math.min(1, Math.round(confidence * 10) / 10);
}

export class FrameOrchestrator {
  private controller?: AbortController;
  private loop?: Promise<void>;
  private readonly perf = new PerformanceClock();
  private stats: OrchestratorStats = { framesSeen: 0, framesProcessed: 0, bundlesSent: 0, errors: 0 };

  constructor(
    private readonly session: SessionContext,
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
    private readonly now: () => number = Date.now
  ) {}

  get isRunning(): boolean {
    return this.controller !== undefined;
  }

  async start(): Promise<void> {
    if (this.controller) {
      return;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.stats = { framesSeen: 0, framesProcessed: 0, bundlesSent: 0, errors: 0 };

    try {
      await this.deps.source.start();
    } catch (error) {
      this.controller = undefined;
      this.loop = undefined;
      throw error;
    }
    this.loop = this.run(controller.signal);

    logger.info('Analysis started', {
      sessionId: this.session.id,
      fps: this.options.fps,
      processEveryN: this.options.processEveryN,
    });
  }

  /**
   * Nothing reaches the transport or history once this resolves. Continuity and the
   * price cache are left as they are so a restart picks up where this run left off.
   */
  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) {
      return;
    }
    this.controller = undefined;
    controller.abort();

    await this.deps.source.stop();
    await this.loop;
    this.loop = undefined;

    logger.info('Analysis stopped', {
      sessionId: this.session.id,
      ...this.stats,
      recognizeMs: this.perf.getStats('recognize').p50Ms,
      priceMs: this.perf.getStats('price').p50Ms,
    });
  }

  getStats(): OrchestratorStats {
    return { ...this.stats };
  }

  private async run(signal: AbortSignal): Promise<void> {
    const intervalMs = 1000 / Math.max(0.1, this.options.fps);
    let lastFrameAt = Number.NEGATIVE_INFINITY;

    while (!signal.aborted) {
      let frame: Frame | undefined;
      try {
        frame = await this.deps.source.next(signal);
      } catch (error) {
        if (signal.aborted) break;
        this.stats.errors++;
        logger.warn('Frame source failed', { sessionId: this.session.id, error: toErrorMessage(error) });
        this.deps.transport.sendStatus('error', toErrorMessage(error));
        await sleep(intervalMs, signal);
        continue;
      }
      if (!frame || signal.aborted) {
        break;
      }

      const wait = lastFrameAt + intervalMs - this.now();
      if (wait > 0) {
        await sleep(wait, signal);
        if (signal.aborted) break;
      }
      lastFrameAt = this.now();

      this.stats.framesSeen++;
      const count = this.stats.framesSeen;
      this.deps.transport.sendFrame(frame.index, frame.image, frame.mimeType);

      if (count % this.options.processEveryN !== 0) {
        continue;
      }

      try {
        await this.processFrame(frame, count, signal);
      } catch (error) {
        if (signal.aborted) break;
        this.stats.errors++;
        logger.error('Frame processing failed', {
          sessionId: this.session.id,
          frameIndex: frame.index,
          error: toErrorMessage(error),
        });
        this.deps.transport.sendStatus('error', toErrorMessage(error), { frameIndex: frame.index });
      }
    }
  }

  private async processFrame(frame: Frame, count: number, signal: AbortSignal): Promise<void> {
    const started = this.perf.now();
    this.stats.framesProcessed++;

    const { result: recognized } = await this.perf.measureAsync(
      () => this.deps.recognizer.recognize(frame.image),
      'recognize'
    );
    const auctionInfo = parseAuctionInfo(recognized.priceText);

    const spoken = this.deps.transcriber.fusionInput(this.now());
    const fused = fuse(recognized.attributes, spoken.attributes, recognized.confidence, spoken.confidence);
    const identity = this.session.continuity.update(fused, this.now());

    if (!isResolved(identity)) {
      if (!signal.aborted && count % this.options.scanningStatusEvery === 0) {
        this.deps.transport.sendStatus('scanning', SCANNING_MESSAGE, {
          ocrText: recognized.text,
          frameIndex: frame.index,
        });
      }
      return;
    }

    const { result: priceSnapshot } = await this.perf.measureAsync(
      () => this.deps.resolver.resolve(identity, this.session),
      'price'
    );
    const signalResult = this.deps.signals.score(identity, auctionInfo.currentBid, priceSnapshot);

    let advisory: Advisory | undefined;
    const advisoryService = this.deps.advisory;
    if (advisoryService && signalResult.recommendation !== 'INSUFFICIENT_DATA') {
      const timed = await this.perf.measureAsync(
        () => advisoryService.advise(identity, auctionInfo.currentBid, priceSnapshot),
        'advise'
      );
      advisory = timed.result;
    }

    if (signal.aborted) {
      return;
    }

    const bundle: AnalysisBundle = {
      sessionId: this.session.id,
      frameIndex: frame.index,
      identity,
      auctionInfo,
      priceSnapshot,
      signalResult,
      advisory,
      advisoryText: advisory ? formatAdvisory(advisory) : undefined,
      audioStatus: this.deps.transcriber.getStatus(this.now()),
      detectionConfidence: detectionConfidence(identity, auctionInfo),
      engine: recognized.engine,
      processingMs: Math.round(this.perf.now() - started),
      timestamp: new Date(this.now()).toISOString(),
    };

    this.deps.transport.sendResult(bundle);
    this.deps.history.log(this.session.id, bundle);
    this.stats.bundlesSent++;

    logger.debug('Bundle sent', {
      sessionId: this.session.id,
      frameIndex: frame.index,
      recommendation: signalResult.recommendation,
      processingMs: bundle.processingMs,
    });
  }
}
