import type { SessionHistoryStore } from '../core/history/HistoryPort';
import type { PriceCache } from '../core/pricing/PriceCachePort';
import type { FrameSource } from '../core/source/SourcePorts';
import type { ResultTransport } from '../core/transport/ResultTransportPort';
import type { AnalysisBundle } from '../core/types';
import {
  FrameOrchestrator,
  type OrchestratorDeps,
  type OrchestratorOptions,
  type OrchestratorStats,
} from '../orchestrator/FrameOrchestrator';
import type { Mutex } from '../utils/mutex';
import { createLogger } from '../utils/logger';
import { createSessionContext, disposeSessionContext, type SessionContext } from './SessionContext';

const logger = createLogger('session-manager');

/** Process-wide collaborators every session is built from. */
export interface SessionServices extends Omit<OrchestratorDeps, 'source' | 'transport'> {
  createFrameSource: () => FrameSource;
  createPriceCache: () => PriceCache;
  /** Set when one persistent cache is shared by every session. */
  sharedPricing?: { priceCache: PriceCache; priceLock: Mutex };
  orchestrator: OrchestratorOptions;
  continuityTtlMs: number;
}

/**
 * One viewer's analysis session: its context plus the frame loop driving it.
 */
export class AnalysisSession {
  readonly context: SessionContext;
  private orchestrator?: FrameOrchestrator;

  constructor(
    private readonly services: SessionServices,
    private readonly transport: ResultTransport,
    id?: string
  ) {
    this.context = createSessionContext({
      id,
      continuityTtlMs: services.continuityTtlMs,
      shared: services.sharedPricing,
      createCache: services.createPriceCache,
    });
  }

  get id(): string {
    return this.context.id;
  }

  get isRunning(): boolean {
    return this.orchestrator?.isRunning ?? false;
  }

  /** Resolves false when analysis is already running. */
  async start(): Promise<boolean> {
    if (this.orchestrator?.isRunning) {
      return false;
    }

    const services = this.services;
    this.orchestrator = new FrameOrchestrator(
      this.context,
      {
        source: services.createFrameSource(),
        recognizer: services.recognizer,
        transcriber: services.transcriber,
        resolver: services.resolver,
        signals: services.signals,
        advisory: services.advisory,
        transport: this.transport,
        history: services.history,
      },
      services.orchestrator
    );
    await this.orchestrator.start();
    return true;
  }

  /** Resolves false when nothing was running. */
  async stop(): Promise<boolean> {
    const orchestrator = this.orchestrator;
    if (!orchestrator?.isRunning) {
      return false;
    }
    await orchestrator.stop();
    return true;
  }

  getHistory(limit?: number): AnalysisBundle[] {
    return this.services.history.getSession(this.id, limit);
  }

  getStats(): OrchestratorStats | undefined {
    return this.orchestrator?.getStats();
  }

  async dispose(): Promise<void> {
    await this.stop();
    disposeSessionContext(this.context, this.services.sharedPricing?.priceCache);
  }
}

export class SessionManager {
  private readonly sessions = new Map<string, AnalysisSession>();

  constructor(private readonly services: SessionServices) {}

  create(transport: ResultTransport, id?: string): AnalysisSession {
    const session = new AnalysisSession(this.services, transport, id);
    this.sessions.set(session.id, session);
    logger.info('Session created', { sessionId: session.id, active: this.sessions.size });
    return session;
  }

  get(id: string): AnalysisSession | undefined {
    return this.sessions.get(id);
  }

  /** Active, or finished with history still on record. */
  isKnown(id: string): boolean {
    return this.sessions.has(id) || this.services.history.hasSession(id);
  }

  get history(): SessionHistoryStore {
    return this.services.history;
  }

  get size(): number {
    return this.sessions.size;
  }

  async remove(id: string): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    await session.dispose();
    logger.info('Session closed', { sessionId: id, active: this.sessions.size });
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.remove(id)));
  }
}
