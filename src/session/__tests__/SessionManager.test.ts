import type { PriceCache } from '../../core/pricing/PriceCachePort';
import type { ResultTransport } from '../../core/transport/ResultTransportPort';
import { MemoryPriceCache } from '../../pricing/priceCache';
import { Mutex } from '../../utils/mutex';
import { createSessionContext, disposeSessionContext } from '../SessionContext';
import { SessionManager } from '../SessionManager';
import { makeBundle } from './bundle';
import { idleServices } from './services';

const transport: ResultTransport = {
  sendFrame: jest.fn(),
  sendResult: jest.fn(),
  sendStatus: jest.fn(),
};

describe('createSessionContext', () => {
  test('should give each session its own cache and lock by default', () => {
    const a = createSessionContext({ continuityTtlMs: 1000, createCache: () => new MemoryPriceCache() });
    const b = createSessionContext({ continuityTtlMs: 1000, createCache: () => new MemoryPriceCache() });

    expect(a.id).not.toBe(b.id);
    expect(a.priceCache).not.toBe(b.priceCache);
    expect(a.priceLock).not.toBe(b.priceLock);

    disposeSessionContext(a);
    disposeSessionContext(b);
  });

  test('should reuse a shared cache and leave it open on dispose', () => {
    const shared = { priceCache: new MemoryPriceCache(), priceLock: new Mutex() };
    const close = jest.spyOn(shared.priceCache, 'close');
    const context = createSessionContext({
      id: 'fixed',
      continuityTtlMs: 1000,
      shared,
      createCache: () => new MemoryPriceCache(),
      now: () => new Date('2026-01-01T00:00:00.000Z'),
    });

    expect(context.id).toBe('fixed');
    expect(context.priceCache).toBe(shared.priceCache);
    expect(context.startedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');

    disposeSessionContext(context, shared.priceCache);
    expect(close).not.toHaveBeenCalled();
    shared.priceCache.close();
  });
});

describe('SessionManager', () => {
  test('should start a session once and stop it', async () => {
    const manager = new SessionManager(idleServices());
    const session = manager.create(transport, 'viewer-1');

    await expect(session.start()).resolves.toBe(true);
    await expect(session.start()).resolves.toBe(false);
    expect(session.isRunning).toBe(true);

    await expect(session.stop()).resolves.toBe(true);
    await expect(session.stop()).resolves.toBe(false);
    expect(session.getStats()).toEqual({ framesSeen: 0, framesProcessed: 0, bundlesSent: 0, errors: 0 });

    await manager.closeAll();
  });

  test('should start again after the frame source failed to start', async () => {
    const services = idleServices();
    let attempts = 0;
    const manager = new SessionManager({
      ...services,
      createFrameSource: () => {
        const source = services.createFrameSource();
        attempts++;
        if (attempts === 1) {
          jest.spyOn(source, 'start').mockRejectedValueOnce(new Error('frames folder missing'));
        }
        return source;
      },
    });
    const session = manager.create(transport);

    await expect(session.start()).rejects.toThrow('frames folder missing');
    expect(session.isRunning).toBe(false);
    await expect(session.start()).resolves.toBe(true);
    expect(session.isRunning).toBe(true);

    await manager.closeAll();
  });

  test('should build a fresh frame source for every run', async () => {
    const services = idleServices();
    const createFrameSource = jest.fn(services.createFrameSource);
    const manager = new SessionManager({ ...services, createFrameSource });
    const session = manager.create(transport);

    await session.start();
    await session.stop();
    await session.start();
    await manager.closeAll();

    expect(createFrameSource).toHaveBeenCalledTimes(2);
  });

  test('should close a private cache when the session is removed', async () => {
    const caches: PriceCache[] = [];
    const manager = new SessionManager(
      idleServices({
        createPriceCache: () => {
          const cache = new MemoryPriceCache();
          caches.push(cache);
          return cache;
        },
      })
    );
    manager.create(transport, 'viewer-1');
    expect(caches).toHaveLength(1);
    const close = jest.spyOn(caches[0], 'close');

    await manager.remove('viewer-1');

    expect(close).toHaveBeenCalledTimes(1);
    expect(manager.get('viewer-1')).toBeUndefined();
    expect(manager.size).toBe(0);
  });

  test('should know sessions that are active or have history', async () => {
    const services = idleServices();
    const manager = new SessionManager(services);
    manager.create(transport, 'live');
    services.history.log('finished', makeBundle('finished', 0));

    expect(manager.isKnown('live')).toBe(true);
    expect(manager.isKnown('finished')).toBe(true);
    expect(manager.isKnown('never')).toBe(false);

    await manager.closeAll();
  });

  test('should read history through the session', async () => {
    const services = idleServices();
    const manager = new SessionManager(services);
    const session = manager.create(transport, 'viewer-1');
    services.history.log('viewer-1', makeBundle('viewer-1', 0));
    services.history.log('viewer-1', makeBundle('viewer-1', 1));

    expect(session.getHistory(1).map((b) => b.frameIndex)).toEqual([1]);

    await manager.closeAll();
  });
});
