import { DropOldestQueue } from '../boundedQueue';

describe('DropOldestQueue', () => {
  test('should reject a non-positive capacity', () => {
    expect(() => new DropOldestQueue<number>(0)).toThrow(RangeError);
    expect(() => new DropOldestQueue<number>(1.5)).toThrow(RangeError);
  });

  test('should evict the oldest item when full', () => {
    const queue = new DropOldestQueue<string>(2);
    expect(queue.push('a')).toBeUndefined();
    expect(queue.push('b')).toBeUndefined();
    expect(queue.push('c')).toBe('a');
    expect(queue.size).toBe(2);
    expect(queue.droppedCount).toBe(1);
  });

  test('should deliver items in arrival order', async () => {
    const queue = new DropOldestQueue<number>(3);
    queue.push(1);
    queue.push(2);
    await expect(queue.take()).resolves.toBe(1);
    await expect(queue.take()).resolves.toBe(2);
  });

  test('should hand a pushed item straight to a waiting consumer', async () => {
    const queue = new DropOldestQueue<number>(1);
    const pending = queue.take();
    expect(queue.push(7)).toBeUndefined();
    await expect(pending).resolves.toBe(7);
    expect(queue.size).toBe(0);
  });

  test('should resolve undefined when the signal aborts', async () => {
    const queue = new DropOldestQueue<number>(1);
    const controller = new AbortController();
    const pending = queue.take(controller.signal);
    controller.abort();
    await expect(pending).resolves.toBeUndefined();

    // The aborted waiter must not swallow later items
    queue.push(3);
    expect(queue.size).toBe(1);
  });

  test('should resolve undefined immediately for an already aborted signal', async () => {
    const queue = new DropOldestQueue<number>(1);
    await expect(queue.take(AbortSignal.abort())).resolves.toBeUndefined();
  });

  test('should clear pending items', () => {
    const queue = new DropOldestQueue<number>(4);
    queue.push(1);
    queue.push(2);
    queue.clear();
    expect(queue.size).toBe(0);
  });
});
