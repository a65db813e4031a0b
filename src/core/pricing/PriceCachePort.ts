import type { PriceSnapshot } from '../types';

export interface PriceCache {
  get(key: string): PriceSnapshot | undefined;
  set(key: string, snapshot: PriceSnapshot, ttlSeconds: number): void;
  delete(key: string): void;
  stats(): { keys: number; hits: number; misses: number };
  close(): void;
}
