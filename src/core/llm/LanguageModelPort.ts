import type { Advisory, ItemAttributes, PriceSnapshot } from '../types';

/**
 * Optional text model used for search-query compaction and deal commentary.
 */
export interface LanguageModelPort {
  readonly name: string;

  /** Shorten an item description to a search query of at most `maxLength` characters. */
  compactQuery(attributes: ItemAttributes, maxLength: number): Promise<string>;

  advise(attributes: ItemAttributes, currentBid: number, snapshot: PriceSnapshot): Promise<Advisory>;

  healthCheck(): Promise<{ healthy: boolean; latency?: number; error?: string }>;
}
