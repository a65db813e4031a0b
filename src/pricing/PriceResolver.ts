/**
 * PriceResolver - identity to sold-price distribution.
 *
 * cache → query (LLM-compacted or plain) → search → one broadened retry →
 * similarity filter → statistics → cache. Search failures become an empty
 * snapshot instead of a rejection.
 */

import type { LanguageModelPort } from '../core/llm/LanguageModelPort';
import type { SoldListingsPort } from '../core/listings/SoldListingsPort';
import type { PriceCache } from '../core/pricing/PriceCachePort';
import type { ItemAttributes, PriceSnapshot, SoldListing } from '../core/types';
import type { Mutex } from '../utils/mutex';
import { toErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { priceCacheKey } from './cacheKey';
import { filterBySimilarity } from './fuzzyFilter';
import { emptySnapshot, summarize, type SnapshotMeta } from './stats';

const logger = createLogger('price-resolver');

export interface PriceResolverOptions {
  cacheTtlHours: number;
  /** TTL for failed or empty lookups, so they are retried sooner. */
  failureTtlSeconds: number;
  fuzzyThreshold: number;
  queryMaxLength: number;
}

/** The slice of a session the resolver reads and writes. */
export interface PricingContext {
  priceCache: PriceCache;
  priceLock: Mutex;
}

export function buildPlainQuery(attributes: ItemAttributes): string {
  return [
    attributes.name,
    attributes.year,
    attributes.set,
    attributes.itemNumber ? `#${attributes.itemNumber}` : null,
    attributes.grade,
  ]
    .filter((part): part is string => Boolean(part && part.trim()))
    .map((part) => part.trim())
    .join(' ');
}

export function broaden(attributes: ItemAttributes): ItemAttributes {
  return { ...attributes, grade: null, gradingCompany: null, itemNumber: null };
}

export class PriceResolver {
  private searches = 0;

  constructor(
    private readonly listings: SoldListingsPort | undefined,
    private readonly llm: LanguageModelPort | undefined,
    private readonly options: PriceResolverOptions,
    private readonly now: () => Date = () => new Date()
  ) {}

  get searchCount(): number {
    return this.searches;
  }

  get isAvailable(): boolean {
    return this.listings !== undefined;
  }

  /**
   * Read-modify-write of the session cache runs under the session's lock, so two
   * overlapping calls for the same identity search at most once.
   */
  resolve(identity: ItemAttributes, context: PricingContext): Promise<PriceSnapshot> {
    return context.priceLock.runExclusive(() => this.resolveLocked(identity, context.priceCache));
  }

  private async resolveLocked(identity: ItemAttributes, cache: PriceCache): Promise<PriceSnapshot> {
    const key = priceCacheKey(identity);
    const cached = cache.get(key);
    if (cached) {
      return { ...cached, source: cached.source === 'live' ? 'cache' : cached.source };
    }

    const listings = this.listings;
    if (!listings) {
      return emptySnapshot(this.meta(buildPlainQuery(identity), 'unavailable'));
    }

    let query = await this.buildQuery(identity);
    let broadened = false;
    let results: SoldListing[];

    try {
      results = await this.search(listings, query);

      if (results.length === 0) {
        const broadQuery = await this.buildQuery(broaden(identity));
        if (broadQuery && broadQuery !== query) {
          logger.debug('No results, broadening query', { query, broadQuery });
          query = broadQuery;
          broadened = true;
          results = await this.search(listings, query);
        }
      }
    } catch (error) {
      logger.warn('Sold listings search failed', { query, error: toErrorMessage(error) });
      const failed = emptySnapshot(this.meta(query, 'error', { broadened }));
      cache.set(key, failed, this.options.failureTtlSeconds);
      return failed;
    }

    const { kept, filtered, rejected } = filterBySimilarity(results, query, this.options.fuzzyThreshold);
    if (results.length > 0 && !filtered) {
      logger.debug('Similarity filter bypassed: every listing scored below threshold', {
        query,
        listings: results.length,
      });
    }

    const snapshot = summarize(kept, this.meta(query, 'live', { filtered, broadened }));
    const ttlSeconds =
      snapshot.count > 0 ? this.options.cacheTtlHours * 3600 : this.options.failureTtlSeconds;
    cache.set(key, snapshot, ttlSeconds);

    logger.info('Price snapshot resolved', {
      query,
      count: snapshot.count,
      rejected,
      filtered,
      broadened,
      mean: snapshot.mean,
    });
    return snapshot;
  }

  private async search(listings: SoldListingsPort, query: string): Promise<SoldListing[]> {
    this.searches++;
    return listings.search(query);
  }

  private async buildQuery(attributes: ItemAttributes): Promise<string> {
    const plain = buildPlainQuery(attributes);
    if (!this.llm || !plain) {
      return plain;
    }
    try {
      return await this.llm.compactQuery(attributes, this.options.queryMaxLength);
    } catch (error) {
      logger.debug('Query compaction failed, using plain query', { error: toErrorMessage(error) });
      return plain;
    }
  }

  private meta(
    query: string,
    source: PriceSnapshot['source'],
    flags: { filtered?: boolean; broadened?: boolean } = {}
  ): SnapshotMeta {
    return {
      query,
      source,
      cachedAt: this.now().toISOString(),
      filtered: flags.filtered ?? false,
      broadened: flags.broadened ?? false,
    };
  }
}
