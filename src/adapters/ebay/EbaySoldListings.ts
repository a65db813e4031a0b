/**
 * eBay Finding API `findCompletedItems` client for sold trading card listings.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SoldListingsPort } from '../../core/listings/SoldListingsPort';
import type { SoldListing } from '../../core/types';
import { ExternalServiceError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';

const logger = createLogger('ebay-sold-listings');

export interface EbayConfig {
  appId: string;
  baseUrl: string;
  categoryId: string;
  pageSize: number;
  timeoutMs: number;
}

// The Finding API wraps every scalar in a one-element array.
const ItemSchema = z.object({
  title: z.array(z.string()).min(1),
  sellingStatus: z
    .array(
      z.object({
        currentPrice: z.array(z.object({ __value__: z.string() })).min(1),
      })
    )
    .min(1),
  listingInfo: z.array(z.object({ endTime: z.array(z.string()).optional() })).optional(),
});

const FindCompletedItemsSchema = z.object({
  findCompletedItemsResponse: z
    .array(
      z.object({
        ack: z.array(z.string()).min(1),
        errorMessage: z.array(z.unknown()).optional(),
        searchResult: z
          .array(
            z.object({
              item: z.array(z.unknown()).optional(),
            })
          )
          .optional(),
      })
    )
    .min(1),
});

function toListing(raw: unknown): SoldListing | undefined {
  const parsed = ItemSchema.safeParse(raw);
  if (!parsed.success) return undefined;

  const item = parsed.data;
  const price = Number.parseFloat(item.sellingStatus[0].currentPrice[0].__value__);
  if (!Number.isFinite(price) || price <= 0) return undefined;

  return {
    price,
    title: item.title[0],
    soldAt: item.listingInfo?.[0]?.endTime?.[0],
  };
}

export class EbaySoldListings implements SoldListingsPort {
  readonly name = 'ebay';
  private readonly api: AxiosInstance;

  constructor(private readonly config: EbayConfig) {
    this.api = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers: {
        'User-Agent': 'bidscope/0.1',
      },
    });

    logger.info('eBay sold listings initialized', {
      baseUrl: config.baseUrl,
      categoryId: config.categoryId,
    });
  }

  async search(query: string): Promise<SoldListing[]> {
    const response = await this.api.get<unknown>('', {
      params: {
        'OPERATION-NAME': 'findCompletedItems',
        'SERVICE-VERSION': '1.13.0',
        'SECURITY-APPNAME': this.config.appId,
        'RESPONSE-DATA-FORMAT': 'JSON',
        'REST-PAYLOAD': '',
        keywords: query,
        categoryId: this.config.categoryId,
        sortOrder: 'EndTimeSoonest',
        'itemFilter(0).name': 'SoldItemsOnly',
        'itemFilter(0).value': 'true',
        'paginationInput.entriesPerPage': this.config.pageSize,
      },
    });

    const parsed = FindCompletedItemsSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ExternalServiceError('ebay', new Error('Malformed findCompletedItems response'));
    }

    const body = parsed.data.findCompletedItemsResponse[0];
    if (body.ack[0] !== 'Success' && body.ack[0] !== 'Warning') {
      throw new ExternalServiceError('ebay', new Error(`Request not acknowledged: ${body.ack[0]}`));
    }

    const items = body.searchResult?.[0]?.item ?? [];
    const listings = items
      .map(toListing)
      .filter((listing): listing is SoldListing => listing !== undefined);

    logger.debug('eBay search complete', { query, items: items.length, listings: listings.length });
    return listings;
  }
}
