import type { SoldListing } from '../types';

/**
 * Historical sold-listings search. Results come most recent first.
 * May reject on transport, auth or decoding failures.
 */
export interface SoldListingsPort {
  readonly name: string;
  search(query: string): Promise<SoldListing[]>;
}
