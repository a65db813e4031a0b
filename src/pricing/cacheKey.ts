import { createHash } from 'crypto';
import type { ItemAttributes } from '../core/types';

/**
 * Stable key over the fields that change what a card sells for.
 * Field order is fixed so equal identities always hash the same.
 */
export function priceCacheKey(attributes: ItemAttributes): string {
  const relevant = {
    grade: attributes.grade ?? '',
    itemNumber: attributes.itemNumber ?? '',
    name: (attributes.name ?? '').trim().toLowerCase(),
    set: (attributes.set ?? '').trim().toLowerCase(),
    year: attributes.year ?? '',
  };
  return createHash('md5').update(JSON.stringify(relevant)).digest('hex');
}
