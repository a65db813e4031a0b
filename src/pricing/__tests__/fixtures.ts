import { emptyAttributes, type ItemAttributes, type SoldListing } from '../../core/types';

export const TROUT: ItemAttributes = {
  ...emptyAttributes(),
  name: 'Mike Trout',
  year: '2023',
  set: 'Topps',
  itemNumber: '27',
  grade: 'PSA 10',
  gradingCompany: 'PSA',
};

export const TROUT_PRICES = [30, 32, 35, 38, 40, 42, 45, 50, 55, 60, 65, 70];

export function listings(title: string, prices: number[] = TROUT_PRICES): SoldListing[] {
  return prices.map((price) => ({ price, title }));
}
