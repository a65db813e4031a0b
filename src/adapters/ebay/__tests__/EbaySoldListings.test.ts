import axios, { type InternalAxiosRequestConfig } from 'axios';
import { ExternalServiceError } from '../../../utils/errors';
import { EbaySoldListings } from '../EbaySoldListings';

const CONFIG = {
  appId: 'test-app-id',
  baseUrl: 'https://finding.test/services',
  categoryId: '212',
  pageSize: 25,
  timeoutMs: 5000,
};

function item(title: string, price: string, endTime?: string) {
  return {
    title: [title],
    sellingStatus: [{ currentPrice: [{ '@currencyId': 'USD', __value__: price }] }],
    listingInfo: endTime ? [{ endTime: [endTime] }] : undefined,
  };
}

function response(ack: string, items: unknown[]) {
  return { findCompletedItemsResponse: [{ ack: [ack], searchResult: [{ '@count': String(items.length), item: items }] }] };
}

describe('EbaySoldListings', () => {
  let requests: InternalAxiosRequestConfig[];
  let reply: () => Promise<unknown>;

  beforeEach(() => {
    requests = [];
    const instance = axios.create({
      adapter: async (config) => {
        requests.push(config);
        return { data: await reply(), status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    jest.spyOn(axios, 'create').mockReturnValue(instance);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('should request completed sold items for the query', async () => {
    reply = async () => response('Success', []);
    await new EbaySoldListings(CONFIG).search('Mike Trout 2023 Topps PSA 10');

    expect(axios.create).toHaveBeenCalledWith(
      expect.objectContaining({ baseURL: 'https://finding.test/services', timeout: 5000 })
    );
    expect(requests[0].params).toMatchObject({
      'OPERATION-NAME': 'findCompletedItems',
      'SECURITY-APPNAME': 'test-app-id',
      keywords: 'Mike Trout 2023 Topps PSA 10',
      categoryId: '212',
      'itemFilter(0).name': 'SoldItemsOnly',
      'paginationInput.entriesPerPage': 25,
    });
  });

  test('should map items to listings in response order', async () => {
    reply = async () =>
      response('Success', [
        item('2023 Topps Mike Trout PSA 10', '45.00', '2026-01-02T10:00:00.000Z'),
        item('2023 Topps Mike Trout PSA 10 #27', '39.99'),
      ]);

    await expect(new EbaySoldListings(CONFIG).search('Mike Trout')).resolves.toEqual([
      { price: 45, title: '2023 Topps Mike Trout PSA 10', soldAt: '2026-01-02T10:00:00.000Z' },
      { price: 39.99, title: '2023 Topps Mike Trout PSA 10 #27', soldAt: undefined },
    ]);
  });

  test('should skip items without a usable price', async () => {
    reply = async () => response('Warning', [item('free', '0.00'), { title: ['broken'] }, item('ok', '12.50')]);

    const listings = await new EbaySoldListings(CONFIG).search('x');
    expect(listings.map((l) => l.price)).toEqual([12.5]);
  });

  test('should return nothing when the result has no items', async () => {
    reply = async () => ({ findCompletedItemsResponse: [{ ack: ['Success'], searchResult: [{ '@count': '0' }] }] });
    await expect(new EbaySoldListings(CONFIG).search('x')).resolves.toEqual([]);
  });

  test('should reject a failed acknowledgement', async () => {
    reply = async () => response('Failure', []);
    await expect(new EbaySoldListings(CONFIG).search('x')).rejects.toThrow(ExternalServiceError);
  });

  test('should reject a malformed body', async () => {
    reply = async () => ({ unexpected: true });
    await expect(new EbaySoldListings(CONFIG).search('x')).rejects.toThrow(
      'External service ebay is unavailable: Malformed findCompletedItems response'
    );
  });

  test('should propagate transport errors', async () => {
    reply = async () => {
      throw new Error('socket hang up');
    };
    await expect(new EbaySoldListings(CONFIG).search('x')).rejects.toThrow('socket hang up');
  });
});
