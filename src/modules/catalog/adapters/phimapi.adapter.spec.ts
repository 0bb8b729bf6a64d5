import axios, { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import { FetchError } from '../../sync/sync.errors';
import { PhimapiCatalogClient } from './phimapi.adapter';

function response<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('PhimapiCatalogClient', () => {
  const client = new PhimapiCatalogClient(
    'https://phimapi.test',
    '/danh-sach/phim-moi-cap-nhat?page={page}&limit={limit}',
    '/phim/{slug}',
    { timeoutMs: 10000, userAgent: 'test-agent' },
  );

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('requests a listing page and maps its items', async () => {
    const get = jest.spyOn(axios, 'get').mockResolvedValue(
      response({
        status: true,
        items: [
          { _id: 'a1', slug: 'first', name: 'First' },
          { _id: 'a2', name: 'No slug' },
          { slug: 'no-id' },
        ],
        pagination: { currentPage: 2, totalPages: 40 },
      }),
    );

    const listing = await client.listUpdated(2, 3);

    expect(get).toHaveBeenCalledWith('https://phimapi.test/danh-sach/phim-moi-cap-nhat?page=2&limit=3', {
      timeout: 10000,
      headers: { 'User-Agent': 'test-agent' },
    });
    expect(listing).toEqual({
      status: true,
      items: [{ id: 'a1', slug: 'first', name: 'First' }],
      pagination: { currentPage: 2, totalPages: 40 },
    });
  });

  it('defaults pagination to the requested page and reports a false status', async () => {
    jest.spyOn(axios, 'get').mockResolvedValue(response({ status: false, items: [] }));

    const listing = await client.listUpdated(4, 3);

    expect(listing.status).toBe(false);
    expect(listing.pagination).toEqual({ currentPage: 4, totalPages: 4 });
  });

  it('encodes the slug in the detail url', async () => {
    const get = jest
      .spyOn(axios, 'get')
      .mockResolvedValue(response({ status: true, msg: '', movie: { slug: 'ten phim' }, episodes: [] }));

    const detail = await client.fetchDetail('ten phim');

    expect(get.mock.calls[0][0]).toBe('https://phimapi.test/phim/ten%20phim');
    expect(detail.movie?.slug).toBe('ten phim');
  });

  it('wraps HTTP failures in FetchError with the status', async () => {
    const failure = new AxiosError('Request failed with status code 503', 'ERR_BAD_RESPONSE', undefined, undefined, {
      ...response({}),
      status: 503,
      statusText: 'Service Unavailable',
    });
    jest.spyOn(axios, 'get').mockRejectedValue(failure);

    const error = await client.fetchDetail('down').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ url: 'https://phimapi.test/phim/down', status: 503 });
  });

  it('wraps timeouts in FetchError without a status', async () => {
    jest.spyOn(axios, 'get').mockRejectedValue(new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED'));

    await expect(client.listUpdated(1, 3)).rejects.toMatchObject({ name: 'FetchError', status: null });
  });

  it('rejects a body that is not a JSON object', async () => {
    jest.spyOn(axios, 'get').mockResolvedValue(response('<html>blocked</html>'));

    await expect(client.fetchDetail('html')).rejects.toThrow('GET https://phimapi.test/phim/html returned a non-JSON body');
  });
});
