import { BinLookupAdapter } from '../BinLookupAdapter';
import { clearClientKeyCache, fetchClientKey } from '../../crypto/clientKey';
import { RequestError } from '../../core/errors';

const API_URL = 'https://checkout.test/';
const CLIENT_KEY = 'test_client_key';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('fetchClientKey', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    clearClientKeyCache();
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('fetches the public key once per client key', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ cardPublicKey: 'test-public-key' }));

    const first = await fetchClientKey({ clientKey: CLIENT_KEY, apiUrl: API_URL });
    const second = await fetchClientKey({ clientKey: CLIENT_KEY, apiUrl: API_URL });

    expect(first).toEqual({ cardPublicKey: 'test-public-key' });
    expect(second).toEqual(first);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      'https://checkout.test/checkoutshopper/v1/clientKeys/test_client_key',
      { method: 'GET' }
    );
  });

  it('fails on an error status', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ message: 'unknown key' }, 401));

    const result = fetchClientKey({ clientKey: CLIENT_KEY, apiUrl: API_URL });

    await expect(result).rejects.toBeInstanceOf(RequestError);
    await expect(result).rejects.toMatchObject({ code: 'REQUEST_FAILED', status: 401 });
  });

  it('fails on a response without key', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}));

    await expect(fetchClientKey({ clientKey: CLIENT_KEY, apiUrl: API_URL })).rejects.toThrow(
      'Malformed client key response'
    );
  });
});

describe('BinLookupAdapter', () => {
  let fetchMock: jest.SpyInstance;

  beforeEach(() => {
    clearClientKeyCache();
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('loads the card public key on init', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ cardPublicKey: 'test-public-key' }));
    const adapter = new BinLookupAdapter({ clientKey: CLIENT_KEY, apiUrl: API_URL });

    expect(adapter.cardPublicKey).toBeNull();
    await adapter.init();

    expect(adapter.cardPublicKey).toBe('test-public-key');
  });

  it('posts the BIN and keeps well formed brands', async () => {
    fetchMock.mockImplementation(async () =>
      jsonResponse({ requestId: 'req-1', brands: [{ type: 'visa', supported: true }, { name: 'broken' }] })
    );
    const adapter = new BinLookupAdapter({ clientKey: CLIENT_KEY, apiUrl: API_URL });

    const response = await adapter.lookup('411111', ['visa', 'mc']);

    expect(response).toEqual({ requestId: 'req-1', brands: [{ type: 'visa', supported: true }] });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://checkout.test/checkoutshopper/v2/bin/binLookup?clientKey=test_client_key');
    expect(init.method).toBe('POST');
    expect(JSON.parse(init.body)).toEqual({
      bin: '411111',
      supportedBrands: ['visa', 'mc'],
      requestId: expect.any(String)
    });
  });

  it('leaves brands out when the service has none', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({ requestId: 'req-2' }));
    const adapter = new BinLookupAdapter({ clientKey: CLIENT_KEY, apiUrl: API_URL });

    await expect(adapter.lookup('999999', ['visa'])).resolves.toEqual({ requestId: 'req-2' });
  });

  it('fails on an error status', async () => {
    fetchMock.mockImplementation(async () => jsonResponse({}, 500));
    const adapter = new BinLookupAdapter({ clientKey: CLIENT_KEY, apiUrl: API_URL });

    await expect(adapter.lookup('411111', ['visa'])).rejects.toMatchObject({ status: 500 });
  });
});
