import type { ApiConfig, BinLookupResponse, BinLookupService, CardBrand } from '../types';
import { RequestError } from '../core/errors';
import { createLogger } from '../core/logger';
import type { Logger } from '../core/logger';
import { fetchClientKey } from '../crypto/clientKey';

/**
 * BIN Lookup Adapter
 *
 * Asks the checkout API which brands a BIN belongs to.
 * `init()` loads the card public key for the client key, so a bad key
 * fails before the shopper starts typing.
 */
export class BinLookupAdapter implements BinLookupService {
  private config: Required<ApiConfig>;
  private publicKey: string | null = null;
  private log: Logger;

  constructor(config: ApiConfig) {
    this.config = {
      clientKey: config.clientKey,
      apiUrl: config.apiUrl.replace(/\/$/, ''),
      debug: config.debug || false
    };
    this.log = createLogger(this.config.debug, 'bin');
  }

  async init(): Promise<void> {
    const { cardPublicKey } = await fetchClientKey(this.config);
    this.publicKey = cardPublicKey;
    this.log('Client key verified');
  }

  /** Public key loaded by `init()`, null before. */
  get cardPublicKey(): string | null {
    return this.publicKey;
  }

  async lookup(bin: string, supportedBrands: string[]): Promise<BinLookupResponse> {
    const requestId = crypto.randomUUID();
    const url = `${this.config.apiUrl}/checkoutshopper/v2/bin/binLookup?clientKey=${encodeURIComponent(this.config.clientKey)}`;

    this.log('Looking up BIN of length', bin.length, 'request', requestId);

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ bin, supportedBrands, requestId })
    });

    if (!response.ok) {
      throw new RequestError(`BIN lookup failed: ${response.status}`, response.status);
    }

    const data: unknown = await response.json();
    return parseBinLookupResponse(data, response.status);
  }
}

function parseBinLookupResponse(data: unknown, status: number): BinLookupResponse {
  if (typeof data !== 'object' || data === null) {
    throw new RequestError('Malformed BIN lookup response', status, data);
  }

  const result: BinLookupResponse = {};

  if ('requestId' in data && typeof data.requestId === 'string') {
    result.requestId = data.requestId;
  }

  if ('brands' in data && Array.isArray(data.brands)) {
    result.brands = data.brands.filter(isCardBrand);
  }

  return result;
}

function isCardBrand(value: unknown): value is CardBrand {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string'
  );
}
