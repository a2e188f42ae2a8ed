/**
 * Client key retrieval.
 *
 * The client key identifies the integration. The checkout API answers it
 * with the public key the card fields encrypt with. Keys are cached per
 * client key for 24 hours.
 */

import type { ApiConfig, ClientKeyResponse } from '../types';
import { RequestError } from '../core/errors';

const keyCache = new Map<string, { response: ClientKeyResponse; timestamp: number }>();
const CACHE_TTL = 24 * 60 * 60 * 1000; // 24 hours

export function clientKeyPath(clientKey: string): string {
  return `checkoutshopper/v1/clientKeys/${encodeURIComponent(clientKey)}`;
}

/**
 * Fetch the public key for a client key. Cached per client key for 24 hours.
 */
export async function fetchClientKey(config: ApiConfig): Promise<ClientKeyResponse> {
  const now = Date.now();
  const cached = keyCache.get(config.clientKey);
  if (cached && now - cached.timestamp < CACHE_TTL) {
    return cached.response;
  }

  const url = `${config.apiUrl.replace(/\/$/, '')}/${clientKeyPath(config.clientKey)}`;
  const res = await fetch(url, { method: 'GET' });
  if (!res.ok) {
    throw new RequestError(`Failed to fetch client key: ${res.status}`, res.status);
  }

  const data: unknown = await res.json();
  if (!isClientKeyResponse(data)) {
    throw new RequestError('Malformed client key response', res.status, data);
  }

  keyCache.set(config.clientKey, { response: data, timestamp: now });
  return data;
}

/**
 * Clear the cached key for one client key, or all if none given.
 */
export function clearClientKeyCache(clientKey?: string): void {
  if (clientKey) {
    keyCache.delete(clientKey);
  } else {
    keyCache.clear();
  }
}

function isClientKeyResponse(value: unknown): value is ClientKeyResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'cardPublicKey' in value &&
    typeof value.cardPublicKey === 'string'
  );
}
