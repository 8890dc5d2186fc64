/**
 * HTTP Client Factory
 * ===================
 *
 * Creates axios clients for price adapters and maps axios failures
 * onto ProviderError kinds.
 */

import axios, { type AxiosInstance } from 'axios';
import type { ProviderId } from '../price-feed.types.js';
import { ProviderError } from './adapter.types.js';

export interface HttpClientOptions {
  baseURL?: string;
  timeout: number;
  headers?: Record<string, string>;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: {
      'User-Agent': 'Mozilla/5.0 (compatible; MarketCommentary/1.0)',
      Accept: 'application/json',
      ...options.headers,
    },
  });
}

export function toProviderError(provider: ProviderId, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;

  if (axios.isAxiosError(err)) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || err.code === 'ERR_CANCELED') {
      return new ProviderError(provider, 'timeout', err.message);
    }
    if (err.response) {
      return new ProviderError(provider, 'http', `HTTP ${err.response.status}`);
    }
    return new ProviderError(provider, 'network', err.message);
  }

  return new ProviderError(provider, 'network', err instanceof Error ? err.message : String(err));
}
