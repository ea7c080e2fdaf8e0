/**
 * Shared fixtures for the resolution tests. Nothing here touches the network.
 */

import { jest } from '@jest/globals';
import { AxiosError, AxiosHeaders } from 'axios';
import { ResolutionConfig, loadResolutionConfig } from '../src/config/resolution';
import { TaxonomyHttpClient } from '../src/services/taxonomy/httpClient';
import { parseLineage } from '../src/services/taxonomy/lineage';
import { applyRankPolicy, createSkipPolicy } from '../src/services/taxonomy/rankPolicy';
import { LineageQuery } from '../src/services/taxonomy/types';
import { RetryPolicy } from '../src/utils/retry';

export const HOMO_SAPIENS = 'Animalia;Chordata;Mammalia;Primates;Hominidae;Homo;Homo_sapiens';

export const FAST_RETRY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1,
  maxDelayMs: 4,
  budgetMs: 1000,
};

export const noSleep = async (_ms: number): Promise<void> => undefined;

export function lineageQuery(verbatim: string, assayName = '18S', skipAssays: string[] = []): LineageQuery {
  return applyRankPolicy(parseLineage(verbatim, assayName), createSkipPolicy(skipAssays));
}

export function testConfig(overrides: Partial<ResolutionConfig> = {}): ResolutionConfig {
  return {
    ...loadResolutionConfig({}),
    retry: FAST_RETRY,
    ...overrides,
  };
}

/**
 * Axios error as thrown by a failed request. Without a status it looks like
 * a timeout (no response received).
 */
export function httpError(status?: number, headers: Record<string, string> = {}): AxiosError {
  const config = { headers: new AxiosHeaders() };
  if (status === undefined) {
    return new AxiosError('timeout of 15000ms exceeded', 'ECONNABORTED', config);
  }
  return new AxiosError(
    `Request failed with status code ${status}`,
    status >= 500 ? 'ERR_BAD_RESPONSE' : 'ERR_BAD_REQUEST',
    config,
    undefined,
    { data: {}, status, statusText: String(status), headers, config }
  );
}

type Handler = (path: string, params?: Record<string, unknown>) => unknown;

/**
 * In-process HTTP client answering from `handler`.
 */
export function fakeHttp(handler: Handler) {
  const get = jest.fn<TaxonomyHttpClient['get']>(async (path, params) => handler(path, params));
  const client: TaxonomyHttpClient = { get };
  return { client, get };
}

export function wormsName(params?: Record<string, unknown>): string {
  const names = params?.scientificnames;
  return Array.isArray(names) ? String(names[0]) : '';
}

export function gbifName(params?: Record<string, unknown>): string {
  return typeof params?.name === 'string' ? params.name : '';
}
