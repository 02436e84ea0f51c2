/**
 * Data Dragon HTTP client
 *
 * axios instance with axios-retry for icon downloads and version lookup.
 * Network errors and idempotent-request failures (5xx, 429) are retried with
 * exponential backoff; a 404 fails immediately.
 */

import axios, { AxiosInstance, CreateAxiosDefaults } from 'axios';
import axiosRetry, { exponentialDelay, isNetworkOrIdempotentRequestError } from 'axios-retry';
import { AssetFetcher } from '../models/asset';
import { AssetFetchError, CancellationError } from '../models/errors';

export interface AssetFetcherOptions {
  timeoutMs: number;
  retries: number;
  // In-process transport for tests; defaults to the Node HTTP adapter
  adapter?: CreateAxiosDefaults['adapter'];
}

/**
 * Create the shared axios client
 */
export function createHttpClient(options: AssetFetcherOptions): AxiosInstance {
  const client = axios.create({
    timeout: options.timeoutMs,
    adapter: options.adapter,
  });

  axiosRetry(client, {
    retries: options.retries,
    retryDelay: exponentialDelay,
    retryCondition: isNetworkOrIdempotentRequestError,
  });

  return client;
}

/**
 * Map an axios failure to an application error
 */
function toFetchError(error: unknown, url: string, signal?: AbortSignal): Error {
  if (signal?.aborted || axios.isCancel(error)) {
    return new CancellationError(`Download cancelled: ${url}`);
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const reason = status ? `HTTP ${status}` : error.code || error.message;
    return new AssetFetchError(`Failed to download ${url}: ${reason}`, url, status);
  }
  return new AssetFetchError(
    `Failed to download ${url}: ${error instanceof Error ? error.message : String(error)}`,
    url
  );
}

/**
 * AssetFetcher backed by axios
 */
export class HttpAssetFetcher implements AssetFetcher {
  constructor(private client: AxiosInstance) {}

  async fetch(url: string, signal?: AbortSignal): Promise<Buffer> {
    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        signal,
      });
      return Buffer.from(response.data);
    } catch (error) {
      throw toFetchError(error, url, signal);
    }
  }
}

/**
 * Latest published asset version, from {assetHost}/api/versions.json
 */
export async function fetchLatestVersion(client: AxiosInstance, assetHost: string): Promise<string> {
  const url = `${assetHost}/api/versions.json`;
  let versions: unknown;
  try {
    const response = await client.get<unknown>(url);
    versions = response.data;
  } catch (error) {
    throw toFetchError(error, url);
  }

  const latest: unknown = Array.isArray(versions) ? versions[0] : undefined;
  if (typeof latest !== 'string' || !latest) {
    throw new AssetFetchError('No asset versions available', url);
  }
  return latest;
}

/**
 * Asset version to use: the configured one, or the latest when set to "latest"
 */
export async function resolveAssetVersion(
  configuredVersion: string,
  client: AxiosInstance,
  assetHost: string
): Promise<string> {
  if (configuredVersion !== 'latest') {
    return configuredVersion;
  }
  return fetchLatestVersion(client, assetHost);
}
