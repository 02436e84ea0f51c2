/**
 * Tests for the Data Dragon HTTP client
 *
 * Requests are served by an in-process axios adapter; nothing leaves the test.
 */

import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { AssetFetchError, CancellationError } from '../../src/models/errors';
import {
  createHttpClient,
  fetchLatestVersion,
  HttpAssetFetcher,
  resolveAssetVersion,
} from '../../src/services/asset-fetcher';

type Route = { status: number; data?: unknown };

/**
 * Adapter answering from a queue of responses per URL
 */
function createAdapter(routes: Record<string, Route[]>) {
  const requests: string[] = [];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const url = config.url ?? '';
    requests.push(url);
    const route = routes[url]?.shift() ?? { status: 404 };
    const response: AxiosResponse = {
      data: route.data,
      status: route.status,
      statusText: String(route.status),
      headers: {},
      config,
    };
    if (route.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${route.status}`,
        route.status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }
    return response;
  };

  return { adapter, requests };
}

const ICON_URL = 'https://cdn.test/cdn/14.1.1/img/item/1001.png';

describe('Asset Fetcher', () => {
  describe('HttpAssetFetcher', () => {
    it('should return the response body as a Buffer', async () => {
      const { adapter } = createAdapter({ [ICON_URL]: [{ status: 200, data: Buffer.from('icon-bytes') }] });
      const fetcher = new HttpAssetFetcher(createHttpClient({ timeoutMs: 1000, retries: 0, adapter }));

      const data = await fetcher.fetch(ICON_URL);

      expect(Buffer.isBuffer(data)).toBe(true);
      expect(data.toString()).toBe('icon-bytes');
    });

    it('should fail a 404 with AssetFetchError without retrying', async () => {
      const { adapter, requests } = createAdapter({ [ICON_URL]: [{ status: 404 }] });
      const fetcher = new HttpAssetFetcher(createHttpClient({ timeoutMs: 1000, retries: 2, adapter }));

      const failure = fetcher.fetch(ICON_URL);

      await expect(failure).rejects.toBeInstanceOf(AssetFetchError);
      await expect(failure).rejects.toMatchObject({ status: 404, url: ICON_URL });
      expect(requests).toHaveLength(1);
    });

    it('should retry a server error and succeed', async () => {
      const { adapter, requests } = createAdapter({
        [ICON_URL]: [{ status: 503 }, { status: 200, data: Buffer.from('ok') }],
      });
      const fetcher = new HttpAssetFetcher(createHttpClient({ timeoutMs: 1000, retries: 1, adapter }));

      const data = await fetcher.fetch(ICON_URL);

      expect(data.toString()).toBe('ok');
      expect(requests).toHaveLength(2);
    });

    it('should report an aborted request as a cancellation', async () => {
      const { adapter } = createAdapter({ [ICON_URL]: [{ status: 200, data: Buffer.from('late') }] });
      const fetcher = new HttpAssetFetcher(createHttpClient({ timeoutMs: 1000, retries: 0, adapter }));
      const controller = new AbortController();
      controller.abort();

      await expect(fetcher.fetch(ICON_URL, controller.signal)).rejects.toBeInstanceOf(CancellationError);
    });
  });

  describe('fetchLatestVersion', () => {
    const VERSIONS_URL = 'https://cdn.test/api/versions.json';

    it('should return the first listed version', async () => {
      const { adapter } = createAdapter({ [VERSIONS_URL]: [{ status: 200, data: ['14.2.1', '14.1.1'] }] });
      const client = createHttpClient({ timeoutMs: 1000, retries: 0, adapter });

      await expect(fetchLatestVersion(client, 'https://cdn.test')).resolves.toBe('14.2.1');
    });

    it('should fail when the version list is empty', async () => {
      const { adapter } = createAdapter({ [VERSIONS_URL]: [{ status: 200, data: [] }] });
      const client = createHttpClient({ timeoutMs: 1000, retries: 0, adapter });

      await expect(fetchLatestVersion(client, 'https://cdn.test')).rejects.toThrow('No asset versions available');
    });
  });

  describe('resolveAssetVersion', () => {
    it('should use a pinned version without any request', async () => {
      const { adapter, requests } = createAdapter({});
      const client = createHttpClient({ timeoutMs: 1000, retries: 0, adapter });

      await expect(resolveAssetVersion('14.1.1', client, 'https://cdn.test')).resolves.toBe('14.1.1');
      expect(requests).toHaveLength(0);
    });

    it('should look up the latest version when configured as "latest"', async () => {
      const { adapter } = createAdapter({
        'https://cdn.test/api/versions.json': [{ status: 200, data: ['14.3.1'] }],
      });
      const client = createHttpClient({ timeoutMs: 1000, retries: 0, adapter });

      await expect(resolveAssetVersion('latest', client, 'https://cdn.test')).resolves.toBe('14.3.1');
    });
  });
});
