/**
 * Tests for the Scoreboard Renderer
 *
 * Renders real PNGs through @napi-rs/canvas with icons served from a
 * temporary asset cache and an in-process fetcher.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CloudWatchClient, PutMetricDataCommand } from '@aws-sdk/client-cloudwatch';
import { createCanvas } from '@napi-rs/canvas';
import { mockClient } from 'aws-sdk-client-mock';
import { createLayoutConfig, DEFAULT_LAYOUT } from '../../src/config/layout';
import { AdmissionTimeoutError, CancellationError, InputError } from '../../src/models/errors';
import { AssetCache } from '../../src/services/asset-cache';
import { RendererOptions, ScoreboardRenderer } from '../../src/services/scoreboard-renderer';
import { failWith, FakeFetcher, waitFor } from '../helpers/fake-fetcher';
import { createAccount, createMatch, createParticipant, createTeams } from '../helpers/match-fixtures';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * Width and height from the IHDR chunk
 */
function pngSize(png: Buffer): { width: number; height: number } {
  return { width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
}

describe('ScoreboardRenderer', () => {
  let iconPng: Buffer;
  let cacheRoot: string;
  let fetcher: FakeFetcher;
  let cache: AssetCache;
  let consoleLogSpy: jest.SpyInstance;
  let consoleErrorSpy: jest.SpyInstance;

  function createRenderer(overrides: Partial<RendererOptions> = {}): ScoreboardRenderer {
    return new ScoreboardRenderer(cache, {
      concurrency: 2,
      timeoutMs: 10000,
      layout: DEFAULT_LAYOUT,
      ...overrides,
    });
  }

  beforeAll(async () => {
    const canvas = createCanvas(4, 4);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = 'rgb(0, 128, 255)';
    ctx.fillRect(0, 0, 4, 4);
    iconPng = await canvas.encode('png');
  });

  beforeEach(async () => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
    cacheRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'scoreboard-renderer-'));
    fetcher = new FakeFetcher(() => iconPng);
    cache = new AssetCache({ cacheRoot, version: '14.1.1', assetBaseUrl: 'https://cdn.test/cdn', fetcher });
    await cache.initialize();
  });

  afterEach(async () => {
    // Release anything a test left pending
    fetcher.manual = false;
    fetcher.flush();
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    await fs.rm(cacheRoot, { recursive: true, force: true });
  });

  describe('renderSummary', () => {
    it('should render a 750x656 PNG for a 5v5 match', async () => {
      const renderer = createRenderer();

      const png = await renderer.renderSummary(createAccount(), createMatch());

      expect(png.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
      expect(pngSize(png)).toEqual({ width: 750, height: 656 });
    });

    it('should download each distinct icon once per render', async () => {
      const renderer = createRenderer();

      await renderer.renderSummary(createAccount(), createMatch());

      // Ahri, Garen, items 1001 and 3020, trinket 3340
      expect(new Set(fetcher.urls).size).toBe(fetcher.urls.length);
      expect(fetcher.urls).toHaveLength(5);
    });

    it('should size the image for uneven teams', async () => {
      const players = createTeams().filter((p) => p.win || p.puuid === 'puuid-9');
      players.splice(3, 1);
      const renderer = createRenderer();

      const png = await renderer.renderSummary(createAccount(), createMatch(players));

      // 4 winners, 1 loser
      expect(pngSize(png).height).toBe(436);
    });

    it('should render when the tracked player lost', async () => {
      const renderer = createRenderer();

      const png = await renderer.renderSummary(createAccount('puuid-7'), createMatch());

      expect(pngSize(png).height).toBe(656);
    });

    it('should render the 7-slot item bar with the role-bound item', async () => {
      const players = createTeams().map((p) => createParticipant({ ...p, roleBoundItem: 3177 }));
      const renderer = createRenderer({ layout: createLayoutConfig({ mainItemSlots: 7 }) });

      const png = await renderer.renderSummary(createAccount(), createMatch(players));

      expect(pngSize(png)).toEqual({ width: 750, height: 656 });
      expect(fetcher.urls).toContain('https://cdn.test/cdn/14.1.1/img/item/3177.png');
    });

    it('should give the same dimensions for the same input', async () => {
      const renderer = createRenderer();
      const match = createMatch();

      const first = await renderer.renderSummary(createAccount(), match);
      const second = await renderer.renderSummary(createAccount(), match);

      expect(pngSize(first)).toEqual(pngSize(second));
    });

    it('should leave the match data unchanged', async () => {
      const match = createMatch();
      const before = JSON.stringify(match);

      await createRenderer({ layout: createLayoutConfig({ teamSort: 'kills' }) }).renderSummary(createAccount(), match);

      expect(JSON.stringify(match)).toBe(before);
    });

    it('should not warn about abort listeners when every icon is downloading', async () => {
      const warningSpy = jest.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
      try {
        fetcher.manual = true;
        const render = createRenderer().renderSummary(createAccount(), createMatch());
        await waitFor(() => fetcher.pending.length === 5);
        // Let the remaining lookups finish their disk checks and join the downloads
        await new Promise((resolve) => setTimeout(resolve, 50));
        fetcher.manual = false;
        fetcher.flush();
        await render;

        const warned = warningSpy.mock.calls.some(
          ([warning]) => warning instanceof Error && warning.name === 'MaxListenersExceededWarning'
        );
        expect(warned).toBe(false);
      } finally {
        warningSpy.mockRestore();
      }
    });
  });

  describe('missing assets', () => {
    it('should draw placeholders when downloads fail', async () => {
      fetcher.respond = failWith(404);
      const renderer = createRenderer();

      const png = await renderer.renderSummary(createAccount(), createMatch());

      expect(pngSize(png)).toEqual({ width: 750, height: 656 });
    });

    it('should draw placeholders for icons that cannot be decoded', async () => {
      fetcher.respond = () => Buffer.from('not an image');
      const renderer = createRenderer();

      const png = await renderer.renderSummary(createAccount(), createMatch());

      expect(png.subarray(0, 8).equals(PNG_SIGNATURE)).toBe(true);
      expect(pngSize(png).height).toBe(656);
    });
  });

  describe('errors', () => {
    it('should throw InputError before any download when the player is not in the match', async () => {
      const renderer = createRenderer();

      await expect(renderer.renderSummary(createAccount('someone-else'), createMatch())).rejects.toBeInstanceOf(
        InputError
      );
      expect(fetcher.urls).toHaveLength(0);
      expect(renderer.activeRenders).toBe(0);
    });

    it('should fail with a timed-out cancellation when the deadline fires during rendering', async () => {
      fetcher.manual = true;
      const renderer = createRenderer({ concurrency: 1 });

      const failure = renderer.renderSummary(createAccount(), createMatch(), { timeoutMs: 100 });

      await expect(failure).rejects.toBeInstanceOf(CancellationError);
      await expect(failure).rejects.toMatchObject({ timedOut: true });
      expect(renderer.activeRenders).toBe(0);
    });

    it('should fail with CancellationError when the caller aborts', async () => {
      fetcher.manual = true;
      const renderer = createRenderer();
      const controller = new AbortController();

      const render = renderer.renderSummary(createAccount(), createMatch(), { signal: controller.signal });
      await waitFor(() => fetcher.pending.length > 0);
      controller.abort();

      await expect(render).rejects.toBeInstanceOf(CancellationError);
      await expect(render).rejects.toMatchObject({ timedOut: false });
      expect(renderer.activeRenders).toBe(0);
    });

    it('should reject an already-cancelled request without downloading', async () => {
      const renderer = createRenderer();
      const controller = new AbortController();
      controller.abort();

      await expect(
        renderer.renderSummary(createAccount(), createMatch(), { signal: controller.signal })
      ).rejects.toBeInstanceOf(CancellationError);
      expect(fetcher.urls).toHaveLength(0);
    });
  });

  describe('concurrency', () => {
    it('should compose at most `concurrency` renders at a time', async () => {
      fetcher.manual = true;
      const renderer = createRenderer({ concurrency: 2 });

      const renders = [1, 2, 3].map(() => renderer.renderSummary(createAccount(), createMatch()));

      expect(renderer.activeRenders).toBe(2);
      expect(renderer.waitingRenders).toBe(1);

      await waitFor(() => fetcher.pending.length > 0);
      fetcher.manual = false;
      fetcher.flush();

      const pngs = await Promise.all(renders);
      expect(pngs.map((png) => pngSize(png).height)).toEqual([656, 656, 656]);
      expect(renderer.activeRenders).toBe(0);
      expect(renderer.waitingRenders).toBe(0);
    });

    it('should reject excess renders with AdmissionTimeoutError without drawing or downloading', async () => {
      fetcher.manual = true;
      const renderer = createRenderer({ concurrency: 1 });
      const blocking = renderer.renderSummary(createAccount(), createMatch());
      expect(renderer.activeRenders).toBe(1);

      const zedMatch = createMatch(createTeams().map((p) => createParticipant({ ...p, championName: 'Zed' })));
      const rejected = renderer.renderSummary(createAccount(), zedMatch, { timeoutMs: 50 });

      await expect(rejected).rejects.toBeInstanceOf(AdmissionTimeoutError);
      expect(renderer.waitingRenders).toBe(0);
      expect(fetcher.urls.some((url) => url.includes('Zed'))).toBe(false);

      fetcher.manual = false;
      fetcher.flush();
      await expect(blocking).resolves.toBeInstanceOf(Buffer);
      expect(renderer.activeRenders).toBe(0);
    });
  });

  describe('metrics', () => {
    const cloudWatchMock = mockClient(CloudWatchClient);
    const originalMetricsEnabled = process.env.METRICS_ENABLED;

    beforeEach(() => {
      cloudWatchMock.reset();
      // CloudWatch never answers
      cloudWatchMock.on(PutMetricDataCommand).callsFake(() => new Promise(() => undefined));
      process.env.METRICS_ENABLED = 'true';
    });

    afterEach(() => {
      if (originalMetricsEnabled === undefined) {
        delete process.env.METRICS_ENABLED;
      } else {
        process.env.METRICS_ENABLED = originalMetricsEnabled;
      }
    });

    afterAll(() => {
      cloudWatchMock.restore();
    });

    it('should release the render slot without waiting for CloudWatch', async () => {
      const renderer = createRenderer({ concurrency: 1 });

      await expect(renderer.renderSummary(createAccount(), createMatch())).resolves.toBeInstanceOf(Buffer);
      expect(renderer.activeRenders).toBe(0);

      await expect(
        renderer.renderSummary(createAccount(), createMatch(), { timeoutMs: 1000 })
      ).resolves.toBeInstanceOf(Buffer);

      // Five icon downloads, then one duration per render
      expect(cloudWatchMock.commandCalls(PutMetricDataCommand)).toHaveLength(7);
    });

    it('should report a failed render without waiting for CloudWatch', async () => {
      const renderer = createRenderer({ concurrency: 1 });

      await expect(renderer.renderSummary(createAccount('someone-else'), createMatch())).rejects.toBeInstanceOf(
        InputError
      );
      fetcher.manual = true;
      const cancelled = renderer.renderSummary(createAccount(), createMatch(), { timeoutMs: 100 });

      await expect(cancelled).rejects.toMatchObject({ timedOut: true });
      expect(renderer.activeRenders).toBe(0);
    });
  });
});
