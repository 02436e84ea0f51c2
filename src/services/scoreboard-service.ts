/**
 * Scoreboard Service
 *
 * Wires configuration, HTTP client, asset cache, renderer and cache
 * maintenance together. This is what the chat-command layer talks to.
 */

import { EnvironmentConfig, toLayoutOverrides, validateEnvironmentConfig } from '../config/environment';
import { createLayoutConfig } from '../config/layout';
import { AssetFetcher, CacheStats } from '../models/asset';
import { MatchData, RiotAccount } from '../models/match';
import { RenderOptions } from '../models/render';
import { log, LogLevel } from '../utils/logger';
import { AssetCache } from './asset-cache';
import { createHttpClient, HttpAssetFetcher, resolveAssetVersion } from './asset-fetcher';
import { CacheMaintenance } from './cache-maintenance';
import { ScoreboardRenderer } from './scoreboard-renderer';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export interface ScoreboardStatus {
  version: string;
  activeRenders: number;
  waitingRenders: number;
  cache: CacheStats;
}

export interface ScoreboardServiceDependencies {
  // Replaces the HTTP icon downloader
  fetcher?: AssetFetcher;
}

export class ScoreboardService {
  constructor(
    readonly version: string,
    readonly cache: AssetCache,
    readonly renderer: ScoreboardRenderer,
    readonly maintenance: CacheMaintenance
  ) {}

  renderSummary(account: RiotAccount, matchData: MatchData, options?: RenderOptions): Promise<Buffer> {
    return this.renderer.renderSummary(account, matchData, options);
  }

  /**
   * Health snapshot: render load and cache size
   */
  async getStatus(): Promise<ScoreboardStatus> {
    return {
      version: this.version,
      activeRenders: this.renderer.activeRenders,
      waitingRenders: this.renderer.waitingRenders,
      cache: await this.cache.getStats(),
    };
  }

  shutdown(): void {
    this.maintenance.stop();
  }
}

/**
 * Build a ready-to-use scoreboard service from configuration
 *
 * @throws ValidationError if the configuration is invalid
 * @throws AssetFetchError if the latest asset version cannot be resolved
 */
export async function createScoreboardService(
  config: EnvironmentConfig,
  dependencies: ScoreboardServiceDependencies = {}
): Promise<ScoreboardService> {
  validateEnvironmentConfig(config);

  const httpClient = createHttpClient({
    timeoutMs: config.assetFetchTimeoutMs,
    retries: config.assetFetchRetries,
  });
  const version = await resolveAssetVersion(config.ddragonVersion, httpClient, config.assetHost);

  const cache = new AssetCache({
    cacheRoot: config.assetCachePath,
    version,
    assetBaseUrl: `${config.assetHost}/cdn`,
    fetcher: dependencies.fetcher ?? new HttpAssetFetcher(httpClient),
  });
  await cache.initialize();

  const renderer = new ScoreboardRenderer(cache, {
    concurrency: config.renderConcurrency,
    timeoutMs: config.renderTimeoutMs,
    layout: createLayoutConfig(toLayoutOverrides(config)),
    headingFontPath: config.headingFontPath,
    statsFontPath: config.statsFontPath,
  });

  const maintenance = new CacheMaintenance(cache, {
    maxAgeMs: config.cacheMaxAgeDays * DAY_MS,
    intervalMs: config.cacheCleanupIntervalHours * HOUR_MS,
  });
  maintenance.start();

  log(LogLevel.INFO, 'Scoreboard service ready', {
    version,
    render_concurrency: config.renderConcurrency,
    render_timeout_ms: config.renderTimeoutMs,
  });

  return new ScoreboardService(version, cache, renderer, maintenance);
}
