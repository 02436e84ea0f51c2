/**
 * Scoreboard Renderer
 *
 * Public entry point: renders post-match scoreboard images from match data,
 * caching champion and item icons on disk.
 */

export * from './config/environment';
export * from './config/layout';
export * from './models/asset';
export * from './models/errors';
export * from './models/match';
export * from './models/render';
export { AssetCache } from './services/asset-cache';
export type { AssetCacheOptions } from './services/asset-cache';
export { createHttpClient, HttpAssetFetcher, fetchLatestVersion, resolveAssetVersion } from './services/asset-fetcher';
export { CacheMaintenance } from './services/cache-maintenance';
export type { CacheMaintenanceOptions } from './services/cache-maintenance';
export { RenderQueue } from './services/render-queue';
export type { ReleaseSlot } from './services/render-queue';
export { ScoreboardRenderer } from './services/scoreboard-renderer';
export type { RendererOptions } from './services/scoreboard-renderer';
export { ScoreboardService, createScoreboardService } from './services/scoreboard-service';
export type { ScoreboardStatus, ScoreboardServiceDependencies } from './services/scoreboard-service';
export { handleRenderError, withRenderErrorHandling, RenderErrorCode } from './middleware/error-handler';
export type { RenderFailure } from './middleware/error-handler';
export { parseMatchData } from './utils/match-validation';
export * from './utils/format';
export { computeLayout, buildItemBar, computeImageHeight } from './utils/layout-engine';
