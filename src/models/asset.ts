/**
 * Asset Models
 *
 * Types describing cached icon assets and cache statistics.
 */

/**
 * Kind of remote icon
 */
export enum AssetKind {
  CHAMPION = 'champion',
  ITEM = 'item',
}

/**
 * Identity of a cached icon
 */
export interface AssetKey {
  kind: AssetKind;
  id: string | number;
}

/**
 * Snapshot of the on-disk cache
 */
export interface CacheStats {
  fileCount: number;
  totalSizeBytes: number;
}

/**
 * Downloads raw icon bytes from the asset provider
 */
export interface AssetFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<Buffer>;
}

/**
 * Subdirectory for each asset kind under the cache root
 */
export const ASSET_DIRECTORIES: Record<AssetKind, string> = {
  [AssetKind.CHAMPION]: 'champions',
  [AssetKind.ITEM]: 'items',
};

/**
 * Path segment used by the CDN for each asset kind
 */
export const ASSET_URL_GROUPS: Record<AssetKind, string> = {
  [AssetKind.CHAMPION]: 'champion',
  [AssetKind.ITEM]: 'item',
};

/**
 * Resolves icons to local file paths; null when no icon is available
 */
export interface IconProvider {
  getChampionIcon(championName: string, signal?: AbortSignal): Promise<string | null>;
  getItemIcon(itemId: number, signal?: AbortSignal): Promise<string | null>;
}
