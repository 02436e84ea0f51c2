/**
 * Asset Cache Service
 *
 * Local store for champion and item icons from the Data Dragon CDN.
 * Files live at {cacheRoot}/{champions|items}/{id}.png; presence of the file is
 * the source of truth, the in-memory index only short-circuits the disk check.
 *
 * Lookup order: in-memory index -> file existence -> network download.
 * Concurrent requests for the same destination share one download. A waiter
 * that is cancelled stops waiting; the download itself is aborted only when
 * its last waiter leaves. Downloads are written to a unique temp file and
 * renamed into place, so a half-written icon is never observed as cached.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  AssetFetcher,
  AssetKey,
  AssetKind,
  ASSET_DIRECTORIES,
  ASSET_URL_GROUPS,
  CacheStats,
  IconProvider,
} from '../models/asset';
import { CacheIOError, CancellationError } from '../models/errors';
import { log, logAssetDownload, logCacheIO, LogLevel } from '../utils/logger';
import { emitAssetDownload, emitCacheCleanupDeleted, emitInBackground } from '../utils/metrics';

const ICON_EXTENSION = '.png';

/**
 * Identifiers become file names; anything that could escape the directory is rejected
 */
const SAFE_IDENTIFIER = /^[A-Za-z0-9_' .-]+$/;

export interface AssetCacheOptions {
  cacheRoot: string;
  version: string;
  assetBaseUrl: string;   // e.g. https://ddragon.leagueoflegends.com/cdn
  fetcher: AssetFetcher;
}

interface InFlightDownload {
  promise: Promise<string | null>;
  controller: AbortController;
  waiters: number;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function cancellationFrom(signal: AbortSignal): CancellationError {
  return signal.reason instanceof CancellationError
    ? signal.reason
    : new CancellationError('Asset request cancelled');
}

export class AssetCache implements IconProvider {
  private readonly index = new Set<string>();
  private readonly inFlight = new Map<string, InFlightDownload>();
  // Bumped before each cleanup unlink; a lookup that sees it change re-checks the disk.
  private removals = 0;

  constructor(private options: AssetCacheOptions) {}

  /**
   * Create the cache directories and index the files already on disk
   *
   * A restarted process with a populated cache volume serves every icon it
   * already has without touching the network.
   */
  async initialize(): Promise<void> {
    for (const directory of this.directories()) {
      try {
        await fs.mkdir(directory, { recursive: true });
      } catch (error) {
        logCacheIO({ operation: 'mkdir', path: directory, errorMessage: errorMessage(error) });
      }
    }

    await this.scanExistingCache();

    log(LogLevel.INFO, 'Asset cache initialized', {
      cache_root: this.options.cacheRoot,
      version: this.options.version,
      indexed_files: this.index.size,
    });
  }

  /**
   * Number of files currently in the in-memory index
   */
  get indexedCount(): number {
    return this.index.size;
  }

  /**
   * Local path of a champion icon, downloading it if needed
   *
   * @returns Path to the icon, or null if it could not be obtained
   * @throws CancellationError if the signal aborts while waiting
   */
  async getChampionIcon(championName: string, signal?: AbortSignal): Promise<string | null> {
    return this.getIcon({ kind: AssetKind.CHAMPION, id: championName }, signal);
  }

  /**
   * Local path of an item icon, downloading it if needed
   *
   * Item 0 is an empty slot: returns null without any I/O.
   */
  async getItemIcon(itemId: number, signal?: AbortSignal): Promise<string | null> {
    if (itemId <= 0) {
      return null;
    }
    return this.getIcon({ kind: AssetKind.ITEM, id: itemId }, signal);
  }

  localPath(key: AssetKey): string {
    return path.join(this.options.cacheRoot, ASSET_DIRECTORIES[key.kind], `${key.id}${ICON_EXTENSION}`);
  }

  remoteUrl(key: AssetKey): string {
    const { assetBaseUrl, version } = this.options;
    const group = ASSET_URL_GROUPS[key.kind];
    return `${assetBaseUrl}/${encodeURIComponent(version)}/img/${group}/${encodeURIComponent(String(key.id))}${ICON_EXTENSION}`;
  }

  async getIcon(key: AssetKey, signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) {
      throw cancellationFrom(signal);
    }

    const id = String(key.id);
    if (!SAFE_IDENTIFIER.test(id) || id === '.' || id === '..') {
      log(LogLevel.WARN, 'Rejected unsafe asset identifier', { asset_kind: key.kind, asset_id: id });
      return null;
    }

    const destination = this.localPath(key);
    if (this.index.has(destination)) {
      return destination;
    }

    const removals = this.removals;
    if (await this.fileExists(destination)) {
      if (this.removals !== removals) {
        return this.getIcon(key, signal);
      }
      this.index.add(destination);
      return destination;
    }

    return this.download(key, destination, signal);
  }

  /**
   * Join the in-flight download for a destination, starting it if none exists
   *
   * The lookup and insert run without an intervening await, so two callers
   * can never both start a download for the same file.
   */
  private download(key: AssetKey, destination: string, signal?: AbortSignal): Promise<string | null> {
    if (this.index.has(destination)) {
      return Promise.resolve(destination);
    }
    // Aborted during the existence check; an abort listener added now would never fire.
    if (signal?.aborted) {
      return Promise.reject(cancellationFrom(signal));
    }

    let entry = this.inFlight.get(destination);
    if (!entry) {
      const controller = new AbortController();
      const created: InFlightDownload = {
        controller,
        waiters: 0,
        promise: this.performDownload(key, destination, controller.signal).finally(() => {
          if (this.inFlight.get(destination) === created) {
            this.inFlight.delete(destination);
          }
        }),
      };
      this.inFlight.set(destination, created);
      entry = created;
    }

    return this.awaitDownload(entry, destination, signal);
  }

  private awaitDownload(
    entry: InFlightDownload,
    destination: string,
    signal?: AbortSignal
  ): Promise<string | null> {
    entry.waiters++;

    return new Promise<string | null>((resolve, reject) => {
      let settled = false;

      const onAbort = () => {
        if (settled || !signal) return;
        settled = true;
        entry.waiters--;
        if (entry.waiters === 0) {
          // Nobody is left to use the file; stop the transfer and let a later request retry.
          if (this.inFlight.get(destination) === entry) {
            this.inFlight.delete(destination);
          }
          entry.controller.abort();
        }
        reject(cancellationFrom(signal));
      };

      signal?.addEventListener('abort', onAbort, { once: true });

      entry.promise.then((result) => {
        if (settled) return;
        settled = true;
        entry.waiters--;
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      }, reject);
    });
  }

  /**
   * Fetch one icon and move it into place
   *
   * Never rejects: failures are logged and reported as null so every waiter
   * falls back to a placeholder and the key stays retryable.
   */
  private async performDownload(
    key: AssetKey,
    destination: string,
    signal: AbortSignal
  ): Promise<string | null> {
    const url = this.remoteUrl(key);
    const startTime = Date.now();

    try {
      const data = await this.options.fetcher.fetch(url, signal);
      await this.writeAtomically(destination, data);
      this.index.add(destination);

      logAssetDownload({ url, destination, success: true, durationMs: Date.now() - startTime });
      emitInBackground(emitAssetDownload(key.kind, true));
      return destination;
    } catch (error) {
      if (signal.aborted) {
        log(LogLevel.DEBUG, 'Icon download cancelled', { url });
        return null;
      }

      if (error instanceof CacheIOError) {
        logCacheIO({ operation: 'write', path: destination, errorMessage: error.message });
      } else {
        logAssetDownload({
          url,
          destination,
          success: false,
          durationMs: Date.now() - startTime,
          errorMessage: errorMessage(error),
        });
      }
      emitInBackground(emitAssetDownload(key.kind, false));
      return null;
    }
  }

  private async writeAtomically(destination: string, data: Buffer): Promise<void> {
    const tempPath = `${destination}.${uuidv4()}.tmp`;
    try {
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, destination);
    } catch (error) {
      try {
        await fs.rm(tempPath, { force: true });
      } catch (cleanupError) {
        logCacheIO({ operation: 'rm', path: tempPath, errorMessage: errorMessage(cleanupError) });
      }
      throw new CacheIOError(
        `Failed to store ${destination}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Existence check; any error other than "not found" is logged and treated as a miss
   */
  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (!isNotFound(error)) {
        logCacheIO({ operation: 'access', path: filePath, errorMessage: errorMessage(error) });
      }
      return false;
    }
  }

  private directories(): string[] {
    return Object.values(ASSET_DIRECTORIES).map((dir) => path.join(this.options.cacheRoot, dir));
  }

  /**
   * Cached icon files currently on disk (temp files excluded)
   */
  private async listIconFiles(): Promise<string[]> {
    const files: string[] = [];
    for (const directory of this.directories()) {
      try {
        const entries = await fs.readdir(directory);
        for (const name of entries) {
          if (name.endsWith(ICON_EXTENSION)) {
            files.push(path.join(directory, name));
          }
        }
      } catch (error) {
        logCacheIO({ operation: 'readdir', path: directory, errorMessage: errorMessage(error) });
      }
    }
    return files;
  }

  private async scanExistingCache(): Promise<void> {
    const files = await this.listIconFiles();
    for (const file of files) {
      this.index.add(file);
    }
    log(LogLevel.DEBUG, 'Cache scanned', { file_count: files.length });
  }

  /**
   * Count and total size of the cached icons
   */
  async getStats(): Promise<CacheStats> {
    let fileCount = 0;
    let totalSizeBytes = 0;

    for (const file of await this.listIconFiles()) {
      try {
        const stat = await fs.stat(file);
        fileCount++;
        totalSizeBytes += stat.size;
      } catch (error) {
        // Removed by a concurrent cleanup
        if (!isNotFound(error)) {
          logCacheIO({ operation: 'stat', path: file, errorMessage: errorMessage(error) });
        }
      }
    }

    return { fileCount, totalSizeBytes };
  }

  /**
   * Delete icons whose last access is older than maxAgeMs
   *
   * Safe to run alongside lookups: a file removed here is simply a miss for
   * the next request, which downloads it again.
   *
   * @returns Number of files deleted
   */
  async cleanupOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = Date.now() - maxAgeMs;
    let deletedCount = 0;

    for (const file of await this.listIconFiles()) {
      try {
        const stat = await fs.stat(file);
        if (stat.atimeMs < cutoff) {
          this.removals++;
          await fs.unlink(file);
          this.index.delete(file);
          deletedCount++;
        }
      } catch (error) {
        if (!isNotFound(error)) {
          logCacheIO({ operation: 'cleanup', path: file, errorMessage: errorMessage(error) });
        }
      }
    }

    if (deletedCount > 0) {
      log(LogLevel.INFO, 'Cache cleanup: deleted old files', { deleted_count: deletedCount });
    }
    emitInBackground(emitCacheCleanupDeleted(deletedCount));

    return deletedCount;
  }
}
