/**
 * Cache Maintenance
 *
 * Periodically sweeps icons that have not been read for `maxAgeMs`.
 * The timer is unref'd so it never keeps the process alive on its own.
 */

import { AssetCache } from './asset-cache';
import { log, LogLevel } from '../utils/logger';

export interface CacheMaintenanceOptions {
  maxAgeMs: number;
  intervalMs: number;
}

export class CacheMaintenance {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<number> | null = null;

  constructor(
    private cache: Pick<AssetCache, 'cleanupOlderThan'>,
    private options: CacheMaintenanceOptions
  ) {}

  get started(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        log(LogLevel.ERROR, 'Cache cleanup failed', {
          error: error instanceof Error ? error.message : 'Unknown error',
        });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  /**
   * Run one sweep; overlapping calls share the sweep already in progress
   */
  runOnce(): Promise<number> {
    if (!this.running) {
      this.running = this.cache.cleanupOlderThan(this.options.maxAgeMs).finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }
}
