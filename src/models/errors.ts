/**
 * Application Error Models
 *
 * Error types raised by the asset cache and the render pipeline.
 * Only InputError, AdmissionTimeoutError and CancellationError ever reach a
 * render caller; asset-level errors are absorbed with a placeholder tile.
 * The error handler maps them to user-facing failures.
 */

/**
 * Tracked participant is missing from the match data
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * No render slot became free before the deadline; nothing was drawn
 */
export class AdmissionTimeoutError extends Error {
  constructor(message: string, public readonly waitedMs: number) {
    super(message);
    this.name = 'AdmissionTimeoutError';
  }
}

/**
 * Render or download aborted after it started
 *
 * `timedOut` is true when the render deadline fired, false when the caller
 * cancelled.
 */
export class CancellationError extends Error {
  constructor(message: string, public readonly timedOut: boolean = false) {
    super(message);
    this.name = 'CancellationError';
  }
}

/**
 * Icon download failed (network error or non-success status)
 */
export class AssetFetchError extends Error {
  constructor(message: string, public readonly url: string, public readonly status?: number) {
    super(message);
    this.name = 'AssetFetchError';
  }
}

/**
 * Local filesystem failure while scanning, reading or writing the cache
 */
export class CacheIOError extends Error {
  constructor(message: string, public readonly originalError?: Error) {
    super(message);
    this.name = 'CacheIOError';
  }
}

/**
 * Validation error with optional field-level details
 */
export class ValidationError extends Error {
  constructor(message: string, public details?: Array<{ field: string; message: string }>) {
    super(message);
    this.name = 'ValidationError';
  }
}
