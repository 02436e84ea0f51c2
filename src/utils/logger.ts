/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the renderer. Every entry carries a timestamp and level; render entries also
 * carry the job_id so the steps of one render can be correlated.
 * Player display names are redacted from context before writing.
 */

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

type LogContext = Record<string, unknown>;

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  job_id?: string;
}

/**
 * Render lifecycle log entry
 */
interface RenderLogEntry extends BaseLogEntry {
  log_type: 'RENDER';
  outcome: 'SUCCESS' | 'INPUT_ERROR' | 'ADMISSION_TIMEOUT' | 'CANCELLED' | 'FAILED';
  match_id: string;
  participant_count: number;
  duration_ms: number;
  error_message?: string;
}

/**
 * Asset download log entry
 */
interface AssetDownloadLogEntry extends BaseLogEntry {
  log_type: 'ASSET_DOWNLOAD';
  success: boolean;
  url: string;
  destination: string;
  duration_ms: number;
  error_message?: string;
}

/**
 * Cache filesystem failure log entry
 */
interface CacheIOLogEntry extends BaseLogEntry {
  log_type: 'CACHE_IO';
  operation: string;
  path: string;
  error_message: string;
}

/**
 * Fields that carry player display names and are never written
 */
const PII_FIELDS = [
  'summoner_name',
  'summonername',
  'game_name',
  'gamename',
  'player_name',
  'tag_line',
  'tagline',
];

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Sanitize object by redacting display-name fields
 */
function sanitizeObject(obj: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }

    if (isPlainObject(value)) {
      sanitized[key] = sanitizeObject(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Minimum level written, from LOG_LEVEL
 */
function minimumLevel(): LogLevel {
  switch ((process.env.LOG_LEVEL || 'info').toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Write log entry to console
 */
function writeLog(entry: BaseLogEntry): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log the outcome of a render request
 *
 * @example
 * ```typescript
 * logRender({
 *   jobId: '5f0c...',
 *   matchId: 'EUW1_1234',
 *   participantCount: 10,
 *   outcome: 'SUCCESS',
 *   durationMs: 412
 * });
 * ```
 */
export function logRender(params: {
  jobId: string;
  matchId: string;
  participantCount: number;
  outcome: RenderLogEntry['outcome'];
  durationMs: number;
  errorMessage?: string;
}): void {
  const level =
    params.outcome === 'SUCCESS'
      ? LogLevel.INFO
      : params.outcome === 'FAILED'
      ? LogLevel.ERROR
      : LogLevel.WARN;

  const entry: RenderLogEntry = {
    timestamp: new Date().toISOString(),
    level,
    log_type: 'RENDER',
    job_id: params.jobId,
    outcome: params.outcome,
    match_id: params.matchId,
    participant_count: params.participantCount,
    duration_ms: params.durationMs,
    error_message: params.errorMessage,
  };

  writeLog(entry);
}

/**
 * Log an icon download attempt
 *
 * Successful downloads are DEBUG; failures are WARN since the render
 * continues with a placeholder.
 */
export function logAssetDownload(params: {
  url: string;
  destination: string;
  success: boolean;
  durationMs: number;
  errorMessage?: string;
}): void {
  const entry: AssetDownloadLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.DEBUG : LogLevel.WARN,
    log_type: 'ASSET_DOWNLOAD',
    success: params.success,
    url: params.url,
    destination: params.destination,
    duration_ms: params.durationMs,
    error_message: params.errorMessage,
  };

  writeLog(entry);
}

/**
 * Log a cache filesystem failure
 */
export function logCacheIO(params: {
  operation: string;
  path: string;
  errorMessage: string;
}): void {
  const entry: CacheIOLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.WARN,
    log_type: 'CACHE_IO',
    operation: params.operation,
    path: params.path,
    error_message: params.errorMessage,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * General-purpose logging function for custom log entries.
 * Automatically redacts display names from the context.
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Cache cleanup finished', {
 *   deleted_count: 12,
 *   duration_ms: 40
 * });
 * ```
 */
export function log(level: LogLevel, message: string, context?: LogContext): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}
