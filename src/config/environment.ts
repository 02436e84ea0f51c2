/**
 * Environment Configuration
 *
 * Centralized configuration management for environment variables.
 * All configuration values should be accessed through this module.
 */

import Ajv, { JSONSchemaType } from 'ajv';
import { ValidationError } from '../models/errors';
import { MainItemSlots, TeamSortMode } from '../models/render';
import { LayoutConfig } from './layout';

export interface EnvironmentConfig {
  // Asset provider configuration
  ddragonVersion: string;
  assetHost: string;
  assetCachePath: string;
  assetFetchTimeoutMs: number;
  assetFetchRetries: number;

  // Cache maintenance
  cacheMaxAgeDays: number;
  cacheCleanupIntervalHours: number;

  // Render configuration
  renderConcurrency: number;
  renderTimeoutMs: number;
  mainItemSlots: number;
  teamSort: string;
  headingFontPath?: string;
  statsFontPath?: string;

  // Application configuration
  logLevel: string;
  metricsEnabled: boolean;
  nodeEnv: string;
}

/**
 * Load configuration from environment variables, applying defaults
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  return {
    ddragonVersion: env.DDRAGON_VERSION || 'latest',
    assetHost: env.ASSET_HOST || 'https://ddragon.leagueoflegends.com',
    assetCachePath: env.ASSET_CACHE_PATH || 'Assets/Cache',
    assetFetchTimeoutMs: parseInt(env.ASSET_FETCH_TIMEOUT_MS || '10000', 10),
    assetFetchRetries: parseInt(env.ASSET_FETCH_RETRIES || '2', 10),
    cacheMaxAgeDays: parseInt(env.CACHE_MAX_AGE_DAYS || '30', 10),
    cacheCleanupIntervalHours: parseInt(env.CACHE_CLEANUP_INTERVAL_HOURS || '168', 10),
    renderConcurrency: parseInt(env.RENDER_CONCURRENCY || '2', 10),
    renderTimeoutMs: parseInt(env.RENDER_TIMEOUT_MS || '30000', 10),
    mainItemSlots: parseInt(env.MAIN_ITEM_SLOTS || '6', 10),
    teamSort: env.TEAM_SORT || 'position',
    headingFontPath: env.HEADING_FONT_PATH || undefined,
    statsFontPath: env.STATS_FONT_PATH || undefined,
    logLevel: env.LOG_LEVEL || 'info',
    metricsEnabled: env.METRICS_ENABLED === 'true',
    nodeEnv: env.NODE_ENV || 'development',
  };
}

const ajv = new Ajv({ allErrors: true, strict: true });

// Largest delay setTimeout/setInterval accept; Node replaces anything above with 1ms.
export const MAX_TIMER_MS = 2147483647;
const MAX_TIMER_HOURS = Math.floor(MAX_TIMER_MS / (60 * 60 * 1000));

const environmentSchema: JSONSchemaType<EnvironmentConfig> = {
  type: 'object',
  properties: {
    ddragonVersion: { type: 'string', pattern: '^(latest|\\d+\\.\\d+\\.\\d+)$' },
    assetHost: { type: 'string', pattern: '^https?://' },
    assetCachePath: { type: 'string', minLength: 1 },
    assetFetchTimeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMER_MS },
    assetFetchRetries: { type: 'integer', minimum: 0, maximum: 10 },
    cacheMaxAgeDays: { type: 'integer', minimum: 1 },
    cacheCleanupIntervalHours: { type: 'integer', minimum: 1, maximum: MAX_TIMER_HOURS },
    renderConcurrency: { type: 'integer', minimum: 1 },
    renderTimeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMER_MS },
    mainItemSlots: { type: 'integer', enum: [6, 7] },
    teamSort: { type: 'string', enum: ['position', 'kills'] },
    headingFontPath: { type: 'string', nullable: true },
    statsFontPath: { type: 'string', nullable: true },
    logLevel: { type: 'string', enum: ['debug', 'info', 'warn', 'error'] },
    metricsEnabled: { type: 'boolean' },
    nodeEnv: { type: 'string' },
  },
  required: [
    'ddragonVersion',
    'assetHost',
    'assetCachePath',
    'assetFetchTimeoutMs',
    'assetFetchRetries',
    'cacheMaxAgeDays',
    'cacheCleanupIntervalHours',
    'renderConcurrency',
    'renderTimeoutMs',
    'mainItemSlots',
    'teamSort',
    'logLevel',
    'metricsEnabled',
    'nodeEnv',
  ],
  additionalProperties: false,
};

const validateEnvironment = ajv.compile(environmentSchema);

/**
 * Validate configuration values
 *
 * @throws ValidationError listing every invalid field
 */
export function validateEnvironmentConfig(config: EnvironmentConfig): void {
  if (validateEnvironment(config)) {
    return;
  }

  const details = (validateEnvironment.errors || []).map((error) => ({
    field: error.instancePath.replace(/^\//, '') || 'config',
    message: error.message || 'is invalid',
  }));

  throw new ValidationError(
    `Invalid configuration: ${details.map((d) => d.field).join(', ')}`,
    details
  );
}

function isMainItemSlots(value: number): value is MainItemSlots {
  return value === 6 || value === 7;
}

function isTeamSortMode(value: string): value is TeamSortMode {
  return value === 'position' || value === 'kills';
}

/**
 * Extract the layout settings carried by the environment
 */
export function toLayoutOverrides(config: EnvironmentConfig): Partial<LayoutConfig> {
  const overrides: Partial<LayoutConfig> = {};
  if (isMainItemSlots(config.mainItemSlots)) {
    overrides.mainItemSlots = config.mainItemSlots;
  }
  if (isTeamSortMode(config.teamSort)) {
    overrides.teamSort = config.teamSort;
  }
  return overrides;
}
