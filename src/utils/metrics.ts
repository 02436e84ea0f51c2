/**
 * CloudWatch Metrics Utilities
 *
 * Emits custom CloudWatch metrics for render latency, admission timeouts,
 * icon downloads and cache cleanup. Emission is disabled unless
 * METRICS_ENABLED=true, so the renderer runs unchanged outside AWS.
 */

import {
  CloudWatchClient,
  MetricDatum,
  PutMetricDataCommand,
  StandardUnit,
} from '@aws-sdk/client-cloudwatch';
import { log, LogLevel } from './logger';

/**
 * CloudWatch client instance, reused across calls
 */
const cloudWatchClient = new CloudWatchClient({
  region: process.env.AWS_REGION || 'us-east-1',
});

/**
 * Namespace for custom metrics
 */
const METRIC_NAMESPACE = 'Scoreboard/Renderer';

/**
 * Metric names
 */
export enum MetricName {
  RENDER_DURATION = 'RenderDuration',
  ADMISSION_TIMEOUT = 'AdmissionTimeout',
  ASSET_DOWNLOAD = 'AssetDownload',
  ASSET_DOWNLOAD_FAILURE = 'AssetDownloadFailure',
  CACHE_CLEANUP_DELETED = 'CacheCleanupDeleted',
}

/**
 * Metric units
 */
export const MetricUnit = {
  MILLISECONDS: StandardUnit.Milliseconds,
  COUNT: StandardUnit.Count,
} as const;

export type MetricUnit = (typeof MetricUnit)[keyof typeof MetricUnit];

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  outcome?: string;
  asset_kind?: string;
  [key: string]: string | undefined;
}

function metricsEnabled(): boolean {
  return process.env.METRICS_ENABLED === 'true';
}

/**
 * Emit a custom CloudWatch metric
 *
 * Never throws; a failed emission is logged.
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  if (!metricsEnabled()) {
    return;
  }

  try {
    const metricData: MetricDatum = {
      MetricName: metricName,
      Value: value,
      Unit: unit,
      Timestamp: new Date(),
    };

    if (dimensions) {
      const entries = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
      if (entries.length > 0) {
        metricData.Dimensions = entries;
      }
    }

    const command = new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    });

    await cloudWatchClient.send(command);
  } catch (error) {
    log(LogLevel.WARN, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Send a metric without holding up the caller
 *
 * Render slots and icon waiters must not wait on a slow CloudWatch call.
 */
export function emitInBackground(emission: Promise<void>): void {
  emission.catch((error: unknown) => {
    log(LogLevel.WARN, 'Failed to emit CloudWatch metric', {
      error: error instanceof Error ? error.message : 'Unknown error',
    });
  });
}

/**
 * Emit render duration, tagged with the render outcome
 */
export async function emitRenderDuration(durationMs: number, outcome: string): Promise<void> {
  await emitMetric(MetricName.RENDER_DURATION, durationMs, MetricUnit.MILLISECONDS, { outcome });
}

/**
 * Count a render rejected at admission
 */
export async function emitAdmissionTimeout(): Promise<void> {
  await emitMetric(MetricName.ADMISSION_TIMEOUT, 1, MetricUnit.COUNT);
}

/**
 * Count an icon download
 */
export async function emitAssetDownload(assetKind: string, success: boolean): Promise<void> {
  await emitMetric(
    success ? MetricName.ASSET_DOWNLOAD : MetricName.ASSET_DOWNLOAD_FAILURE,
    1,
    MetricUnit.COUNT,
    { asset_kind: assetKind }
  );
}

/**
 * Record how many files a cleanup sweep removed
 */
export async function emitCacheCleanupDeleted(deletedCount: number): Promise<void> {
  await emitMetric(MetricName.CACHE_CLEANUP_DELETED, deletedCount, MetricUnit.COUNT);
}
