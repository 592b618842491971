/**
 * CloudWatch Metrics Utilities
 *
 * Emits custom CloudWatch metrics for failed logins and CSV imports.
 * Emission is switched on with METRICS_ENABLED and never throws.
 */

import { CloudWatchClient, PutMetricDataCommand, MetricDatum } from '@aws-sdk/client-cloudwatch';
import { loadEnvironmentConfig } from '../config/environment';
import { log, LogLevel } from './logger';

/**
 * CloudWatch client instance
 * Reused across Lambda invocations for connection pooling
 */
const cloudWatchClient = new CloudWatchClient({
  region: process.env.AWS_REGION || 'us-east-1',
});

/**
 * Namespace for custom metrics
 */
export const METRIC_NAMESPACE = 'RosterApi/Backend';

/**
 * Metric names
 */
export enum MetricName {
  LOGIN_FAILURE = 'LoginFailure',
  CSV_IMPORT_ROWS = 'CsvImportRows',
  CSV_IMPORT_DURATION = 'CsvImportDuration',
}

/**
 * Metric units
 */
export enum MetricUnit {
  MILLISECONDS = 'Milliseconds',
  COUNT = 'Count',
}

/**
 * Metric dimensions for filtering and grouping
 */
export interface MetricDimensions {
  operation_type?: string;
  outcome?: string;
  reason?: string;
  [key: string]: string | undefined;
}

/**
 * Emit a custom CloudWatch metric
 */
export async function emitMetric(
  metricName: MetricName,
  value: number,
  unit: MetricUnit,
  dimensions?: MetricDimensions
): Promise<void> {
  if (!loadEnvironmentConfig().metricsEnabled) {
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
      metricData.Dimensions = Object.entries(dimensions).flatMap(([name, dimensionValue]) =>
        dimensionValue === undefined ? [] : [{ Name: name, Value: dimensionValue }]
      );
    }

    const command = new PutMetricDataCommand({
      Namespace: METRIC_NAMESPACE,
      MetricData: [metricData],
    });

    await cloudWatchClient.send(command);
  } catch (error) {
    // Metrics must not break the request
    log(LogLevel.WARN, 'Failed to emit CloudWatch metric', {
      metric_name: metricName,
      value,
      unit,
      error_message: error instanceof Error ? error.message : 'Unknown error',
    });
  }
}

/**
 * Emit a failed login
 *
 * @param reason - unknown_username or password_mismatch
 */
export async function emitLoginFailure(reason: string): Promise<void> {
  await emitMetric(MetricName.LOGIN_FAILURE, 1, MetricUnit.COUNT, {
    operation_type: 'login',
    reason,
  });
}

/**
 * Emit the outcome of a CSV import
 *
 * @param imported - Rows committed
 * @param succeeded - Whether every row was imported
 * @param durationMs - Wall time of the import
 */
export async function emitCsvImport(
  imported: number,
  succeeded: boolean,
  durationMs: number
): Promise<void> {
  const outcome = succeeded ? 'success' : 'aborted';

  await emitMetric(MetricName.CSV_IMPORT_ROWS, imported, MetricUnit.COUNT, {
    operation_type: 'csv_import',
    outcome,
  });
  await emitMetric(MetricName.CSV_IMPORT_DURATION, durationMs, MetricUnit.MILLISECONDS, {
    operation_type: 'csv_import',
    outcome,
  });
}
