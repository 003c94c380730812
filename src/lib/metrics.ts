// Path: src/lib/metrics.ts
// Prometheus metrics for rds-iam-connect

import { metricsLogger as log } from './logger.js';

/**
 * Minimal Prometheus registry, exported in text format (0.0.4).
 * Nothing is served; `rds-iam-connect check --metrics` prints the text.
 */

type Labels = Record<string, string>;

interface ScalarSeries {
  labels: Labels;
  value: number;
}

interface HistogramSeries {
  labels: Labels;
  /** Cumulative count per bucket, same order as the family's bounds */
  bucketCounts: number[];
  sum: number;
  count: number;
}

interface ScalarFamily {
  type: 'counter' | 'gauge';
  help: string;
  series: Map<string, ScalarSeries>;
}

interface HistogramFamily {
  type: 'histogram';
  help: string;
  bounds: readonly number[];
  series: Map<string, HistogramSeries>;
}

type MetricFamily = ScalarFamily | HistogramFamily;

// Export order is registration order
const registry = new Map<string, MetricFamily>();

// Token refreshes take tens to hundreds of milliseconds
const DEFAULT_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10];

function seriesKey(labels: Labels): string {
  return JSON.stringify(labels);
}

function scalarFamily(name: string, type: ScalarFamily['type']): ScalarFamily | undefined {
  const family = registry.get(name);
  if (family?.type === type) return family;
  log.warn({ name, type }, 'Metric not registered');
  return undefined;
}

/**
 * Register a counter metric
 */
export function registerCounter(name: string, help: string): void {
  if (!registry.has(name)) {
    registry.set(name, { type: 'counter', help, series: new Map() });
  }
}

/**
 * Register a gauge metric
 */
export function registerGauge(name: string, help: string): void {
  if (!registry.has(name)) {
    registry.set(name, { type: 'gauge', help, series: new Map() });
  }
}

/**
 * Register a histogram metric. Bounds are upper limits in seconds, ascending.
 */
export function registerHistogram(name: string, help: string, bounds: readonly number[] = DEFAULT_BUCKETS): void {
  if (!registry.has(name)) {
    registry.set(name, { type: 'histogram', help, bounds, series: new Map() });
  }
}

export function incCounter(name: string, labels: Labels = {}, value = 1): void {
  const family = scalarFamily(name, 'counter');
  if (!family) return;

  const key = seriesKey(labels);
  const series = family.series.get(key);
  if (series) {
    series.value += value;
  } else {
    family.series.set(key, { labels, value });
  }
}

export function setGauge(name: string, value: number, labels: Labels = {}): void {
  const family = scalarFamily(name, 'gauge');
  if (!family) return;
  family.series.set(seriesKey(labels), { labels, value });
}

export function observeHistogram(name: string, value: number, labels: Labels = {}): void {
  const family = registry.get(name);
  if (family?.type !== 'histogram') {
    log.warn({ name, type: 'histogram' }, 'Metric not registered');
    return;
  }

  const key = seriesKey(labels);
  const series = family.series.get(key) ?? { labels, bucketCounts: family.bounds.map(() => 0), sum: 0, count: 0 };
  family.series.set(key, series);

  family.bounds.forEach((le, i) => {
    if (value <= le) series.bucketCounts[i]++;
  });
  series.sum += value;
  series.count++;
}

function formatLabels(labels: Labels): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return '';
  return `{${entries.map(([k, v]) => `${k}="${v}"`).join(',')}}`;
}

function exportFamily(name: string, family: MetricFamily): string[] {
  const lines = [`# HELP ${name} ${family.help}`, `# TYPE ${name} ${family.type}`];

  if (family.type === 'histogram') {
    for (const s of family.series.values()) {
      family.bounds.forEach((le, i) => {
        lines.push(`${name}_bucket${formatLabels({ ...s.labels, le: String(le) })} ${s.bucketCounts[i]}`);
      });
      lines.push(`${name}_bucket${formatLabels({ ...s.labels, le: '+Inf' })} ${s.count}`);
      lines.push(`${name}_sum${formatLabels(s.labels)} ${s.sum.toFixed(6)}`);
      lines.push(`${name}_count${formatLabels(s.labels)} ${s.count}`);
    }
    return lines;
  }

  for (const s of family.series.values()) {
    lines.push(`${name}${formatLabels(s.labels)} ${s.value}`);
  }
  if (family.series.size === 0) {
    lines.push(`${name} 0`);
  }
  return lines;
}

/**
 * Export all metrics in Prometheus text format
 */
export function exportMetrics(): string {
  const lines: string[] = [];
  for (const [name, family] of registry) {
    lines.push(...exportFamily(name, family), '');
  }
  return lines.join('\n');
}

/**
 * Drop all recorded values, keeping registrations
 */
export function resetMetrics(): void {
  for (const family of registry.values()) {
    family.series.clear();
  }
}

// Register token refresh and connection metrics
export function initializeMetrics(): void {
  registerCounter('rds_iam_token_refresh_total', 'Total IAM token refresh attempts');
  registerCounter('rds_iam_token_refresh_failures_total', 'Total failed IAM token refreshes');
  registerCounter('rds_iam_connections_opened_total', 'Total physical connections opened through the connector');

  registerGauge('rds_iam_token_last_refresh_timestamp', 'Timestamp of last successful token refresh');
  registerGauge('rds_iam_pool_connections', 'Open pooled connections');

  registerHistogram('rds_iam_token_refresh_duration_seconds', 'IAM token refresh duration in seconds');

  log.debug('Metrics initialized');
}

// Convenience functions for common operations
export const metrics = {
  tokenRefreshed: (endpoint: string, durationMs: number) => {
    incCounter('rds_iam_token_refresh_total', { status: 'success', endpoint });
    setGauge('rds_iam_token_last_refresh_timestamp', Date.now() / 1000, { endpoint });
    observeHistogram('rds_iam_token_refresh_duration_seconds', durationMs / 1000, { endpoint });
  },
  tokenRefreshFailed: (endpoint: string, reason: string) => {
    incCounter('rds_iam_token_refresh_total', { status: 'failure', endpoint });
    incCounter('rds_iam_token_refresh_failures_total', { endpoint, reason });
  },
  connectionOpened: (driver: string, status: 'success' | 'failure') => {
    incCounter('rds_iam_connections_opened_total', { driver, status });
  },
  setPoolConnections: (driver: string, count: number) => {
    setGauge('rds_iam_pool_connections', count, { driver });
  },
};

initializeMetrics();
