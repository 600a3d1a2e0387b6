import { CONSTANTS, OPERATIONS, type Metrics, type Operation } from './types.js';

/**
 * In-memory metrics for one app instance.
 *
 * SCOPE: Each `createApp` call owns its collector, so two apps in one process
 * (as in the tests) never see each other's numbers.
 *
 * RETENTION: Only the last `CONSTANTS.METRICS.MAX_SAMPLES` request durations
 * are kept; quantiles are computed over that window when `/metrics` is read.
 * Operation counters only grow.
 *
 * EXPOSITION: `renderMetrics` writes the Prometheus text format, so the
 * endpoint can be scraped as is.
 */

/**
 * Creates an empty collector.
 */
export function createMetrics(): Metrics {
  return {
    requestDuration: [],
    operationCount: new Map(),
  };
}

/**
 * Nearest-rank percentile over a sorted copy of `arr`.
 * @param p Percentile value from 0.0 to 1.0, where 0.5 is the median
 */
export function percentile(arr: number[], p: number): number {
  if (arr.length === 0) return 0;
  const sorted = [...arr].sort((a, b) => a - b);
  const index = Math.ceil((sorted.length - 1) * p);
  return sorted[index] ?? 0;
}

export function recordRequestDuration(metrics: Metrics, durationMs: number): void {
  metrics.requestDuration.push(durationMs);
  if (metrics.requestDuration.length > CONSTANTS.METRICS.MAX_SAMPLES) {
    metrics.requestDuration.shift();
  }
}

export function recordOperation(metrics: Metrics, operation: Operation): void {
  metrics.operationCount.set(operation, (metrics.operationCount.get(operation) ?? 0) + 1);
}

/**
 * Renders the collector in the Prometheus text exposition format.
 */
export function renderMetrics(metrics: Metrics): string {
  const durations = metrics.requestDuration;
  const operationLines = OPERATIONS.map(
    (op) => `calculator_operations_total{operation="${op}"} ${metrics.operationCount.get(op) ?? 0}`,
  );

  return [
    '# HELP calculator_request_duration_milliseconds HTTP request duration summary',
    '# TYPE calculator_request_duration_milliseconds summary',
    `calculator_request_duration_milliseconds{quantile="0.5"} ${percentile(durations, 0.5)}`,
    `calculator_request_duration_milliseconds{quantile="0.95"} ${percentile(durations, 0.95)}`,
    `calculator_request_duration_milliseconds{quantile="0.99"} ${percentile(durations, 0.99)}`,
    `calculator_request_duration_milliseconds_count ${durations.length}`,
    '',
    '# HELP calculator_operations_total Successful calculations by operation',
    '# TYPE calculator_operations_total counter',
    ...operationLines,
    '',
  ].join('\n');
}
