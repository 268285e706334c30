/**
 * Telemetry and observability helpers
 */

import { metrics, type AggregationKind } from "@shelter-records/sdk";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

let verboseOverride = false;

/**
 * Force metric output on for this process (the --verbose flag)
 */
export function setVerbose(enabled: boolean): void {
  verboseOverride = enabled;
}

function metricsEnabled(): boolean {
  return verboseOverride || isVerbose();
}

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if verbose mode is enabled
 */
export function emitMetric(key: string, fields: Record<string, unknown>): void {
  if (!metricsEnabled()) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  writeStderr(parts.join(" ") + "\n");
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(label, {
      duration_ms: duration,
      success,
    });
  }
}

/**
 * Emit the SDK's counters for one aggregation
 */
export function emitAggregationMetrics(kind: AggregationKind): void {
  const snapshot = metrics.getMetrics(kind);
  if (!snapshot) {
    return;
  }
  emitMetric(`analytics.${kind}`, {
    computed: snapshot.computedCount,
    fallback: snapshot.fallbackCount,
    failure: snapshot.failureCount,
    p95_ms: metrics.getP95Duration(kind).toFixed(2),
  });
}
