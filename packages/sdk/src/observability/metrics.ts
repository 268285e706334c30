/**
 * Metrics tracking for aggregation runs
 */

import type { AggregationKind } from "../types.js";

/** How an aggregation call was answered */
export type AggregationOutcome = "computed" | "fallback" | "failure";

export interface AggregationMetrics {
  computedCount: number;
  /** Answered from the fallback provider because the store was unavailable */
  fallbackCount: number;
  /** Computation failed and was masked by the fallback payload */
  failureCount: number;
  durationMs: number[];
}

const MAX_SAMPLES = 100;

class MetricsCollector {
  #metrics = new Map<AggregationKind, AggregationMetrics>();

  #getMetrics(kind: AggregationKind): AggregationMetrics {
    let metrics = this.#metrics.get(kind);
    if (!metrics) {
      metrics = { computedCount: 0, fallbackCount: 0, failureCount: 0, durationMs: [] };
      this.#metrics.set(kind, metrics);
    }
    return metrics;
  }

  /**
   * Record one aggregation call
   */
  recordRun(kind: AggregationKind, ms: number, outcome: AggregationOutcome): void {
    const metrics = this.#getMetrics(kind);
    switch (outcome) {
      case "computed":
        metrics.computedCount++;
        break;
      case "fallback":
        metrics.fallbackCount++;
        break;
      case "failure":
        metrics.failureCount++;
        break;
    }

    metrics.durationMs.push(ms);
    if (metrics.durationMs.length > MAX_SAMPLES) {
      metrics.durationMs.shift();
    }
  }

  /**
   * Get metrics for an aggregation
   */
  getMetrics(kind: AggregationKind): AggregationMetrics | undefined {
    return this.#metrics.get(kind);
  }

  /**
   * Get all metrics
   */
  getAllMetrics(): Map<AggregationKind, AggregationMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Calculate p95 for a list of samples
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Get p95 duration for an aggregation
   */
  getP95Duration(kind: AggregationKind): number {
    return this.getP95(this.#metrics.get(kind)?.durationMs ?? []);
  }

  /**
   * Reset metrics for one aggregation or all of them
   */
  reset(kind?: AggregationKind): void {
    if (kind) {
      this.#metrics.delete(kind);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
