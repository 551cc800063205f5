/**
 * @fileoverview Metrics Aggregator - running statistics across pursuits.
 *
 * Counters live in memory only and are never persisted. Every method is
 * synchronous, so on Node's single JS thread a `record` cannot interleave
 * with another `record` or a `snapshot`.
 *
 * @module pursuit-runtime/metrics/aggregator
 * @version 0.1.0
 */

import type { LoopMetricsSnapshot } from '../types/index.js';

/**
 * The part of a loop result the aggregator reads.
 */
export type RecordableResult = Readonly<{ success: boolean; iterations: number }>;

interface Counters {
  totalPursuits: number;
  successfulPursuits: number;
  totalIterations: number;
}

const emptyCounters = (): Counters => ({
  totalPursuits: 0,
  successfulPursuits: 0,
  totalIterations: 0,
});

/**
 * @example
 * ```typescript
 * const metrics = new MetricsAggregator();
 * metrics.record(await pursue(goal, state, plan, act, observe, reflect));
 * console.log(metrics.snapshot().convergenceRate);
 * ```
 */
export class MetricsAggregator {
  private counters: Counters = emptyCounters();

  record(result: RecordableResult): void {
    this.counters.totalPursuits++;
    if (result.success) {
      this.counters.successfulPursuits++;
      this.counters.totalIterations += result.iterations;
    }
  }

  /**
   * Frozen copy of the counters with derived rates.
   * Rates are 0 rather than NaN when their denominator is 0.
   */
  snapshot(): LoopMetricsSnapshot {
    const { totalPursuits, successfulPursuits, totalIterations } = this.counters;
    return Object.freeze({
      totalPursuits,
      successfulPursuits,
      totalIterations,
      convergenceRate: totalPursuits === 0 ? 0 : successfulPursuits / totalPursuits,
      avgIterationsToGoal: successfulPursuits === 0 ? 0 : totalIterations / successfulPursuits,
    });
  }

  reset(): void {
    this.counters = emptyCounters();
  }
}

/**
 * Process-wide aggregator. Only reset explicitly.
 */
export const defaultMetrics = new MetricsAggregator();
