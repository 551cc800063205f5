/**
 * @fileoverview Unit tests for MetricsAggregator
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MetricsAggregator } from './aggregator.js';

describe('MetricsAggregator', () => {
  let metrics: MetricsAggregator;

  beforeEach(() => {
    metrics = new MetricsAggregator();
  });

  it('should start with zeroed counters and rates', () => {
    expect(metrics.snapshot()).toEqual({
      totalPursuits: 0,
      successfulPursuits: 0,
      totalIterations: 0,
      convergenceRate: 0,
      avgIterationsToGoal: 0,
    });
  });

  it('should summarize successful and failed pursuits', () => {
    metrics.record({ success: true, iterations: 2 });
    metrics.record({ success: true, iterations: 4 });
    metrics.record({ success: false, iterations: 5 });

    const snapshot = metrics.snapshot();
    expect(snapshot.totalPursuits).toBe(3);
    expect(snapshot.successfulPursuits).toBe(2);
    expect(snapshot.totalIterations).toBe(6);
    expect(snapshot.convergenceRate).toBeCloseTo(0.667, 3);
    expect(snapshot.avgIterationsToGoal).toBe(3);
  });

  it('should report 0 average iterations when nothing converged', () => {
    metrics.record({ success: false, iterations: 3 });

    expect(metrics.snapshot().convergenceRate).toBe(0);
    expect(metrics.snapshot().avgIterationsToGoal).toBe(0);
  });

  it('should return a frozen copy unaffected by later records', () => {
    const before = metrics.snapshot();
    metrics.record({ success: true, iterations: 1 });

    expect(Object.isFrozen(before)).toBe(true);
    expect(before.totalPursuits).toBe(0);
  });

  it('should zero everything on reset', () => {
    metrics.record({ success: true, iterations: 7 });
    metrics.reset();

    expect(metrics.snapshot()).toEqual({
      totalPursuits: 0,
      successfulPursuits: 0,
      totalIterations: 0,
      convergenceRate: 0,
      avgIterationsToGoal: 0,
    });
  });

  it('should keep counts exact under concurrent recording', async () => {
    await Promise.all(Array.from({ length: 50 }, (_, i) =>
      Promise.resolve().then(() => metrics.record({ success: i % 2 === 0, iterations: 2 })),
    ));

    expect(metrics.snapshot()).toMatchObject({
      totalPursuits: 50,
      successfulPursuits: 25,
      totalIterations: 50,
      convergenceRate: 0.5,
      avgIterationsToGoal: 2,
    });
  });
});
