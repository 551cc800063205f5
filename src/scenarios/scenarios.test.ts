/**
 * @fileoverview Tests for the built-in scenarios
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { LoopRuntime } from '../agent/loop-runtime.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { SCENARIOS, runScenario } from './index.js';
import { createLoginBlockingScenario, findOffenders } from './login-blocking.js';
import { createCanaryRolloutScenario, nextTrafficStep } from './canary-rollout.js';

describe('scenarios', () => {
  let runtime: LoopRuntime;

  beforeEach(() => {
    runtime = new LoopRuntime({ logger: new Logger({ transports: [new MemoryTransport()] }) });
  });

  describe('login-blocking', () => {
    it('should rank unblocked offenders worst first', () => {
      const offenders = findOffenders({
        sources: [
          { ip: '10.0.0.9', failedAttempts: 6, blocked: false },
          { ip: '10.0.0.8', failedAttempts: 30, blocked: true },
          { ip: '10.0.0.7', failedAttempts: 6, blocked: false },
          { ip: '10.0.0.6', failedAttempts: 4, blocked: false },
        ],
      }, 5);

      expect(offenders.map(o => o.ip)).toEqual(['10.0.0.7', '10.0.0.9']);
    });

    it('should block all offenders, widening the batch after a slow round', async () => {
      const { result, lines } = await runScenario(runtime, createLoginBlockingScenario(), 5);

      expect(result.success).toBe(true);
      expect(result.iterations).toBe(2);
      expect(lines).toEqual([
        '#1 blocked [10.0.0.1], 2 offender(s) left',
        '#2 blocked [10.0.0.2, 10.0.0.4], 0 offender(s) left',
      ]);
      expect(result.trace.records[0]?.reflection).toEqual({
        goalAchieved: false,
        shouldAdjustStrategy: true,
        learnings: { remainingOffenders: 2, batchSize: 2 },
      });
      expect(result.finalObservation?.sources.filter(s => s.blocked).map(s => s.ip))
        .toEqual(['10.0.0.1', '10.0.0.2', '10.0.0.4']);
    });

    it('should run out of iterations when the cap is too low', async () => {
      const { result } = await runScenario(runtime, createLoginBlockingScenario(), 1);

      expect(result.success).toBe(false);
      expect(result.reason).toBe('max iterations reached');
    });

    it('should succeed at once with nothing to block', async () => {
      const scenario = createLoginBlockingScenario({ sources: [{ ip: '192.168.1.1', failedAttempts: 2 }] });

      const { result, lines } = await runScenario(runtime, scenario, 3);

      expect(result.success).toBe(true);
      expect(result.iterations).toBe(1);
      expect(lines).toEqual(['#1 blocked [], 0 offender(s) left']);
    });
  });

  describe('canary-rollout', () => {
    it('should pick the next traffic step', () => {
      const steps = [10, 25, 50, 100];

      expect(nextTrafficStep(0, steps, false)).toBe(10);
      expect(nextTrafficStep(50, steps, false)).toBe(100);
      expect(nextTrafficStep(25, steps, true)).toBe(38);
      expect(nextTrafficStep(49, steps, true)).toBe(50);
      expect(nextTrafficStep(99, steps, true)).toBe(100);
    });

    it('should reach full traffic on a healthy release', async () => {
      const { result, lines } = await runScenario(runtime, createCanaryRolloutScenario(), 6);

      expect(result.success).toBe(true);
      expect(result.iterations).toBe(4);
      expect(lines).toEqual([
        '#1 traffic 10%, error rate 0.14%',
        '#2 traffic 25%, error rate 0.20%',
        '#3 traffic 50%, error rate 0.30%',
        '#4 traffic 100%, error rate 0.50%',
      ]);
    });

    it('should exit and roll back when the error budget breaks', async () => {
      const scenario = createCanaryRolloutScenario({
        errorRateAt: traffic => (traffic >= 50 ? 2.5 : 0.2),
      });

      const { result, lines } = await runScenario(runtime, scenario, 6);

      expect(result.success).toBe(false);
      expect(result.reason).toBe('error rate 2.50% exceeds budget 1.00% at 50% traffic; rolling back');
      expect(result.iterations).toBe(4);
      expect(result.trace.records[3]).not.toHaveProperty('actionResult');
      expect(result.finalObservation).toEqual({ trafficPercent: 50, errorRate: 2.5 });
      expect(lines[3]).toBe('#4 error rate 2.50% exceeds budget 1.00% at 50% traffic; rolling back');
    });

    it('should turn cautious when headroom gets thin', async () => {
      const scenario = createCanaryRolloutScenario({
        errorRateAt: traffic => (traffic >= 25 ? 0.8 : 0.1),
      });

      const { result } = await runScenario(runtime, scenario, 3);

      const reflections = result.trace.records.map(r => r.reflection?.shouldAdjustStrategy);
      expect(reflections).toEqual([false, true, false]);
      expect(result.trace.records.map(r => r.observation?.trafficPercent)).toEqual([10, 25, 38]);
    });
  });

  describe('registry', () => {
    it('should list both scenarios', () => {
      expect([...SCENARIOS.keys()]).toEqual(['login-blocking', 'canary-rollout']);
    });

    it('should run an entry with erased payload types', async () => {
      const entry = SCENARIOS.get('canary-rollout');

      const run = await entry?.run(runtime, 6);

      expect(run?.result.success).toBe(true);
      expect(run?.lines).toHaveLength(4);
    });
  });
});
