/**
 * @fileoverview Canary deployment rollout.
 *
 * Traffic to the new release advances through fixed steps while the
 * observed error rate stays within budget. The goal is full traffic at
 * an acceptable error rate. When the error rate breaks the budget the
 * planner asks to exit and the rollout is abandoned. When headroom gets
 * thin, the strategy turns cautious and halves the next traffic jump.
 *
 * @module pursuit-runtime/scenarios/canary-rollout
 * @version 0.1.0
 */

import { createGoal } from '../agent/goal.js';
import type { Scenario, ScenarioEntry } from './types.js';
import { runScenario } from './types.js';

export interface CanaryObservation {
  /** Share of traffic on the canary, 0-100 */
  readonly trafficPercent: number;

  /** Observed error rate in percent */
  readonly errorRate: number;
}

export interface TrafficShift {
  readonly trafficPercent: number;
}

export interface CanaryLearnings {
  /** Error budget left at this traffic level, in percentage points */
  readonly headroom: number;
  readonly cautious: boolean;
}

export interface CanaryRolloutOptions {
  /** Ascending traffic steps ending at 100 */
  readonly steps?: ReadonlyArray<number>;

  /** Highest acceptable error rate, in percent */
  readonly errorBudget?: number;

  /** Error rate observed at a given traffic level */
  readonly errorRateAt?: (trafficPercent: number) => number;
}

export const DEFAULT_CANARY_STEPS: ReadonlyArray<number> = [10, 25, 50, 100];
export const DEFAULT_ERROR_BUDGET = 1;

/**
 * Healthy release: error rate grows slowly with traffic.
 */
export const healthyErrorRate = (trafficPercent: number): number => 0.1 + trafficPercent * 0.004;

/**
 * Traffic level the next iteration should move to.
 * Cautious mode stops halfway to the next step.
 */
export function nextTrafficStep(current: number, steps: ReadonlyArray<number>, cautious: boolean): number {
  const target = steps.find(step => step > current) ?? 100;
  if (!cautious) return target;

  const halfway = Math.round((current + target) / 2);
  return halfway > current ? halfway : target;
}

export function createCanaryRolloutScenario(
  options: CanaryRolloutOptions = {},
): Scenario<CanaryObservation, TrafficShift, TrafficShift, CanaryLearnings> {
  const steps = options.steps ?? DEFAULT_CANARY_STEPS;
  const errorBudget = options.errorBudget ?? DEFAULT_ERROR_BUDGET;
  const errorRateAt = options.errorRateAt ?? healthyErrorRate;

  let cautious = false;

  return {
    initialState: { trafficPercent: 0, errorRate: 0 },

    createGoal: maxIterations => createGoal<CanaryObservation>(
      `Canary at 100% traffic with error rate <= ${errorBudget}%`,
      observation => observation.trafficPercent === 100 && observation.errorRate <= errorBudget,
      maxIterations,
    ),

    plan: (_goal, state) => {
      if (state.errorRate > errorBudget) {
        return {
          actionToken: { trafficPercent: 0 },
          shouldExit: true,
          exitReason: `error rate ${state.errorRate.toFixed(2)}% exceeds budget ` +
            `${errorBudget.toFixed(2)}% at ${state.trafficPercent}% traffic; rolling back`,
        };
      }
      return { actionToken: { trafficPercent: nextTrafficStep(state.trafficPercent, steps, cautious) } };
    },

    act: plan => ({ trafficPercent: plan.actionToken.trafficPercent }),

    observe: shift => ({
      trafficPercent: shift.trafficPercent,
      errorRate: errorRateAt(shift.trafficPercent),
    }),

    reflect: observation => {
      const headroom = errorBudget - observation.errorRate;
      const shouldAdjustStrategy = !cautious && headroom >= 0 && headroom < errorBudget * 0.25;
      if (shouldAdjustStrategy) cautious = true;
      return {
        goalAchieved: observation.trafficPercent === 100 && headroom >= 0,
        shouldAdjustStrategy,
        learnings: { headroom, cautious },
      };
    },

    describe: record => {
      const observation = record.observation;
      if (!observation) {
        return `#${record.iteration} ${record.plan?.exitReason ?? 'no traffic change'}`;
      }
      return `#${record.iteration} traffic ${observation.trafficPercent}%, ` +
        `error rate ${observation.errorRate.toFixed(2)}%`;
    },
  };
}

export const canaryRolloutEntry: ScenarioEntry = {
  name: 'canary-rollout',
  summary: 'Advance canary traffic 10 → 25 → 50 → 100% while the error rate stays in budget',
  run: (runtime, maxIterations) => runScenario(runtime, createCanaryRolloutScenario(), maxIterations),
};
