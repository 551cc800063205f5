/**
 * @fileoverview Brute-force login defender.
 *
 * Each iteration blocks the sources with the most failed logins above a
 * threshold. The goal holds once no unblocked source is above it. When
 * a round leaves more than one offender standing, the defender doubles
 * how many sources it blocks per round.
 *
 * @module pursuit-runtime/scenarios/login-blocking
 * @version 0.1.0
 */

import { createGoal } from '../agent/goal.js';
import type { Scenario, ScenarioEntry } from './types.js';
import { runScenario } from './types.js';

export interface LoginSource {
  readonly ip: string;
  readonly failedAttempts: number;
  readonly blocked: boolean;
}

export interface LoginObservation {
  readonly sources: ReadonlyArray<LoginSource>;
}

export interface BlockAction {
  readonly block: ReadonlyArray<string>;
}

export interface BlockResult {
  readonly blocked: ReadonlyArray<string>;
}

export interface LoginLearnings {
  readonly remainingOffenders: number;
  readonly batchSize: number;
}

export interface LoginBlockingOptions {
  readonly sources?: ReadonlyArray<{ readonly ip: string; readonly failedAttempts: number }>;

  /** Failed attempts at or above which a source must be blocked */
  readonly threshold?: number;
}

export const DEFAULT_LOGIN_SOURCES: ReadonlyArray<{ readonly ip: string; readonly failedAttempts: number }> = [
  { ip: '10.0.0.1', failedAttempts: 42 },
  { ip: '10.0.0.2', failedAttempts: 17 },
  { ip: '10.0.0.3', failedAttempts: 3 },
  { ip: '10.0.0.4', failedAttempts: 9 },
  { ip: '10.0.0.5', failedAttempts: 1 },
];

export const DEFAULT_LOGIN_THRESHOLD = 5;

/**
 * Unblocked sources at or above `threshold`, worst first.
 */
export function findOffenders(observation: LoginObservation, threshold: number): LoginSource[] {
  return observation.sources
    .filter(source => !source.blocked && source.failedAttempts >= threshold)
    .sort((a, b) => b.failedAttempts - a.failedAttempts || a.ip.localeCompare(b.ip));
}

export function createLoginBlockingScenario(
  options: LoginBlockingOptions = {},
): Scenario<LoginObservation, BlockAction, BlockResult, LoginLearnings> {
  const threshold = options.threshold ?? DEFAULT_LOGIN_THRESHOLD;
  const attempts = new Map((options.sources ?? DEFAULT_LOGIN_SOURCES).map(s => [s.ip, s.failedAttempts] as const));

  // Simulated firewall and the defender's strategy state
  const firewall = new Set<string>();
  let batchSize = 1;

  const snapshot = (): LoginObservation => ({
    sources: [...attempts].map(([ip, failedAttempts]) => ({ ip, failedAttempts, blocked: firewall.has(ip) })),
  });

  return {
    initialState: snapshot(),

    createGoal: maxIterations => createGoal<LoginObservation>(
      `No unblocked source with ${threshold}+ failed logins`,
      observation => findOffenders(observation, threshold).length === 0,
      maxIterations,
    ),

    plan: (_goal, state) => ({
      actionToken: { block: findOffenders(state, threshold).slice(0, batchSize).map(s => s.ip) },
    }),

    act: plan => {
      const blocked = plan.actionToken.block.filter(ip => !firewall.has(ip));
      blocked.forEach(ip => firewall.add(ip));
      return { blocked };
    },

    observe: () => snapshot(),

    reflect: observation => {
      const remainingOffenders = findOffenders(observation, threshold).length;
      const shouldAdjustStrategy = remainingOffenders > 1;
      if (shouldAdjustStrategy) batchSize *= 2;
      return {
        goalAchieved: remainingOffenders === 0,
        shouldAdjustStrategy,
        learnings: { remainingOffenders, batchSize },
      };
    },

    describe: record => {
      const blocked = record.actionResult?.blocked ?? [];
      const remaining = record.reflection?.learnings.remainingOffenders;
      return `#${record.iteration} blocked [${blocked.join(', ')}]` +
        (remaining === undefined ? '' : `, ${remaining} offender(s) left`);
    },
  };
}

export const loginBlockingEntry: ScenarioEntry = {
  name: 'login-blocking',
  summary: 'Block brute-force login sources until none exceeds the failed-attempt threshold',
  run: (runtime, maxIterations) => runScenario(runtime, createLoginBlockingScenario(), maxIterations),
};
