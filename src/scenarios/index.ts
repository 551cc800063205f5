/**
 * @fileoverview Built-in scenarios.
 *
 * @module pursuit-runtime/scenarios
 * @version 0.1.0
 */

import type { ScenarioEntry } from './types.js';
import { loginBlockingEntry } from './login-blocking.js';
import { canaryRolloutEntry } from './canary-rollout.js';

export const SCENARIOS: ReadonlyMap<string, ScenarioEntry> = new Map([
  [loginBlockingEntry.name, loginBlockingEntry],
  [canaryRolloutEntry.name, canaryRolloutEntry],
]);

export { runScenario, type Scenario, type ScenarioEntry, type ScenarioRun } from './types.js';

export {
  createLoginBlockingScenario,
  findOffenders,
  loginBlockingEntry,
  DEFAULT_LOGIN_SOURCES,
  DEFAULT_LOGIN_THRESHOLD,
  type LoginSource,
  type LoginObservation,
  type BlockAction,
  type BlockResult,
  type LoginLearnings,
  type LoginBlockingOptions,
} from './login-blocking.js';

export {
  createCanaryRolloutScenario,
  nextTrafficStep,
  healthyErrorRate,
  canaryRolloutEntry,
  DEFAULT_CANARY_STEPS,
  DEFAULT_ERROR_BUDGET,
  type CanaryObservation,
  type TrafficShift,
  type CanaryLearnings,
  type CanaryRolloutOptions,
} from './canary-rollout.js';
