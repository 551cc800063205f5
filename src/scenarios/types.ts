/**
 * @fileoverview Scenario contract.
 *
 * A scenario bundles a goal factory, an initial state and the four
 * callbacks of a pursuit. Callbacks close over the scenario's own
 * strategy state, so a scenario instance serves a single pursuit;
 * create a new one per run.
 *
 * @module pursuit-runtime/scenarios/types
 * @version 0.1.0
 */

import type { LoopRuntime } from '../agent/loop-runtime.js';
import type {
  ActFn,
  Goal,
  IterationRecord,
  LoopResult,
  ObserveFn,
  PlanFn,
  ReflectFn,
} from '../types/index.js';

export interface Scenario<TObservation, TAction, TResult, TLearnings> {
  readonly initialState: TObservation;
  createGoal(maxIterations: number): Goal<TObservation>;
  readonly plan: PlanFn<TObservation, TAction>;
  readonly act: ActFn<TAction, TResult>;
  readonly observe: ObserveFn<TResult, TObservation>;
  readonly reflect: ReflectFn<TObservation, TLearnings>;

  /** One-line description of an iteration, for reports */
  describe(record: IterationRecord<TAction, TResult, TObservation, TLearnings>): string;
}

/**
 * Outcome of running a scenario, with its payload types erased.
 */
export interface ScenarioRun {
  readonly result: LoopResult;
  readonly lines: ReadonlyArray<string>;
}

/**
 * Registry entry: everything the CLI needs without knowing payload types.
 */
export interface ScenarioEntry {
  readonly name: string;
  readonly summary: string;
  run(runtime: LoopRuntime, maxIterations: number): Promise<ScenarioRun>;
}

/**
 * Runs a scenario on `runtime` and describes each iteration.
 */
export async function runScenario<TObservation, TAction, TResult, TLearnings>(
  runtime: LoopRuntime,
  scenario: Scenario<TObservation, TAction, TResult, TLearnings>,
  maxIterations: number,
): Promise<{
  result: LoopResult<TAction, TResult, TObservation, TLearnings>;
  lines: string[];
}> {
  const result = await runtime.pursue(
    scenario.createGoal(maxIterations),
    scenario.initialState,
    scenario.plan,
    scenario.act,
    scenario.observe,
    scenario.reflect,
  );
  return { result, lines: result.trace.records.map(record => scenario.describe(record)) };
}
