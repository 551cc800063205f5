/**
 * @fileoverview Data model of a goal pursuit.
 *
 * Payloads (action tokens, action results, observations, learnings) are
 * type parameters chosen by the caller. The runtime moves them between
 * callbacks and never looks inside.
 *
 * @module pursuit-runtime/types/loop
 * @version 0.1.0
 */

import type { Timestamp, UniqueId } from './core.types.js';

/**
 * What a pursuit is trying to achieve.
 */
export interface Goal<TObservation> {
  /** Human-readable description, informational only */
  readonly description: string;

  /** Sole authority on whether an observation satisfies the goal */
  readonly successCriteria: (observation: TObservation) => boolean;

  /** Upper bound on plan/act/observe/reflect cycles */
  readonly maxIterations: number;
}

/**
 * One iteration's proposed action, or a request to stop.
 */
export interface Plan<TAction> {
  readonly actionToken: TAction;
  readonly shouldExit?: boolean;
  readonly exitReason?: string;
}

/**
 * Caller's post-hoc analysis of an observation.
 */
export interface Reflection<TLearnings = unknown> {
  /** Advisory only; the goal's success criteria decide success */
  readonly goalAchieved: boolean;
  readonly shouldAdjustStrategy: boolean;
  readonly learnings: TLearnings;
}

type MaybePromise<T> = T | Promise<T>;

export type PlanFn<TObservation, TAction> = (
  goal: Goal<TObservation>,
  currentState: TObservation,
) => MaybePromise<Plan<TAction>>;

export type ActFn<TAction, TResult> = (plan: Plan<TAction>) => MaybePromise<TResult>;

export type ObserveFn<TResult, TObservation> = (actionResult: TResult) => MaybePromise<TObservation>;

export type ReflectFn<TObservation, TLearnings> = (
  observation: TObservation,
  goal: Goal<TObservation>,
) => MaybePromise<Reflection<TLearnings>>;

/**
 * Phases that invoke a caller callback.
 */
export type CallbackPhase = 'plan' | 'act' | 'observe' | 'reflect';

/**
 * Every timed phase of an iteration, including criteria evaluation.
 */
export type TimedPhase = CallbackPhase | 'criteria';

/**
 * Wall-clock milliseconds per phase. Phases that did not run are absent.
 */
export type PhaseDurations = Readonly<Partial<Record<TimedPhase, number>>>;

/**
 * Everything one iteration produced.
 */
export interface IterationRecord<TAction, TResult, TObservation, TLearnings> {
  /** 1-indexed */
  readonly iteration: number;
  readonly plan: Plan<TAction> | undefined;
  readonly actionResult?: TResult;
  readonly observation?: TObservation;
  readonly reflection?: Reflection<TLearnings>;
  readonly durations: PhaseDurations;
}

/**
 * Ordered, immutable record of a pursuit's iterations.
 */
export interface LoopTrace<TAction, TResult, TObservation, TLearnings> {
  readonly pursuitId: UniqueId;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp;
  readonly records: ReadonlyArray<IterationRecord<TAction, TResult, TObservation, TLearnings>>;
}

/**
 * Outcome of one pursuit.
 */
export interface LoopResult<TAction = unknown, TResult = unknown, TObservation = unknown, TLearnings = unknown> {
  readonly pursuitId: UniqueId;
  readonly success: boolean;

  /** Iterations executed, counting the one that ended the pursuit */
  readonly iterations: number;

  /** Last computed observation, null when none was made */
  readonly finalObservation: TObservation | null;

  /** Why the pursuit failed; null on success */
  readonly reason: string | null;

  readonly trace: LoopTrace<TAction, TResult, TObservation, TLearnings>;
  readonly durationMs: number;
}

/**
 * Point-in-time view of the metrics aggregator.
 */
export interface LoopMetricsSnapshot {
  readonly totalPursuits: number;
  readonly successfulPursuits: number;
  readonly totalIterations: number;
  readonly convergenceRate: number;
  readonly avgIterationsToGoal: number;
}
