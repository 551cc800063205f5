/**
 * @fileoverview Loop Runtime - drives a bounded goal pursuit.
 *
 * A pursuit repeats Plan → Act → Observe → Evaluate → Reflect until the
 * goal's success criteria hold, the planner asks to exit, or the goal's
 * iteration cap is reached. The runtime only moves caller payloads
 * between caller callbacks; it never interprets them.
 *
 * Guarantees:
 * 1. Sequential - one callback at a time, strictly in phase order
 * 2. Bounded - never more than `goal.maxIterations` iterations
 * 3. Stateless between pursuits - every pursuit owns its lifecycle and trace
 * 4. Traced - every iteration is captured, including a failing one
 *
 * No retries, timeouts or cancellation happen here: callers wrap their
 * callbacks (or the whole `pursue` call) for that.
 *
 * @module pursuit-runtime/agent/loop-runtime
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type {
  ActFn,
  CallbackPhase,
  Goal,
  LoopResult,
  ObserveFn,
  PlanFn,
  ReflectFn,
  TimedPhase,
  UniqueId,
} from '../types/index.js';
import { LoopPhase, Severity, createUniqueId } from '../types/index.js';
import { ConsoleTransport, Logger, createLogger } from '../observability/logger.js';
import { TraceRecorder } from '../observability/tracer.js';
import type { MetricsAggregator } from '../metrics/aggregator.js';
import { loadLoggingConfig } from '../config/runtime-config.js';
import { PursuitLifecycle } from './lifecycle.js';
import { validateGoal } from './goal.js';
import {
  CallbackExecutionError,
  CriteriaEvaluationError,
  InvalidCallbackError,
  describeError,
} from './errors.js';

export const DEFAULT_EXIT_REASON = 'agent requested exit';
export const MAX_ITERATIONS_REASON = 'max iterations reached';

/**
 * Events emitted by the loop runtime.
 */
export interface LoopRuntimeEvents {
  'pursuit:start': (pursuitId: UniqueId, description: string, maxIterations: number) => void;
  'iteration:start': (pursuitId: UniqueId, iteration: number) => void;
  'phase:end': (pursuitId: UniqueId, iteration: number, phase: TimedPhase, durationMs: number) => void;
  'iteration:end': (pursuitId: UniqueId, iteration: number) => void;
  'pursuit:complete': (result: LoopResult) => void;
  'pursuit:failed': (result: LoopResult) => void;
}

export interface LoopRuntimeOptions {
  readonly logger?: Logger;

  /** When set, every finished pursuit is recorded here */
  readonly metrics?: MetricsAggregator;
}

/**
 * Per-pursuit state. Created by `pursue`, dropped when it returns.
 */
interface PursuitContext<TAction, TResult, TObservation, TLearnings> {
  readonly pursuitId: UniqueId;
  readonly startedAt: number;
  readonly lifecycle: PursuitLifecycle;
  readonly recorder: TraceRecorder<TAction, TResult, TObservation, TLearnings>;
  readonly log: Logger;
  lastObservation: { readonly value: TObservation } | null;
}

interface Outcome {
  readonly success: boolean;
  readonly iterations: number;
  readonly reason: string | null;
}

/**
 * Runs goal pursuits.
 *
 * @example
 * ```typescript
 * const runtime = new LoopRuntime({ metrics: defaultMetrics });
 * runtime.on('pursuit:failed', result => alert(result.reason));
 *
 * const result = await runtime.pursue(
 *   createGoal('reach ten', obs => obs.value >= 10, 5),
 *   { value: 0 },
 *   (_goal, state) => ({ actionToken: state.value + 4 }),
 *   plan => plan.actionToken,
 *   value => ({ value }),
 *   () => ({ goalAchieved: false, shouldAdjustStrategy: false, learnings: null }),
 * );
 * console.log(`${result.success} after ${result.iterations} iterations`);
 * ```
 */
export class LoopRuntime extends EventEmitter<LoopRuntimeEvents> {
  private readonly logger: Logger;
  private readonly metrics: MetricsAggregator | undefined;

  constructor(options: LoopRuntimeOptions = {}) {
    super();
    this.logger = options.logger ?? createLogger('agent.loop');
    this.metrics = options.metrics;
  }

  /**
   * Pursues `goal` starting from `initialState`.
   *
   * @returns The pursuit's result; failed pursuits carry a `reason`
   * @throws InvalidGoalError before any iteration when the goal is malformed
   * @throws InvalidCallbackError before any iteration when a callback is missing
   * @throws CallbackExecutionError when a callback throws; its `result` holds the partial trace
   */
  async pursue<TObservation, TAction, TResult, TLearnings>(
    goal: Goal<TObservation>,
    initialState: TObservation,
    planFn: PlanFn<TObservation, TAction>,
    actFn: ActFn<TAction, TResult>,
    observeFn: ObserveFn<TResult, TObservation>,
    reflectFn: ReflectFn<TObservation, TLearnings>,
  ): Promise<LoopResult<TAction, TResult, TObservation, TLearnings>> {
    validateGoal(goal);
    validateCallbacks({ plan: planFn, act: actFn, observe: observeFn, reflect: reflectFn });

    const pursuitId = createUniqueId(uuidv4());
    const ctx: PursuitContext<TAction, TResult, TObservation, TLearnings> = {
      pursuitId,
      startedAt: performance.now(),
      lifecycle: new PursuitLifecycle(pursuitId),
      recorder: new TraceRecorder(pursuitId),
      log: this.logger.child({ pursuitId }),
      lastObservation: null,
    };

    this.emit('pursuit:start', pursuitId, goal.description, goal.maxIterations);
    ctx.log.info('Pursuit started', { goal: goal.description, maxIterations: goal.maxIterations });

    let currentState = initialState;

    for (let iteration = 1; iteration <= goal.maxIterations; iteration++) {
      ctx.lifecycle.transition(LoopPhase.PLANNING, `Iteration ${iteration}`);
      ctx.recorder.startIteration(iteration);
      this.emit('iteration:start', pursuitId, iteration);

      // 1. Plan
      const state = currentState;
      const plan = await this.invoke(ctx, 'plan', async () => {
        const proposed = await planFn(goal, state);
        if (proposed === null || typeof proposed !== 'object') {
          throw new TypeError('plan callback must return a plan object');
        }
        return proposed;
      });
      ctx.recorder.setPlan(plan);

      if (plan.shouldExit === true) {
        const reason = plan.exitReason ?? DEFAULT_EXIT_REASON;
        ctx.lifecycle.transition(LoopPhase.FAILED, reason);
        this.endIteration(ctx, iteration);
        return this.finish(ctx, { success: false, iterations: iteration, reason });
      }

      // 2. Act
      ctx.lifecycle.transition(LoopPhase.ACTING, 'Plan ready');
      const actionResult = await this.invoke(ctx, 'act', () => actFn(plan));
      ctx.recorder.setActionResult(actionResult);

      // 3. Observe
      ctx.lifecycle.transition(LoopPhase.OBSERVING, 'Action finished');
      const observation = await this.invoke(ctx, 'observe', () => observeFn(actionResult));
      ctx.recorder.setObservation(observation);
      ctx.lastObservation = { value: observation };

      // 4. Evaluate
      ctx.lifecycle.transition(LoopPhase.EVALUATING, 'Observation ready');
      let satisfied: boolean;
      try {
        satisfied = await this.timed(ctx, 'criteria', () => goal.successCriteria(observation) === true);
      } catch (cause) {
        const error = new CriteriaEvaluationError(cause);
        ctx.log.warn('Success criteria threw', { iteration }, cause instanceof Error ? cause : undefined);
        ctx.lifecycle.fail(error.message);
        this.endIteration(ctx, iteration);
        return this.finish(ctx, { success: false, iterations: iteration, reason: error.message });
      }

      // 5. Reflect, on success as well as failure
      ctx.lifecycle.transition(LoopPhase.REFLECTING, satisfied ? 'Goal satisfied' : 'Goal not yet satisfied');
      const reflection = await this.invoke(ctx, 'reflect', async () => {
        const reflected = await reflectFn(observation, goal);
        if (reflected === null || typeof reflected !== 'object') {
          throw new TypeError('reflect callback must return a reflection object');
        }
        return reflected;
      });
      ctx.recorder.setReflection(reflection);

      if (reflection.goalAchieved !== satisfied) {
        ctx.log.debug('Reflection disagrees with success criteria; criteria win', {
          iteration,
          criteria: satisfied,
          reflection: reflection.goalAchieved,
        });
      }

      this.endIteration(ctx, iteration);

      if (satisfied) {
        ctx.lifecycle.complete('Success criteria satisfied');
        return this.finish(ctx, { success: true, iterations: iteration, reason: null });
      }

      currentState = observation;
    }

    ctx.lifecycle.fail(MAX_ITERATIONS_REASON);
    return this.finish(ctx, { success: false, iterations: goal.maxIterations, reason: MAX_ITERATIONS_REASON });
  }

  // ============ Phase Helpers ============

  /**
   * Runs a caller callback. A throw aborts the pursuit with a
   * `CallbackExecutionError` carrying the partial result.
   */
  private async invoke<T, TAction, TResult, TObservation, TLearnings>(
    ctx: PursuitContext<TAction, TResult, TObservation, TLearnings>,
    phase: CallbackPhase,
    operation: () => T | Promise<T>,
  ): Promise<T> {
    try {
      return await this.timed(ctx, phase, operation);
    } catch (cause) {
      throw this.abort(ctx, phase, cause);
    }
  }

  private async timed<T, TAction, TResult, TObservation, TLearnings>(
    ctx: PursuitContext<TAction, TResult, TObservation, TLearnings>,
    phase: TimedPhase,
    operation: () => T | Promise<T>,
  ): Promise<T> {
    const start = performance.now();
    try {
      return await operation();
    } finally {
      const durationMs = performance.now() - start;
      const iteration = ctx.lifecycle.getIteration();
      ctx.recorder.recordDuration(phase, durationMs);
      this.emit('phase:end', ctx.pursuitId, iteration, phase, durationMs);
      ctx.log.debug(`${phase} phase finished`, { iteration, durationMs });
    }
  }

  private endIteration<TAction, TResult, TObservation, TLearnings>(
    ctx: PursuitContext<TAction, TResult, TObservation, TLearnings>,
    iteration: number,
  ): void {
    ctx.recorder.commitIteration();
    this.emit('iteration:end', ctx.pursuitId, iteration);
  }

  private abort<TAction, TResult, TObservation, TLearnings>(
    ctx: PursuitContext<TAction, TResult, TObservation, TLearnings>,
    phase: CallbackPhase,
    cause: unknown,
  ): CallbackExecutionError {
    const reason = `callback failure in phase ${phase}: ${describeError(cause)}`;
    ctx.log.error('Callback failed', { phase, iteration: ctx.lifecycle.getIteration() },
      cause instanceof Error ? cause : undefined);
    ctx.lifecycle.fail(reason);

    const result = this.finish(ctx, { success: false, iterations: ctx.lifecycle.getIteration(), reason });
    return new CallbackExecutionError(phase, cause, result);
  }

  private finish<TAction, TResult, TObservation, TLearnings>(
    ctx: PursuitContext<TAction, TResult, TObservation, TLearnings>,
    outcome: Outcome,
  ): LoopResult<TAction, TResult, TObservation, TLearnings> {
    const result: LoopResult<TAction, TResult, TObservation, TLearnings> = Object.freeze({
      pursuitId: ctx.pursuitId,
      success: outcome.success,
      iterations: outcome.iterations,
      finalObservation: ctx.lastObservation ? ctx.lastObservation.value : null,
      reason: outcome.reason,
      trace: ctx.recorder.finalize(),
      durationMs: performance.now() - ctx.startedAt,
    });

    this.metrics?.record(result);

    const summary = { iterations: result.iterations, durationMs: result.durationMs };
    if (result.success) {
      ctx.log.info('Pursuit succeeded', summary);
      this.emit('pursuit:complete', result);
    } else {
      ctx.log.info('Pursuit failed', { ...summary, reason: result.reason });
      this.emit('pursuit:failed', result);
    }
    return result;
  }
}

/**
 * @throws InvalidCallbackError naming every callback that is not a function
 */
function validateCallbacks(callbacks: Record<CallbackPhase, unknown>): void {
  const phases: CallbackPhase[] = ['plan', 'act', 'observe', 'reflect'];
  const missing = phases.filter(phase => typeof callbacks[phase] !== 'function');
  if (missing.length > 0) {
    throw new InvalidCallbackError(missing);
  }
}

let sharedRuntime: LoopRuntime | null = null;

/**
 * Pursues a goal on a shared runtime whose logger follows the
 * environment's logging variables, at WARN unless `PURSUIT_LOG_LEVEL`
 * is set. See {@link LoopRuntime.pursue}.
 */
export async function pursue<TObservation, TAction, TResult, TLearnings>(
  goal: Goal<TObservation>,
  initialState: TObservation,
  planFn: PlanFn<TObservation, TAction>,
  actFn: ActFn<TAction, TResult>,
  observeFn: ObserveFn<TResult, TObservation>,
  reflectFn: ReflectFn<TObservation, TLearnings>,
): Promise<LoopResult<TAction, TResult, TObservation, TLearnings>> {
  if (!sharedRuntime) {
    const config = loadLoggingConfig(process.env, Severity.WARN);
    sharedRuntime = new LoopRuntime({
      logger: createLogger('agent.loop', {
        minLevel: config.logLevel,
        transports: [new ConsoleTransport(config.logColors)],
      }),
    });
  }
  return sharedRuntime.pursue(goal, initialState, planFn, actFn, observeFn, reflectFn);
}
