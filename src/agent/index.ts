/**
 * @fileoverview Agent module public exports.
 *
 * @module pursuit-runtime/agent
 * @version 0.1.0
 */

export {
  LoopRuntime,
  pursue,
  DEFAULT_EXIT_REASON,
  MAX_ITERATIONS_REASON,
  type LoopRuntimeEvents,
  type LoopRuntimeOptions,
} from './loop-runtime.js';

export {
  PursuitLifecycle,
  type LifecycleEvents,
  type LifecycleError,
  type LifecycleState,
  type PhaseHistoryEntry,
  type PhaseMetadata,
} from './lifecycle.js';

export { createGoal, validateGoal, GoalSchema } from './goal.js';

export {
  PursuitError,
  InvalidGoalError,
  InvalidCallbackError,
  CriteriaEvaluationError,
  CallbackExecutionError,
  describeError,
  type PursuitErrorCode,
} from './errors.js';
