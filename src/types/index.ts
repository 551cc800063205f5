/**
 * @fileoverview Type exports.
 *
 * @module pursuit-runtime/types
 * @version 0.1.0
 */

export {
  LoopPhase,
  Severity,
  createUniqueId,
  createTimestamp,
  type UniqueId,
  type Timestamp,
} from './core.types.js';

export type {
  Goal,
  Plan,
  Reflection,
  PlanFn,
  ActFn,
  ObserveFn,
  ReflectFn,
  CallbackPhase,
  TimedPhase,
  PhaseDurations,
  IterationRecord,
  LoopTrace,
  LoopResult,
  LoopMetricsSnapshot,
} from './loop.types.js';
