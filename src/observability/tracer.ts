/**
 * @fileoverview Trace Recorder - captures the iterations of one pursuit.
 *
 * The recorder keeps one open iteration at a time. Phase outputs and
 * timings are attached to it as they become available, and the iteration
 * is appended to the trace when committed. `finalize()` commits whatever
 * is still open and returns a frozen `LoopTrace`; the recorder refuses
 * writes after that.
 *
 * @module pursuit-runtime/observability/tracer
 * @version 0.1.0
 */

import type {
  IterationRecord,
  LoopTrace,
  Plan,
  Reflection,
  TimedPhase,
  Timestamp,
  UniqueId,
} from '../types/index.js';
import { createTimestamp } from '../types/index.js';

interface OpenIteration<TAction, TResult, TObservation, TLearnings> {
  iteration: number;
  plan: Plan<TAction> | undefined;
  actionResult?: TResult;
  observation?: TObservation;
  reflection?: Reflection<TLearnings>;
  durations: Partial<Record<TimedPhase, number>>;
}

/**
 * Records the iteration trace of a pursuit.
 *
 * @example
 * ```typescript
 * const recorder = new TraceRecorder<string, number, number, void>(pursuitId);
 *
 * recorder.startIteration(1);
 * recorder.setPlan(plan);
 * recorder.recordDuration('plan', 3.2);
 * recorder.commitIteration();
 *
 * const trace = recorder.finalize();
 * ```
 */
export class TraceRecorder<TAction, TResult, TObservation, TLearnings> {
  private readonly pursuitId: UniqueId;
  private readonly startedAt: Timestamp;
  private readonly records: IterationRecord<TAction, TResult, TObservation, TLearnings>[] = [];
  private open: OpenIteration<TAction, TResult, TObservation, TLearnings> | null = null;
  private finalized: LoopTrace<TAction, TResult, TObservation, TLearnings> | null = null;

  constructor(pursuitId: UniqueId) {
    this.pursuitId = pursuitId;
    this.startedAt = createTimestamp();
  }

  /**
   * Opens a new iteration, committing the previous one if still open.
   */
  startIteration(iteration: number): void {
    this.assertWritable();
    if (this.open) this.commitIteration();
    this.open = { iteration, plan: undefined, durations: {} };
  }

  setPlan(plan: Plan<TAction>): void {
    this.current().plan = plan;
  }

  setActionResult(actionResult: TResult): void {
    this.current().actionResult = actionResult;
  }

  setObservation(observation: TObservation): void {
    this.current().observation = observation;
  }

  setReflection(reflection: Reflection<TLearnings>): void {
    this.current().reflection = reflection;
  }

  recordDuration(phase: TimedPhase, durationMs: number): void {
    this.current().durations[phase] = durationMs;
  }

  /**
   * Appends the open iteration to the trace.
   */
  commitIteration(): void {
    this.assertWritable();
    if (!this.open) return;

    const { durations, ...outputs } = this.open;
    this.records.push(Object.freeze({ ...outputs, durations: Object.freeze({ ...durations }) }));
    this.open = null;
  }

  /**
   * Number of committed iterations.
   */
  size(): number {
    return this.records.length;
  }

  /**
   * Seals the trace. Repeated calls return the same trace.
   */
  finalize(): LoopTrace<TAction, TResult, TObservation, TLearnings> {
    if (this.finalized) return this.finalized;
    if (this.open) this.commitIteration();

    this.finalized = Object.freeze({
      pursuitId: this.pursuitId,
      startedAt: this.startedAt,
      endedAt: createTimestamp(),
      records: Object.freeze([...this.records]),
    });
    return this.finalized;
  }

  isFinalized(): boolean {
    return this.finalized !== null;
  }

  // ============ Private Methods ============

  private current(): OpenIteration<TAction, TResult, TObservation, TLearnings> {
    this.assertWritable();
    if (!this.open) {
      throw new Error('No iteration is open; call startIteration() first');
    }
    return this.open;
  }

  private assertWritable(): void {
    if (this.finalized) {
      throw new Error(`Trace for pursuit ${this.pursuitId} is finalized`);
    }
  }
}
