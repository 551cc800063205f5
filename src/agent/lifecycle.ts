/**
 * @fileoverview Pursuit Lifecycle - phase state machine for one pursuit.
 *
 * The loop runtime creates one lifecycle per pursuit and drives it
 * through the phases below. It answers "which phase is this pursuit in?"
 * and records how long each phase lasted.
 *
 * State Machine:
 * ```
 *          ┌──────────────────────────────────────────────────────┐
 *          ▼                                                      │
 *   IDLE ──► PLANNING ──► ACTING ──► OBSERVING ──► EVALUATING ──► REFLECTING
 *              │                                                  │      │
 *              ▼                                                  ▼      │
 *            FAILED ◄────────────── (forced from any phase)    COMPLETE  │
 *              ▲                                                         │
 *              └─────────────────────────────────────────────────────────┘
 * ```
 *
 * @module pursuit-runtime/agent/lifecycle
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import type { Timestamp, UniqueId } from '../types/index.js';
import { LoopPhase, createTimestamp } from '../types/index.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: LoopPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: LoopPhase, metadata: PhaseMetadata) => void;
  'transition': (from: LoopPhase, to: LoopPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly iteration: number;
  readonly reason: string;
}

export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: LoopPhase;
  readonly attemptedTransition: LoopPhase;
}

export interface PhaseHistoryEntry {
  readonly phase: LoopPhase;
  readonly iteration: number;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp;
  readonly reason: string;
}

export interface LifecycleState {
  readonly pursuitId: UniqueId;
  readonly currentPhase: LoopPhase;
  readonly previousPhase: LoopPhase | null;
  readonly iteration: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly isTerminal: boolean;
}

/**
 * Authoritative definition of the state machine.
 * FAILED is also reachable from any running phase through `fail()`.
 */
const VALID_TRANSITIONS: ReadonlyMap<LoopPhase, ReadonlyArray<LoopPhase>> = new Map([
  [LoopPhase.IDLE, [LoopPhase.PLANNING]],
  [LoopPhase.PLANNING, [LoopPhase.ACTING, LoopPhase.FAILED]],
  [LoopPhase.ACTING, [LoopPhase.OBSERVING]],
  [LoopPhase.OBSERVING, [LoopPhase.EVALUATING]],
  [LoopPhase.EVALUATING, [LoopPhase.REFLECTING, LoopPhase.FAILED]],
  [LoopPhase.REFLECTING, [LoopPhase.PLANNING, LoopPhase.COMPLETE, LoopPhase.FAILED]],
  [LoopPhase.COMPLETE, []],
  [LoopPhase.FAILED, []],
]);

const TERMINAL_PHASES: ReadonlySet<LoopPhase> = new Set([
  LoopPhase.COMPLETE,
  LoopPhase.FAILED,
]);

interface OpenPhase {
  readonly phase: LoopPhase;
  readonly iteration: number;
  readonly enteredAt: Timestamp;
  readonly reason: string;
}

/**
 * Tracks the phase of a single pursuit.
 *
 * @example
 * ```typescript
 * const lifecycle = new PursuitLifecycle(pursuitId);
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`${from} → ${to}`, { reason });
 * });
 *
 * lifecycle.transition(LoopPhase.PLANNING, 'iteration 1');
 * lifecycle.transition(LoopPhase.ACTING, 'plan ready');
 * ```
 */
export class PursuitLifecycle extends EventEmitter<LifecycleEvents> {
  private readonly pursuitId: UniqueId;
  private currentPhase: LoopPhase = LoopPhase.IDLE;
  private previousPhase: LoopPhase | null = null;
  private iteration = 0;
  private readonly phaseHistory: PhaseHistoryEntry[] = [];
  private openPhase: OpenPhase;

  constructor(pursuitId: UniqueId) {
    super();
    this.pursuitId = pursuitId;
    this.openPhase = {
      phase: LoopPhase.IDLE,
      iteration: 0,
      enteredAt: createTimestamp(),
      reason: 'Pursuit created',
    };
  }

  getState(): LifecycleState {
    return {
      pursuitId: this.pursuitId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      iteration: this.iteration,
      phaseHistory: [...this.phaseHistory],
      isTerminal: this.isTerminal(),
    };
  }

  getCurrentPhase(): LoopPhase {
    return this.currentPhase;
  }

  /**
   * Number of the iteration in progress; each entry into PLANNING starts one.
   */
  getIteration(): number {
    return this.iteration;
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  canTransition(targetPhase: LoopPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Moves to `targetPhase`.
   *
   * @throws Error if the current phase is terminal or the transition is not allowed
   */
  transition(targetPhase: LoopPhase, reason: string): void {
    if (this.isTerminal()) {
      this.reject('TERMINAL_STATE', `Cannot transition from terminal state '${this.currentPhase}'`, targetPhase);
    }
    if (!this.canTransition(targetPhase)) {
      this.reject('INVALID_TRANSITION', `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`, targetPhase);
    }

    if (targetPhase === LoopPhase.PLANNING) {
      this.iteration++;
    }
    this.moveTo(targetPhase, reason);
  }

  /**
   * Forces FAILED from any running phase. No-op once terminal.
   */
  fail(reason: string): void {
    if (this.isTerminal()) return;
    this.moveTo(LoopPhase.FAILED, reason);
  }

  /**
   * Completes the pursuit. Only valid from REFLECTING.
   */
  complete(reason: string): void {
    this.transition(LoopPhase.COMPLETE, reason);
  }

  // ============ Private Methods ============

  private reject(code: LifecycleError['code'], message: string, attemptedTransition: LoopPhase): never {
    const error: LifecycleError = {
      code,
      message,
      phase: this.currentPhase,
      attemptedTransition,
    };
    this.emit('error', error);
    throw new Error(message);
  }

  private moveTo(targetPhase: LoopPhase, reason: string): void {
    const now = createTimestamp();
    const closing = this.openPhase;

    this.phaseHistory.push({ ...closing, exitedAt: now });
    this.emit('phase:exit', closing.phase, {
      enteredAt: closing.enteredAt,
      iteration: closing.iteration,
      reason: closing.reason,
    });

    this.previousPhase = this.currentPhase;
    this.currentPhase = targetPhase;
    this.emit('transition', this.previousPhase, targetPhase, reason);

    this.openPhase = { phase: targetPhase, iteration: this.iteration, enteredAt: now, reason };
    this.emit('phase:enter', targetPhase, { enteredAt: now, iteration: this.iteration, reason });
  }
}
