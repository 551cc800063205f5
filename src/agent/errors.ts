/**
 * @fileoverview Error taxonomy for goal pursuits.
 *
 * Contract violations (`InvalidGoalError`, `InvalidCallbackError`) are
 * thrown before any iteration starts. `CriteriaEvaluationError` never
 * escapes `pursue`; it is captured as a failed result's reason.
 * `CallbackExecutionError` is thrown after the partial trace is captured.
 *
 * @module pursuit-runtime/agent/errors
 * @version 0.1.0
 */

import type { CallbackPhase, LoopResult } from '../types/index.js';

export type PursuitErrorCode =
  | 'INVALID_GOAL'
  | 'INVALID_CALLBACK'
  | 'CRITERIA_EVALUATION_FAILED'
  | 'CALLBACK_FAILED';

/**
 * Base class for every error raised by the runtime.
 */
export class PursuitError extends Error {
  readonly code: PursuitErrorCode;

  constructor(code: PursuitErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PursuitError';
    this.code = code;
  }
}

export class InvalidGoalError extends PursuitError {
  /** Field-level problems found while validating the goal */
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super('INVALID_GOAL', `Invalid goal: ${issues.join('; ')}`);
    this.name = 'InvalidGoalError';
    this.issues = issues;
  }
}

export class InvalidCallbackError extends PursuitError {
  readonly missing: ReadonlyArray<CallbackPhase>;

  constructor(missing: ReadonlyArray<CallbackPhase>) {
    super('INVALID_CALLBACK', `Missing required callback(s): ${missing.join(', ')}`);
    this.name = 'InvalidCallbackError';
    this.missing = missing;
  }
}

export class CriteriaEvaluationError extends PursuitError {
  constructor(cause: unknown) {
    super('CRITERIA_EVALUATION_FAILED', `success criteria evaluation failed: ${describeError(cause)}`, { cause });
    this.name = 'CriteriaEvaluationError';
  }
}

/**
 * A plan/act/observe/reflect callback threw.
 * `result` holds the best-effort outcome with the partial trace.
 */
export class CallbackExecutionError extends PursuitError {
  readonly phase: CallbackPhase;
  readonly result: LoopResult;

  constructor(phase: CallbackPhase, cause: unknown, result: LoopResult) {
    super('CALLBACK_FAILED', `callback failure in phase ${phase}: ${describeError(cause)}`, { cause });
    this.name = 'CallbackExecutionError';
    this.phase = phase;
    this.result = result;
  }
}

/**
 * Extracts a message from anything that was thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
