/**
 * @fileoverview Core type definitions for the pursuit runtime.
 *
 * Primitives shared by the loop runtime, the lifecycle state machine,
 * and the observability layer.
 *
 * @module pursuit-runtime/types
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phase of a single pursuit.
 *
 * IDLE → PLANNING → ACTING → OBSERVING → EVALUATING → REFLECTING → (PLANNING | COMPLETE | FAILED)
 *
 * @remarks
 * - EVALUATING: the goal's success criteria are checked against the observation
 * - PLANNING may go straight to FAILED when the planner asks to exit
 * - Any running phase may be forced to FAILED on a callback fault
 */
export enum LoopPhase {
  IDLE = 'IDLE',
  PLANNING = 'PLANNING',
  ACTING = 'ACTING',
  OBSERVING = 'OBSERVING',
  EVALUATING = 'EVALUATING',
  REFLECTING = 'REFLECTING',
  COMPLETE = 'COMPLETE',
  FAILED = 'FAILED',
}

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}
