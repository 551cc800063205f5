/**
 * @fileoverview Goal construction and validation.
 *
 * @module pursuit-runtime/agent/goal
 * @version 0.1.0
 */

import { z } from 'zod';
import type { Goal } from '../types/index.js';
import { InvalidGoalError } from './errors.js';

const isFunction = (value: unknown): boolean => typeof value === 'function';

export const GoalSchema = z.object({
  description: z.string(),
  successCriteria: z.custom<(observation: never) => boolean>(isFunction, {
    message: 'successCriteria must be a function',
  }),
  maxIterations: z.number().int().min(1),
});

/**
 * Validates a goal and returns it unchanged.
 *
 * @throws InvalidGoalError listing every failing field
 */
export function validateGoal<TObservation>(goal: Goal<TObservation>): Goal<TObservation> {
  const parsed = GoalSchema.safeParse(goal);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new InvalidGoalError(issues);
  }
  return goal;
}

/**
 * Builds a frozen, validated goal.
 *
 * @example
 * ```typescript
 * const goal = createGoal('reach ten', obs => obs.value >= 10, 5);
 * ```
 */
export function createGoal<TObservation>(
  description: string,
  successCriteria: (observation: TObservation) => boolean,
  maxIterations: number,
): Goal<TObservation> {
  return Object.freeze(validateGoal({ description, successCriteria, maxIterations }));
}
