/**
 * @fileoverview Runtime configuration read from the environment.
 *
 * | Variable                         | Default | Meaning                                 |
 * |----------------------------------|---------|-----------------------------------------|
 * | `PURSUIT_LOG_LEVEL`              | INFO    | Minimum severity written by the logger  |
 * | `PURSUIT_LOG_COLORS`             | true    | ANSI colors on console output           |
 * | `PURSUIT_DEFAULT_MAX_ITERATIONS` | 10      | Iteration cap when the CLI is given none |
 *
 * @module pursuit-runtime/config
 * @version 0.1.0
 */

import { z } from 'zod';
import { Severity } from '../types/index.js';

export interface RuntimeConfig {
  readonly logLevel: Severity;
  readonly logColors: boolean;
  readonly defaultMaxIterations: number;
}

export type LoggingConfig = Pick<RuntimeConfig, 'logLevel' | 'logColors'>;

export const RuntimeConfigSchema = z.object({
  PURSUIT_LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? value.toUpperCase() : value),
    z.nativeEnum(Severity),
  ).default(Severity.INFO),
  PURSUIT_LOG_COLORS: z.enum(['true', 'false']).default('true').transform(value => value === 'true'),
  PURSUIT_DEFAULT_MAX_ITERATIONS: z.coerce.number().int().positive().default(10),
});

/**
 * Parses runtime configuration.
 *
 * @throws ZodError when a variable is set to an invalid value
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const parsed = RuntimeConfigSchema.parse(env);
  return {
    logLevel: parsed.PURSUIT_LOG_LEVEL,
    logColors: parsed.PURSUIT_LOG_COLORS,
    defaultMaxIterations: parsed.PURSUIT_DEFAULT_MAX_ITERATIONS,
  };
}

/**
 * Parses only the logging variables, so a bad value elsewhere in the
 * environment does not break logger setup. `defaultLevel` applies when
 * `PURSUIT_LOG_LEVEL` is unset.
 *
 * @throws ZodError when a logging variable is set to an invalid value
 */
export function loadLoggingConfig(
  env: NodeJS.ProcessEnv = process.env,
  defaultLevel: Severity = Severity.INFO,
): LoggingConfig {
  const parsed = RuntimeConfigSchema.pick({ PURSUIT_LOG_LEVEL: true, PURSUIT_LOG_COLORS: true }).parse(env);
  return {
    logLevel: env.PURSUIT_LOG_LEVEL === undefined ? defaultLevel : parsed.PURSUIT_LOG_LEVEL,
    logColors: parsed.PURSUIT_LOG_COLORS,
  };
}
