/**
 * @fileoverview CLI command parsing and execution.
 *
 * Kept free of `process` so it can be driven from tests; `index.ts`
 * wires it to argv, the environment and the exit code.
 *
 * @module pursuit-runtime/cli/program
 * @version 0.1.0
 */

import { ZodError } from 'zod';
import { LoopRuntime } from '../agent/loop-runtime.js';
import { CallbackExecutionError, describeError } from '../agent/errors.js';
import { loadRuntimeConfig } from '../config/runtime-config.js';
import type { RuntimeConfig } from '../config/runtime-config.js';
import { defaultMetrics } from '../metrics/aggregator.js';
import type { MetricsAggregator } from '../metrics/aggregator.js';
import { ConsoleTransport, createLogger } from '../observability/logger.js';
import type { LogTransport } from '../observability/logger.js';
import { SCENARIOS } from '../scenarios/index.js';
import type { LoopMetricsSnapshot } from '../types/index.js';
import { Severity } from '../types/index.js';

export const VERSION = '0.1.0';

export const EXIT_SUCCESS = 0;
export const EXIT_PURSUIT_FAILED = 1;
export const EXIT_USAGE = 2;

export type CLICommand =
  | { readonly command: 'run'; readonly scenario: string; readonly maxIterations: number | undefined; readonly verbose: boolean; readonly json: boolean }
  | { readonly command: 'scenarios' }
  | { readonly command: 'help' }
  | { readonly command: 'version' }
  | { readonly command: 'invalid'; readonly message: string };

export interface CLIEnvironment {
  readonly env: NodeJS.ProcessEnv;
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
  readonly metrics?: MetricsAggregator;

  /** Overrides the console transport, for tests */
  readonly logTransports?: ReadonlyArray<LogTransport>;
}

/**
 * Parse command line arguments.
 */
export function parseArgs(args: ReadonlyArray<string>): CLICommand {
  let command: 'run' | 'scenarios' | 'help' | 'version' = 'help';
  let scenario: string | undefined;
  let maxIterations: number | undefined;
  let verbose = false;
  let json = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'run':
        command = 'run';
        scenario = args[i + 1];
        i++;
        break;

      case 'scenarios':
      case 'list':
        command = 'scenarios';
        break;

      case '-h':
      case '--help':
      case 'help':
        command = 'help';
        break;

      case '-v':
      case '--version':
      case 'version':
        command = 'version';
        break;

      case '-n':
      case '--max-iterations': {
        const raw = args[++i];
        const value = Number(raw);
        if (raw === undefined || !Number.isInteger(value) || value < 1) {
          return { command: 'invalid', message: `--max-iterations expects a positive integer, got '${raw ?? ''}'` };
        }
        maxIterations = value;
        break;
      }

      case '--verbose':
        verbose = true;
        break;

      case '--json':
        json = true;
        break;

      default:
        return { command: 'invalid', message: `Unknown argument '${arg ?? ''}'` };
    }

    i++;
  }

  if (command === 'run') {
    if (scenario === undefined || scenario.startsWith('-')) {
      return { command: 'invalid', message: 'run expects a scenario name' };
    }
    return { command, scenario, maxIterations, verbose, json };
  }
  return { command };
}

export const HELP_TEXT = `
pursuit-runtime - bounded goal pursuit runner

USAGE:
  pursuit-runtime <command> [options]

COMMANDS:
  run <scenario>    Pursue a built-in scenario's goal
  scenarios         List built-in scenarios
  help              Show this help message
  version           Show version

OPTIONS:
  -n, --max-iterations <n>  Iteration cap (default: PURSUIT_DEFAULT_MAX_ITERATIONS or 10)
  --verbose                 Log every phase
  --json                    Print the result as JSON

ENVIRONMENT:
  PURSUIT_LOG_LEVEL               DEBUG | INFO | WARN | ERROR | FATAL (default INFO)
  PURSUIT_LOG_COLORS              true | false (default true)
  PURSUIT_DEFAULT_MAX_ITERATIONS  positive integer (default 10)

EXAMPLES:
  pursuit-runtime run login-blocking
  pursuit-runtime run canary-rollout -n 3 --json
`;

/**
 * Executes a parsed command and returns the process exit code.
 */
export async function runCommand(parsed: CLICommand, io: CLIEnvironment): Promise<number> {
  switch (parsed.command) {
    case 'help':
      io.out(HELP_TEXT);
      return EXIT_SUCCESS;

    case 'version':
      io.out(`pursuit-runtime v${VERSION}`);
      return EXIT_SUCCESS;

    case 'scenarios':
      for (const entry of SCENARIOS.values()) {
        io.out(`  ${entry.name.padEnd(16)} ${entry.summary}`);
      }
      return EXIT_SUCCESS;

    case 'invalid':
      io.err(`Error: ${parsed.message}`);
      io.err(`Run 'pursuit-runtime help' for usage.`);
      return EXIT_USAGE;

    case 'run':
      return runScenarioCommand(parsed, io);
  }
}

async function runScenarioCommand(
  parsed: Extract<CLICommand, { command: 'run' }>,
  io: CLIEnvironment,
): Promise<number> {
  const entry = SCENARIOS.get(parsed.scenario);
  if (!entry) {
    io.err(`Error: unknown scenario '${parsed.scenario}'. Known: ${[...SCENARIOS.keys()].join(', ')}`);
    return EXIT_USAGE;
  }

  let config: RuntimeConfig;
  try {
    config = loadRuntimeConfig(io.env);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      io.err(`Error: invalid environment configuration: ${details}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const metrics = io.metrics ?? defaultMetrics;
  const runtime = new LoopRuntime({
    metrics,
    logger: createLogger('cli', {
      minLevel: parsed.verbose ? Severity.DEBUG : config.logLevel,
      transports: io.logTransports ?? [new ConsoleTransport(config.logColors)],
    }),
  });

  const maxIterations = parsed.maxIterations ?? config.defaultMaxIterations;

  try {
    const { result, lines } = await entry.run(runtime, maxIterations);

    if (parsed.json) {
      io.out(JSON.stringify({
        scenario: entry.name,
        success: result.success,
        iterations: result.iterations,
        reason: result.reason,
        finalObservation: result.finalObservation,
        trace: lines,
        metrics: metrics.snapshot(),
      }, null, 2));
    } else {
      io.out(`Scenario:   ${entry.name}`);
      io.out(`Outcome:    ${result.success ? 'SUCCESS' : 'FAILED'}`);
      io.out(`Iterations: ${result.iterations}`);
      if (result.reason !== null) io.out(`Reason:     ${result.reason}`);
      io.out('Trace:');
      lines.forEach(line => io.out(`  ${line}`));
      io.out(`Metrics:    ${formatMetrics(metrics.snapshot())}`);
    }

    return result.success ? EXIT_SUCCESS : EXIT_PURSUIT_FAILED;
  } catch (error) {
    if (error instanceof CallbackExecutionError) {
      io.err(`Error: ${error.message} (after ${error.result.trace.records.length} iteration(s))`);
      return EXIT_PURSUIT_FAILED;
    }
    io.err(`Error: ${describeError(error)}`);
    return EXIT_PURSUIT_FAILED;
  }
}

export function formatMetrics(snapshot: LoopMetricsSnapshot): string {
  return `${snapshot.successfulPursuits}/${snapshot.totalPursuits} pursuits converged ` +
    `(${(snapshot.convergenceRate * 100).toFixed(1)}%), ` +
    `${snapshot.avgIterationsToGoal.toFixed(2)} avg iterations to goal`;
}
