#!/usr/bin/env node
/**
 * @fileoverview pursuit-runtime CLI
 *
 * Usage:
 *   pursuit-runtime run <scenario> [options]
 *   pursuit-runtime scenarios
 *   pursuit-runtime --help
 */

import { parseArgs, runCommand } from './program.js';

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  process.exitCode = await runCommand(parsed, {
    env: process.env,
    out: line => console.log(line),
    err: line => console.error(line),
  });
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
