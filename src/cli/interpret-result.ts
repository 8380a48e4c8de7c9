/**
 * CLI Result Interpreter
 *
 * The only place a CliResult becomes a process exit status.
 */

import type { CliResult } from './types/cli-result.js';
import { failure } from './types/cli-result.js';
import { toNumericExitCode } from './types/exit-code.js';
import { printResult } from './output-formatter.js';
import { Err } from '../errors/factories.js';
import { formatAppError } from '../errors/formatter.js';

/**
 * Runs a command, turning anything it throws (a loop body failing, say) into
 * an `Unexpected` failure.
 */
export function runCommand(name: string, execute: () => CliResult): CliResult {
  try {
    return execute();
  } catch (error) {
    return failure(formatAppError(Err.unexpected(`Command '${name}' failed`, error)));
  }
}

/**
 * Prints the result and sets `process.exitCode` on failure. Never calls
 * `process.exit`, so pending stderr writes still flush.
 */
export function interpretCliResult(result: CliResult): void {
  printResult(result);

  switch (result.kind) {
    case 'success':
      return;

    case 'failure':
      process.exitCode = toNumericExitCode(result.exitCode);
  }
}
