/**
 * CLI Result Types
 *
 * Commands return these; the composition root prints them and sets the exit code.
 */

import type { ExitCode } from './exit-code.js';

/**
 * Structured output for CLI display.
 * Separates content from presentation.
 */
export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: 'success'; readonly output?: CliOutput }
  | { readonly kind: 'failure'; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: 'success', output };
}

/**
 * The command ran and failed.
 */
export function failure(message: string): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'general_error' },
    output: { message },
  };
}

/**
 * Bad arguments.
 */
export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return {
    kind: 'failure',
    exitCode: { kind: 'misuse' },
    output: { message, suggestions },
  };
}
