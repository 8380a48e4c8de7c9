/**
 * Loop engine errors.
 *
 * These are typed errors (errors-as-data), not exceptions. Drivers and
 * constructors return them inside a neverthrow `Result`.
 */

export interface ControlStackOverflowError {
  readonly code: 'CONTROL_STACK_OVERFLOW';
  readonly maxDepth: number;
  readonly message: string;
}

export interface InvalidLoopArgumentError {
  readonly code: 'INVALID_LOOP_ARGUMENT';
  readonly argument: string;
  readonly value: number;
  readonly message: string;
}

export type InvalidRangeError = InvalidLoopArgumentError;

export type LoopError = ControlStackOverflowError | InvalidLoopArgumentError;

export function controlStackOverflow(maxDepth: number): ControlStackOverflowError {
  return {
    code: 'CONTROL_STACK_OVERFLOW',
    maxDepth,
    message: `Control stack overflow: nesting exceeds maxDepth (${maxDepth})`,
  };
}

export function invalidLoopArgument(argument: string, value: number, expected: string): InvalidLoopArgumentError {
  return {
    code: 'INVALID_LOOP_ARGUMENT',
    argument,
    value,
    message: `Invalid loop argument '${argument}': expected ${expected} (got ${String(value)})`,
  };
}
