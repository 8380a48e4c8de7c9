import { err, ok, type Result } from 'neverthrow';
import { DEFAULT_UNROLL_THRESHOLD } from '../../config/app-config.js';
import { invalidLoopArgument, type InvalidLoopArgumentError } from './loop-errors.js';

/**
 * Advisory metadata for a code generator deciding whether to unroll a loop.
 * The drivers never read it.
 */
export interface LoopHint {
  readonly iterationCount: number;
  readonly enableUnroll: boolean;
  readonly unrollFactor: number;
}

/**
 * Both arguments must be non-negative safe integers.
 *
 * @example
 * analyzeLoop(4)   // ok({ iterationCount: 4, enableUnroll: true, unrollFactor: 4 })
 * analyzeLoop(100) // ok({ iterationCount: 100, enableUnroll: false, unrollFactor: 1 })
 */
export function analyzeLoop(
  iterations: number,
  threshold: number = DEFAULT_UNROLL_THRESHOLD
): Result<LoopHint, InvalidLoopArgumentError> {
  if (!isCount(iterations)) {
    return err(invalidLoopArgument('iterations', iterations, 'a non-negative safe integer'));
  }
  if (!isCount(threshold)) {
    return err(invalidLoopArgument('threshold', threshold, 'a non-negative safe integer'));
  }

  const enableUnroll = iterations <= threshold;
  return ok({
    iterationCount: iterations,
    enableUnroll,
    unrollFactor: enableUnroll ? iterations : 1,
  });
}

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}
