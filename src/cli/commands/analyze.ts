/**
 * Analyze Command
 *
 * Prints the unroll hint for a loop of the given iteration count.
 * `--threshold` overrides the configured unroll threshold.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import type { LoopHint } from '../../domain/loops/loop-hint.js';
import type { InvalidLoopArgumentError } from '../../domain/loops/loop-errors.js';
import { parseInteger } from './parse-integer.js';

export interface AnalyzeCommandDeps {
  readonly analyze: (iterations: number, threshold?: number) => Result<LoopHint, InvalidLoopArgumentError>;
}

export function executeAnalyzeCommand(
  deps: AnalyzeCommandDeps,
  rawIterations: string,
  rawThreshold?: string
): CliResult {
  const parsed = parseInteger('iterations', rawIterations);
  if (parsed.isErr()) {
    return misuse(parsed.error, ['Pass a whole number, e.g. `loopwire analyze 8`']);
  }
  if (parsed.value < 0) {
    return misuse(`iterations cannot be negative (got ${parsed.value})`);
  }

  let threshold: number | undefined;
  if (rawThreshold !== undefined) {
    const parsedThreshold = parseInteger('--threshold', rawThreshold);
    if (parsedThreshold.isErr()) return misuse(parsedThreshold.error);
    if (parsedThreshold.value < 0) {
      return misuse(`--threshold cannot be negative (got ${parsedThreshold.value})`);
    }
    threshold = parsedThreshold.value;
  }

  const analyzed = deps.analyze(parsed.value, threshold);
  if (analyzed.isErr()) {
    return misuse(analyzed.error.message);
  }

  const hint = analyzed.value;
  return success({
    message: hint.enableUnroll ? 'Loop is eligible for unrolling' : 'Loop is not eligible for unrolling',
    details: [
      `Iteration count: ${hint.iterationCount}`,
      `Unroll: ${hint.enableUnroll ? 'yes' : 'no'}`,
      `Unroll factor: ${hint.unrollFactor}`,
    ],
  });
}
