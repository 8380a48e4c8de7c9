/**
 * Test helpers for neverthrow Results.
 *
 * Unwrap in tests, throwing a descriptive error on the wrong branch.
 */

import type { Result } from 'neverthrow';

/**
 * @example
 * const range = expectOk(RangeIterator.create(0, 3, 1), 'creating range');
 */
export function expectOk<T, E>(result: Result<T, E>, context: string): T {
  if (result.isErr()) {
    const errorJson = JSON.stringify(result.error, null, 2);
    throw new Error(`Expected Ok in ${context}, but got Err:\n${errorJson}`);
  }
  return result.value;
}

/**
 * @example
 * const error = expectErr(RangeIterator.create(0, 3, 0), 'zero step');
 * expect(error.code).toBe('INVALID_LOOP_ARGUMENT');
 */
export function expectErr<T, E>(result: Result<T, E>, context: string): E {
  if (result.isOk()) {
    const valueJson = JSON.stringify(result.value, null, 2);
    throw new Error(`Expected Err in ${context}, but got Ok:\n${valueJson}`);
  }
  return result.error;
}
