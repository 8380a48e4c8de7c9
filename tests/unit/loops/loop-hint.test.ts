import { describe, it, expect } from 'vitest';
import { analyzeLoop } from '../../../src/domain/loops/loop-hint.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

describe('analyzeLoop', () => {
  it('unrolls counts up to the default threshold', () => {
    expect(expectOk(analyzeLoop(8), '8')).toEqual({ iterationCount: 8, enableUnroll: true, unrollFactor: 8 });
    expect(expectOk(analyzeLoop(0), '0')).toEqual({ iterationCount: 0, enableUnroll: true, unrollFactor: 0 });
  });

  it('does not unroll past the threshold', () => {
    expect(expectOk(analyzeLoop(9), '9')).toEqual({ iterationCount: 9, enableUnroll: false, unrollFactor: 1 });
  });

  it('honours a custom threshold', () => {
    expect(expectOk(analyzeLoop(5, 4), '5/4')).toEqual({ iterationCount: 5, enableUnroll: false, unrollFactor: 1 });
    expect(expectOk(analyzeLoop(4, 4), '4/4')).toEqual({ iterationCount: 4, enableUnroll: true, unrollFactor: 4 });
  });

  it('rejects negative and non-integer counts', () => {
    expect(expectErr(analyzeLoop(-3), 'negative')).toEqual({
      code: 'INVALID_LOOP_ARGUMENT',
      argument: 'iterations',
      value: -3,
      message: "Invalid loop argument 'iterations': expected a non-negative safe integer (got -3)",
    });
    expect(expectErr(analyzeLoop(Number.NaN), 'NaN').argument).toBe('iterations');
    expect(expectErr(analyzeLoop(2.5), 'fractional').argument).toBe('iterations');
  });

  it('rejects a negative threshold', () => {
    expect(expectErr(analyzeLoop(3, -1), 'threshold').message).toBe(
      "Invalid loop argument 'threshold': expected a non-negative safe integer (got -1)"
    );
  });
});
