import { describe, it, expect } from 'vitest';
import { forRange, repeat } from '../../../src/domain/loops/drivers.js';
import type { LoopOutcome } from '../../../src/domain/loops/loop-supervisor.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { createTestLoopContext } from '../../helpers/loop-context.js';

describe('control stack overflow', () => {
  describe('reject policy', () => {
    it('refuses the loop, runs nothing and keeps existing levels', () => {
      const { ctx, logger } = createTestLoopContext({ maxDepth: 2 });
      ctx.stack.push();
      ctx.stack.push();
      let calls = 0;

      const error = expectErr(
        forRange(ctx, 0, 5, 1, () => calls++, undefined),
        'overflow'
      );

      expect(error).toEqual({
        code: 'CONTROL_STACK_OVERFLOW',
        maxDepth: 2,
        message: 'Control stack overflow: nesting exceeds maxDepth (2)',
      });
      expect(calls).toBe(0);
      expect(ctx.depth).toBe(2);
      expect(logger.getEntries('warn')).toEqual([
        { level: 'warn', obj: { shape: 'range', maxDepth: 2 }, msg: 'control stack overflow, loop rejected' },
      ]);
    });
  });

  describe('degrade policy', () => {
    it('runs the inner loop without a level and reports it as unsupervised', () => {
      const { ctx, logger } = createTestLoopContext({ maxDepth: 1, overflowPolicy: { kind: 'degrade' } });
      const inner: LoopOutcome[] = [];

      const outer = expectOk(
        forRange(
          ctx,
          0,
          2,
          1,
          () => {
            inner.push(expectOk(repeat(ctx, 3, () => undefined, undefined), 'inner'));
          },
          undefined
        ),
        'outer'
      );

      expect(outer).toEqual({ exit: 'completed', iterations: 2 });
      expect(inner).toEqual([
        { exit: 'unsupervised', iterations: 3 },
        { exit: 'unsupervised', iterations: 3 },
      ]);
      expect(logger.getEntries('warn')).toHaveLength(2);
      expect(logger.getEntries('warn')[0]).toEqual({
        level: 'warn',
        obj: { shape: 'repeat', maxDepth: 1 },
        msg: 'control stack overflow, loop running unsupervised',
      });
      expect(ctx.depth).toBe(0);
    });

    it('lets a break from the unsupervised loop reach the enclosing loop', () => {
      const { ctx } = createTestLoopContext({ maxDepth: 1, overflowPolicy: { kind: 'degrade' } });
      const inner: LoopOutcome[] = [];

      const outer = expectOk(
        repeat(
          ctx,
          3,
          () => {
            inner.push(
              expectOk(
                repeat(
                  ctx,
                  5,
                  (j) => {
                    if (j === 1) ctx.signalBreak();
                  },
                  undefined
                ),
                'inner'
              )
            );
          },
          undefined
        ),
        'outer'
      );

      expect(inner).toEqual([{ exit: 'broken', iterations: 2 }]);
      expect(outer).toEqual({ exit: 'broken', iterations: 1 });
      expect(ctx.stats.snapshot()).toEqual({ totalIterations: 3, breaksHit: 2, continuesHit: 0 });
      expect(ctx.depth).toBe(0);
    });

    it('runs a top-level loop unsupervised when maxDepth leaves no room', () => {
      const { ctx } = createTestLoopContext({ maxDepth: 1, overflowPolicy: { kind: 'degrade' } });
      ctx.stack.push();
      const seen: number[] = [];

      const outcome = expectOk(forRange(ctx, 0, 3, 1, (i) => seen.push(i), undefined), 'degraded');

      expect(outcome).toEqual({ exit: 'unsupervised', iterations: 3 });
      expect(seen).toEqual([0, 1, 2]);
      expect(ctx.depth).toBe(1);
    });
  });
});
