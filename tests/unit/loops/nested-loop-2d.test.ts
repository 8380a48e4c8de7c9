import { describe, it, expect } from 'vitest';
import { nestedLoop2d } from '../../../src/domain/loops/drivers.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';
import { createTestLoopContext } from '../../helpers/loop-context.js';

type Cell = readonly [number, number];

describe('nestedLoop2d', () => {
  it('visits every cell row by row under two control levels', () => {
    const { ctx } = createTestLoopContext();
    const cells: Cell[] = [];
    const depths = new Set<number>();

    const outcome = expectOk(
      nestedLoop2d(
        ctx,
        2,
        3,
        (row, col, out: Cell[]) => {
          depths.add(ctx.depth);
          out.push([row, col]);
        },
        cells
      ),
      '2x3'
    );

    expect(cells).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [1, 0],
      [1, 1],
      [1, 2],
    ]);
    expect([...depths]).toEqual([2]);
    expect(outcome).toEqual({ exit: 'completed', iterations: 6 });
    expect(ctx.depth).toBe(0);
  });

  it('ends only the current row on an inner break', () => {
    const { ctx } = createTestLoopContext();
    const cells: Cell[] = [];

    const outcome = expectOk(
      nestedLoop2d(
        ctx,
        3,
        3,
        (row, col) => {
          cells.push([row, col]);
          if (col === 1) ctx.signalBreak();
        },
        undefined
      ),
      'break at col 1'
    );

    expect(cells).toEqual([
      [0, 0],
      [0, 1],
      [1, 0],
      [1, 1],
      [2, 0],
      [2, 1],
    ]);
    expect(outcome).toEqual({ exit: 'completed', iterations: 6 });
    expect(ctx.stats.snapshot()).toEqual({ totalIterations: 6, breaksHit: 3, continuesHit: 0 });
  });

  it('skips one cell on an inner continue', () => {
    const { ctx } = createTestLoopContext();
    const cells: Cell[] = [];

    const outcome = expectOk(
      nestedLoop2d(
        ctx,
        3,
        3,
        (row, col) => {
          if (row === 1 && col === 1) {
            ctx.signalContinue();
            return;
          }
          cells.push([row, col]);
        },
        undefined
      ),
      'continue at (1, 1)'
    );

    expect(cells).toHaveLength(8);
    expect(cells).not.toContainEqual([1, 1]);
    expect(cells[4]).toEqual([1, 2]);
    expect(outcome).toEqual({ exit: 'completed', iterations: 9 });
    expect(ctx.stats.snapshot().continuesHit).toBe(1);
  });

  it('runs nothing for empty or negative dimensions', () => {
    const { ctx } = createTestLoopContext();
    let calls = 0;
    const body = (): void => {
      calls += 1;
    };

    expect(expectOk(nestedLoop2d(ctx, 0, 4, body, undefined), 'no rows').iterations).toBe(0);
    expect(expectOk(nestedLoop2d(ctx, 4, 0, body, undefined), 'no cols').iterations).toBe(0);
    expect(expectOk(nestedLoop2d(ctx, -2, 4, body, undefined), 'negative rows').iterations).toBe(0);
    expect(calls).toBe(0);
    expect(ctx.depth).toBe(0);
  });

  it('rejects non-integer dimensions', () => {
    const { ctx } = createTestLoopContext();

    expect(expectErr(nestedLoop2d(ctx, 1.5, 2, () => undefined, undefined), 'rows').argument).toBe('rows');
    expect(expectErr(nestedLoop2d(ctx, 2, Number.POSITIVE_INFINITY, () => undefined, undefined), 'cols').argument).toBe(
      'cols'
    );
  });

  it('skips a missing body', () => {
    const { ctx } = createTestLoopContext();

    expect(expectOk(nestedLoop2d(ctx, 2, 2, null, undefined), 'null body').exit).toBe('skipped');
  });

  it('fails when only the outer level fits, leaving the stack balanced', () => {
    const { ctx, logger } = createTestLoopContext({ maxDepth: 1 });
    let calls = 0;

    const error = expectErr(nestedLoop2d(ctx, 2, 2, () => calls++, undefined), 'inner overflow');

    expect(error.code).toBe('CONTROL_STACK_OVERFLOW');
    expect(calls).toBe(0);
    expect(ctx.depth).toBe(0);
    expect(logger.hasEntry('warn', 'control stack overflow, loop rejected')).toBe(true);
  });

  it('ends the whole grid when a degraded row leaves a break on the outer level', () => {
    const { ctx } = createTestLoopContext({ maxDepth: 1, overflowPolicy: { kind: 'degrade' } });
    const cells: Cell[] = [];

    const outcome = expectOk(
      nestedLoop2d(
        ctx,
        3,
        3,
        (row, col) => {
          cells.push([row, col]);
          if (col === 1) ctx.signalBreak();
        },
        undefined
      ),
      'degraded rows'
    );

    expect(cells).toEqual([
      [0, 0],
      [0, 1],
    ]);
    expect(outcome).toEqual({ exit: 'broken', iterations: 2 });
    expect(ctx.stats.snapshot()).toEqual({ totalIterations: 2, breaksHit: 2, continuesHit: 0 });
    expect(ctx.depth).toBe(0);
  });

  it('runs every row when degraded rows consume their own continues', () => {
    const { ctx } = createTestLoopContext({ maxDepth: 1, overflowPolicy: { kind: 'degrade' } });
    const cells: Cell[] = [];

    const outcome = expectOk(
      nestedLoop2d(
        ctx,
        2,
        2,
        (row, col) => {
          cells.push([row, col]);
          if (col === 1) ctx.signalContinue();
        },
        undefined
      ),
      'degraded continue'
    );

    expect(cells).toHaveLength(4);
    expect(outcome).toEqual({ exit: 'completed', iterations: 4 });
    expect(ctx.stats.snapshot().continuesHit).toBe(2);
    expect(ctx.stack.peek()).toBeUndefined();
  });
});
