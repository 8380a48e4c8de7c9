/**
 * Iteration drivers, one per loop shape.
 *
 * Every driver:
 * - takes the loop context first and an opaque `userData` last, handed to the
 *   body unchanged and never inspected
 * - returns `skipped` without touching the stack when the body (or condition,
 *   or item list) is missing
 * - returns INVALID_LOOP_ARGUMENT without touching the stack for bad shape
 *   parameters
 * - otherwise runs under exactly one control level (nested 2-D: one outer level
 *   plus one inner level per row)
 */

import { err, ok } from 'neverthrow';
import type { LoopContext } from './loop-context.js';
import { invalidLoopArgument } from './loop-errors.js';
import { RangeIterator } from './range-iterator.js';
import {
  SKIPPED,
  broken,
  completed,
  consumeBreak,
  consumeContinue,
  drive,
  runSteps,
  supervise,
  type LoopRun,
} from './loop-supervisor.js';

// =============================================================================
// Callable contracts
// =============================================================================

export type Maybe<T> = T | null | undefined;

export type LoopBody<T, C> = (item: T, userData: C) => void;
export type GridBody<C> = (row: number, col: number, userData: C) => void;
export type ActionBody<C> = (userData: C) => void;
export type LoopCondition<C> = (userData: C) => boolean;

// =============================================================================
// Counted range
// =============================================================================

/**
 * `for (i = start; i < end; i += step)`, or `i > end` when step is negative.
 *
 * A continue signaled by the body still advances `i`.
 */
export function forRange<C>(
  ctx: LoopContext,
  start: number,
  end: number,
  step: number,
  body: Maybe<LoopBody<number, C>>,
  userData: C
): LoopRun {
  if (!body) return ok(SKIPPED);

  const created = RangeIterator.create(start, end, step);
  if (created.isErr()) return err(created.error);
  const range = created.value;

  let index = start;
  return drive(ctx, 'range', {
    next: () => {
      const pulled = range.next();
      if (pulled.done) return false;
      index = pulled.value;
      return true;
    },
    invoke: () => body(index, userData),
  });
}

// =============================================================================
// Condition loops
// =============================================================================

/** Condition is evaluated before every iteration, the first included. */
export function whileLoop<C>(
  ctx: LoopContext,
  condition: Maybe<LoopCondition<C>>,
  body: Maybe<ActionBody<C>>,
  userData: C
): LoopRun {
  if (!condition || !body) return ok(SKIPPED);

  return drive(ctx, 'while', {
    next: () => condition(userData),
    invoke: () => body(userData),
  });
}

/** The body always runs once; the condition is evaluated after each body. */
export function doWhileLoop<C>(
  ctx: LoopContext,
  condition: Maybe<LoopCondition<C>>,
  body: Maybe<ActionBody<C>>,
  userData: C
): LoopRun {
  if (!condition || !body) return ok(SKIPPED);

  let first = true;
  return drive(ctx, 'do_while', {
    next: () => {
      if (first) {
        first = false;
        return true;
      }
      return condition(userData);
    },
    invoke: () => body(userData),
  });
}

// =============================================================================
// Foreach
// =============================================================================

export function forEach<T, C>(
  ctx: LoopContext,
  items: Maybe<readonly T[]>,
  body: Maybe<LoopBody<T, C>>,
  userData: C
): LoopRun {
  if (!items || !body) return ok(SKIPPED);

  let index = -1;
  return drive(ctx, 'for_each', {
    next: () => ++index < items.length,
    invoke: () => body(items[index], userData),
  });
}

export function forEachNumber<C>(
  ctx: LoopContext,
  items: Maybe<readonly number[]>,
  body: Maybe<LoopBody<number, C>>,
  userData: C
): LoopRun {
  return forEach(ctx, items, body, userData);
}

export function forEachString<C>(
  ctx: LoopContext,
  items: Maybe<readonly string[]>,
  body: Maybe<LoopBody<string, C>>,
  userData: C
): LoopRun {
  return forEach(ctx, items, body, userData);
}

// =============================================================================
// Nested 2-D
// =============================================================================

/**
 * `for row in 0..rows { for col in 0..cols { body(row, col) } }`
 *
 * Lock: the outer level is pushed once; each row runs under its own inner
 * level. Signals from the body always land on the inner level, so a break ends
 * the current row only and a continue skips one cell. The outer level's flags
 * are polled before each row and after its inner loop returns.
 */
export function nestedLoop2d<C>(
  ctx: LoopContext,
  rows: number,
  cols: number,
  body: Maybe<GridBody<C>>,
  userData: C
): LoopRun {
  if (!body) return ok(SKIPPED);
  if (!Number.isSafeInteger(rows)) return err(invalidLoopArgument('rows', rows, 'a safe integer'));
  if (!Number.isSafeInteger(cols)) return err(invalidLoopArgument('cols', cols, 'a safe integer'));

  return supervise(ctx, 'nested_2d', () => {
    let iterations = 0;

    for (let row = 0; row < rows; row++) {
      if (consumeBreak(ctx)) return ok(broken(iterations));
      if (consumeContinue(ctx)) continue;

      let col = -1;
      const inner = supervise(ctx, 'nested_2d', () =>
        ok(
          runSteps(ctx, {
            next: () => ++col < cols,
            invoke: () => body(row, col, userData),
          })
        )
      );
      if (inner.isErr()) return err(inner.error);
      iterations += inner.value.iterations;

      if (consumeBreak(ctx)) return ok(broken(iterations));
      consumeContinue(ctx);
    }

    return ok(completed(iterations));
  });
}

// =============================================================================
// Counter loops
// =============================================================================

/** Runs the body `times` times with a 0-based counter. */
export function repeat<C>(ctx: LoopContext, times: number, body: Maybe<LoopBody<number, C>>, userData: C): LoopRun {
  if (!body) return ok(SKIPPED);
  if (!Number.isSafeInteger(times) || times < 0) {
    return err(invalidLoopArgument('times', times, 'a non-negative safe integer'));
  }

  let counter = -1;
  return drive(ctx, 'repeat', {
    next: () => ++counter < times,
    invoke: () => body(counter, userData),
  });
}

/**
 * Runs until the body signals a break. There is no other way out.
 */
export function infiniteLoop<C>(ctx: LoopContext, body: Maybe<ActionBody<C>>, userData: C): LoopRun {
  if (!body) return ok(SKIPPED);

  return drive(ctx, 'infinite', {
    next: () => true,
    invoke: () => body(userData),
  });
}
