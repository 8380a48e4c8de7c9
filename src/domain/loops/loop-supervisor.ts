/**
 * Shared driver skeleton.
 *
 * Locks:
 * - A driver owns exactly one control level for its whole run: pushed on entry,
 *   popped exactly once on every exit path (completion, break, thrown body).
 * - Flags are polled before each body (signals written outside a body, e.g. by a
 *   while-condition) and again right after it returns. A continue ends only the
 *   iteration that signaled it; a break stops before the next element.
 * - Consumed continues are cleared; a consumed break ends the loop and its level
 *   is discarded with the pop.
 */

import { err, ok, type Result } from 'neverthrow';
import type { LoopContext } from './loop-context.js';
import type { LoopError } from './loop-errors.js';

// =============================================================================
// Types
// =============================================================================

export type LoopShape = 'range' | 'while' | 'do_while' | 'for_each' | 'nested_2d' | 'repeat' | 'infinite';

/**
 * - completed: natural termination
 * - broken: a break was consumed
 * - skipped: missing body/condition/items, nothing ran
 * - unsupervised: ran to completion without its own level (overflow, degrade policy)
 */
export type LoopExit = 'completed' | 'broken' | 'skipped' | 'unsupervised';

export interface LoopOutcome {
  readonly exit: LoopExit;
  /** Number of body invocations. */
  readonly iterations: number;
}

/**
 * One loop shape reduced to two moves: step to the next position (false on
 * natural termination) and run the body at the current position.
 */
export interface LoopCursor {
  readonly next: () => boolean;
  readonly invoke: () => void;
}

export type LoopRun = Result<LoopOutcome, LoopError>;

export const SKIPPED: LoopOutcome = { exit: 'skipped', iterations: 0 };

export const completed = (iterations: number): LoopOutcome => ({ exit: 'completed', iterations });
export const broken = (iterations: number): LoopOutcome => ({ exit: 'broken', iterations });

// =============================================================================
// Flag consumption
// =============================================================================

/** True (and counted) when the top level carries a break. */
export function consumeBreak(ctx: LoopContext): boolean {
  if (!ctx.stack.shouldBreak()) return false;
  ctx.stats.recordBreak();
  return true;
}

/** True (and counted) when the top level carries a continue; the flag is cleared. */
export function consumeContinue(ctx: LoopContext): boolean {
  if (!ctx.stack.shouldContinue()) return false;
  ctx.stack.clearFlags();
  ctx.stats.recordContinue();
  return true;
}

// =============================================================================
// Skeleton
// =============================================================================

/**
 * Runs `run` under a freshly pushed control level.
 *
 * On overflow the context's policy decides: `reject` returns the error without
 * running anything; `degrade` runs without a level of its own.
 */
export function supervise(ctx: LoopContext, shape: LoopShape, run: () => LoopRun): LoopRun {
  const pushed = ctx.stack.push();

  if (pushed.isErr()) {
    if (ctx.overflowPolicy.kind === 'reject') {
      ctx.logger.warn({ shape, maxDepth: ctx.stack.maxDepth }, 'control stack overflow, loop rejected');
      return err(pushed.error);
    }
    ctx.logger.warn({ shape, maxDepth: ctx.stack.maxDepth }, 'control stack overflow, loop running unsupervised');
    return run().map((outcome): LoopOutcome =>
      outcome.exit === 'completed' ? { ...outcome, exit: 'unsupervised' } : outcome
    );
  }

  ctx.logger.trace({ shape, depth: pushed.value }, 'loop entered');
  try {
    const result = run();
    if (result.isOk()) {
      ctx.logger.trace({ shape, exit: result.value.exit, iterations: result.value.iterations }, 'loop exited');
    }
    return result;
  } finally {
    ctx.stack.pop();
  }
}

/**
 * Polling loop shared by every single-level driver.
 * Must run inside `supervise`, which owns the level being polled.
 */
export function runSteps(ctx: LoopContext, cursor: LoopCursor): LoopOutcome {
  let iterations = 0;

  while (cursor.next()) {
    if (consumeBreak(ctx)) return broken(iterations);
    if (consumeContinue(ctx)) continue;

    cursor.invoke();
    iterations += 1;
    ctx.stats.recordIteration();

    if (consumeBreak(ctx)) return broken(iterations);
    consumeContinue(ctx);
  }

  return completed(iterations);
}

export function drive(ctx: LoopContext, shape: LoopShape, cursor: LoopCursor): LoopRun {
  return supervise(ctx, shape, () => ok(runSteps(ctx, cursor)));
}
