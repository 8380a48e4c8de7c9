import { err, ok, type Result } from 'neverthrow';
import { controlStackOverflow, type ControlStackOverflowError } from './loop-errors.js';

/**
 * Per-level control state.
 *
 * Written by signal calls from inside a loop body, read by the driver that
 * owns the level.
 */
export type ControlState = 'normal' | 'break' | 'continue';

/**
 * Bounded stack of control levels, one per active loop.
 *
 * Locks:
 * - depth is always within 0..maxDepth
 * - every signal/query addresses the top level only; at depth 0 they are no-ops
 * - a pushed level always starts as 'normal' (popped state never leaks)
 * - a push at capacity is refused and leaves existing levels untouched
 */
export class ControlStack {
  private readonly levels: ControlState[] = [];

  constructor(readonly maxDepth: number) {}

  get depth(): number {
    return this.levels.length;
  }

  /** Top level state, or undefined when no loop is active. */
  peek(): ControlState | undefined {
    return this.levels[this.levels.length - 1];
  }

  /**
   * Enters a new loop level.
   * @returns the new depth, or a typed overflow error (nothing is pushed)
   */
  push(): Result<number, ControlStackOverflowError> {
    if (this.levels.length >= this.maxDepth) {
      return err(controlStackOverflow(this.maxDepth));
    }
    this.levels.push('normal');
    return ok(this.levels.length);
  }

  pop(): void {
    this.levels.pop();
  }

  signalBreak(): void {
    this.setTop('break');
  }

  signalContinue(): void {
    this.setTop('continue');
  }

  shouldBreak(): boolean {
    return this.peek() === 'break';
  }

  shouldContinue(): boolean {
    return this.peek() === 'continue';
  }

  /** Resets the top level to 'normal' (after a continue is consumed). */
  clearFlags(): void {
    this.setTop('normal');
  }

  private setTop(state: ControlState): void {
    if (this.levels.length > 0) {
      this.levels[this.levels.length - 1] = state;
    }
  }
}
