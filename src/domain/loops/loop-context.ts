import { DEFAULT_MAX_DEPTH, type OverflowPolicy } from '../../config/app-config.js';
import { createBootstrapLogger } from '../../core/logging/bootstrap.js';
import type { Logger } from '../../core/logging/types.js';
import { ControlStack } from './control-stack.js';
import { ExecutionStats } from './execution-stats.js';

export interface LoopContextOptions {
  readonly maxDepth?: number;
  readonly overflowPolicy?: OverflowPolicy;
  readonly logger?: Logger;
}

/**
 * Everything one thread of loop execution shares: its control stack, its
 * statistics, its logger and its overflow policy.
 *
 * Drivers take the context explicitly; bodies signal through the context they
 * close over:
 *
 * ```ts
 * const ctx = createLoopContext();
 * forEachNumber(ctx, [1, 2, 3, 4, 5], (n) => {
 *   if (n === 3) ctx.signalBreak();
 * }, undefined);
 * ```
 */
export class LoopContext {
  readonly stack: ControlStack;
  readonly stats = new ExecutionStats();

  constructor(
    maxDepth: number,
    readonly overflowPolicy: OverflowPolicy,
    readonly logger: Logger
  ) {
    this.stack = new ControlStack(maxDepth);
  }

  get depth(): number {
    return this.stack.depth;
  }

  /** Ends the innermost active loop after the current body returns. */
  signalBreak(): void {
    this.stack.signalBreak();
  }

  /** Ends the current iteration of the innermost active loop. */
  signalContinue(): void {
    this.stack.signalContinue();
  }
}

export function createLoopContext(options: LoopContextOptions = {}): LoopContext {
  return new LoopContext(
    options.maxDepth ?? DEFAULT_MAX_DEPTH,
    options.overflowPolicy ?? { kind: 'reject' },
    options.logger ?? createBootstrapLogger('loops')
  );
}
