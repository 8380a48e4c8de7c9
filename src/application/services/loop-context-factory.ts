import 'reflect-metadata';
import { inject, singleton } from 'tsyringe';
import { DI } from '../../di/tokens.js';
import type { ValidatedConfig } from '../../config/app-config.js';
import type { ILoggerFactory } from '../../core/logging/index.js';
import { LoopContext } from '../../domain/loops/loop-context.js';
import type { Result } from 'neverthrow';
import { analyzeLoop, type LoopHint } from '../../domain/loops/loop-hint.js';
import type { InvalidLoopArgumentError } from '../../domain/loops/loop-errors.js';

/**
 * Creates loop contexts wired to the validated config and the component logger.
 *
 * One context per logical thread of execution; contexts never share state.
 */
@singleton()
export class LoopContextFactory {
  constructor(
    @inject(DI.Config.App) private readonly config: ValidatedConfig,
    @inject(DI.Logging.Factory) private readonly loggers: ILoggerFactory
  ) {}

  create(): LoopContext {
    const { maxDepth, overflowPolicy } = this.config.loops;
    return new LoopContext(maxDepth, overflowPolicy, this.loggers.create('loops'));
  }

  /** Unroll hint; the configured threshold unless one is given. */
  analyze(
    iterations: number,
    threshold: number = this.config.loops.unrollThreshold
  ): Result<LoopHint, InvalidLoopArgumentError> {
    return analyzeLoop(iterations, threshold);
  }
}
