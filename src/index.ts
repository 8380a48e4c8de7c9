/**
 * loopwire - public API
 *
 * Loop drivers that invoke their body as a function value and let the body
 * request break/continue through an explicit control stack.
 */

export * from './domain/loops/index.js';

export {
  loadConfig,
  createValidatedConfig,
  DEFAULT_MAX_DEPTH,
  DEFAULT_UNROLL_THRESHOLD,
  type AppConfig,
  type ValidatedConfig,
  type OverflowPolicy,
  type MaxDepth,
  type UnrollThreshold,
  type LoadConfigOptions,
  type LoadConfigResult,
} from './config/app-config.js';

export { LoopContextFactory } from './application/services/loop-context-factory.js';
export { initializeContainer, resetContainer, container } from './di/container.js';
export { DI } from './di/tokens.js';

export type { Logger, ILoggerFactory, LogLevel } from './core/logging/index.js';
export { PinoLoggerFactory, createBootstrapLogger } from './core/logging/index.js';

export type { AppError, ConfigInvalidError, ConfigIssue, UnexpectedError } from './errors/index.js';
export { Err, formatAppError } from './errors/index.js';
