import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { PinoLoggerFactory, type ILoggerFactory } from '../core/logging/index.js';
import { LoopContextFactory } from '../application/services/loop-context-factory.js';

// ═══════════════════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════════════════

let initialized = false;

export interface ContainerInitOptions {
  /** Already validated config; parsing happens at the composition root. */
  readonly config: ValidatedConfig;
  /** Override the logger factory (tests register a fake). */
  readonly loggerFactory?: ILoggerFactory;
}

// ═══════════════════════════════════════════════════════════════════════════
// REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(config: ValidatedConfig): void {
  container.register<ValidatedConfig>(DI.Config.App, { useValue: config });
}

function registerLogging(loggerFactory: ILoggerFactory | undefined): void {
  if (loggerFactory) {
    container.register<ILoggerFactory>(DI.Logging.Factory, { useValue: loggerFactory });
    return;
  }
  container.register<ILoggerFactory>(DI.Logging.Factory, {
    useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
  });
}

function registerServices(): void {
  container.register(DI.Loops.ContextFactory, {
    useFactory: instanceCachingFactory((c) => c.resolve(LoopContextFactory)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Wires the container. Idempotent: later calls are ignored until reset.
 */
export function initializeContainer(options: ContainerInitOptions): void {
  if (initialized) return;

  registerConfig(options.config);
  registerLogging(options.loggerFactory);
  registerServices();

  initialized = true;
}

export function isInitialized(): boolean {
  return initialized;
}

/**
 * Clears every registration (tests only).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export { container };
