// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { isLogLevel, resolveLogLevel } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
