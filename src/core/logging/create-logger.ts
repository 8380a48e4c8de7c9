import 'reflect-metadata';
import pino from 'pino';
import { singleton } from 'tsyringe';
import { resolveLogLevel, type ILoggerFactory, type Logger } from './types.js';

/**
 * Root pino logger.
 *
 * - Sync output to stderr (stdout belongs to CLI output)
 * - JSON format for machine parsing
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: resolveLogLevel(process.env),
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
