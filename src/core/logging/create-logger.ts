import 'reflect-metadata';
import pino from 'pino';
import { singleton } from 'tsyringe';
import { type Logger, type ILoggerFactory, logLevelFromEnv } from './types.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr; stdout belongs to the host program
 * - JSON format for machine parsing
 */
function createRootLogger(): Logger {
  return pino(
    {
      level: logLevelFromEnv(),

      // ISO timestamps for consistency
      timestamp: pino.stdTimeFunctions.isoTime,

      // Include error stack traces
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers. Singleton lifecycle.
 */
@singleton()
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor() {
    this._root = createRootLogger();
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
