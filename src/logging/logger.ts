import { destination, pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { LogLevel } from '../config/types.js';

export type { Logger };

export interface CreateLoggerOptions {
  level: LogLevel;
  /** Defaults to a synchronous stderr stream so stdout stays clean for command output */
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level,
    base: null,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  return pino(loggerOptions, options.destination ?? destination({ fd: 2, sync: true }));
}

export function createModuleLogger(parent: Logger, module: string): Logger {
  return parent.child({ module });
}

/** Logger that drops everything. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
