import pino, { type DestinationStream, type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
  /** Write to this stream instead of stdout (tests capture output this way) */
  destination?: DestinationStream;
}

/**
 * Base logging sink for the whole process.
 * Call sites use the object-first form: `logger.info({ count }, 'message')`.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const pinoOptions = {
    name: options.name ?? 'dishwatch',
    level: options.level ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}
