import pino, { type DestinationStream, type Level, type Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = Level | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Where log lines go. Defaults to a synchronous stderr destination, which
   * keeps stdout free for the extracted addresses.
   */
  destination?: DestinationStream;
}

/**
 * Builds the process logger. Nothing in the library creates one on its own;
 * the CLI constructs it once and hands it to every component.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const destination = options.destination ?? pino.destination({ dest: 2, sync: true });
  return pino(
    {
      name: 'imgmail',
      level: options.level ?? 'info',
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}
