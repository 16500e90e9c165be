/**
 * Pino logger writing to stdout and to the append-only execution log
 */

import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  level?: string;
  /** Execution log file; omitted means stdout only */
  file?: string;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', file, name = 'market-wrap-bot' } = options;

  const streams: pino.StreamEntry[] = [{ level: 'trace', stream: process.stdout }];

  if (file) {
    streams.push({
      level: 'trace',
      stream: pino.destination({ dest: file, append: true, mkdir: true, sync: true }),
    });
  }

  return pino(
    {
      name,
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}

/**
 * Logger that discards everything; used where no logger is injected
 */
export const silentLogger: Logger = pino({ level: 'silent' });
