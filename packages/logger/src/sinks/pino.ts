import pino from 'pino';

import { validateLoggerEnv } from '../env.schema.js';
import type { LogEntry, Sink } from '../logger.js';

export interface PinoSinkOptions {
  /** Destination for JSON lines; defaults to stdout. */
  destination?: pino.DestinationStream | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Forwards log entries to a pino logger as structured JSON.
 * The entry's category is kept as a field so log processors can filter on it.
 */
export class PinoSink implements Sink {
  constructor(private readonly logger: pino.Logger) {}

  write(entry: LogEntry): void {
    const fields = { ...entry.context, category: entry.category, time: entry.timestamp.toISOString() };
    this.logger[entry.level](fields, entry.msg);
  }

  flush(): void {
    this.logger.flush();
  }
}

/**
 * Builds a pino-backed sink from LOGGER_* environment variables.
 */
export function createPinoSink(options: PinoSinkOptions = {}): PinoSink {
  const env = validateLoggerEnv(options.env ?? process.env);

  const pinoOptions: pino.LoggerOptions = {
    base: {
      environment: env.NODE_ENV,
      service: env.LOGGER_SERVICE_NAME,
    },
    level: env.LOGGER_LOG_LEVEL,
    timestamp: false,
  };

  const logger = options.destination
    ? pino.pino(pinoOptions, options.destination)
    : pino.pino(pinoOptions, pino.destination({ dest: 1, sync: false }));

  return new PinoSink(logger);
}
