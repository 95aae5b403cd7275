export {
  initLogger,
  getLogger,
  flushLoggers,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogContext,
  type Sink,
  type LogEntry,
  type LogLevel,
  type LoggerConfig,
} from './logger.js';
export { ConsoleSink, type ConsoleSinkOptions } from './sinks/console.js';
export { PinoSink, createPinoSink, type PinoSinkOptions } from './sinks/pino.js';
export { BufferedSink, type BufferedSinkOptions } from './buffered-sink.js';
export { loggerEnvSchema, validateLoggerEnv, type LoggerEnvConfig } from './env.schema.js';
