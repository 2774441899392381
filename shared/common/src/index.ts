export { Logger, silentLogger, type LogLevel, type LogSink, type LoggerOptions } from './logger.js';
export { runWithConcurrency } from './concurrency.js';
