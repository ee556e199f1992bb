export { createLogger, logger } from './logger.js';
export type { Logger, LoggerOptions, LogFields, LogSink } from './logger.js';
