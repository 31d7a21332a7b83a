export { createLogger, type CreateLoggerOptions } from './logger.js';
