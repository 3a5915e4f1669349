/**
 * Logging infrastructure exports
 */

export {
  rootLogger,
  createLogger,
  resolveLogLevel,
  LOG_LEVEL_ENV,
} from './pino-setup.js';

export { logEvent, logError } from '../logger.js';
export type { LogLevel } from '../logger.js';
