/**
 * Pino logger setup shared by every srcmap package
 *
 * The root logger is silent unless SRCMAP_LOG_LEVEL selects a level.
 * Modules log through scoped children created with {@link createLogger}.
 */

import pino from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

/**
 * Environment variable read once at load to pick the root log level.
 * @public
 */
export const LOG_LEVEL_ENV = 'SRCMAP_LOG_LEVEL';

const LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Maps a raw level string to a pino level. Unknown or missing values fall
 * back to 'silent'.
 *
 * @param value - Raw value, typically from the environment
 * @returns A level pino accepts
 * @public
 */
export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const normalized = (value ?? '').trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? 'silent';
}

/**
 * Root logger instance.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'debug';
 * rootLogger.debug({ sections: 2 }, 'consumer:parsed');
 * ```
 *
 * @public
 * @see {@link createLogger} - Scoped child loggers
 */
const rootLogger: Logger = pino({
  name: 'srcmap',
  level: resolveLogLevel(process.env[LOG_LEVEL_ENV]),
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/**
 * Creates a child of the root logger tagged with a scope binding.
 * @param scope - Module or component name, e.g. 'consumer'
 * @public
 */
export function createLogger(scope: string): Logger {
  return rootLogger.child({ scope });
}

export { rootLogger };
