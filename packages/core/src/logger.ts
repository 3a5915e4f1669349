import type { Logger } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event.
 *
 * The event name doubles as the message so it stays greppable in plain output.
 * @param level - Log severity level
 * @param event - Event identifier, `<component>:<what>`
 * @param data - Optional structured data to include
 * @param logger - Target logger, the root logger when omitted
 * @public
 */
export function logEvent(
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
  logger: Logger = rootLogger,
): void {
  if (!logger.isLevelEnabled(level)) return;
  logger[level]({ event, ...data }, event);
}

/**
 * Logs an error event with its stack and any extra context.
 *
 * Non-Error values are wrapped so the `err` serializer always sees an Error.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @param logger - Target logger, the root logger when omitted
 * @public
 */
export function logError(
  context: string,
  rawError: unknown,
  extra?: Record<string, unknown>,
  logger: Logger = rootLogger,
): void {
  const err = rawError instanceof Error ? rawError : new Error(String(rawError));
  logEvent('error', `error:${context}`, { err, ...extra }, logger);
}
