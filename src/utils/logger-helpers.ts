/**
 * Logger Helpers
 *
 * Lazy evaluation of log context objects. The simulation loops emit a
 * debug event per dispatch; the context is only built when debug is on.
 */

import type { Logger } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param level - Log level
 * @param contextBuilder - Builds the context object (only called if logging)
 * @param message - Log message string
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ processId, start, stop }), 'dispatch');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
