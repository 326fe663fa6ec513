/**
 * @fileoverview Interface for logging abstraction.
 *
 * Mirrors the public API of `ComponentLogger` so that the event bus, the
 * plan executor, the retry supervisor and the coordinator can take a logger
 * by injection and be tested without touching the console.
 *
 * @module interfaces/ILogger
 */

/**
 * Supported log levels, lowest first.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Interface for a component-scoped logger.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly log: ILogger) {}
 *
 *   doWork(): void {
 *     this.log.info('Starting work');
 *     this.log.debug('Details', { step: 1 });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
   *
   * @param message - Log message
   * @param data - Optional structured data or Error
   */
  debug(message: string, data?: unknown): void;

  /**
   * Log at info level.
   */
  info(message: string, data?: unknown): void;

  /**
   * Log at warn level.
   */
  warn(message: string, data?: unknown): void;

  /**
   * Log at error level.
   */
  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;
}
