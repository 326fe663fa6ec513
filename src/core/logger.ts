/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * All output goes to stderr so that stdout stays reserved for the CLI's
 * report and NDJSON event stream. The global level and the set of components
 * with debug output enabled are read from an {@link IConfigProvider}.
 *
 * Components:
 * - event-bus: publication, subscriber overflow and removal
 * - plan-state / plan-executor: plan transitions and batches
 * - retry: retry supervisor attempts and backoff
 * - coordinator / consolidation: review orchestration and fan-in
 * - capabilities: bundled analysis capabilities
 * - review-service: submission boundary
 * - config / cli: configuration loading and the command line
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('coordinator');
 * log.info('Review started');
 * log.debug('Plan built', { steps: 3 });
 * log.error('Capability failed', error);
 * ```
 *
 * @module core/logger
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { ILogger, LogLevel } from '../interfaces/ILogger';

export type { LogLevel } from '../interfaces/ILogger';

/**
 * Components that can have logging enabled
 */
export type LogComponent =
  | 'event-bus'
  | 'plan-state'
  | 'plan-executor'
  | 'retry'
  | 'coordinator'
  | 'consolidation'
  | 'capabilities'
  | 'review-service'
  | 'config'
  | 'cli';

/** Config section holding the logging keys. */
export const LOGGING_SECTION = 'logging';

/** Key of the global log level inside {@link LOGGING_SECTION}. */
export const LOGGING_LEVEL_KEY = 'level';

/** Key of the debug-enabled component list inside {@link LOGGING_SECTION}. */
export const LOGGING_DEBUG_COMPONENTS_KEY = 'debugComponents';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

/**
 * Centralized logger with per-component debug control.
 *
 * One process-wide instance is installed with {@link Logger.initialize};
 * component loggers created before that fall back to a default instance.
 */
export class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel = 'info';
  private debugComponents = new Set<string>();
  private configProvider: IConfigProvider | undefined;

  constructor(configProvider?: IConfigProvider) {
    if (configProvider) {
      this.setConfigProvider(configProvider);
    }
  }

  /**
   * Install the process-wide logger. Later calls replace the configuration
   * source but keep the same instance.
   */
  static initialize(configProvider?: IConfigProvider): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger(configProvider);
    } else if (configProvider) {
      Logger.instance.setConfigProvider(configProvider);
    }
    return Logger.instance;
  }

  /**
   * Get the process-wide logger, creating a default one on first use.
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Drop the process-wide instance. Tests use this to start from defaults.
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  /**
   * Create a component-scoped logger.
   *
   * @param component - The component name for log prefixes
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  /**
   * Switch configuration source and reload level and debug components.
   */
  setConfigProvider(configProvider: IConfigProvider): void {
    this.configProvider = configProvider;
    this.loadConfig();
  }

  /**
   * Reload level and debug components from the configuration source.
   */
  loadConfig(): void {
    if (!this.configProvider) {
      return;
    }

    const level = this.configProvider.getConfig<string>(LOGGING_SECTION, LOGGING_LEVEL_KEY, 'info');
    this.level = isLogLevel(level) ? level : 'info';

    const components = this.configProvider.getConfig<string[]>(
      LOGGING_SECTION,
      LOGGING_DEBUG_COMPONENTS_KEY,
      [],
    );
    this.debugComponents = new Set(components);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Enable or disable debug output for one component.
   */
  setDebugEnabled(component: LogComponent, enabled: boolean): void {
    if (enabled) {
      this.debugComponents.add(component);
    } else {
      this.debugComponents.delete(component);
    }
  }

  /**
   * Debug output is on when the global level is `debug` or the component
   * is listed in `logging.debugComponents`.
   */
  isDebugEnabled(component: LogComponent): boolean {
    return this.level === 'debug' || this.debugComponents.has(component) || this.debugComponents.has('*');
  }

  /**
   * Format a log message with timestamp and component prefix.
   */
  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  /**
   * Format additional data for logging.
   */
  private formatData(data?: unknown): string {
    if (data === undefined) return '';
    if (data instanceof Error) {
      return `\n  Error: ${data.message}${data.stack ? `\n  Stack: ${data.stack}` : ''}`;
    }
    try {
      return '\n  ' + JSON.stringify(data, errorReplacer, 2).split('\n').join('\n  ');
    } catch {
      return `\n  [Unserializable data: ${typeof data}]`;
    }
  }

  /**
   * Write a log entry.
   */
  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    if (level === 'debug') {
      if (!this.isDebugEnabled(component)) return;
    } else if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = this.formatMessage(level, component, message) + this.formatData(data);
    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        // stdout belongs to the CLI output
        console.error(line);
        break;
    }
  }

  debug(component: LogComponent, message: string, data?: unknown): void {
    this.log('debug', component, message, data);
  }

  info(component: LogComponent, message: string, data?: unknown): void {
    this.log('info', component, message, data);
  }

  warn(component: LogComponent, message: string, data?: unknown): void {
    this.log('warn', component, message, data);
  }

  error(component: LogComponent, message: string, data?: unknown): void {
    this.log('error', component, message, data);
  }
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Component-scoped logger for convenience.
 *
 * Provides log methods pre-bound to a specific component. Resolves the
 * process-wide {@link Logger} on every call so that loggers created at
 * module load pick up configuration installed later.
 */
export class ComponentLogger implements ILogger {
  constructor(private readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    Logger.getInstance().debug(this.component, message, data);
  }

  info(message: string, data?: unknown): void {
    Logger.getInstance().info(this.component, message, data);
  }

  warn(message: string, data?: unknown): void {
    Logger.getInstance().warn(this.component, message, data);
  }

  error(message: string, data?: unknown): void {
    Logger.getInstance().error(this.component, message, data);
  }

  isDebugEnabled(): boolean {
    return Logger.getInstance().isDebugEnabled(this.component);
  }
}
