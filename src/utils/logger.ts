/**
 * Structured Logger utility class
 *
 * Static logging methods with emoji prefixes and an optional context object.
 * The minimum level comes from `LOG_LEVEL` (debug, info, warn, error) and
 * defaults to info.
 *
 * @example
 * ```typescript
 * Logger.info('Deployment reused', { cloud: 'selectel', cpu: 4 });
 * Logger.warn('Skipping malformed cache line', { line: 12 });
 * Logger.error('apply terraform plan', new Error('exit code 1'), { cloud: 'timeweb' });
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

export class Logger {
  private static level: LogLevel | null = null;

  /**
   * Overrides the level read from the environment
   */
  static setLevel(level: LogLevel): void {
    Logger.level = level;
  }

  static getLevel(): LogLevel {
    if (Logger.level) {
      return Logger.level;
    }
    const fromEnv = (process.env.LOG_LEVEL ?? '').toLowerCase();
    return isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  /**
   * Logs error messages with structured formatting
   *
   * @param operation - Description of the operation that failed
   * @param error - The error object or message that occurred
   * @param context - Optional additional context information
   *
   * @example
   * ```typescript
   * try {
   *   await backend.apply(vars);
   * } catch (error) {
   *   Logger.error('provision deployment', error, { cloud: 'selectel' });
   * }
   * ```
   */
  static error(operation: string, error: unknown, context?: Record<string, unknown>): void {
    if (!Logger.enabled('error')) return;
    const errorInfo = Logger.extractErrorInfo(error);

    console.error(`❌ Failed to ${operation}:`, {
      message: errorInfo.message,
      stack: errorInfo.stack,
      ...(context && { context })
    });
  }

  static info(message: string, context?: Record<string, unknown>): void {
    if (!Logger.enabled('info')) return;
    console.log(`ℹ️ ${message}`, context ? { message, context } : '');
  }

  static warn(message: string, context?: Record<string, unknown>): void {
    if (!Logger.enabled('warn')) return;
    console.warn(`⚠️ ${message}`, context ? { message, context } : '');
  }

  static debug(message: string, context?: Record<string, unknown>): void {
    if (!Logger.enabled('debug')) return;
    console.debug(`🔍 ${message}`, context ? { message, context } : '');
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.getLevel()];
  }

  /**
   * Extracts error information from various error types
   */
  private static extractErrorInfo(error: unknown): { message: string; stack?: string } {
    if (error instanceof Error) {
      return {
        message: error.message,
        stack: error.stack
      };
    }

    if (typeof error === 'string') {
      return { message: error };
    }

    if (error && typeof error === 'object') {
      // Error-like objects
      const message = 'message' in error && typeof error.message === 'string'
        ? error.message
        : JSON.stringify(error);
      const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : undefined;
      return { message, stack };
    }

    return {
      message: `Unknown error: ${String(error)}`
    };
  }
}
