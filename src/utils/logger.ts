/**
 * Console logger with a component prefix and a level threshold.
 *
 * Output goes through console.* so it lands in the host's stdout/stderr
 * capture unchanged.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** A logger for a sub-component sharing this logger's threshold */
  child(component: string): Logger;
}

export function createLogger(component: string, level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const prefix = `[${component}]`;
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
    child(subComponent) {
      return createLogger(subComponent, level);
    }
  };
}

/**
 * Logger that drops everything
 */
export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => noopLogger
};

/**
 * Human-readable message for anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
