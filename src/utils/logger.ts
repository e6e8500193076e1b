import anylogger from 'anylogger';
import 'anylogger-console';

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Named logger under the `nvd-stats:` namespace, e.g. `nvd-stats:feed`.
 */
export function createLogger(name: string): Logger {
  return anylogger(`nvd-stats:${name}`);
}
