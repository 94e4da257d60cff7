export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** `Request >>> {"method":"POST",...}` */
export function structured(message: string, fields: Record<string, unknown>): string {
  return `${message} >>> ${JSON.stringify(fields, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))}`;
}

export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: (message) => {
      if (enabled('debug')) console.debug(message);
    },
    info: (message) => {
      if (enabled('info')) console.info(message);
    },
    warn: (message) => {
      if (enabled('warn')) console.warn(message);
    },
    error: (message) => {
      if (enabled('error')) console.error(message);
    }
  };
}
