/**
 * Console logger with a `[Scope]` prefix and a level threshold
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

/**
 * Set the minimum level written to the console. Called once at startup.
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Create a logger that prefixes every line with `[scope]`
 */
export function createLogger(scope: string) {
  const prefix = `[${scope}]`;

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.log(prefix, message, ...args);
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error(message: string, ...args: unknown[]): void {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;
