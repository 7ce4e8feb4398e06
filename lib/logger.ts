export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  /** Derives a logger whose lines carry `[scope]` instead of this one's tag. */
  child: (scope: string) => Logger;
}

const rank = (level: LogLevel) => LOG_LEVELS.indexOf(level);

export const isLogLevel = (value: string): value is LogLevel =>
  (LOG_LEVELS as readonly string[]).includes(value);

export function createLogger(level: LogLevel = 'info', scope = 'Narrator'): Logger {
  const enabled = (target: LogLevel) => rank(target) >= rank(level);
  const tag = `[${scope}]`;

  return {
    debug: (...args) => { if (enabled('debug')) console.debug(tag, ...args); },
    info: (...args) => { if (enabled('info')) console.info(tag, ...args); },
    warn: (...args) => { if (enabled('warn')) console.warn(tag, ...args); },
    error: (...args) => { if (enabled('error')) console.error(tag, ...args); },
    child: (childScope) => createLogger(level, childScope),
  };
}

export const silentLogger: Logger = createLogger('silent');
