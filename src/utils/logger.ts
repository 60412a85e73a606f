/**
 * Console logger with `[Component]` prefixes.
 *
 * Every level writes to stderr: under the stdio transport stdout carries the
 * MCP JSON-RPC stream and must not receive anything else.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export interface Logger {
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const write =
    (level: LogLevel) =>
    (message: string, ...meta: unknown[]): void => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[activeLevel]) {
        return;
      }
      console.error(`[${component}] ${message}`, ...meta);
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}
