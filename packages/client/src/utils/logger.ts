export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

let minimumLevel: LogLevel = 'info';

/**
 * Set the process-wide minimum level. Entries below it are discarded.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimumLevel);
}

export function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: [${entry.scope}] ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  scope: string,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    scope,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

/**
 * Create a console-backed logger whose lines carry the given scope.
 */
export function createLogger(scope: string): Logger {
  return {
    debug(message: string, data?: Record<string, unknown>): void {
      if (isEnabled('debug')) {
        console.debug(formatLog(createLogEntry('debug', scope, message, data)));
      }
    },

    info(message: string, data?: Record<string, unknown>): void {
      if (isEnabled('info')) {
        console.info(formatLog(createLogEntry('info', scope, message, data)));
      }
    },

    warn(message: string, data?: Record<string, unknown>): void {
      if (isEnabled('warn')) {
        console.warn(formatLog(createLogEntry('warn', scope, message, data)));
      }
    },

    error(message: string, data?: Record<string, unknown>): void {
      if (isEnabled('error')) {
        console.error(formatLog(createLogEntry('error', scope, message, data)));
      }
    },
  };
}
