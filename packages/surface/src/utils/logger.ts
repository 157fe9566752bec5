export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  /** Component name shown in every line */
  readonly scope?: string;
  /** Entries below this level are dropped (default: info) */
  readonly level?: LogLevel;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  scope?: string | undefined;
  data?: Record<string, unknown> | undefined;
}

export function formatLog(entry: LogEntry): string {
  const scope = entry.scope ? ` [${entry.scope}]` : '';
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}${scope}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');

  const write = (level: LogLevel, message: string, data?: Record<string, unknown>): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    SINKS[level](
      formatLog({
        level,
        message,
        timestamp: new Date().toISOString(),
        scope: options.scope,
        data,
      })
    );
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
  };
}

export const logger = createLogger();
