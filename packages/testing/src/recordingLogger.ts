export type RecordedLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogRecord {
  readonly level: RecordedLevel;
  readonly message: string;
  readonly data: Record<string, unknown> | undefined;
}

/**
 * Logger double that keeps entries instead of printing them.
 */
export interface RecordingLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  readonly entries: LogRecord[];
  /** Entries at one level */
  at(level: RecordedLevel): LogRecord[];
  clear(): void;
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogRecord[] = [];
  const record =
    (level: RecordedLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      entries.push({ level, message, data });
    };

  return {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    get entries() {
      return entries;
    },
    at: (level) => entries.filter((entry) => entry.level === level),
    clear: () => {
      entries.length = 0;
    },
  };
}
