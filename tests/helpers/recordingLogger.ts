import type { Logger, LoggerContext, LogLevel } from '@core/app';

export type RecordedLogEntry = {
  level: LogLevel;
  message: string;
  context: LoggerContext;
};

/**
 * In-process logger that keeps every entry, merging contexts added through `withContext`.
 */
export const createRecordingLogger = (
  entries: RecordedLogEntry[] = [],
  baseContext: LoggerContext = {},
): Logger & { entries: RecordedLogEntry[] } => {
  const record = (level: LogLevel) => (message: string, context?: LoggerContext) => {
    entries.push({ level, message, context: { ...baseContext, ...context } });
  };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    withContext: (context) => createRecordingLogger(entries, { ...baseContext, ...context }),
  };
};
