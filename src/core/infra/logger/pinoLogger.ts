import { mkdirSync } from 'node:fs';
import { join } from 'node:path';

import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

import type { Logger, LoggerContext, LogLevel } from '@core/app/ports/logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_LOG_DIRECTORY = join(process.cwd(), '_logs');
const DEFAULT_FILE_NAME_PREFIX = 'app';

export type CreatePinoLoggerOptions = {
  level?: LogLevel;
  disableFileLogs?: boolean;
  disableConsoleLogs?: boolean;
  logDirectory?: string;
  /** Base name of the log files: `<prefix>.log` and `<prefix>-error.log`. */
  fileNamePrefix?: string;
};

const ERROR_BASE_KEYS = new Set(['name', 'message', 'stack', 'cause']);

const toLoggableError = (value: unknown): Record<string, unknown> | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (!(value instanceof Error)) {
    return typeof value === 'object' ? { ...value } : { value: String(value) };
  }

  const record: Record<string, unknown> = { name: value.name, message: value.message };

  // Own fields carry the failure detail: `code`, `eventType`, `location`, `issues`.
  for (const [key, field] of Object.entries(value)) {
    if (!ERROR_BASE_KEYS.has(key) && field !== undefined) {
      record[key] = field;
    }
  }

  if (value.stack) {
    record.stack = value.stack;
  }

  const cause = toLoggableError(value.cause);
  if (cause) {
    record.cause = cause;
  }

  return record;
};

const toLogFields = (context?: LoggerContext): Record<string, unknown> | undefined => {
  if (!context) {
    return undefined;
  }

  const fields = Object.entries(context).flatMap(([key, value]): Array<[string, unknown]> => {
    if (value === undefined) {
      return [];
    }

    if (key !== 'error') {
      return [[key, value]];
    }

    const error = toLoggableError(value);
    return error ? [[key, error]] : [];
  });

  return fields.length > 0 ? Object.fromEntries(fields) : undefined;
};

class PinoLoggerAdapter implements Logger {
  constructor(private readonly instance: PinoInstance) {}

  debug(message: string, context?: LoggerContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LoggerContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LoggerContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LoggerContext): void {
    this.write('error', message, context);
  }

  withContext(context: LoggerContext): Logger {
    return new PinoLoggerAdapter(this.instance.child(toLogFields(context) ?? {}));
  }

  private write(level: LogLevel, message: string, context?: LoggerContext) {
    const fields = toLogFields(context);

    if (fields) {
      this.instance[level](fields, message);
      return;
    }

    this.instance[level](message);
  }
}

type LogStream = { stream: DestinationStream; level: LogLevel };

const fileStream = (filePath: string, level: LogLevel): LogStream => ({
  stream: pino.destination({ dest: filePath, mkdir: true, append: true, sync: false }),
  level,
});

// `2025-03-01 09:15:02.125 UTC`
const humanReadableTimestamp = () =>
  `,"timestamp":"${new Date().toISOString().replace('T', ' ').replace('Z', ' UTC')}"`;

/**
 * Console output goes to stderr so that CLI reports on stdout stay machine readable.
 */
export const createPinoLogger = (options: CreatePinoLoggerOptions = {}): Logger => {
  const level = options.level ?? DEFAULT_LOG_LEVEL;
  const logDirectory = options.logDirectory ?? DEFAULT_LOG_DIRECTORY;
  const prefix = options.fileNamePrefix ?? DEFAULT_FILE_NAME_PREFIX;

  const streams: LogStream[] = [];

  if (!options.disableConsoleLogs) {
    streams.push({ stream: pino.destination({ dest: 2, sync: false }), level });
  }

  if (!options.disableFileLogs) {
    mkdirSync(logDirectory, { recursive: true });

    streams.push(
      fileStream(join(logDirectory, `${prefix}.log`), level),
      fileStream(join(logDirectory, `${prefix}-error.log`), 'warn'),
    );
  }

  const instance = pino(
    {
      level,
      enabled: streams.length > 0,
      base: undefined,
      timestamp: humanReadableTimestamp,
    },
    pino.multistream(streams),
  );

  return new PinoLoggerAdapter(instance);
};
