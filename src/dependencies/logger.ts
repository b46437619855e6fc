import { isAbsolute, join } from 'node:path';

import type { Logger } from '@core/app';
import { createPinoLogger, type CreatePinoLoggerOptions } from '@core/infra';

import type { LoggingConfig } from '@/config/environment';

const resolveLogDirectory = (override: string | null): string => {
  if (!override) {
    return join(process.cwd(), '_logs');
  }

  return isAbsolute(override) ? override : join(process.cwd(), override);
};

export const toPinoLoggerOptions = (config: LoggingConfig): CreatePinoLoggerOptions => ({
  level: config.level,
  disableFileLogs: config.disableFileLogs,
  disableConsoleLogs: config.disableConsoleLogs,
  fileNamePrefix: config.fileNamePrefix,
  logDirectory: resolveLogDirectory(config.logDirectory),
});

let applicationLogger: Logger | null = null;

/**
 * The process-wide logger, created on first use so that importing this module writes nothing.
 */
export const getApplicationLogger = (config: LoggingConfig): Logger => {
  if (!applicationLogger) {
    applicationLogger = createPinoLogger(toPinoLoggerOptions(config));
  }

  return applicationLogger;
};
