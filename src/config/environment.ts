/**
 * Filename: src/config/environment.ts
 * Purpose: Parse and validate process environment variables into the analysis and logging configuration.
 * License: MIT
 */

import type { LogLevel } from '@core/app';
import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from '@core/domain';

export type EnvIssue = {
  key: string;
  message: string;
};

export type LoggingConfig = {
  level: LogLevel;
  logDirectory: string | null;
  fileNamePrefix: string;
  disableFileLogs: boolean;
  disableConsoleLogs: boolean;
};

export type EnvironmentConfig = {
  analysis: AnalysisConfig;
  logging: LoggingConfig;
};

export class EnvironmentValidationError extends Error {
  constructor(public readonly issues: EnvIssue[]) {
    super('Environment configuration is invalid.');
    this.name = 'EnvironmentValidationError';
  }
}

const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warn', 'error'];

const DEFAULT_LOG_FILE_PREFIX = 'app';
const LOG_FILE_PREFIX_PATTERN = /^[\w.-]+$/u;

const TRUE_FLAG_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_FLAG_VALUES = new Set(['0', 'false', 'no', 'off']);

export function parseBooleanFlagValue(value: string): boolean | null {
  const normalised = value.trim().toLowerCase();

  if (TRUE_FLAG_VALUES.has(normalised)) {
    return true;
  }

  if (FALSE_FLAG_VALUES.has(normalised)) {
    return false;
  }

  return null;
}

const readBooleanFlag = (
  key: string,
  raw: string | undefined,
  issues: EnvIssue[],
  defaultValue: boolean,
): boolean => {
  if (raw === undefined || raw.trim().length === 0) {
    return defaultValue;
  }

  const parsed = parseBooleanFlagValue(raw);
  if (parsed === null) {
    issues.push({ key, message: `${key} must be set to "true" or "false".` });
    return defaultValue;
  }

  return parsed;
};

const readNumber = (
  key: string,
  raw: string | undefined,
  issues: EnvIssue[],
  options: { defaultValue: number; allowZero: boolean },
): number => {
  const value = raw?.trim();
  if (!value) {
    return options.defaultValue;
  }

  const parsed = Number(value);
  const valid = Number.isFinite(parsed) && (options.allowZero ? parsed >= 0 : parsed > 0);

  if (!valid) {
    issues.push({
      key,
      message: `${key} must be a ${options.allowZero ? 'non-negative' : 'positive'} number.`,
    });
    return options.defaultValue;
  }

  return parsed;
};

const parseLogLevel = (raw: string | undefined, issues: EnvIssue[]): LogLevel => {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return 'info';
  }

  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    issues.push({ key: 'LOG_LEVEL', message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}.` });
    return 'info';
  }

  return level;
};

const parseLogFilePrefix = (raw: string | undefined, issues: EnvIssue[]): string => {
  const value = raw?.trim();
  if (!value) {
    return DEFAULT_LOG_FILE_PREFIX;
  }

  if (!LOG_FILE_PREFIX_PATTERN.test(value)) {
    issues.push({
      key: 'LOG_FILE_PREFIX',
      message: 'LOG_FILE_PREFIX may only contain letters, digits, ".", "_" and "-".',
    });
    return DEFAULT_LOG_FILE_PREFIX;
  }

  return value;
};

export const parseEnvironment = (env: Record<string, string | undefined>): EnvironmentConfig => {
  const issues: EnvIssue[] = [];

  const poolLength = readNumber('POOL_LENGTH', env.POOL_LENGTH, issues, {
    defaultValue: DEFAULT_ANALYSIS_CONFIG.poolLength,
    allowZero: false,
  });
  const handTouchAllowance = readNumber('HAND_TOUCH_ALLOWANCE', env.HAND_TOUCH_ALLOWANCE, issues, {
    defaultValue: DEFAULT_ANALYSIS_CONFIG.handTouchAllowance,
    allowZero: true,
  });
  const debounceSeconds = readNumber(
    'BOUNDARY_DEBOUNCE_SECONDS',
    env.BOUNDARY_DEBOUNCE_SECONDS,
    issues,
    { defaultValue: DEFAULT_ANALYSIS_CONFIG.debounceSeconds, allowZero: true },
  );

  if (handTouchAllowance >= poolLength) {
    issues.push({
      key: 'HAND_TOUCH_ALLOWANCE',
      message: 'HAND_TOUCH_ALLOWANCE must be smaller than POOL_LENGTH.',
    });
  }

  const level = parseLogLevel(env.LOG_LEVEL, issues);
  const disableFileLogs = readBooleanFlag('DISABLE_FILE_LOGS', env.DISABLE_FILE_LOGS, issues, false);
  const disableConsoleLogs = readBooleanFlag(
    'DISABLE_CONSOLE_LOGS',
    env.DISABLE_CONSOLE_LOGS,
    issues,
    false,
  );
  const logDirectory = env.LOG_DIR?.trim() || null;
  const fileNamePrefix = parseLogFilePrefix(env.LOG_FILE_PREFIX, issues);

  if (issues.length > 0) {
    throw new EnvironmentValidationError(issues);
  }

  return {
    analysis: { poolLength, handTouchAllowance, debounceSeconds },
    logging: { level, logDirectory, fileNamePrefix, disableFileLogs, disableConsoleLogs },
  };
};
