import { access, mkdtemp, readFile, rm } from 'node:fs/promises';
import path from 'node:path';
import { tmpdir } from 'node:os';
import { setTimeout as delay } from 'node:timers/promises';
import { strict as assert } from 'node:assert';
import test from 'node:test';

import { MissingRaceEventError } from '@core/domain';

import { createPinoLogger } from './pinoLogger';

type LogEntry = Record<string, unknown>;

const isRecord = (value: unknown): value is LogEntry =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const createTempDir = async () => mkdtemp(path.join(tmpdir(), 'pino-logger-test-'));

const waitForLogFile = async (filePath: string) => {
  for (let attempt = 0; attempt < 15; attempt += 1) {
    try {
      await access(filePath);
      return;
    } catch (error) {
      if (!isRecord(error) || error.code !== 'ENOENT') {
        throw error;
      }
    }

    await delay(100);
  }

  throw new Error(`Log file was not created: ${filePath}`);
};

const readLastLogEntry = async (filePath: string): Promise<LogEntry> => {
  await waitForLogFile(filePath);
  const contents = await readFile(filePath, 'utf8');
  const lines = contents
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const lastLine = lines.at(-1);
  if (!lastLine) {
    throw new Error(`No log entries found for ${filePath}`);
  }

  const parsed: unknown = JSON.parse(lastLine);
  assert.ok(isRecord(parsed), 'Expected log line to be a JSON object');
  return parsed;
};

const expectString = (entry: LogEntry, key: string) => {
  const value = entry[key];
  assert.equal(typeof value, 'string', `Expected ${key} to be a string`);
  return String(value);
};

const expectTimestamp = (entry: LogEntry) => {
  const timestamp = expectString(entry, 'timestamp');
  assert.match(
    timestamp,
    /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3} UTC$/u,
    'Expected timestamp to be in human readable format.',
  );
  return timestamp;
};

const expectRecord = (entry: LogEntry, key: string) => {
  const value = entry[key];
  assert.ok(isRecord(value), `Expected ${key} to be an object`);
  return value;
};

void test('writes structured log entries to app log', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({
    level: 'debug',
    logDirectory: logDir,
    disableConsoleLogs: true,
  });

  logger.info('Race analysis completed.', {
    event: 'tests.logger.app_log',
    raceId: 'heat-3',
    lapCount: 4,
    outcome: 'success',
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'app.log'));
  assert.equal(expectString(entry, 'event'), 'tests.logger.app_log');
  assert.equal(expectString(entry, 'raceId'), 'heat-3');
  assert.equal(entry.lapCount, 4);
  assert.equal(expectString(entry, 'outcome'), 'success');
  assert.equal(expectString(entry, 'msg'), 'Race analysis completed.');
  expectTimestamp(entry);
});

void test('serialises error metadata for error log file', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({ logDirectory: logDir, disableConsoleLogs: true });
  const error = new Error('boom');
  error.cause = new Error('root-cause');

  logger.error('Race analysis failed.', {
    event: 'tests.logger.error_log',
    raceId: 'heat-4',
    outcome: 'failure',
    error,
  });

  await delay(400);

  const appEntry = await readLastLogEntry(path.join(logDir, 'app.log'));
  assert.equal(expectString(appEntry, 'event'), 'tests.logger.error_log');
  const errorRecord = expectRecord(appEntry, 'error');
  assert.equal(expectString(errorRecord, 'name'), 'Error');
  assert.equal(expectString(errorRecord, 'message'), 'boom');
  expectString(errorRecord, 'stack');
  const causeRecord = expectRecord(errorRecord, 'cause');
  assert.equal(expectString(causeRecord, 'message'), 'root-cause');

  const errorEntry = await readLastLogEntry(path.join(logDir, 'app-error.log'));
  assert.equal(expectString(errorEntry, 'event'), 'tests.logger.error_log');
  assert.equal(errorEntry.level, 50);
  expectTimestamp(errorEntry);
});

void test('keeps the fields a failure carries alongside its message', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({ logDirectory: logDir, disableConsoleLogs: true });

  logger.error('Race analysis failed.', {
    event: 'tests.logger.domain_error',
    error: new MissingRaceEventError('end'),
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'app-error.log'));
  const errorRecord = expectRecord(entry, 'error');
  assert.equal(expectString(errorRecord, 'name'), 'MissingRaceEventError');
  assert.equal(expectString(errorRecord, 'eventType'), 'end');
  assert.equal(
    expectString(errorRecord, 'message'),
    "Race event stream is missing the 'end' event.",
  );
});

void test('inherits context with withContext()', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({ logDirectory: logDir, disableConsoleLogs: true });
  const raceLogger = logger.withContext({ raceId: 'heat-5', stroke: 'backstroke' });

  raceLogger.info('Child logger entry.', {
    event: 'tests.logger.child',
    outcome: 'success',
    durationMs: 42,
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'app.log'));
  assert.equal(expectString(entry, 'raceId'), 'heat-5');
  assert.equal(expectString(entry, 'stroke'), 'backstroke');
  assert.equal(entry.durationMs, 42);
  assert.equal(expectString(entry, 'event'), 'tests.logger.child');
  expectTimestamp(entry);
});

void test('writes to custom file name prefixes when provided', async (t) => {
  const logDir = await createTempDir();
  void t.after(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  const logger = createPinoLogger({
    logDirectory: logDir,
    fileNamePrefix: 'analyze-race',
    disableConsoleLogs: true,
  });

  logger.info('Boundaries detected.', {
    event: 'tests.logger.custom_prefix',
    raceId: 'heat-6',
  });

  await delay(400);

  const entry = await readLastLogEntry(path.join(logDir, 'analyze-race.log'));
  assert.equal(expectString(entry, 'event'), 'tests.logger.custom_prefix');
  assert.equal(expectString(entry, 'raceId'), 'heat-6');
  expectTimestamp(entry);

  logger.warn('Turn pattern did not match.', {
    event: 'tests.logger.custom_prefix_warn',
    raceId: 'heat-6',
  });

  await delay(400);

  const warnEntry = await readLastLogEntry(path.join(logDir, 'analyze-race-error.log'));
  assert.equal(expectString(warnEntry, 'event'), 'tests.logger.custom_prefix_warn');
  expectTimestamp(warnEntry);
});
