import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { RaceRecordNotFoundError, RaceRecordValidationError } from '../../../src/core/app';
import { JsonRaceFileSource } from '../../../src/core/infra';

const createTempDir = async () => mkdtemp(path.join(tmpdir(), 'race-file-source-test-'));

test('loads a race record by id from the configured directory', async (t) => {
  const directory = await createTempDir();
  t.after(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const record = { context: { stroke: 'freestyle', distance: 50 }, events: [] };
  await writeFile(path.join(directory, 'heat-3.json'), JSON.stringify(record), 'utf8');

  const source = new JsonRaceFileSource(directory);

  assert.deepEqual(await source.load('heat-3'), record);
  assert.deepEqual(await source.load('heat-3.json'), record);
});

test('names the missing file when a race record does not exist', async (t) => {
  const directory = await createTempDir();
  t.after(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const source = new JsonRaceFileSource(directory);

  await assert.rejects(
    () => source.load('missing'),
    (error: unknown) =>
      error instanceof RaceRecordNotFoundError &&
      error.location === path.join(directory, 'missing.json'),
  );
});

test('rejects files that are not JSON', async (t) => {
  const directory = await createTempDir();
  t.after(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  await writeFile(path.join(directory, 'broken.json'), 'time,type\n0,start\n', 'utf8');

  const source = new JsonRaceFileSource(directory);

  await assert.rejects(
    () => source.load('broken'),
    (error: unknown) =>
      error instanceof RaceRecordValidationError && error.issues[0]?.code === 'invalid_json',
  );
});
