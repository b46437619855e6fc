import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import { RaceRecordNotFoundError, RaceRecordValidationError, type RaceRecordSource } from '@core/app';

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads race records stored as `<raceId>.json` under a directory. An absolute `raceId` or one
 * already ending in `.json` is used as the file path as-is.
 */
export class JsonRaceFileSource implements RaceRecordSource {
  constructor(private readonly directory: string = process.cwd()) {}

  resolvePath(raceId: string): string {
    const fileName = raceId.endsWith('.json') ? raceId : `${raceId}.json`;
    return isAbsolute(fileName) ? fileName : join(this.directory, fileName);
  }

  async load(raceId: string): Promise<unknown> {
    const filePath = this.resolvePath(raceId);

    let contents: string;
    try {
      contents = await readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new RaceRecordNotFoundError(filePath);
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(contents);
      return parsed;
    } catch (error) {
      throw new RaceRecordValidationError([
        {
          path: '',
          message: `is not valid JSON (${error instanceof Error ? error.message : String(error)})`,
          code: 'invalid_json',
        },
      ]);
    }
  }
}
