import { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { basename, dirname, resolve } from 'node:path';

import {
  RaceAnalysisService,
  formatRaceSummary,
  type Logger,
  type RaceAnalysisReport,
} from '@core/app';
import { JsonRaceFileSource } from '@core/infra';

import { parseEnvironment } from '@/config/environment';
import { getApplicationLogger } from '@/dependencies/logger';
import { describeFailure } from '@/lib/errors/describeFailure';

type RunAnalyzeRaceOptions = {
  file: string;
  cwd?: string;
  json?: boolean;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  output?: Writable;
  errorOutput?: Writable;
};

type AnalyzeRaceRunResult = {
  report: RaceAnalysisReport | null;
  exitCode: number;
};

export async function runAnalyzeRace(options: RunAnalyzeRaceOptions): Promise<AnalyzeRaceRunResult> {
  const output = options.output ?? process.stdout;
  const errorOutput = options.errorOutput ?? process.stderr;
  const filePath = resolve(options.cwd ?? process.cwd(), options.file);

  try {
    const config = parseEnvironment(options.env ?? process.env);
    const logger = options.logger ?? getApplicationLogger(config.logging);
    const service = new RaceAnalysisService(
      new JsonRaceFileSource(dirname(filePath)),
      logger,
      config.analysis,
    );

    const report = await service.analyzeRace(basename(filePath));

    if (options.json) {
      output.write(`${JSON.stringify(report, null, 2)}\n`);
    } else {
      output.write(`${formatRaceSummary(report)}\n`);
    }

    return { report, exitCode: 0 };
  } catch (error) {
    errorOutput.write(`${describeFailure(error, filePath)}\n`);
    return { report: null, exitCode: 1 };
  }
}

function isCliEntry() {
  const current = fileURLToPath(import.meta.url);
  const calledWith = process.argv[1];
  if (!calledWith) {
    return false;
  }
  return current === resolve(calledWith);
}

async function main() {
  const args = process.argv.slice(2);
  const json = args.includes('--json');
  const file = args.find((arg) => !arg.startsWith('--'));

  if (!file) {
    process.stderr.write('Usage: analyze-race <race-file.json> [--json]\n');
    process.exit(2);
  }

  const result = await runAnalyzeRace({ file, json });
  process.exitCode = result.exitCode;
}

if (isCliEntry()) {
  main().catch((error) => {
    console.error('analyze-race failed:', error);
    process.exit(1);
  });
}
