import {
  calculateLapStats,
  calculateOverallStats,
  calculateStrokeTempo,
  countLaps,
  detectLapBoundaries,
  findFirstEvent,
  resolveAnalysisConfig,
  roundLapStat,
  roundOverallStats,
  roundTo2,
  summariseBreakouts,
  type AnalysisConfig,
  type BreakoutSummary,
  type DataQualityWarning,
  type LapStat,
  type OverallStats,
  type RaceContext,
} from '@core/domain';

import type { Logger } from '../ports/logger';
import type { RaceRecord, RaceRecordSource } from '../ports/raceRecordSource';
import { parseRaceRecord } from '../validation/raceRecordSchema';

export type RaceTempoSummary = {
  totalStrokes: number;
  intervals: number[];
  averageInterval: number | null;
};

/** Presentation-ready analysis; every number is rounded to 2 decimals. */
export type RaceAnalysisReport = {
  context: RaceContext;
  totalTime: number;
  waterEntryTime: number | null;
  breakouts: BreakoutSummary;
  boundaries: number[];
  laps: LapStat[];
  overall: OverallStats;
  tempo: RaceTempoSummary;
  warnings: DataQualityWarning[];
};

const manualCoverageWarning = (rows: number, lapCount: number): DataQualityWarning => ({
  kind: 'mismatched-manual-data',
  message: `Manual measurements cover ${rows} of ${lapCount} laps; underwater fields are omitted for the rest.`,
  expected: lapCount,
  actual: rows,
});

/**
 * Runs the full pipeline over an already validated record. Throws `MissingRaceEventError`
 * when the stream has no `end` event.
 */
export const analyzeRaceRecord = (
  record: RaceRecord,
  config: AnalysisConfig = resolveAnalysisConfig(),
): RaceAnalysisReport => {
  const { context, events, manual } = record;

  const detection = detectLapBoundaries(events, context, config);
  const lapCount = countLaps(detection.boundaries);
  const warnings = [...detection.warnings];

  if (manual && manual.length < lapCount) {
    warnings.push(manualCoverageWarning(manual.length, lapCount));
  }

  const laps = calculateLapStats({
    events,
    boundaries: detection.boundaries,
    turnPairLaps: detection.turnPairLaps,
    manual,
    config,
  });
  const tempo = calculateStrokeTempo(events);
  const breakouts = summariseBreakouts(events);
  const waterEntry = findFirstEvent(events, 'water_entry');

  return {
    context,
    totalTime: roundTo2(detection.boundaries[detection.boundaries.length - 1]),
    waterEntryTime: waterEntry ? roundTo2(waterEntry.time) : null,
    breakouts: {
      times: breakouts.times.map(roundTo2),
      averageTime: breakouts.averageTime === null ? null : roundTo2(breakouts.averageTime),
    },
    boundaries: detection.boundaries.map(roundTo2),
    laps: laps.map(roundLapStat),
    overall: roundOverallStats(calculateOverallStats(laps)),
    tempo: {
      totalStrokes: tempo.totalStrokes,
      intervals: tempo.intervals.map(roundTo2),
      averageInterval: tempo.averageInterval === null ? null : roundTo2(tempo.averageInterval),
    },
    warnings,
  };
};

export class RaceAnalysisService {
  private readonly config: AnalysisConfig;

  constructor(
    private readonly source: RaceRecordSource,
    private readonly logger: Logger,
    config: Partial<AnalysisConfig> = {},
  ) {
    this.config = resolveAnalysisConfig(config);
  }

  async analyzeRace(raceId: string): Promise<RaceAnalysisReport> {
    const logger = this.logger.withContext({ raceId });
    const startedAt = Date.now();

    try {
      const record = parseRaceRecord(await this.source.load(raceId));
      const report = this.analyzeRecord(record, logger);

      logger.info('Race analysis completed.', {
        event: 'race.analysis.success',
        outcome: 'success',
        durationMs: Date.now() - startedAt,
        lapCount: report.laps.length,
        warningCount: report.warnings.length,
      });

      return report;
    } catch (error) {
      logger.error('Race analysis failed.', {
        event: 'race.analysis.failure',
        outcome: 'failure',
        durationMs: Date.now() - startedAt,
        error,
      });
      throw error;
    }
  }

  analyzeRecord(record: RaceRecord, logger: Logger = this.logger): RaceAnalysisReport {
    const report = analyzeRaceRecord(record, this.config);

    logger.debug('Lap boundaries detected.', {
      event: 'race.analysis.boundaries',
      stroke: record.context.stroke,
      distance: record.context.distance,
      boundaries: report.boundaries,
    });

    for (const warning of report.warnings) {
      logger.warn(warning.message, {
        event: 'race.analysis.data_quality',
        outcome: 'degraded',
        kind: warning.kind,
        expected: warning.expected,
        actual: warning.actual,
      });
    }

    return report;
  }
}
