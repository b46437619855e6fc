import { LAP_STAT_FIELDS, LAP_STAT_LABELS, roundTo2, type LapStat } from './lapMetrics';

export type OverallStats = Record<string, number>;

export const averageKey = (label: string): string => `Average ${label}`;

/**
 * Averages each field over the laps that carry it. A field missing from a lap does not count
 * towards its mean.
 */
export const calculateOverallStats = (laps: ReadonlyArray<LapStat>): OverallStats => {
  const overall: OverallStats = {};

  for (const field of LAP_STAT_FIELDS) {
    const values = laps
      .map((lap) => lap[field])
      .filter((value): value is number => typeof value === 'number');

    if (values.length === 0) {
      continue;
    }

    const total = values.reduce((sum, value) => sum + value, 0);
    overall[averageKey(LAP_STAT_LABELS[field])] = total / values.length;
  }

  return overall;
};

export const roundOverallStats = (overall: OverallStats): OverallStats =>
  Object.fromEntries(Object.entries(overall).map(([key, value]) => [key, roundTo2(value)]));
