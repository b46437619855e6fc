export type DataQualityWarningKind =
  | 'insufficient-turn-events'
  | 'turn-pattern-fallback'
  | 'mismatched-manual-data';

/**
 * Non-fatal gap in the captured data. The analysis still completes, with fewer laps or fewer
 * fields than a clean capture would give.
 */
export type DataQualityWarning = {
  kind: DataQualityWarningKind;
  message: string;
  expected?: number;
  actual?: number;
};
