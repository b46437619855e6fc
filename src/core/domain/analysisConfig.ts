/**
 * Tunables for lap segmentation and the underwater/overwater split.
 * Defaults assume a short-course yards pool.
 */
export type AnalysisConfig = {
  /** Length of one pool traversal. */
  poolLength: number;
  /** Distance covered by the reach into the wall, excluded from the overwater distance. */
  handTouchAllowance: number;
  /** Boundaries closer than this many seconds collapse into the earlier one. */
  debounceSeconds: number;
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  poolLength: 25,
  handTouchAllowance: 0.5,
  debounceSeconds: 0.1,
};

export const resolveAnalysisConfig = (overrides: Partial<AnalysisConfig> = {}): AnalysisConfig => ({
  ...DEFAULT_ANALYSIS_CONFIG,
  ...overrides,
});
