import type { ManualMeasurements, RaceContext, RaceEvent } from '@core/domain';

/**
 * Everything captured for one swim: the key-press timeline plus the rows measured afterwards.
 */
export type RaceRecord = {
  context: RaceContext;
  events: RaceEvent[];
  manual?: ManualMeasurements;
};

export interface RaceRecordSource {
  /** Returns the raw, unvalidated record stored under `raceId`. */
  load(raceId: string): Promise<unknown>;
}
