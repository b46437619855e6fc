import { type RaceEvent } from './raceEvent';

export type BreakoutSummary = {
  /** Race-clock times of each `breakout` key press, in order. */
  times: number[];
  averageTime: number | null;
};

export const summariseBreakouts = (events: ReadonlyArray<RaceEvent>): BreakoutSummary => {
  const times = events
    .filter((event) => event.type === 'breakout')
    .map((event) => event.time)
    .sort((left, right) => left - right);

  return {
    times,
    averageTime: times.length > 0 ? times.reduce((sum, time) => sum + time, 0) / times.length : null,
  };
};
