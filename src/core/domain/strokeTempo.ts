import { collectStrokeTimes, type RaceEvent } from './raceEvent';

export type StrokeTempo = {
  totalStrokes: number;
  /** Seconds between consecutive strokes. */
  intervals: number[];
  averageInterval: number | null;
};

export const calculateStrokeTempo = (events: ReadonlyArray<RaceEvent>): StrokeTempo => {
  const strokeTimes = collectStrokeTimes(events);
  const intervals = strokeTimes.slice(1).map((time, index) => time - strokeTimes[index]);

  return {
    totalStrokes: strokeTimes.length,
    intervals,
    averageInterval:
      intervals.length > 0
        ? intervals.reduce((sum, interval) => sum + interval, 0) / intervals.length
        : null,
  };
};
