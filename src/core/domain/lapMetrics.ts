import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from './analysisConfig';
import {
  collectStrokeTimes,
  collectTurnEvents,
  findFirstEvent,
  type ManualLapMeasurement,
  type ManualMeasurements,
  type RaceEvent,
  type TurnEvent,
} from './raceEvent';

export type LapStat = {
  /** 1-based lap number. */
  lap: number;
  lapTime: number;
  turnTime?: number;
  strokeToWall?: number;
  strokeCount: number;
  strokesPerSecond: number;
  breakoutTimeRel?: number;
  breakoutDistance?: number;
  underwaterSpeed?: number;
  overwaterSpeed?: number;
  breakoutToFifteen?: number;
  fifteenToTurn?: number;
};

export type LapStatField = Exclude<keyof LapStat, 'lap'>;

/** Field order used wherever laps are tabulated or averaged. */
export const LAP_STAT_FIELDS: ReadonlyArray<LapStatField> = [
  'lapTime',
  'turnTime',
  'strokeToWall',
  'strokeCount',
  'strokesPerSecond',
  'breakoutTimeRel',
  'breakoutDistance',
  'underwaterSpeed',
  'overwaterSpeed',
  'breakoutToFifteen',
  'fifteenToTurn',
];

export const LAP_STAT_LABELS: Record<LapStatField, string> = {
  lapTime: 'Lap Time',
  turnTime: 'Turn Time',
  strokeToWall: 'Stroke To Wall',
  strokeCount: 'Stroke Count',
  strokesPerSecond: 'Strokes Per Second',
  breakoutTimeRel: 'Breakout Time',
  breakoutDistance: 'Breakout Distance',
  underwaterSpeed: 'Underwater Speed',
  overwaterSpeed: 'Overwater Speed',
  breakoutToFifteen: 'Breakout To Fifteen',
  fifteenToTurn: 'Fifteen To Turn',
};

export type TurnPair = {
  start: number;
  end: number;
};

export type CalculateLapStatsInput = {
  events: ReadonlyArray<RaceEvent>;
  boundaries: ReadonlyArray<number>;
  turnPairLaps: ReadonlySet<number>;
  manual?: ManualMeasurements;
  config?: AnalysisConfig;
};

type LapWindow = {
  index: number;
  start: number;
  end: number;
};

export const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

const safeDivide = (numerator: number, denominator: number): number =>
  denominator > 0 ? numerator / denominator : 0;

/**
 * Pairs each turn_start with the turn_end that immediately follows it in time order.
 * Unpaired markers are ignored.
 */
export const matchTurnPairs = (turns: ReadonlyArray<TurnEvent>): TurnPair[] => {
  const pairs: TurnPair[] = [];
  let cursor = 0;

  while (cursor < turns.length - 1) {
    const current = turns[cursor];
    const next = turns[cursor + 1];

    if (current.type === 'turn_start' && next.type === 'turn_end') {
      pairs.push({ start: current.time, end: next.time });
      cursor += 2;
      continue;
    }

    cursor += 1;
  }

  return pairs;
};

const belongsToLap = (pair: TurnPair, window: LapWindow): boolean =>
  (pair.start > window.start && pair.start <= window.end) ||
  (pair.start !== window.start && pair.start <= window.end && window.end <= pair.end);

const strokesInWindow = (strokeTimes: ReadonlyArray<number>, window: LapWindow): number[] =>
  strokeTimes.filter((time) => time >= window.start && time < window.end);

const calculateStrokeToWall = (
  lapStrokes: ReadonlyArray<number>,
  turns: ReadonlyArray<TurnEvent>,
  window: LapWindow,
): number | undefined => {
  if (lapStrokes.length === 0) {
    return undefined;
  }

  const lastStroke = lapStrokes[lapStrokes.length - 1];
  const wallContact = turns.find((turn) => turn.time > lastStroke && turn.time <= window.end);
  return (wallContact?.time ?? window.end) - lastStroke;
};

const calculateManualFields = (
  measurement: ManualLapMeasurement,
  lapStrokes: ReadonlyArray<number>,
  window: LapWindow,
  underwaterStart: number,
  config: AnalysisConfig,
): Partial<LapStat> => {
  const { breakoutTime, breakoutDistance, fifteenTime } = measurement;
  const breakoutTimeRel = breakoutTime - underwaterStart;

  const overwaterDistance = config.poolLength - breakoutDistance - config.handTouchAllowance;
  const strokesAfterBreakout = lapStrokes.filter((time) => time > breakoutTime);
  const overwaterEnd =
    strokesAfterBreakout.length > 0
      ? strokesAfterBreakout[strokesAfterBreakout.length - 1]
      : window.end;
  const overwaterTime = overwaterEnd - breakoutTime;

  const fields: Partial<LapStat> = {
    breakoutTimeRel,
    breakoutDistance,
    underwaterSpeed: safeDivide(breakoutDistance, breakoutTimeRel),
    overwaterSpeed: safeDivide(overwaterDistance, overwaterTime),
  };

  if (typeof fifteenTime === 'number') {
    fields.breakoutToFifteen = fifteenTime - breakoutTime;
    fields.fifteenToTurn = window.end - fifteenTime;
  }

  return fields;
};

/**
 * Derives per-lap statistics at full precision. Fields whose inputs are missing are left off
 * the record rather than set to zero.
 */
export const calculateLapStats = (input: CalculateLapStatsInput): LapStat[] => {
  const { events, boundaries, turnPairLaps, manual } = input;
  const config = input.config ?? DEFAULT_ANALYSIS_CONFIG;

  const strokeTimes = collectStrokeTimes(events);
  const turns = collectTurnEvents(events);
  const turnPairs = matchTurnPairs(turns);
  const waterEntry = findFirstEvent(events, 'water_entry');

  const laps: LapStat[] = [];

  for (let index = 0; index < boundaries.length - 1; index += 1) {
    const window: LapWindow = { index, start: boundaries[index], end: boundaries[index + 1] };
    const lapStrokes = strokesInWindow(strokeTimes, window);
    const measurement = manual && index < manual.length ? manual[index] : undefined;

    const swimStart =
      measurement?.breakoutTime ?? (lapStrokes.length > 0 ? lapStrokes[0] : undefined);
    const strokesPerSecond =
      typeof swimStart === 'number' ? safeDivide(lapStrokes.length, window.end - swimStart) : 0;

    const lap: LapStat = {
      lap: index + 1,
      lapTime: window.end - window.start,
      strokeCount: lapStrokes.length,
      strokesPerSecond,
    };

    if (turnPairLaps.has(index)) {
      const pair = turnPairs.find((candidate) => belongsToLap(candidate, window));
      if (pair) {
        lap.turnTime = pair.end - pair.start;
      }
    }

    const strokeToWall = calculateStrokeToWall(lapStrokes, turns, window);
    if (typeof strokeToWall === 'number') {
      lap.strokeToWall = strokeToWall;
    }

    if (measurement) {
      const underwaterStart = index === 0 ? (waterEntry?.time ?? 0) : window.start;
      Object.assign(
        lap,
        calculateManualFields(measurement, lapStrokes, window, underwaterStart, config),
      );
    }

    laps.push(lap);
  }

  return laps;
};

export const roundLapStat = (lap: LapStat): LapStat => {
  const rounded: LapStat = { ...lap };

  for (const field of LAP_STAT_FIELDS) {
    const value = lap[field];
    if (typeof value === 'number') {
      rounded[field] = roundTo2(value);
    }
  }

  return rounded;
};
