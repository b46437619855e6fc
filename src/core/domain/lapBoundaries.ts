import { DEFAULT_ANALYSIS_CONFIG, type AnalysisConfig } from './analysisConfig';
import type { DataQualityWarning } from './dataQuality';
import { MissingRaceEventError } from './raceErrors';
import {
  collectTurnEvents,
  findFirstEvent,
  type RaceContext,
  type RaceEvent,
  type Stroke,
  type TurnEvent,
  type TurnEventType,
} from './raceEvent';

export type LapBoundaryDetection = {
  /** Starts at 0, ends at the `end` event, strictly increasing. */
  boundaries: number[];
  /** 0-based lap indices whose closing wall contact is a turn_start/turn_end pair. */
  turnPairLaps: ReadonlySet<number>;
  warnings: DataQualityWarning[];
};

type StrategyInput = {
  turns: TurnEvent[];
  expectedTurns: number;
};

type StrategyResult = {
  times: number[];
  turnPairLaps: Set<number>;
  warnings: DataQualityWarning[];
};

type BoundaryStrategy = (input: StrategyInput) => StrategyResult;

type DistanceClass = 'any' | 'medley-100' | 'medley-200' | 'medley-400';

const MEDLEY_ORDER = ['butterfly', 'backstroke', 'breaststroke', 'freestyle'] as const;

const MEDLEY_LENGTHS_PER_SEGMENT: Record<number, number> = {
  100: 1,
  200: 2,
  400: 4,
};

const range = (count: number): number[] => Array.from({ length: Math.max(0, count) }, (_, i) => i);

const insufficientTurnsWarning = (
  expected: number,
  actual: number,
  source: string,
): DataQualityWarning => ({
  kind: 'insufficient-turn-events',
  message: `Expected ${expected} ${source} events but found ${actual}; lap count is reduced.`,
  expected,
  actual,
});

const boundariesFromTurnType = (
  type: TurnEventType,
  input: StrategyInput,
): { times: number[]; warnings: DataQualityWarning[] } => {
  const times = input.turns.filter((turn) => turn.type === type).map((turn) => turn.time);
  const warnings =
    times.length < input.expectedTurns
      ? [insufficientTurnsWarning(input.expectedTurns, times.length, type)]
      : [];

  return { times, warnings };
};

// Freestyle and backstroke touch the wall once; the push-off key press marks the boundary.
const singleTouchStrategy: BoundaryStrategy = (input) => ({
  ...boundariesFromTurnType('turn_end', input),
  turnPairLaps: new Set(),
});

// Breaststroke and butterfly start the turn with a two-hand touch.
const twoHandTouchStrategy: BoundaryStrategy = (input) => {
  const { times, warnings } = boundariesFromTurnType('turn_start', input);
  const lapCount = Math.max(times.length, input.expectedTurns) + 1;
  return { times, warnings, turnPairLaps: new Set(range(lapCount)) };
};

const takeChronological = (input: StrategyInput): { times: number[]; warnings: DataQualityWarning[] } => {
  const times = input.turns.slice(0, input.expectedTurns).map((turn) => turn.time);
  const warnings =
    times.length < input.expectedTurns
      ? [insufficientTurnsWarning(input.expectedTurns, times.length, 'turn')]
      : [];
  return { times, warnings };
};

const chronologicalStrategy: BoundaryStrategy = (input) => ({
  ...takeChronological(input),
  turnPairLaps: new Set(),
});

const medleyTurnPairLaps = (lengthsPerSegment: number): Set<number> => {
  const butterfly = range(lengthsPerSegment);
  const crossover = 2 * lengthsPerSegment - 1;
  const breaststroke = range(lengthsPerSegment).map((i) => 2 * lengthsPerSegment + i);
  return new Set([...butterfly, crossover, ...breaststroke]);
};

/**
 * Walks the sorted turns once, consuming the marker each length finishes on. Returns null when
 * the turns run out before every intermediate boundary is found.
 */
export const walkMedleyTurns = (
  turns: ReadonlyArray<TurnEvent>,
  lengthsPerSegment: number,
): number[] | null => {
  const expected = MEDLEY_ORDER.length * lengthsPerSegment - 1;
  const times: number[] = [];
  let cursor = 0;

  for (let length = 0; length < expected; length += 1) {
    const segment = MEDLEY_ORDER[Math.floor(length / lengthsPerSegment)];
    const wanted: TurnEventType =
      segment === 'butterfly' || segment === 'breaststroke' ? 'turn_start' : 'turn_end';

    while (cursor < turns.length && turns[cursor].type !== wanted) {
      cursor += 1;
    }

    if (cursor >= turns.length) {
      return null;
    }

    times.push(turns[cursor].time);
    cursor += 1;

    if (wanted === 'turn_start' && cursor < turns.length && turns[cursor].type === 'turn_end') {
      cursor += 1;
    }
  }

  return times;
};

const medleyStrategy =
  (lengthsPerSegment: number): BoundaryStrategy =>
  (input) => {
    const expectedTurns = MEDLEY_ORDER.length * lengthsPerSegment - 1;
    const turnPairLaps = medleyTurnPairLaps(lengthsPerSegment);
    const walked = walkMedleyTurns(input.turns, lengthsPerSegment);

    if (walked) {
      return { times: walked, turnPairLaps, warnings: [] };
    }

    const fallbackTurns = input.turns.slice(0, expectedTurns);
    const fallback = takeChronological({ turns: input.turns, expectedTurns });
    const fallbackWarning: DataQualityWarning = {
      kind: 'turn-pattern-fallback',
      message:
        'Turn markers do not follow the medley pattern; using the first turn events in time order.',
      expected: expectedTurns,
      actual: input.turns.length,
    };

    // A lap only carries a turn time when its closing wall contact opens a turn pair.
    const fallbackPairLaps = new Set(
      fallbackTurns.flatMap((turn, index) => (turn.type === 'turn_start' ? [index] : [])),
    );

    return {
      times: fallback.times,
      turnPairLaps: fallbackPairLaps,
      warnings: [fallbackWarning, ...fallback.warnings],
    };
  };

const BOUNDARY_STRATEGIES = new Map<`${Stroke}:${DistanceClass}`, BoundaryStrategy>([
  ['freestyle:any', singleTouchStrategy],
  ['backstroke:any', singleTouchStrategy],
  ['breaststroke:any', twoHandTouchStrategy],
  ['butterfly:any', twoHandTouchStrategy],
  ['im:any', chronologicalStrategy],
  ['im:medley-100', medleyStrategy(MEDLEY_LENGTHS_PER_SEGMENT[100])],
  ['im:medley-200', medleyStrategy(MEDLEY_LENGTHS_PER_SEGMENT[200])],
  ['im:medley-400', medleyStrategy(MEDLEY_LENGTHS_PER_SEGMENT[400])],
]);

const classifyDistance = (context: RaceContext): DistanceClass => {
  if (context.stroke !== 'im') {
    return 'any';
  }

  switch (context.distance) {
    case 100:
      return 'medley-100';
    case 200:
      return 'medley-200';
    case 400:
      return 'medley-400';
    default:
      return 'any';
  }
};

export const resolveBoundaryStrategy = (context: RaceContext): BoundaryStrategy =>
  BOUNDARY_STRATEGIES.get(`${context.stroke}:${classifyDistance(context)}`) ??
  chronologicalStrategy;

export const expectedTurnCount = (distance: number, poolLength: number): number =>
  Math.max(0, Math.round(distance / poolLength) - 1);

/**
 * Sorts the candidate times, drops those outside the race and collapses near-duplicates into
 * the earlier one. The end time always survives when it is after 0.
 */
export const finaliseBoundaries = (
  candidates: ReadonlyArray<number>,
  endTime: number,
  debounceSeconds: number,
): number[] => {
  const intermediate = candidates
    .filter((time) => time > 0 && time < endTime)
    .sort((left, right) => left - right);

  const kept = [0];
  for (const time of intermediate) {
    if (time - kept[kept.length - 1] >= debounceSeconds) {
      kept.push(time);
    }
  }

  while (kept.length > 1 && endTime - kept[kept.length - 1] < debounceSeconds) {
    kept.pop();
  }

  if (endTime > kept[kept.length - 1]) {
    kept.push(endTime);
  }

  return kept;
};

export const countLaps = (boundaries: ReadonlyArray<number>): number =>
  Math.max(0, boundaries.length - 1);

export const detectLapBoundaries = (
  events: ReadonlyArray<RaceEvent>,
  context: RaceContext,
  config: AnalysisConfig = DEFAULT_ANALYSIS_CONFIG,
): LapBoundaryDetection => {
  const endEvent = findFirstEvent(events, 'end');
  if (!endEvent) {
    throw new MissingRaceEventError('end');
  }

  const strategy = resolveBoundaryStrategy(context);
  const result = strategy({
    turns: collectTurnEvents(events),
    expectedTurns: expectedTurnCount(context.distance, config.poolLength),
  });

  return {
    boundaries: finaliseBoundaries(result.times, endEvent.time, config.debounceSeconds),
    turnPairLaps: result.turnPairLaps,
    warnings: result.warnings,
  };
};
