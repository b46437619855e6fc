export const RACE_EVENT_TYPES = [
  'start',
  'water_entry',
  'stroke',
  'turn_start',
  'turn_end',
  'breakout',
  'end',
] as const;

export type RaceEventType = (typeof RACE_EVENT_TYPES)[number];

export type TurnEventType = Extract<RaceEventType, 'turn_start' | 'turn_end'>;

/**
 * A single key press captured during the race, in seconds since the start signal.
 */
export type RaceEvent = {
  type: RaceEventType;
  time: number;
};

export type TurnEvent = RaceEvent & { type: TurnEventType };

export const STROKES = ['freestyle', 'backstroke', 'breaststroke', 'butterfly', 'im'] as const;

export type Stroke = (typeof STROKES)[number];

export const GENDERS = ['men', 'women'] as const;

export type Gender = (typeof GENDERS)[number];

export type RaceContext = Readonly<{
  stroke: Stroke;
  distance: number;
  gender?: Gender;
  session?: string;
  swimmer?: string;
  relay: boolean;
}>;

/**
 * Values measured by hand after the race, one row per lap.
 * `breakoutTime` and `fifteenTime` are absolute race times.
 */
export type ManualLapMeasurement = {
  breakoutTime: number;
  breakoutDistance: number;
  fifteenTime?: number;
};

export type ManualMeasurements = ReadonlyArray<ManualLapMeasurement>;

export const isTurnEvent = (event: RaceEvent): event is TurnEvent =>
  event.type === 'turn_start' || event.type === 'turn_end';

export const sortByTime = <T extends RaceEvent>(events: ReadonlyArray<T>): T[] =>
  [...events].sort((left, right) => left.time - right.time);

export const findFirstEvent = (
  events: ReadonlyArray<RaceEvent>,
  type: RaceEventType,
): RaceEvent | undefined => events.find((event) => event.type === type);

export const collectTurnEvents = (events: ReadonlyArray<RaceEvent>): TurnEvent[] =>
  sortByTime(events.filter(isTurnEvent));

export const collectStrokeTimes = (events: ReadonlyArray<RaceEvent>): number[] =>
  events
    .filter((event) => event.type === 'stroke')
    .map((event) => event.time)
    .sort((left, right) => left - right);
