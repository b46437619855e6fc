import { InvalidRaceDetailsError } from './raceErrors';
import { GENDERS, STROKES, type Gender, type Stroke } from './raceEvent';

export const RACE_DISTANCES = [50, 100, 200, 400, 500, 1000, 1650] as const;

export type RaceDistance = (typeof RACE_DISTANCES)[number];

export type RaceDetails = {
  gender: Gender;
  distance: RaceDistance;
  stroke: Stroke;
};

const isGender = (value: string): value is Gender =>
  GENDERS.some((gender) => gender === value);

const isStroke = (value: string): value is Stroke =>
  STROKES.some((stroke) => stroke === value);

const isRaceDistance = (value: number): value is RaceDistance =>
  RACE_DISTANCES.some((distance) => distance === value);

/**
 * Parses labels such as `Men's 50 Freestyle` or `Women's 400 IM`.
 */
export const parseRaceDetails = (input: string): RaceDetails => {
  const parts = input.trim().split(/\s+/);
  if (parts.length < 3) {
    throw new InvalidRaceDetailsError(input, 'expected gender, distance and stroke');
  }

  const [genderPart, distancePart, ...strokeParts] = parts;

  const gender = genderPart.toLowerCase().replace(/['’]s$/, '');
  if (!isGender(gender)) {
    throw new InvalidRaceDetailsError(input, `unknown gender "${genderPart}"`);
  }

  const distance = Number(distancePart);
  if (!/^\d+$/.test(distancePart) || !isRaceDistance(distance)) {
    throw new InvalidRaceDetailsError(input, `unsupported distance "${distancePart}"`);
  }

  const stroke = strokeParts.join(' ').toLowerCase();
  if (!isStroke(stroke)) {
    throw new InvalidRaceDetailsError(input, `unknown stroke "${strokeParts.join(' ')}"`);
  }

  return { gender, distance, stroke };
};
