import type { RaceEventType } from './raceEvent';

export class MissingRaceEventError extends Error {
  constructor(public readonly eventType: RaceEventType) {
    super(`Race event stream is missing the '${eventType}' event.`);
    this.name = 'MissingRaceEventError';
  }
}

export class InvalidRaceDetailsError extends Error {
  constructor(
    public readonly input: string,
    reason: string,
  ) {
    super(`Invalid race details "${input}": ${reason}. Expected "Gender's Distance Stroke".`);
    this.name = 'InvalidRaceDetailsError';
  }
}
