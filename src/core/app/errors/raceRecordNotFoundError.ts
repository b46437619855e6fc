export class RaceRecordNotFoundError extends Error {
  constructor(public readonly location: string) {
    super(`Race record not found at ${location}.`);
    this.name = 'RaceRecordNotFoundError';
  }
}
