export * from './errors/raceRecordNotFoundError';
export * from './errors/raceRecordValidationError';
export * from './ports/logger';
export * from './ports/raceRecordSource';
export * from './services/analyzeRace';
export * from './services/raceSummary';
export * from './validation/raceRecordSchema';
