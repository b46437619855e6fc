/**
 * File: src/core/domain/index.ts
 * Summary: Barrel exports for the race analysis domain model.
 */

export * from './analysisConfig';
export * from './breakouts';
export * from './dataQuality';
export * from './lapBoundaries';
export * from './lapMetrics';
export * from './overallStats';
export * from './raceDetails';
export * from './raceErrors';
export * from './raceEvent';
export * from './strokeTempo';
