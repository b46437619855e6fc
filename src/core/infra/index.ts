/**
 * File: src/core/infra/index.ts
 * Summary: Barrel exports for infrastructure adapters.
 */

export * from './files/jsonRaceFileSource';
export * from './logger/pinoLogger';
