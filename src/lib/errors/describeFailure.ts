import { RaceRecordNotFoundError, RaceRecordValidationError } from '@core/app';
import { MissingRaceEventError } from '@core/domain';

import { EnvironmentValidationError } from '@/config/environment';

/**
 * One-line explanation of why an analysis run stopped, naming the missing or broken artifact.
 */
export const describeFailure = (error: unknown, artifact: string): string => {
  if (error instanceof RaceRecordNotFoundError) {
    return `Race file not found: ${error.location}`;
  }

  if (error instanceof MissingRaceEventError) {
    return `No '${error.eventType}' event recorded in ${artifact}; lap metrics cannot be computed.`;
  }

  if (error instanceof RaceRecordValidationError) {
    const details = error.issues
      .map((issue) => `${issue.path || '<root>'}: ${issue.message}`)
      .join('; ');
    return `Invalid race record in ${artifact}: ${details}`;
  }

  if (error instanceof EnvironmentValidationError) {
    return `Invalid environment: ${error.issues.map((issue) => issue.message).join(' ')}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return typeof error === 'string' ? error : 'Unknown error';
};
