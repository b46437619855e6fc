import {
  GENDERS,
  InvalidRaceDetailsError,
  RACE_EVENT_TYPES,
  STROKES,
  parseRaceDetails,
  sortByTime,
  type RaceContext,
} from '@core/domain';
import { z } from 'zod';

import { RaceRecordValidationError } from '../errors/raceRecordValidationError';
import type { RaceRecord } from '../ports/raceRecordSource';

const seconds = z
  .number({ invalid_type_error: 'must be a number of seconds' })
  .finite()
  .nonnegative();

export const raceEventSchema = z.object({
  type: z.enum(RACE_EVENT_TYPES),
  time: seconds,
});

const contextMetadataSchema = z.object({
  session: z.string().trim().min(1).optional(),
  swimmer: z.string().trim().min(1).optional(),
  relay: z.boolean().default(false),
});

const explicitContextSchema = contextMetadataSchema.extend({
  stroke: z.enum(STROKES),
  distance: z.number().int().positive(),
  gender: z.enum(GENDERS).optional(),
});

// `{ "race": "Women's 200 IM" }` is accepted in place of stroke, distance and gender.
const labelledContextSchema = contextMetadataSchema
  .extend({ race: z.string().trim().min(1) })
  .transform((value, ctx) => {
    const { race, ...metadata } = value;
    try {
      return { ...metadata, ...parseRaceDetails(race) };
    } catch (error) {
      if (error instanceof InvalidRaceDetailsError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['race'], message: error.message });
        return z.NEVER;
      }
      throw error;
    }
  });

export const raceContextSchema = z.union([explicitContextSchema, labelledContextSchema]);

export const manualMeasurementSchema = z.object({
  breakoutTime: seconds,
  breakoutDistance: z.number({ invalid_type_error: 'must be a distance' }).finite().nonnegative(),
  fifteenTime: seconds.optional(),
});

export const raceRecordSchema = z
  .object({
    context: raceContextSchema,
    events: z.array(raceEventSchema),
    manual: z.array(manualMeasurementSchema).optional(),
  })
  .superRefine((record, ctx) => {
    const starts = record.events.filter((event) => event.type === 'start');
    const ends = record.events.filter((event) => event.type === 'end');

    if (starts.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['events'],
        message: 'must contain at most one start event',
      });
    }

    if (starts.some((event) => event.time !== 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['events'],
        message: 'start event must be at time 0',
      });
    }

    if (ends.length > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['events'],
        message: 'must contain at most one end event',
      });
    }
  });

export const normaliseZodIssues = (issues: z.ZodIssue[]) =>
  issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));

/**
 * Validates an untrusted record and returns it with events in time order.
 */
export const parseRaceRecord = (value: unknown): RaceRecord => {
  const result = raceRecordSchema.safeParse(value);

  if (!result.success) {
    throw new RaceRecordValidationError(normaliseZodIssues(result.error.issues));
  }

  const context: RaceContext = result.data.context;
  const record: RaceRecord = { context, events: sortByTime(result.data.events) };

  if (result.data.manual) {
    record.manual = result.data.manual;
  }

  return record;
};
