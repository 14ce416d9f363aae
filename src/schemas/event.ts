/**
 * Event record schema and types.
 *
 * @module
 */

import { z } from 'zod';

/** Event id written by a job when a run starts. */
export const START_EVENT_ID = 200;
/** Event id written by a job when a run completes. */
export const END_EVENT_ID = 201;

/** Empty elements parse as '' and mean "absent". */
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const optionalInteger = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.trim() === '') return undefined;
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected an integer, received '${value}'`,
      });
      return z.NEVER;
    }
    return parsed;
  });

const requiredInteger = z
  .string()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform((value) => Number(value));

/** Schema for one `<Event>` element as produced by the XML parser. */
export const rawEventSchema = z.object({
  /** Record id, increasing within one log. */
  RecordId: requiredInteger,
  /** Event id (200 start, 201 end, anything else informational/error). */
  EventId: requiredInteger,
  /** Emitting component; the namespace leaf for start events. */
  Source: z.string().default(''),
  /** Token linking a run's start, end and exception events. */
  CorrelationId: z.string().default(''),
  /** Timestamp as written by the job. */
  Timestamp: z.string().default(''),
  /** Error code of an exception record. */
  ErrorCode: optionalInteger,
  /** Free-text message. */
  Message: optionalText,
  /** Serialized data object attached to an exception record. */
  DataObject: optionalText,
});

/** Event record with normalized field names. */
export const eventRecordSchema = rawEventSchema.transform((raw) => ({
  recordId: raw.RecordId,
  eventId: raw.EventId,
  source: raw.Source,
  correlationId: raw.CorrelationId,
  timestamp: raw.Timestamp,
  errorCode: raw.ErrorCode,
  message: raw.Message,
  dataObject: raw.DataObject,
}));

/** One entry of a job event log. */
export type EventRecord = z.infer<typeof eventRecordSchema>;
