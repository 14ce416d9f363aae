/**
 * Scheduled task metadata schema and types.
 *
 * @module
 */

import { z } from 'zod';

/** Task scheduler states. */
export const taskStateSchema = z.enum([
  'Unknown',
  'Disabled',
  'Queued',
  'Ready',
  'Running',
]);

/** The scheduler reports 1999-11-30 for tasks that never ran. */
const NEVER_RAN_BEFORE = Date.UTC(2000, 0, 1);

const schedulerTimeSchema = z
  .string()
  .nullable()
  .optional()
  .transform((value, ctx) => {
    if (value === null || value === undefined || value === '') return null;
    const time = Date.parse(value);
    if (Number.isNaN(time)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid timestamp '${value}'`,
      });
      return z.NEVER;
    }
    return time < NEVER_RAN_BEFORE ? null : new Date(time);
  });

/** One task as printed by the scheduler query. */
export const taskQueryRecordSchema = z.object({
  /** Task name within its folder. */
  taskName: z.string().min(1),
  /** Task folder, with leading and trailing backslash. */
  taskPath: z.string().default('\\'),
  /** Scheduler state. */
  state: taskStateSchema,
  /** Start of the last run (ISO 8601), null if never run. */
  lastRunTime: schedulerTimeSchema,
  /** Result code of the last run, as reported by the scheduler. */
  lastTaskResult: z.number().int(),
  /** Next scheduled start (ISO 8601), null if none. */
  nextRunTime: schedulerTimeSchema,
});

/** Normalized task metadata. */
export const taskMetadataSchema = taskQueryRecordSchema.transform((raw) => ({
  taskName: raw.taskName,
  taskPath: raw.taskPath,
  displayName: `${raw.taskPath}${raw.taskName}`,
  state: raw.state,
  enabled: raw.state !== 'Disabled',
  lastRunTime: raw.lastRunTime,
  lastResultCode: raw.lastTaskResult,
  nextRunTime: raw.nextRunTime,
}));

export type TaskState = z.infer<typeof taskStateSchema>;
export type TaskMetadata = z.infer<typeof taskMetadataSchema>;
