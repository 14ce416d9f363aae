/**
 * Probe configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

import { channelAttributesSchema } from './channel.js';

/** Sensor kinds, each reserving a fixed channel set. */
export const sensorKindSchema = z.enum(['generic', 'scheduled-job-with-log']);

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal, silent). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('warn'),
  /** Optional log file path. Logs go to stderr otherwise. */
  file: z.string().optional(),
});

/** Scheduled task identity sub-schema. */
const taskSchema = z.object({
  /** Host running the task scheduler. */
  host: z.string().min(1).default('localhost'),
  /** Task folder. */
  path: z.string().min(1).default('\\'),
  /** Task name. */
  name: z.string().min(1),
});

/** Task scheduler query sub-schema. */
const taskQuerySchema = z.object({
  /** PowerShell executable used to query the task scheduler. */
  command: z.string().min(1).default('powershell.exe'),
  /** Query timeout in milliseconds. */
  timeoutMs: z.number().int().positive().default(60000),
});

/** Sensor sub-schema. */
const sensorSchema = z.object({
  /** Sensor name. Defaults to the task name. */
  name: z.string().min(1).optional(),
  /** Sensor kind. */
  kind: sensorKindSchema.default('scheduled-job-with-log'),
});

/** Job event log sub-schema. */
const jobLogSchema = z.object({
  /** Dotted job namespace; its last segment is the source of start events. */
  namespace: z.string().min(1),
  /** Directory (local or UNC share) holding the job's event logs. */
  directory: z.string().min(1),
  /** Primary event log file name. Defaults to `{namespace}.xml`. */
  primaryFile: z.string().min(1).optional(),
});

/** Full probe configuration schema. Validates and provides defaults. */
export const probeConfigSchema = z
  .object({
    /** Logging configuration. */
    log: logSchema.default({ level: 'warn' }),
    /** Scheduled task identity. */
    task: taskSchema,
    /** Task scheduler query settings. */
    taskQuery: taskQuerySchema.default({}),
    /** Sensor settings. */
    sensor: sensorSchema.default({}),
    /** Job event log location; required for scheduled-job-with-log sensors. */
    jobLog: jobLogSchema.optional(),
    /** Attribute overrides keyed by channel name. */
    channels: z.record(z.string().min(1), channelAttributesSchema).default({}),
  })
  .superRefine((config, ctx) => {
    if (config.sensor.kind === 'scheduled-job-with-log' && !config.jobLog) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['jobLog'],
        message: 'jobLog is required for scheduled-job-with-log sensors',
      });
    }
  });

/** Configuration as read from a file, before defaults. */
export type ProbeConfigInput = z.input<typeof probeConfigSchema>;
/** Inferred probe configuration type. */
export type ProbeConfig = z.infer<typeof probeConfigSchema>;
export type SensorKind = z.infer<typeof sensorKindSchema>;
export type JobLogConfig = z.infer<typeof jobLogSchema>;
