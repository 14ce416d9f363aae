/**
 * Sensor aggregate. Owns the fixed channel set of a sensor kind, merges task scheduler metadata and the correlator
 * verdict into it, and renders the report.
 */

import { pino, type Logger } from 'pino';

import { CapacityError, InputValidationError } from '../errors.js';
import type { LogCorrelator } from '../log/correlator.js';
import { STACK_TRACE_SEPARATOR } from '../log/correlator.js';
import type { ChannelAttributes } from '../schemas/channel.js';
import type { SensorKind } from '../schemas/config.js';
import type { TaskMetadata } from '../schemas/task.js';
import { type Channel, createChannel } from './channel.js';
import { renderOkDocument, renderReport } from './render.js';

/** Names of the channels a sensor may reserve. */
export const ChannelNames = {
  HoursSinceLastRun: 'Hours Since Last Run',
  LastTaskResult: 'Last Task Result',
  TaskEnabled: 'Task Enabled',
  LastJobResult: 'Last Job Result',
} as const;

interface ChannelTemplate {
  name: string;
  attributes: ChannelAttributes;
}

const GENERIC_CHANNELS: readonly ChannelTemplate[] = [
  {
    name: ChannelNames.HoursSinceLastRun,
    attributes: { Unit: 'TimeHours', Float: '1' },
  },
  { name: ChannelNames.LastTaskResult, attributes: { Unit: 'Count' } },
  {
    name: ChannelNames.TaskEnabled,
    attributes: { ValueLookup: 'prtg.standardlookups.yesno.stateyesok' },
  },
];

/** Channel template per sensor kind; its length is the sensor's capacity. */
export const CHANNEL_TEMPLATES: Record<SensorKind, readonly ChannelTemplate[]> =
  {
    generic: GENERIC_CHANNELS,
    'scheduled-job-with-log': [
      ...GENERIC_CHANNELS,
      {
        name: ChannelNames.LastJobResult,
        attributes: {
          LimitMode: '1',
          LimitMaxError: '0',
          LimitMinError: '0',
          LimitErrorMsg: 'Last job run failed',
        },
      },
    ],
  };

const MS_PER_HOUR = 3_600_000;

/** Hours since a run: two decimals below one hour, whole hours from one hour up. */
export function elapsedHours(since: Date, now: Date): number {
  const hours = (now.getTime() - since.getTime()) / MS_PER_HOUR;
  return hours < 1 ? Math.round(hours * 100) / 100 : Math.round(hours);
}

/** Options for creating a sensor. */
export interface SensorOptions {
  /** Logger instance. */
  logger?: Logger;
}

/** Sensor aggregate interface. */
export interface Sensor {
  readonly name: string;
  readonly kind: SensorKind;
  /** Number of channel slots reserved by the kind. */
  readonly capacity: number;
  /** Add a channel, or return the existing one with that name. Fails once every slot is taken. */
  addChannel(name: string): Channel;
  /** Channel by name. */
  getChannel(name: string): Channel | undefined;
  /** Channels in slot order. */
  channels(): readonly Channel[];
  /** Apply configured attributes to named channels. */
  applyChannelAttributes(
    overrides: Readonly<Record<string, ChannelAttributes>>,
  ): void;
  /** Populate channels from task metadata and, for log sensors, the correlator verdict. */
  mergeTaskAndLogData(
    task: TaskMetadata,
    correlator?: LogCorrelator,
    now?: Date,
  ): void;
  /** Summary line for the merged data. */
  summary(): string;
  /** Render the report document. */
  render(): string;
}

/** Create a sensor whose channel set is fixed by its kind. */
export function createSensor(
  name: string,
  kind: SensorKind,
  options: SensorOptions = {},
): Sensor {
  if (name.trim() === '') {
    throw new InputValidationError('Sensor name must not be empty');
  }

  const logger = options.logger ?? pino({ level: 'silent' });
  const template = CHANNEL_TEMPLATES[kind];
  const capacity = template.length;
  const slots: Channel[] = [];
  const byName = new Map<string, Channel>();

  let task: TaskMetadata | undefined;
  let correlator: LogCorrelator | undefined;

  function failureSummary(
    merged: TaskMetadata,
    source: LogCorrelator,
  ): string {
    const detail = [
      source.getInnerExceptionMessage(),
      source.getInnerExceptionStackTrace(),
    ]
      .filter((part): part is string => part !== undefined && part !== '')
      .join(STACK_TRACE_SEPARATOR);
    const filename =
      source.getSecondaryFilename() ?? source.getInnerExceptionLogFilename();

    return `Task ${merged.displayName} failed with code ${String(source.getLastRunResult())}${
      detail === '' ? '' : `: ${detail}`
    } (inner exception log ${filename})`;
  }

  function successSummary(merged: TaskMetadata): string {
    const lastRun = merged.lastRunTime?.toISOString() ?? 'never';
    const nextRun = merged.nextRunTime?.toISOString() ?? 'not scheduled';
    return `Task ${merged.displayName} is ${merged.state}; last run ${lastRun} with result ${String(merged.lastResultCode)}; next run ${nextRun}`;
  }

  const sensor: Sensor = {
    name,
    kind,
    capacity,

    addChannel(channelName: string): Channel {
      const existing = byName.get(channelName);
      if (existing) return existing;

      if (slots.length >= capacity) {
        throw new CapacityError(
          `Sensor '${name}' (${kind}) has no free slot for channel '${channelName}'; all ${String(capacity)} are taken`,
        );
      }

      const channel = createChannel(channelName);
      slots.push(channel);
      byName.set(channelName, channel);
      return channel;
    },

    getChannel: (channelName) => byName.get(channelName),

    channels: () => slots,

    applyChannelAttributes(overrides): void {
      for (const [channelName, attributes] of Object.entries(overrides)) {
        const channel = byName.get(channelName);
        if (!channel) {
          throw new InputValidationError(
            `Sensor '${name}' (${kind}) has no channel '${channelName}'`,
          );
        }
        channel.setAttributes(attributes);
      }
    },

    mergeTaskAndLogData(
      merged: TaskMetadata,
      source?: LogCorrelator,
      now: Date = new Date(),
    ): void {
      if (kind === 'scheduled-job-with-log' && !source) {
        throw new InputValidationError(
          `Sensor '${name}' (${kind}) requires a log correlator`,
        );
      }

      task = merged;
      correlator = kind === 'scheduled-job-with-log' ? source : undefined;

      if (merged.lastRunTime) {
        sensor
          .addChannel(ChannelNames.HoursSinceLastRun)
          .setValue(elapsedHours(merged.lastRunTime, now));
      }
      sensor
        .addChannel(ChannelNames.LastTaskResult)
        .setValue(merged.lastResultCode);
      sensor
        .addChannel(ChannelNames.TaskEnabled)
        .setValue(merged.enabled ? 1 : 0);

      if (correlator) {
        sensor
          .addChannel(ChannelNames.LastJobResult)
          .setValue(correlator.getLastRunResult());
      }

      logger.debug(
        {
          sensor: name,
          channels: slots.map((channel) => [channel.name, channel.getValue()]),
        },
        'Merged task and log data',
      );
    },

    summary(): string {
      if (!task) return 'OK';
      if (!correlator || correlator.hasSucceeded()) return successSummary(task);
      return failureSummary(task, correlator);
    },

    render(): string {
      const populated = slots.filter((channel) => channel.hasValue());
      if (populated.length === 0) return renderOkDocument();
      return renderReport(
        populated.map((channel) => channel.render()),
        sensor.summary(),
      );
    },
  };

  for (const channel of template) {
    sensor.addChannel(channel.name).setAttributes(channel.attributes);
  }

  return sensor;
}
