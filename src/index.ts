/**
 * Public API exports for job-health-probe.
 *
 * @module
 */

// Schemas
export type { ChannelAttribute, ChannelAttributes } from './schemas/channel.js';
export { channelAttributeSchema } from './schemas/channel.js';
export type {
  JobLogConfig,
  ProbeConfig,
  ProbeConfigInput,
  SensorKind,
} from './schemas/config.js';
export { probeConfigSchema, sensorKindSchema } from './schemas/config.js';
export type { EventRecord } from './schemas/event.js';
export { END_EVENT_ID, START_EVENT_ID } from './schemas/event.js';
export type { TaskMetadata, TaskState } from './schemas/task.js';
export { taskMetadataSchema } from './schemas/task.js';

// Errors
export {
  CapacityError,
  CorrelatorStateError,
  InputValidationError,
  MalformedLogError,
  MandatoryEvidenceMissingError,
  MultipleMatchError,
  NoRunRecordedError,
  ProbeError,
  TransportError,
} from './errors.js';

// Event logs
export type { LogCorrelator, RunEvidence, Verdict } from './log/correlator.js';
export {
  createLogCorrelator,
  innerExceptionLogFilename,
  LastRunResult,
  transition,
} from './log/correlator.js';
export { importExceptionContent, repairExceptionLines } from './log/importer.js';
export { parseEventLog } from './log/parser.js';

// Sensor
export type { Channel } from './sensor/channel.js';
export { createChannel } from './sensor/channel.js';
export { renderErrorDocument } from './sensor/render.js';
export type { Sensor } from './sensor/sensor.js';
export { ChannelNames, createSensor } from './sensor/sensor.js';

// Collaborators
export type {
  Collaborators,
  FileSource,
  TaskIdentity,
  TaskSource,
} from './collectors/types.js';
export { createFileSource } from './collectors/file-source.js';
export { createScheduledTaskSource } from './collectors/scheduled-task.js';

// Probe
export type { Probe, ProbeDeps, ProbeOutcome } from './probe.js';
export { createProbe, resolveInnerException } from './probe.js';
export { loadConfig } from './lib/config.js';
