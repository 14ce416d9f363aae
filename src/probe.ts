/**
 * Probe orchestrator. Wires collaborators, correlator and sensor for one invocation and renders exactly one
 * document: the sensor report, or an error report if anything failed.
 */

import pino, { type Logger } from 'pino';

import { createFileSource } from './collectors/file-source.js';
import { createScheduledTaskSource } from './collectors/scheduled-task.js';
import type { Collaborators, FileSource, TaskIdentity } from './collectors/types.js';
import { formatIdentity } from './collectors/types.js';
import {
  errorMessage,
  MalformedLogError,
  MandatoryEvidenceMissingError,
  ProbeError,
} from './errors.js';
import { createLogCorrelator, type LogCorrelator } from './log/correlator.js';
import type { JobLogConfig, ProbeConfig } from './schemas/config.js';
import { renderErrorDocument } from './sensor/render.js';
import { createSensor } from './sensor/sensor.js';

/** Result of one probe invocation. */
export interface ProbeOutcome {
  /** False when the document is an error report. */
  ok: boolean;
  /** Rendered report. */
  document: string;
}

/** Probe dependencies. */
export interface ProbeDeps {
  /** Logger instance. Defaults to one built from `config.log`. */
  logger?: Logger;
  /** Collaborators. Defaults to the PowerShell task source and a file source over `jobLog.directory`. */
  collaborators?: Collaborators;
}

/** Probe interface. */
export interface Probe {
  /** Run the probe once. Never rejects; failures are rendered as an error report. */
  run(now?: Date): Promise<ProbeOutcome>;
}

/** Create the probe logger. Logs go to stderr so stdout carries only the report. */
export function createProbeLogger(config: ProbeConfig['log']): Logger {
  return config.file
    ? pino({
        level: config.level,
        transport: {
          target: 'pino/file',
          options: { destination: config.file },
        },
      })
    : pino({ level: config.level }, pino.destination(2));
}

/** Default collaborators for a config. */
export function createDefaultCollaborators(
  config: ProbeConfig,
  logger: Logger,
): Collaborators {
  return {
    tasks: createScheduledTaskSource({
      command: config.taskQuery.command,
      timeoutMs: config.taskQuery.timeoutMs,
      logger,
    }),
    files: createFileSource({ root: config.jobLog?.directory, logger }),
    close: () => Promise.resolve(),
  };
}

/** Primary event log file name for a job log config. */
export function primaryLogFilename(jobLog: JobLogConfig): string {
  return jobLog.primaryFile ?? `${jobLog.namespace}.xml`;
}

/**
 * Consult the inner exception log when the correlator still needs it. After a preliminary failure the log is
 * mandatory; after a preliminary success its absence, or a correlation id that names no log, confirms the result.
 * A failed read is never taken for absence.
 */
export async function resolveInnerException(
  correlator: LogCorrelator,
  files: FileSource,
  logger: Logger,
): Promise<void> {
  correlator.getLastRunResult();
  if (!correlator.innerExceptionRequired()) return;

  const preliminaryFailure =
    correlator.getVerdict().state === 'preliminary-failure';

  let filename: string;
  try {
    filename = correlator.getInnerExceptionLogFilename();
  } catch (error) {
    if (preliminaryFailure || !(error instanceof MalformedLogError)) throw error;
    logger.warn(
      { namespace: correlator.namespace, err: error },
      'Inner exception log name unavailable; confirming completed run',
    );
    correlator.confirmLastRunResult();
    return;
  }

  logger.info(
    { namespace: correlator.namespace, filename, mandatory: preliminaryFailure },
    'Checking inner exception log',
  );

  const lines = await files.fetchFileLines(filename);
  if (lines === null) {
    if (preliminaryFailure) {
      throw new MandatoryEvidenceMissingError(
        `Last run of ${correlator.namespace} failed and its inner exception log ${filename} was not found`,
      );
    }
    correlator.confirmLastRunResult();
    return;
  }

  correlator.importInnerException(lines);
}

/** Create a probe for a validated config. */
export function createProbe(config: ProbeConfig, deps: ProbeDeps = {}): Probe {
  const logger = deps.logger ?? createProbeLogger(config.log);
  const identity: TaskIdentity = {
    host: config.task.host,
    path: config.task.path,
    name: config.task.name,
  };

  async function collect(
    collaborators: Collaborators,
    now: Date,
  ): Promise<string> {
    const sensor = createSensor(
      config.sensor.name ?? config.task.name,
      config.sensor.kind,
      { logger },
    );
    sensor.applyChannelAttributes(config.channels);

    const task = await collaborators.tasks.fetchTaskMetadata(identity);
    logger.debug(
      { task: task.displayName, state: task.state, lastResultCode: task.lastResultCode },
      'Task metadata fetched',
    );

    let correlator: LogCorrelator | undefined;
    if (config.sensor.kind === 'scheduled-job-with-log' && config.jobLog) {
      const { jobLog } = config;
      const primaryFile = primaryLogFilename(jobLog);
      const primary = await collaborators.files.fetchFileLines(primaryFile);
      if (primary === null) {
        throw new MandatoryEvidenceMissingError(
          `Primary event log ${primaryFile} for ${jobLog.namespace} was not found`,
        );
      }

      correlator = createLogCorrelator(jobLog.namespace, primary.join('\n'), {
        logger,
      });
      await resolveInnerException(correlator, collaborators.files, logger);
    }

    sensor.mergeTaskAndLogData(task, correlator, now);
    return sensor.render();
  }

  return {
    async run(now: Date = new Date()): Promise<ProbeOutcome> {
      logger.debug({ task: formatIdentity(identity) }, 'Starting probe');
      const collaborators =
        deps.collaborators ?? createDefaultCollaborators(config, logger);

      try {
        const document = await collect(collaborators, now);
        logger.debug('Probe finished');
        return { ok: true, document };
      } catch (error) {
        logger.error(
          {
            err: error,
            code: error instanceof ProbeError ? error.code : 'UNEXPECTED',
          },
          errorMessage(error),
        );
        return { ok: false, document: renderErrorDocument(error) };
      } finally {
        await collaborators.close().catch((err: unknown) => {
          logger.error({ err }, 'Collaborator cleanup failed');
        });
      }
    },
  };
}
