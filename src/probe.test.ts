/**
 * Tests for the probe orchestrator.
 */

import { XMLParser } from 'fast-xml-parser';
import { pino } from 'pino';
import { describe, expect, it } from 'vitest';

import { MultipleMatchError, TransportError } from './errors.js';
import { parseConfig } from './lib/config.js';
import { createProbe } from './probe.js';
import {
  createFakeCollaborators,
  eventLogLines,
  runEvents,
  taskMetadata,
} from './test-utils/logs.js';

const parser = new XMLParser({
  parseTagValue: false,
  isArray: (tagName) => tagName === 'result',
});

const logger = pino({ level: 'silent' });
const NOW = new Date('2024-01-15T11:00:00Z');
const CORRELATION_ID = 'abc-202401151030-xyz';
const PRIMARY = 'com.example.job.xml';
const INNER = 'com.example.job.20240115_1030.xml';

const jobConfig = parseConfig({
  task: { host: 'server01', path: '\\Jobs\\', name: 'NightlyExport' },
  jobLog: { namespace: 'com.example.job', directory: 'D:\\logs' },
});

const failureRecord = eventLogLines([
  { recordId: 1, eventId: 500, errorCode: 42, message: 'X' },
]);

function jobResult(document: string): unknown {
  const parsed = parser.parse(document);
  return parsed.prtg.result.find(
    (entry: { channel: string }) => entry.channel === 'Last Job Result',
  )?.value;
}

describe('createProbe', () => {
  it('should report task channels for generic sensors without reading logs', async () => {
    const config = parseConfig({
      task: { name: 'NightlyExport' },
      sensor: { kind: 'generic', name: 'Nightly export' },
    });
    const collaborators = createFakeCollaborators({ task: taskMetadata() });

    const outcome = await createProbe(config, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(true);
    expect(parser.parse(outcome.document).prtg.result).toHaveLength(3);
    expect(collaborators.queriedIdentities).toEqual([
      { host: 'localhost', path: '\\', name: 'NightlyExport' },
    ]);
    expect(collaborators.fetchedPaths).toEqual([]);
    expect(collaborators.closeCalls).toBe(1);
  });

  it('should confirm a completed run when no inner exception log exists', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: { [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, true)) },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(true);
    expect(jobResult(outcome.document)).toBe('0');
    expect(collaborators.fetchedPaths).toEqual([PRIMARY, INNER]);
  });

  it('should report a completed run as failed when its inner exception log has records', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: {
        [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, true)),
        [INNER]: failureRecord,
      },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(true);
    expect(jobResult(outcome.document)).toBe('42');
  });

  it('should report the inner exception of an unfinished run', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: {
        [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, false)),
        [INNER]: failureRecord,
      },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);
    const parsed = parser.parse(outcome.document);

    expect(outcome.ok).toBe(true);
    expect(jobResult(outcome.document)).toBe('42');
    expect(parsed.prtg.text).toBe(
      `Task \\Jobs\\NightlyExport failed with code 42: X (inner exception log ${INNER})`,
    );
  });

  it('should fail when an unfinished run has no inner exception log', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: { [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, false)) },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document)).toEqual({
      prtg: {
        error: '1',
        text: `Last run of com.example.job failed and its inner exception log ${INNER} was not found`,
      },
    });
    expect(collaborators.closeCalls).toBe(1);
  });

  it('should fail when the primary event log is missing', async () => {
    const collaborators = createFakeCollaborators({ task: taskMetadata() });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document).prtg.text).toBe(
      `Primary event log ${PRIMARY} for com.example.job was not found`,
    );
  });

  it('should read a configured primary log file', async () => {
    const config = parseConfig({
      task: { name: 'NightlyExport' },
      jobLog: {
        namespace: 'com.example.job',
        directory: 'D:\\logs',
        primaryFile: 'events.xml',
      },
    });
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: {
        'events.xml': eventLogLines(runEvents('job', CORRELATION_ID, 1, true)),
      },
    });

    const outcome = await createProbe(config, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(true);
    expect(collaborators.fetchedPaths[0]).toBe('events.xml');
  });

  it('should render task source failures as an error report', async () => {
    const collaborators = createFakeCollaborators({
      task: new MultipleMatchError('server01:\\Jobs\\NightlyExport', 2),
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document).prtg).toEqual({
      error: '1',
      text: "Scheduled task identity 'server01:\\Jobs\\NightlyExport' matched 2 tasks, expected exactly one",
    });
    expect(collaborators.fetchedPaths).toEqual([]);
  });

  it('should render malformed logs as an error report', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: { [PRIMARY]: ['<Events>', '<Event>'] },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document).prtg.text).toMatch(
      /^primary event log is not well-formed XML/,
    );
  });

  it('should keep the report when cleanup fails', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: { [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, true)) },
    });
    collaborators.close = () => Promise.reject(new Error('share busy'));

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(true);
  });

  it('should fail when the inner exception log cannot be read after a completed run', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: {
        [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, true)),
        [INNER]: new TransportError(`Failed to read ${INNER}: permission denied`),
      },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document)).toEqual({
      prtg: { error: '1', text: `Failed to read ${INNER}: permission denied` },
    });
    expect(collaborators.fetchedPaths).toEqual([PRIMARY, INNER]);
    expect(collaborators.closeCalls).toBe(1);
  });

  it('should fail when the inner exception log cannot be read after an unfinished run', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: {
        [PRIMARY]: eventLogLines(runEvents('job', CORRELATION_ID, 1, false)),
        [INNER]: new TransportError(`Failed to read ${INNER}: permission denied`),
      },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document).prtg.text).toBe(
      `Failed to read ${INNER}: permission denied`,
    );
    expect(collaborators.closeCalls).toBe(1);
  });

  it('should confirm a completed run whose correlation id names no inner exception log', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: { [PRIMARY]: eventLogLines(runEvents('job', 'abc-2024-xyz', 1, true)) },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(true);
    expect(jobResult(outcome.document)).toBe('0');
    expect(collaborators.fetchedPaths).toEqual([PRIMARY]);
  });

  it('should fail an unfinished run whose correlation id names no inner exception log', async () => {
    const collaborators = createFakeCollaborators({
      task: taskMetadata(),
      files: { [PRIMARY]: eventLogLines(runEvents('job', 'abc-2024-xyz', 1, false)) },
    });

    const outcome = await createProbe(jobConfig, { logger, collaborators }).run(NOW);

    expect(outcome.ok).toBe(false);
    expect(parser.parse(outcome.document).prtg.text).toBe(
      "Correlation id 'abc-2024-xyz' has no 12-character timestamp field",
    );
  });
});
