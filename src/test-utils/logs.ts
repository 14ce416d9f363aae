/**
 * Shared test utilities for event log fixtures and in-memory collaborators.
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type {
  Collaborators,
  FileSource,
  TaskIdentity,
  TaskSource,
} from '../collectors/types.js';
import type { TaskMetadata } from '../schemas/task.js';

/** Event fixture; omitted optional fields are left out of the XML. */
export interface EventFixture {
  recordId: number;
  eventId: number;
  source?: string;
  correlationId?: string;
  timestamp?: string;
  errorCode?: number;
  message?: string;
  dataObject?: string;
}

/** Render fixtures as event log lines. */
export function eventLogLines(events: readonly EventFixture[]): string[] {
  const lines = ['<?xml version="1.0" encoding="utf-8"?>', '<Events>'];
  for (const event of events) {
    lines.push('  <Event>');
    lines.push(`    <RecordId>${String(event.recordId)}</RecordId>`);
    lines.push(`    <EventId>${String(event.eventId)}</EventId>`);
    if (event.source !== undefined) {
      lines.push(`    <Source>${event.source}</Source>`);
    }
    if (event.correlationId !== undefined) {
      lines.push(`    <CorrelationId>${event.correlationId}</CorrelationId>`);
    }
    if (event.timestamp !== undefined) {
      lines.push(`    <Timestamp>${event.timestamp}</Timestamp>`);
    }
    if (event.errorCode !== undefined) {
      lines.push(`    <ErrorCode>${String(event.errorCode)}</ErrorCode>`);
    }
    if (event.message !== undefined) {
      lines.push(`    <Message>${event.message}</Message>`);
    }
    if (event.dataObject !== undefined) {
      lines.push(`    <DataObject>${event.dataObject}</DataObject>`);
    }
    lines.push('  </Event>');
  }
  lines.push('</Events>');
  return lines;
}

/** Render fixtures as event log XML. */
export function eventLogXml(events: readonly EventFixture[]): string {
  return eventLogLines(events).join('\n');
}

/** Start and end events of one run. */
export function runEvents(
  source: string,
  correlationId: string,
  firstRecordId: number,
  completed: boolean,
): EventFixture[] {
  const start: EventFixture = {
    recordId: firstRecordId,
    eventId: 200,
    source,
    correlationId,
    timestamp: '2024-01-15T10:30:00Z',
  };
  if (!completed) return [start];
  return [
    start,
    {
      recordId: firstRecordId + 1,
      eventId: 201,
      source,
      correlationId,
      timestamp: '2024-01-15T10:45:00Z',
    },
  ];
}

/** Task metadata with overridable fields. */
export function taskMetadata(overrides: Partial<TaskMetadata> = {}): TaskMetadata {
  return {
    taskName: 'NightlyExport',
    taskPath: '\\Jobs\\',
    displayName: '\\Jobs\\NightlyExport',
    state: 'Ready',
    enabled: true,
    lastRunTime: new Date('2024-01-15T10:30:00Z'),
    lastResultCode: 0,
    nextRunTime: new Date('2024-01-16T10:30:00Z'),
    ...overrides,
  };
}

/** In-memory collaborators with call recording. */
export interface FakeCollaborators extends Collaborators {
  /** Paths requested from the file source, in order. */
  fetchedPaths: string[];
  /** Identities requested from the task source. */
  queriedIdentities: TaskIdentity[];
  /** Number of close() calls. */
  closeCalls: number;
}

/** Create collaborators serving fixed files and task metadata; an Error is thrown where given instead. */
export function createFakeCollaborators(options: {
  task: TaskMetadata | Error;
  files?: Record<string, string[] | Error>;
}): FakeCollaborators {
  const fetchedPaths: string[] = [];
  const queriedIdentities: TaskIdentity[] = [];

  const tasks: TaskSource = {
    fetchTaskMetadata(identity) {
      queriedIdentities.push(identity);
      return options.task instanceof Error
        ? Promise.reject(options.task)
        : Promise.resolve(options.task);
    },
  };

  const files: FileSource = {
    fetchFileLines(path) {
      fetchedPaths.push(path);
      const entry = options.files?.[path];
      if (entry === undefined) return Promise.resolve(null);
      return entry instanceof Error
        ? Promise.reject(entry)
        : Promise.resolve(entry);
    },
  };

  const fake: FakeCollaborators = {
    tasks,
    files,
    fetchedPaths,
    queriedIdentities,
    closeCalls: 0,
    close() {
      fake.closeCalls += 1;
      return Promise.resolve();
    },
  };
  return fake;
}

/** Temporary directory context. */
export interface TestDir {
  /** Directory path. */
  dir: string;
  /** Write a file into the directory and return its path. */
  write: (name: string, content: string) => string;
  /** Remove the directory. */
  cleanup: () => void;
}

/** Create a temporary directory for file-based tests. */
export function createTestDir(): TestDir {
  const dir = mkdtempSync(join(tmpdir(), 'job-health-probe-test-'));
  return {
    dir,
    write: (name, content) => {
      const path = join(dir, name);
      writeFileSync(path, content);
      return path;
    },
    cleanup: () => {
      try {
        rmSync(dir, {
          recursive: true,
          force: true,
          maxRetries: 3,
          retryDelay: 100,
        });
      } catch {
        // Ignore cleanup errors in tests
      }
    },
  };
}
