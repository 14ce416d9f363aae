/**
 * Collaborator interfaces the probe depends on: task scheduler metadata and remote file retrieval.
 *
 * @module
 */

import type { TaskMetadata } from '../schemas/task.js';

/** Identity of one scheduled task. */
export interface TaskIdentity {
  /** Host running the task scheduler. */
  host: string;
  /** Task folder. */
  path: string;
  /** Task name. */
  name: string;
}

/** Source of scheduled task metadata. */
export interface TaskSource {
  /** Fetch metadata for exactly one task. Rejects with a `MultipleMatchError` on an ambiguous identity. */
  fetchTaskMetadata(identity: TaskIdentity): Promise<TaskMetadata>;
}

/** Source of remote file content. */
export interface FileSource {
  /** Fetch a file as lines. Resolves null when the file does not exist; rejects with a `TransportError` otherwise. */
  fetchFileLines(path: string): Promise<string[] | null>;
}

/** Collaborators for one probe invocation. */
export interface Collaborators {
  tasks: TaskSource;
  files: FileSource;
  /** Release any sessions opened by the collaborators. */
  close(): Promise<void>;
}

/** Render a task identity for messages and logs. */
export function formatIdentity(identity: TaskIdentity): string {
  return `${identity.host}:${identity.path}${identity.name}`;
}
