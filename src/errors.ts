/**
 * Probe error taxonomy. Every failure the probe can report surfaces as one of these, carrying a stable code for logs.
 *
 * @module
 */

import type { ZodError } from 'zod';

/** Base class for all probe errors. */
export abstract class ProbeError extends Error {
  /** Stable machine-readable error code. */
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or empty required input (constructor argument, parameter, config value). */
export class InputValidationError extends ProbeError {
  readonly code = 'INPUT_VALIDATION';
}

/** The scheduler identity resolved to more than one task. */
export class MultipleMatchError extends ProbeError {
  readonly code = 'MULTIPLE_MATCH';

  constructor(
    readonly identity: string,
    readonly matches: number,
  ) {
    super(
      `Scheduled task identity '${identity}' matched ${String(matches)} tasks, expected exactly one`,
    );
  }
}

/** A failed run whose inner exception log cannot be retrieved. */
export class MandatoryEvidenceMissingError extends ProbeError {
  readonly code = 'MANDATORY_EVIDENCE_MISSING';
}

/** Content that does not parse as the expected event log format. */
export class MalformedLogError extends ProbeError {
  readonly code = 'MALFORMED_LOG';
}

/** A collaborator call itself failed (as opposed to reporting "not found"). */
export class TransportError extends ProbeError {
  readonly code = 'TRANSPORT';
}

/** A sensor has no free channel slot left. */
export class CapacityError extends ProbeError {
  readonly code = 'CAPACITY';
}

/** The primary log holds no start event for the job, so there is no run to correlate. */
export class NoRunRecordedError extends ProbeError {
  readonly code = 'NO_RUN_RECORDED';
}

/** A correlator operation was called before its preconditions were met. */
export class CorrelatorStateError extends ProbeError {
  readonly code = 'CORRELATOR_STATE';
}

/** Render any thrown value as a message string. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Summarize zod issues as `path: message` pairs. */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message,
    )
    .join('; ');
}
