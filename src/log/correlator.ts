/**
 * Log correlator. Derives the result of a job's most recent run from its primary event log and, when the primary
 * log alone is inconclusive, from the inner exception log written alongside it.
 *
 * Verdicts move UNINITIALIZED → PRELIMINARY_SUCCESS | PRELIMINARY_FAILURE → CONFIRMED_SUCCESS | FAILURE and never
 * back. Re-evaluating a terminal verdict is a no-op.
 */

import { pino, type Logger } from 'pino';

import {
  CorrelatorStateError,
  InputValidationError,
  MalformedLogError,
  NoRunRecordedError,
} from '../errors.js';
import {
  END_EVENT_ID,
  type EventRecord,
  START_EVENT_ID,
} from '../schemas/event.js';
import { importExceptionContent } from './importer.js';
import { parseEventLog } from './parser.js';

/** Numeric run results reported by {@link LogCorrelator.getLastRunResult}. Failures report their own error code. */
export const LastRunResult = {
  Success: 0,
  NotEvaluated: -1,
  PreliminarySuccess: -2,
  PreliminaryFailure: -3,
  /** Failure whose exception record carries no usable error code. */
  UnknownFailure: -4,
} as const;

/** Verdict on the most recent run. */
export type Verdict =
  | { state: 'uninitialized' }
  | { state: 'preliminary-success' }
  | { state: 'preliminary-failure' }
  | { state: 'confirmed-success' }
  | {
      state: 'failure';
      code: number;
      message?: string;
      stackTrace?: string;
    };

export type VerdictState = Verdict['state'];

/** Evidence available to one evaluation step. */
export interface RunEvidence {
  /** Whether an end event shares the last start event's correlation id. */
  endEventFound: boolean;
  /** Inner exception records, or null when none have been imported. */
  secondary: readonly EventRecord[] | null;
}

/** Separator between the data object and message of a stack trace record. */
export const STACK_TRACE_SEPARATOR = ' -- ';

const CORRELATION_TOKEN_LENGTH = 12;

/** Whether no further evaluation can change the verdict. */
export function isTerminal(verdict: Verdict): boolean {
  return verdict.state === 'confirmed-success' || verdict.state === 'failure';
}

/** Codes that would read as success or as a verdict sentinel are reported as an unknown failure. */
function failureCode(errorCode: number | undefined): number {
  return errorCode === undefined ||
    (errorCode <= LastRunResult.Success &&
      errorCode >= LastRunResult.UnknownFailure)
    ? LastRunResult.UnknownFailure
    : errorCode;
}

/** Newest exception record first; records past the second are ignored. */
function resolveFromSecondary(
  verdict: Verdict,
  secondary: readonly EventRecord[],
): Verdict {
  const [newest, previous] = [...secondary].sort(
    (a, b) => b.recordId - a.recordId,
  );

  if (newest === undefined) {
    return verdict.state === 'preliminary-success'
      ? { state: 'confirmed-success' }
      : { state: 'failure', code: LastRunResult.UnknownFailure };
  }

  if (previous === undefined) {
    return {
      state: 'failure',
      code: failureCode(newest.errorCode),
      message: newest.message,
    };
  }

  const traceParts = [newest.dataObject, newest.message].filter(
    (part): part is string => part !== undefined,
  );

  return {
    state: 'failure',
    code: failureCode(previous.errorCode),
    message: previous.message,
    stackTrace:
      traceParts.length > 0 ? traceParts.join(STACK_TRACE_SEPARATOR) : undefined,
  };
}

/**
 * Verdict transition function. A matching end event only counts while the verdict is still uninitialized, so that
 * re-evaluation after an import cannot fall back to success.
 */
export function transition(verdict: Verdict, evidence: RunEvidence): Verdict {
  if (isTerminal(verdict)) return verdict;

  if (evidence.endEventFound && verdict.state === 'uninitialized') {
    return { state: 'preliminary-success' };
  }

  if (evidence.secondary === null) {
    return verdict.state === 'uninitialized'
      ? { state: 'preliminary-failure' }
      : verdict;
  }

  return resolveFromSecondary(verdict, evidence.secondary);
}

/** Map a verdict to its numeric run result. */
export function verdictCode(verdict: Verdict): number {
  switch (verdict.state) {
    case 'uninitialized':
      return LastRunResult.NotEvaluated;
    case 'preliminary-success':
      return LastRunResult.PreliminarySuccess;
    case 'preliminary-failure':
      return LastRunResult.PreliminaryFailure;
    case 'confirmed-success':
      return LastRunResult.Success;
    case 'failure':
      return verdict.code;
  }
}

/** Most recent start event written by the given source. */
export function findLastStartEvent(
  events: readonly EventRecord[],
  source: string,
): EventRecord | undefined {
  let latest: EventRecord | undefined;
  for (const event of events) {
    if (event.source !== source || event.eventId !== START_EVENT_ID) continue;
    if (latest === undefined || event.recordId > latest.recordId) {
      latest = event;
    }
  }
  return latest;
}

/**
 * Inner exception log filename for a run: `{namespace}.{yyyyMMdd}_{HHmm}.xml`, taken from the 12-character
 * timestamp token in the second hyphen-delimited field of the correlation id.
 */
export function innerExceptionLogFilename(
  namespace: string,
  correlationId: string,
): string {
  const token = correlationId.split('-')[1];
  if (token?.length !== CORRELATION_TOKEN_LENGTH) {
    throw new MalformedLogError(
      `Correlation id '${correlationId}' has no ${String(CORRELATION_TOKEN_LENGTH)}-character timestamp field`,
    );
  }
  return `${namespace}.${token.slice(0, 8)}_${token.slice(8, 12)}.xml`;
}

/** Options for creating a log correlator. */
export interface LogCorrelatorOptions {
  /** Logger for verdict transitions. */
  logger?: Logger;
}

/** Correlator for one job namespace over one invocation. */
export interface LogCorrelator {
  /** Dotted job namespace. */
  readonly namespace: string;
  /** Last namespace segment; the source of start events. */
  readonly leaf: string;
  /** Namespace without its last segment. */
  readonly parent: string;
  /** Primary log records in document order. */
  readonly primaryEvents: readonly EventRecord[];
  /** Current verdict. */
  getVerdict(): Verdict;
  /** Correlation id of the most recent start event, once located. */
  getLastCorrelationId(): string | null;
  /** Run one transition step against the current evidence. */
  evaluate(): Verdict;
  /** Whether the inner exception log still has to be consulted. */
  innerExceptionRequired(): boolean;
  /** Confirm a preliminary success when no inner exception log exists. */
  confirmLastRunResult(): void;
  /** Numeric run result; evaluates first when nothing was evaluated yet. */
  getLastRunResult(): number;
  /** Whether the verdict is a confirmed success. */
  hasSucceeded(): boolean;
  /** Inner exception log filename for the last run. */
  getInnerExceptionLogFilename(): string;
  /** Import raw inner exception log lines and re-evaluate. */
  importInnerException(lines: readonly string[]): Verdict;
  /** Whether inner exception evidence has been imported. */
  hasInnerException(): boolean;
  /** Error code inferred from the inner exception log. */
  getInnerExceptionCode(): number | undefined;
  /** Message inferred from the inner exception log. */
  getInnerExceptionMessage(): string | undefined;
  /** Stack trace inferred from the inner exception log. */
  getInnerExceptionStackTrace(): string | undefined;
  /** Filename of the inner exception log that produced a failure verdict. */
  getSecondaryFilename(): string | undefined;
}

/**
 * Create a correlator over primary event log XML. Fails when the namespace or log is empty, when the log is
 * malformed, or when it holds no records.
 */
export function createLogCorrelator(
  namespace: string,
  primaryXml: string,
  options: LogCorrelatorOptions = {},
): LogCorrelator {
  const logger = options.logger ?? pino({ level: 'silent' });

  if (namespace.trim() === '') {
    throw new InputValidationError('Job namespace must not be empty');
  }
  if (primaryXml.trim() === '') {
    throw new InputValidationError('Primary event log must not be empty');
  }

  const separator = namespace.lastIndexOf('.');
  const leaf = separator === -1 ? namespace : namespace.slice(separator + 1);
  const parent = separator === -1 ? '' : namespace.slice(0, separator);

  const primaryEvents: readonly EventRecord[] = Object.freeze(
    parseEventLog(primaryXml, 'primary event log'),
  );
  if (primaryEvents.length === 0) {
    throw new InputValidationError('Primary event log contains no events');
  }

  let verdict: Verdict = { state: 'uninitialized' };
  let lastCorrelationId: string | null = null;
  let secondaryEvents: readonly EventRecord[] | null = null;
  let secondaryFilename: string | undefined;

  function locateLastRun(): string {
    if (lastCorrelationId !== null) return lastCorrelationId;
    const start = findLastStartEvent(primaryEvents, leaf);
    if (start === undefined) {
      throw new NoRunRecordedError(
        `No start event (${String(START_EVENT_ID)}) from source '${leaf}' in the primary event log`,
      );
    }
    lastCorrelationId = start.correlationId;
    logger.debug(
      { namespace, recordId: start.recordId, correlationId: lastCorrelationId },
      'Located last run',
    );
    return lastCorrelationId;
  }

  function failure(): Extract<Verdict, { state: 'failure' }> | undefined {
    return verdict.state === 'failure' ? verdict : undefined;
  }

  const correlator: LogCorrelator = {
    namespace,
    leaf,
    parent,
    primaryEvents,

    getVerdict: () => verdict,

    getLastCorrelationId: () => lastCorrelationId,

    evaluate(): Verdict {
      if (isTerminal(verdict)) return verdict;

      const correlationId = locateLastRun();
      const endEventFound = primaryEvents.some(
        (event) =>
          event.correlationId === correlationId &&
          event.eventId === END_EVENT_ID,
      );

      const previous = verdict.state;
      verdict = transition(verdict, {
        endEventFound,
        secondary: secondaryEvents,
      });
      if (verdict.state !== previous) {
        logger.debug(
          { namespace, from: previous, to: verdict.state },
          'Verdict transition',
        );
      }
      return verdict;
    },

    innerExceptionRequired(): boolean {
      return (
        (verdict.state === 'preliminary-failure' ||
          verdict.state === 'preliminary-success') &&
        secondaryEvents === null
      );
    },

    confirmLastRunResult(): void {
      if (verdict.state === 'preliminary-success') {
        verdict = { state: 'confirmed-success' };
        logger.debug({ namespace }, 'Last run result confirmed');
      }
    },

    getLastRunResult(): number {
      if (verdict.state === 'uninitialized') correlator.evaluate();
      return verdictCode(verdict);
    },

    hasSucceeded: () => verdict.state === 'confirmed-success',

    getInnerExceptionLogFilename(): string {
      if (lastCorrelationId === null) {
        throw new CorrelatorStateError(
          'Inner exception log filename requested before the last run was located',
        );
      }
      return innerExceptionLogFilename(namespace, lastCorrelationId);
    },

    importInnerException(lines: readonly string[]): Verdict {
      if (secondaryEvents !== null) {
        throw new CorrelatorStateError('Inner exception log already imported');
      }
      if (verdict.state === 'uninitialized') correlator.evaluate();

      const filename = correlator.getInnerExceptionLogFilename();
      secondaryEvents = Object.freeze(
        parseEventLog(importExceptionContent(lines), `inner exception log ${filename}`),
      );
      logger.debug(
        { namespace, filename, records: secondaryEvents.length },
        'Imported inner exception log',
      );

      correlator.evaluate();
      if (verdict.state === 'failure') secondaryFilename = filename;
      return verdict;
    },

    hasInnerException: () => secondaryEvents !== null,

    getInnerExceptionCode: () => failure()?.code,

    getInnerExceptionMessage: () => failure()?.message,

    getInnerExceptionStackTrace: () => failure()?.stackTrace,

    getSecondaryFilename: () => secondaryFilename,
  };

  return correlator;
}
