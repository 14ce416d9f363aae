/**
 * Job event log parser. Turns `<Events><Event>…</Event></Events>` XML into event records.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';

import { formatIssues, MalformedLogError } from '../errors.js';
import { type EventRecord, eventRecordSchema } from '../schemas/event.js';

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName) => tagName === 'Event',
});

const documentSchema = z.object({
  Events: z.union([
    z.literal(''),
    z.object({ Event: z.array(eventRecordSchema).default([]) }),
  ]),
});

/**
 * Parse event log XML into records, in document order. Optional payload fields may be missing; content that is not
 * well-formed or lacks the `<Events>` root fails with {@link MalformedLogError}.
 */
export function parseEventLog(xml: string, origin = 'event log'): EventRecord[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MalformedLogError(
      `${origin} is not well-formed XML (line ${String(line)}): ${msg}`,
    );
  }

  const result = documentSchema.safeParse(parser.parse(xml));
  if (!result.success) {
    throw new MalformedLogError(
      `${origin} does not match the event log format: ${formatIssues(result.error)}`,
    );
  }

  const { Events } = result.data;
  return Events === '' ? [] : Events.Event;
}
