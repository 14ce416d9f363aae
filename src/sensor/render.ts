/**
 * Sensor report rendering. Builds the `<prtg>` documents a monitoring collector reads from the probe's stdout.
 */

import { XMLBuilder } from 'fast-xml-parser';

import { errorMessage } from '../errors.js';
import type { ChannelEntry } from './channel.js';

/** Replaces line breaks in free text. */
export const LINE_BREAK_SEPARATOR = ' | ';

const builder = new XMLBuilder({
  format: true,
  indentBy: '  ',
});

function build(document: Record<string, unknown>): string {
  const xml: string = builder.build(document);
  return xml;
}

/** Flatten free text onto one line and swap angle brackets for square ones. */
export function sanitizeText(text: string): string {
  return text
    .replace(/(\r\n|\r|\n)+/g, LINE_BREAK_SEPARATOR)
    .replaceAll('<', '[')
    .replaceAll('>', ']');
}

/** Report with one `<result>` per channel and a status line. */
export function renderReport(
  entries: readonly ChannelEntry[],
  text: string,
): string {
  return build({ prtg: { result: entries, text: sanitizeText(text) } });
}

/** Report for a sensor that populated no channels. */
export function renderOkDocument(): string {
  return build({ prtg: { error: '0', text: 'OK' } });
}

/** Error report: severity marker plus the sanitized message. */
export function renderErrorDocument(error: unknown): string {
  return build({
    prtg: { error: '1', text: sanitizeText(errorMessage(error)) },
  });
}
