/**
 * Inner exception log importer. Jobs write exception messages into `<Message>` as raw free text, so a multi-line
 * message arrives as several physical lines with unescaped characters. This module stitches them back into one
 * logical line before the content is parsed.
 */

import { InputValidationError } from '../errors.js';

/** Longest message prefix kept when a multi-line message is merged. */
export const MESSAGE_TRUNCATE_LENGTH = 250;
/** Appended to every merged message. */
export const TRUNCATION_MARKER = '...';

const MESSAGE_CLOSE_TAG = '</Message>';

/** Whether a physical line starts a new logical line. */
function isStructuralLine(trimmed: string): boolean {
  return trimmed === '' || trimmed.startsWith('<');
}

/** Normalize characters that break the XML parser in merged free text. */
function normalizeMessageText(text: string): string {
  return text
    .replaceAll('&apos;', "'")
    .replaceAll('&', '.')
    .replaceAll('\0', '');
}

/** Close a merged message: truncate and normalize the accumulated text, then mark it before the closing tag. */
function closeMessage(text: string, closing: string): string {
  const merged = normalizeMessageText(text.slice(0, MESSAGE_TRUNCATE_LENGTH));
  return `${merged}${TRUNCATION_MARKER}${closing}`;
}

/**
 * Reassemble raw exception log lines. Blank lines, the XML declaration and tag lines stay standalone. A line starting
 * with `</Message>`, or a text line ending its message with `</Message>`, closes a merged message (truncated,
 * normalized, marked with {@link TRUNCATION_MARKER}). Any other line is concatenated onto the current logical line.
 */
export function repairExceptionLines(lines: readonly string[]): string[] {
  if (lines.length === 0) {
    throw new InputValidationError('Inner exception log is empty');
  }

  const output: string[] = [];
  let current: string | null = null;

  for (const line of lines) {
    const trimmed = line.trim();
    const closeAt = line.indexOf(MESSAGE_CLOSE_TAG);

    if (trimmed.startsWith(MESSAGE_CLOSE_TAG)) {
      current = closeMessage(current ?? '', line);
    } else if (isStructuralLine(trimmed)) {
      if (current !== null) output.push(current);
      current = line;
    } else if (closeAt !== -1) {
      current = closeMessage(
        (current ?? '') + line.slice(0, closeAt),
        line.slice(closeAt),
      );
    } else {
      current = (current ?? '') + line;
    }
  }

  if (current !== null) output.push(current);
  return output;
}

/** Repair raw exception log lines and join them into one XML document. */
export function importExceptionContent(lines: readonly string[]): string {
  return repairExceptionLines(lines).join('\n');
}
