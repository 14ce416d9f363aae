/**
 * File source backed by the filesystem. Remote hosts are reached through a share root (e.g. `\\host\d$\logs`).
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import type { Logger } from 'pino';

import { errorMessage, TransportError } from '../errors.js';
import type { FileSource } from './types.js';

/** Options for creating a file source. */
export interface FileSourceOptions {
  /** Directory relative paths are resolved against. */
  root?: string;
  /** Logger instance. */
  logger?: Logger;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/** Split file content into lines, dropping a byte order mark and the final newline. */
export function splitLines(text: string): string[] {
  const body = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (body === '') return [];
  const lines = body.split(/\r?\n/);
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** Create a file source. Missing files resolve to null; every other read failure is a {@link TransportError}. */
export function createFileSource(options: FileSourceOptions = {}): FileSource {
  const { root, logger } = options;

  return {
    async fetchFileLines(path: string): Promise<string[] | null> {
      const fullPath = root && !isAbsolute(path) ? join(root, path) : path;
      logger?.debug({ path: fullPath }, 'Fetching file');

      try {
        return splitLines(await readFile(fullPath, 'utf-8'));
      } catch (error) {
        if (isNotFound(error)) {
          logger?.debug({ path: fullPath }, 'File not found');
          return null;
        }
        throw new TransportError(
          `Failed to read ${fullPath}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    },
  };
}
