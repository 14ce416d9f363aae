/**
 * Tests for the filesystem file source.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { TransportError } from '../errors.js';
import { createTestDir, type TestDir } from '../test-utils/logs.js';
import { createFileSource, splitLines } from './file-source.js';

describe('splitLines', () => {
  it('should split on both line ending styles', () => {
    expect(splitLines('a\r\nb\nc')).toEqual(['a', 'b', 'c']);
  });

  it('should drop the final newline only', () => {
    expect(splitLines('a\n\nb\n')).toEqual(['a', '', 'b']);
  });

  it('should drop a byte order mark', () => {
    expect(splitLines('\uFEFF<Events/>\n')).toEqual(['<Events/>']);
  });

  it('should return no lines for empty content', () => {
    expect(splitLines('')).toEqual([]);
    expect(splitLines('\uFEFF')).toEqual([]);
  });
});

describe('createFileSource', () => {
  let testDir: TestDir;

  beforeEach(() => {
    testDir = createTestDir();
  });

  afterEach(() => {
    testDir.cleanup();
  });

  it('should resolve relative paths against the root', async () => {
    testDir.write('job.xml', '<Events>\n</Events>\n');
    const files = createFileSource({ root: testDir.dir });

    await expect(files.fetchFileLines('job.xml')).resolves.toEqual([
      '<Events>',
      '</Events>',
    ]);
  });

  it('should read absolute paths as given', async () => {
    const path = testDir.write('abs.xml', 'line');
    const files = createFileSource({ root: '/does/not/matter' });

    await expect(files.fetchFileLines(path)).resolves.toEqual(['line']);
  });

  it('should resolve missing files to null', async () => {
    const files = createFileSource({ root: testDir.dir });

    await expect(files.fetchFileLines('missing.xml')).resolves.toBeNull();
  });

  it('should resolve paths through a file to null', async () => {
    testDir.write('plain.txt', 'x');
    const files = createFileSource({ root: testDir.dir });

    await expect(files.fetchFileLines('plain.txt/inner.xml')).resolves.toBeNull();
  });

  it('should fail with a transport error on other read failures', async () => {
    const files = createFileSource();

    await expect(files.fetchFileLines(testDir.dir)).rejects.toThrow(
      TransportError,
    );
  });
});
