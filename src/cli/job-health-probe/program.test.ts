/**
 * Tests for the CLI commands, run in process against fake collaborators.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { XMLParser } from 'fast-xml-parser';
import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TransportError } from '../../errors.js';
import {
  createFakeCollaborators,
  createTestDir,
  type FakeCollaborators,
  taskMetadata,
  type TestDir,
} from '../../test-utils/logs.js';
import { INIT_CONFIG_TEMPLATE } from './commands/config.js';
import { createProgram } from './program.js';

const parser = new XMLParser({
  parseTagValue: false,
  isArray: (tagName) => tagName === 'result',
});

describe('CLI', () => {
  let testDir: TestDir;
  let output: string[];
  let collaborators: FakeCollaborators;

  function run(args: string[]) {
    const program = createProgram({
      logger: pino({ level: 'silent' }),
      createCollaborators: () => collaborators,
      write: (text) => {
        output.push(text);
      },
    });
    return program.parseAsync(['node', 'job-health-probe', ...args]);
  }

  beforeEach(() => {
    testDir = createTestDir();
    output = [];
    collaborators = createFakeCollaborators({ task: taskMetadata() });
    process.exitCode = undefined;
  });

  afterEach(() => {
    testDir.cleanup();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe('check', () => {
    it('should print the sensor report', async () => {
      await run(['check', '-t', 'NightlyExport', '-k', 'generic']);

      expect(output).toHaveLength(1);
      expect(parser.parse(output[0] ?? '').prtg.result).toHaveLength(3);
      expect(process.exitCode).toBe(0);
    });

    it('should run by default', async () => {
      await run(['-t', 'NightlyExport', '-k', 'generic', '-H', 'server01']);

      expect(parser.parse(output[0] ?? '').prtg.result).toHaveLength(3);
      expect(collaborators.queriedIdentities).toEqual([
        { host: 'server01', path: '\\', name: 'NightlyExport' },
      ]);
    });

    it('should read options from a config file', async () => {
      const path = testDir.write(
        'probe.json',
        JSON.stringify({
          task: { path: '\\Jobs\\', name: 'NightlyExport' },
          sensor: { kind: 'generic' },
        }),
      );

      await run(['check', '-c', path]);

      expect(collaborators.queriedIdentities).toEqual([
        { host: 'localhost', path: '\\Jobs\\', name: 'NightlyExport' },
      ]);
      expect(process.exitCode).toBe(0);
    });

    it('should print an error report for invalid configuration', async () => {
      await run(['check', '-k', 'generic']);

      expect(parser.parse(output[0] ?? '')).toEqual({
        prtg: { error: '1', text: 'Invalid configuration: task: Required' },
      });
      expect(process.exitCode).toBe(1);
      expect(collaborators.queriedIdentities).toEqual([]);
    });

    it('should exit non-zero when the probe fails', async () => {
      collaborators = createFakeCollaborators({
        task: new TransportError('Task scheduler unreachable'),
      });

      await run(['check', '-t', 'NightlyExport', '-k', 'generic']);

      expect(parser.parse(output[0] ?? '')).toEqual({
        prtg: { error: '1', text: 'Task scheduler unreachable' },
      });
      expect(process.exitCode).toBe(1);
    });
  });

  describe('validate', () => {
    it('should accept a valid config', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const path = testDir.write(
        'probe.json',
        JSON.stringify({ task: { name: 'NightlyExport' }, sensor: { kind: 'generic' } }),
      );

      await run(['validate', '-c', path]);

      expect(log).toHaveBeenCalledWith('✅ Config valid');
      expect(log).toHaveBeenCalledWith('  Task: localhost:\\NightlyExport');
      expect(log).toHaveBeenCalledWith('  Sensor kind: generic');
      expect(process.exitCode).toBeUndefined();
    });

    it('should reject an invalid config', async () => {
      const error = vi
        .spyOn(console, 'error')
        .mockImplementation(() => undefined);
      const path = testDir.write(
        'probe.json',
        JSON.stringify({ task: { name: 'NightlyExport' } }),
      );

      await run(['validate', '-c', path]);

      expect(error).toHaveBeenCalledWith(
        '❌ Invalid configuration: jobLog: jobLog is required for scheduled-job-with-log sensors',
      );
      expect(process.exitCode).toBe(1);
    });
  });

  describe('config-show', () => {
    it('should print the resolved config with defaults', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const path = testDir.write(
        'probe.json',
        JSON.stringify({ task: { name: 'NightlyExport' }, sensor: { kind: 'generic' } }),
      );

      await run(['config-show', '-c', path]);

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({
        log: { level: 'warn' },
        task: { host: 'localhost', path: '\\', name: 'NightlyExport' },
        taskQuery: { command: 'powershell.exe', timeoutMs: 60000 },
        sensor: { kind: 'generic' },
        channels: {},
      });
    });
  });

  describe('init', () => {
    it('should write the starter config', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const path = join(testDir.dir, 'probe.json');

      await run(['init', '-o', path]);

      expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(
        INIT_CONFIG_TEMPLATE,
      );
    });

    it('should refuse to overwrite an existing file', async () => {
      const error = vi
        .spyOn(console, 'error')
        .mockImplementation(() => undefined);
      const path = testDir.write('probe.json', '{}');

      await run(['init', '-o', path]);

      expect(error).toHaveBeenCalledWith(`❌ File already exists: ${path}`);
      expect(readFileSync(path, 'utf-8')).toBe('{}');
      expect(process.exitCode).toBe(1);
    });

    it('should produce a config that validates', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const path = join(testDir.dir, 'probe.json');

      await run(['init', '-o', path]);
      await run(['validate', '-c', path]);

      expect(existsSync(path)).toBe(true);
      expect(log).toHaveBeenCalledWith('  Job namespace: com.example.nightlyexport');
      expect(process.exitCode).toBeUndefined();
    });
  });
});
