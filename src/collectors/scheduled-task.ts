/**
 * Task scheduler source. Spawns PowerShell to query `Get-ScheduledTask` / `Get-ScheduledTaskInfo`, passing the task
 * identity through environment variables, and validates the JSON it prints.
 */

import { spawn } from 'node:child_process';

import type { Logger } from 'pino';
import { z } from 'zod';

import {
  formatIssues,
  InputValidationError,
  MultipleMatchError,
  TransportError,
} from '../errors.js';
import { type TaskMetadata, taskMetadataSchema } from '../schemas/task.js';
import { formatIdentity, type TaskIdentity, type TaskSource } from './types.js';

/** Command resolution result. */
export interface ResolvedCommand {
  /** Command to execute. */
  command: string;
  /** Arguments to pass to the command. */
  args: string[];
}

/** Options for creating a scheduled task source. */
export interface ScheduledTaskSourceOptions {
  /** PowerShell executable. */
  command?: string;
  /** Query timeout in milliseconds. */
  timeoutMs?: number;
  /** Optional custom command resolver (for extensibility). */
  commandResolver?: (command: string, script: string) => ResolvedCommand;
  /** Logger instance. */
  logger?: Logger;
}

/** Query script; reads the identity from PROBE_TASK_* and prints a JSON array. */
export const TASK_QUERY_SCRIPT = [
  "$ErrorActionPreference = 'Stop'",
  '$query = @{ TaskPath = $env:PROBE_TASK_PATH; TaskName = $env:PROBE_TASK_NAME }',
  "$local = @('localhost', '.', '127.0.0.1', $env:COMPUTERNAME) -contains $env:PROBE_TASK_HOST",
  'if (-not $local) { $query.CimSession = New-CimSession -ComputerName $env:PROBE_TASK_HOST }',
  'try {',
  '  $tasks = @(Get-ScheduledTask @query -ErrorAction SilentlyContinue)',
  '  $rows = @($tasks | ForEach-Object {',
  '    $info = $_ | Get-ScheduledTaskInfo',
  '    [pscustomobject]@{',
  '      taskName = $_.TaskName',
  '      taskPath = $_.TaskPath',
  '      state = [string]$_.State',
  "      lastRunTime = if ($info.LastRunTime) { $info.LastRunTime.ToString('o') } else { $null }",
  '      lastTaskResult = [int64]$info.LastTaskResult',
  "      nextRunTime = if ($info.NextRunTime) { $info.NextRunTime.ToString('o') } else { $null }",
  '    }',
  '  })',
  '  ConvertTo-Json -InputObject $rows -Compress -Depth 3',
  '} finally {',
  '  if ($query.CimSession) { Remove-CimSession -CimSession $query.CimSession }',
  '}',
].join('\n');

/** Resolve the PowerShell invocation for the query script. */
function resolveCommand(command: string, script: string): ResolvedCommand {
  return {
    command,
    args: ['-NoProfile', '-NonInteractive', '-Command', script],
  };
}

/** PowerShell prints a lone object for one-element arrays in some versions. */
const taskQueryOutputSchema = z.union([
  z.array(z.unknown()),
  z.record(z.unknown()).transform((row) => [row]),
]);

/**
 * Parse scheduler query output into exactly one task. No match is an {@link InputValidationError}, several are a
 * {@link MultipleMatchError}, unparseable output is a {@link TransportError}.
 */
export function parseTaskQueryOutput(
  stdout: string,
  identity: TaskIdentity,
): TaskMetadata {
  const label = formatIdentity(identity);
  const trimmed = stdout.trim();
  if (trimmed === '') {
    throw new InputValidationError(`No scheduled task matches '${label}'`);
  }

  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    throw new TransportError(
      `Task scheduler query for '${label}' printed invalid JSON: ${trimmed.slice(0, 200)}`,
    );
  }

  const rows = taskQueryOutputSchema.safeParse(json);
  if (!rows.success) {
    throw new TransportError(
      `Task scheduler query for '${label}' printed unexpected output: ${formatIssues(rows.error)}`,
    );
  }

  const [row, ...rest] = rows.data;
  if (row === undefined) {
    throw new InputValidationError(`No scheduled task matches '${label}'`);
  }
  if (rest.length > 0) {
    throw new MultipleMatchError(label, rows.data.length);
  }

  const task = taskMetadataSchema.safeParse(row);
  if (!task.success) {
    throw new TransportError(
      `Task scheduler query for '${label}' returned an invalid task: ${formatIssues(task.error)}`,
    );
  }
  return task.data;
}

/** Create a task source that queries the Windows task scheduler through PowerShell. */
export function createScheduledTaskSource(
  options: ScheduledTaskSourceOptions = {},
): TaskSource {
  const {
    command = 'powershell.exe',
    timeoutMs = 60000,
    commandResolver,
    logger,
  } = options;

  function runQuery(identity: TaskIdentity): Promise<string> {
    const label = formatIdentity(identity);
    const resolved = commandResolver
      ? commandResolver(command, TASK_QUERY_SCRIPT)
      : resolveCommand(command, TASK_QUERY_SCRIPT);

    return new Promise((resolve, reject) => {
      const child = spawn(resolved.command, resolved.args, {
        env: {
          ...process.env,
          PROBE_TASK_HOST: identity.host,
          PROBE_TASK_PATH: identity.path,
          PROBE_TASK_NAME: identity.name,
        },
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      let timedOut = false;

      const timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => {
        stdout += chunk.toString();
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on('close', (exitCode) => {
        clearTimeout(timeoutHandle);

        if (timedOut) {
          reject(
            new TransportError(
              `Task scheduler query for '${label}' timed out after ${String(timeoutMs)}ms`,
            ),
          );
        } else if (exitCode === 0) {
          resolve(stdout);
        } else {
          reject(
            new TransportError(
              `Task scheduler query for '${label}' failed (exit code ${String(exitCode)}): ${stderr.trim()}`,
            ),
          );
        }
      });

      child.on('error', (err) => {
        clearTimeout(timeoutHandle);
        reject(
          new TransportError(
            `Task scheduler query for '${label}' could not start: ${err.message}`,
            { cause: err },
          ),
        );
      });
    });
  }

  return {
    async fetchTaskMetadata(identity: TaskIdentity): Promise<TaskMetadata> {
      logger?.debug({ task: formatIdentity(identity) }, 'Querying task scheduler');
      const stdout = await runQuery(identity);
      return parseTaskQueryOutput(stdout, identity);
    },
  };
}
