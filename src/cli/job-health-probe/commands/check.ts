/**
 * @module commands/check
 *
 * CLI command: check. Runs the probe once and prints the report.
 */

import type { Command } from 'commander';
import type { Logger } from 'pino';

import type { Collaborators } from '../../../collectors/types.js';
import { loadConfig } from '../../../lib/config.js';
import { createProbe } from '../../../probe.js';
import type { ProbeConfig } from '../../../schemas/config.js';
import { renderErrorDocument } from '../../../sensor/render.js';

/** Options for the check command. */
interface CheckOptions {
  config?: string;
  host?: string;
  taskPath?: string;
  task?: string;
  namespace?: string;
  logDirectory?: string;
  kind?: string;
  logLevel?: string;
}

/** Overridable dependencies of the check command. */
export interface CheckCommandDeps {
  /** Logger replacing the one built from config. */
  logger?: Logger;
  /** Collaborator factory replacing the defaults. */
  createCollaborators?: (config: ProbeConfig) => Collaborators;
  /** Output sink for the report. */
  write?: (text: string) => void;
}

/** Register the `check` command on the CLI. */
export function registerCheckCommand(
  cli: Command,
  deps: CheckCommandDeps = {},
): void {
  const write =
    deps.write ??
    ((text: string) => {
      process.stdout.write(text);
    });

  cli
    .command('check', { isDefault: true })
    .description('Check the scheduled job and print the sensor report')
    .option('-c, --config <path>', 'Path to config file')
    .option('-H, --host <host>', 'Host running the task scheduler')
    .option('-p, --task-path <path>', 'Task scheduler folder')
    .option('-t, --task <name>', 'Scheduled task name')
    .option('-n, --namespace <namespace>', 'Job namespace')
    .option('-d, --log-directory <dir>', 'Directory holding the job event logs')
    .option('-k, --kind <kind>', 'Sensor kind (generic|scheduled-job-with-log)')
    .option('-l, --log-level <level>', 'Log level')
    .action(async (options: CheckOptions) => {
      let config: ProbeConfig;
      try {
        config = loadConfig(options.config, {
          host: options.host,
          taskPath: options.taskPath,
          taskName: options.task,
          namespace: options.namespace,
          logDirectory: options.logDirectory,
          kind: options.kind,
          logLevel: options.logLevel,
        });
      } catch (error) {
        write(renderErrorDocument(error));
        process.exitCode = 1;
        return;
      }

      const probe = createProbe(config, {
        logger: deps.logger,
        collaborators: deps.createCollaborators?.(config),
      });
      const outcome = await probe.run();
      write(outcome.document);
      process.exitCode = outcome.ok ? 0 : 1;
    });
}
