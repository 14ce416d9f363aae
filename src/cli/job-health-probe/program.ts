/**
 * CLI program assembly.
 *
 * @module
 */

import { Command } from 'commander';

import { type CheckCommandDeps, registerCheckCommand } from './commands/check.js';
import { registerConfigCommands } from './commands/config.js';

/** Build the CLI program. */
export function createProgram(deps: CheckCommandDeps = {}): Command {
  const program = new Command();

  program
    .name('job-health-probe')
    .description(
      'Report scheduled job health from task scheduler metadata and job event logs',
    )
    .version('0.1.0');

  registerCheckCommand(program, deps);
  registerConfigCommands(program);

  return program;
}
