/**
 * @module commands/config
 *
 * CLI commands: validate, init, config-show.
 */

import { existsSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Command } from 'commander';

import { errorMessage } from '../../../errors.js';
import { loadConfig } from '../../../lib/config.js';
import { primaryLogFilename } from '../../../probe.js';
import type { ProbeConfigInput } from '../../../schemas/config.js';

/** Minimal starter config template. */
export const INIT_CONFIG_TEMPLATE = {
  log: {
    level: 'warn',
  },
  task: {
    host: 'localhost',
    path: '\\Jobs\\',
    name: 'NightlyExport',
  },
  sensor: {
    kind: 'scheduled-job-with-log',
  },
  jobLog: {
    namespace: 'com.example.nightlyexport',
    directory: '\\\\jobhost\\d$\\logs',
  },
  channels: {},
} satisfies ProbeConfigInput;

/** Register config-related commands on the CLI. */
export function registerConfigCommands(cli: Command): void {
  cli
    .command('validate')
    .description('Validate a configuration file against the schema')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        const config = loadConfig(options.config);

        console.log('✅ Config valid');
        console.log(
          `  Task: ${config.task.host}:${config.task.path}${config.task.name}`,
        );
        console.log(`  Sensor kind: ${config.sensor.kind}`);
        if (config.jobLog) {
          console.log(`  Job namespace: ${config.jobLog.namespace}`);
          console.log(
            `  Primary log: ${resolve(config.jobLog.directory, primaryLogFilename(config.jobLog))}`,
          );
        }
        console.log(`  Log level: ${config.log.level}`);
        if (config.log.file) {
          console.log(`  Log file: ${config.log.file}`);
        }
        const overrides = Object.keys(config.channels);
        if (overrides.length > 0) {
          console.log(`  Channel overrides: ${overrides.join(', ')}`);
        }
      } catch (error) {
        console.error(`❌ ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  cli
    .command('init')
    .description('Generate a starter configuration file')
    .option(
      '-o, --output <path>',
      'Output config file path',
      'job-health-probe.config.json',
    )
    .action((options: { output: string }) => {
      const outputPath = resolve(options.output);

      if (existsSync(outputPath)) {
        console.error(`❌ File already exists: ${outputPath}`);
        console.error('   Remove it first or choose a different path with -o');
        process.exitCode = 1;
        return;
      }

      writeFileSync(
        outputPath,
        JSON.stringify(INIT_CONFIG_TEMPLATE, null, 2) + '\n',
      );
      console.log(`✅ Wrote ${outputPath}`);
      console.log();
      console.log('Next steps:');
      console.log('  1. Edit the config file to point at your task and job logs');
      console.log('  2. Validate: job-health-probe validate -c ' + options.output);
      console.log('  3. Check: job-health-probe check -c ' + options.output);
    });

  cli
    .command('config-show')
    .description('Show the resolved configuration (defaults applied)')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        console.log(JSON.stringify(loadConfig(options.config), null, 2));
      } catch (error) {
        console.error(`❌ ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });
}
