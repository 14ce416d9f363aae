#!/usr/bin/env node
/**
 * CLI entry point for job-health-probe.
 *
 * @module
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
