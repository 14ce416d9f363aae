/**
 * Config file loading. Reads JSON, applies command-line overrides, validates against the probe schema.
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { errorMessage, formatIssues, InputValidationError } from '../errors.js';
import { type ProbeConfig, probeConfigSchema } from '../schemas/config.js';

/** Command-line values that take precedence over the config file. */
export interface ConfigOverrides {
  host?: string;
  taskPath?: string;
  taskName?: string;
  namespace?: string;
  logDirectory?: string;
  kind?: string;
  logLevel?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

function defined(values: Record<string, string | undefined>) {
  return Object.fromEntries(
    Object.entries(values).filter(([, value]) => value !== undefined),
  );
}

/** Merge overrides into raw config; sections without an override are left as read. */
export function applyOverrides(
  raw: Record<string, unknown>,
  overrides: ConfigOverrides,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };

  const task = defined({
    host: overrides.host,
    path: overrides.taskPath,
    name: overrides.taskName,
  });
  const jobLog = defined({
    namespace: overrides.namespace,
    directory: overrides.logDirectory,
  });
  const sensor = defined({ kind: overrides.kind });
  const log = defined({ level: overrides.logLevel });

  for (const [key, values] of Object.entries({ task, jobLog, sensor, log })) {
    if (Object.keys(values).length > 0) {
      merged[key] = { ...section(raw[key]), ...values };
    }
  }

  return merged;
}

/** Validate a raw config object. */
export function parseConfig(raw: unknown): ProbeConfig {
  const result = probeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new InputValidationError(
      `Invalid configuration: ${formatIssues(result.error)}`,
    );
  }
  return result.data;
}

/** Read a JSON config file. */
export function readConfigFile(configPath: string): Record<string, unknown> {
  let text: string;
  try {
    text = readFileSync(resolve(configPath), 'utf-8');
  } catch (error) {
    throw new InputValidationError(
      `Cannot read config file ${configPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new InputValidationError(
      `Invalid JSON in config file ${configPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!isRecord(parsed)) {
    throw new InputValidationError(
      `Config file ${configPath} must contain a JSON object`,
    );
  }
  return parsed;
}

/** Load and validate config from a JSON file path (or overrides alone). */
export function loadConfig(
  configPath?: string,
  overrides: ConfigOverrides = {},
): ProbeConfig {
  const raw = configPath ? readConfigFile(configPath) : {};
  return parseConfig(applyOverrides(raw, overrides));
}
