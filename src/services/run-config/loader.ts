/**
 * Run configuration loader
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createModuleLogger } from '../../utils/logger.js';
import { runConfigSchema } from './schema.js';
import { ConfigurationError } from './errors.js';
import { validateRunConfig, type ConfigValidationResult } from './validation.js';
import type { RunConfig } from './types.js';

const logger = createModuleLogger('run-config');

export interface RunConfigCheck extends ConfigValidationResult {
  /** Present when the document passed the schema */
  config?: RunConfig;
}

function schemaIssues(document: unknown): { config?: RunConfig; issues: string[] } {
  const result = runConfigSchema.safeParse(document);
  if (result.success) {
    return { config: result.data, issues: [] };
  }
  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return { issues };
}

/**
 * Collect every schema and semantic issue without throwing
 */
export function checkRunConfig(document: unknown): RunConfigCheck {
  const { config, issues } = schemaIssues(document);
  if (!config) {
    return { errors: issues, warnings: [] };
  }
  return { config, ...validateRunConfig(config) };
}

/**
 * Validate an already-parsed JSON document against the schema and the
 * semantic rules
 */
export function parseRunConfig(document: unknown): RunConfig {
  const { config, issues } = schemaIssues(document);

  if (!config) {
    throw new ConfigurationError(
      `Configuration schema validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      'CONFIGURATION_ERROR',
      issues
    );
  }

  const { errors, warnings } = validateRunConfig(config);

  for (const warning of warnings) {
    logger.warn({ warning }, 'Configuration warning');
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Semantic validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      'CONFIGURATION_ERROR',
      errors
    );
  }

  return config;
}

/**
 * Read a configuration file and parse its JSON
 */
export async function readRunConfigDocument(configPath: string): Promise<unknown> {
  const fullPath = resolve(configPath);

  let text: string;
  try {
    text = await readFile(fullPath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Configuration file '${configPath}' could not be read: ${message}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Configuration file '${configPath}' is not valid JSON: ${message}`);
  }
}

/**
 * Read, parse and validate a configuration file
 */
export async function loadRunConfig(configPath: string): Promise<RunConfig> {
  logger.info({ path: resolve(configPath) }, 'Loading configuration');

  const config = parseRunConfig(await readRunConfigDocument(configPath));
  logger.info(
    {
      iosDevices: config.devices.ios.length,
      androidDevices: config.devices.android.length,
      languages: config.languages.length,
      screenshots: config.screenshots.length,
    },
    'Configuration loaded'
  );
  return config;
}
