/**
 * CLI Command: validate-config
 * Report schema and semantic issues in a run configuration
 */

import { parseArgs } from 'node:util';
import { checkRunConfig, readRunConfigDocument } from '../../services/run-config/index.js';
import { EXIT_CODES, UsageError } from './shared-options.js';

export function displayValidateConfigHelp(): void {
  console.log(`
Usage:
  screenshot-matrix validate-config --config <file>

Options:
  -c, --config <file>       Run configuration (JSON)
  -h, --help                Show this help message
`);
}

export async function executeValidateConfigCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) {
    displayValidateConfigHelp();
    return EXIT_CODES.success;
  }
  if (!values.config) {
    throw new UsageError('--config is required');
  }

  const { config, errors, warnings } = checkRunConfig(await readRunConfigDocument(values.config));

  for (const warning of warnings) {
    console.warn(`Warning: ${warning}`);
  }

  if (errors.length > 0) {
    console.error(`${values.config} is invalid:`);
    for (const error of errors) {
      console.error(`  - ${error}`);
    }
    return EXIT_CODES.failure;
  }

  const devices = config ? config.devices.ios.length + config.devices.android.length : 0;
  console.log(
    `${values.config} is valid: ${devices} device(s), ${config?.languages.length ?? 0} language(s), ` +
      `${config?.screenshots.length ?? 0} screenshot plan(s)`
  );
  return EXIT_CODES.success;
}
