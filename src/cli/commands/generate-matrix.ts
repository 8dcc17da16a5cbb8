/**
 * CLI Command: generate-matrix
 * Print the job matrix for a CI system
 */

import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { loadRunConfig } from '../../services/run-config/index.js';
import {
  MATRIX_FORMATS,
  PortAllocator,
  RunPlanBuilder,
  isMatrixFormat,
  renderMatrix,
} from '../../services/run-plan/index.js';
import { logger as rootLogger } from '../../utils/logger.js';
import {
  DEFAULT_OUTPUT_DIR,
  EXIT_CODES,
  UsageError,
  parseIntegerOption,
  planOptions,
  toAppOverrides,
  toPlanFilters,
} from './shared-options.js';

export function displayGenerateMatrixHelp(): void {
  console.log(`
Usage:
  screenshot-matrix generate-matrix --config <file> [options]

Options:
  -c, --config <file>       Run configuration (JSON)
  -f, --format <format>     ${MATRIX_FORMATS.join(', ')} (default: github)
  -o, --output <dir>        Output root used for job directories (default: ./${DEFAULT_OUTPUT_DIR})
  --platforms, --devices, --langs, --screens <list>
                            Comma-separated filters, as for run
  --ios-app, --android-app <path>
                            App artifacts, as for run
  --base-port <port>        First automation server port
  -v, --verbose             Debug logging
  -h, --help                Show this help message
`);
}

export async function executeGenerateMatrixCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...planOptions,
      format: { type: 'string', short: 'f', default: 'github' },
    },
    strict: true,
    allowPositionals: false,
  });

  if (values.help) {
    displayGenerateMatrixHelp();
    return EXIT_CODES.success;
  }
  if (!values.config) {
    throw new UsageError('--config is required');
  }
  const format = values.format.trim().toLowerCase();
  if (!isMatrixFormat(format)) {
    throw new UsageError(`Unknown format '${values.format}'. Valid formats: ${MATRIX_FORMATS.join(', ')}`);
  }
  if (values.verbose) {
    rootLogger.setLevel('debug');
  }

  const config = await loadRunConfig(values.config);
  const basePort = parseIntegerOption('base-port', values['base-port']);
  const allocator = basePort === undefined ? undefined : new PortAllocator(basePort, config.ports.portOffset);

  const plan = await new RunPlanBuilder().build(
    config,
    resolve(values.output ?? DEFAULT_OUTPUT_DIR),
    toPlanFilters(values),
    allocator,
    toAppOverrides(values)
  );

  console.log(JSON.stringify(renderMatrix(plan, format), null, 2));
  return EXIT_CODES.success;
}
