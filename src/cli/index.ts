#!/usr/bin/env node
/**
 * CLI entry point for screenshot-matrix
 */

import { ConfigurationError } from '../services/run-config/errors.js';
import { executeGenerateMatrixCommand } from './commands/generate-matrix.js';
import { executeRunCommand } from './commands/run.js';
import { EXIT_CODES, UsageError } from './commands/shared-options.js';
import { executeValidateConfigCommand } from './commands/validate-config.js';

type Command = (args: string[]) => Promise<number>;

const COMMANDS: Record<string, Command> = {
  run: executeRunCommand,
  'generate-matrix': executeGenerateMatrixCommand,
  'validate-config': executeValidateConfigCommand,
};

/**
 * Display main CLI help
 */
function displayMainHelp(): void {
  console.log(`
screenshot-matrix
=================

Captures localized app screenshots on iOS simulators and Android emulators,
one job per platform, device and language.

Usage:
  screenshot-matrix <command> [options]

Commands:
  run                     Build the job matrix and capture screenshots
  generate-matrix         Print the job matrix for GitHub, GitLab or Azure CI
  validate-config         Check a run configuration

Options:
  -h, --help              Show this help message

For the options of a command, use:
  screenshot-matrix <command> --help
`);
}

/**
 * Parse arguments errors surface as TypeError with an ERR_PARSE_ARGS_* code
 */
function isParseArgsError(error: unknown): error is TypeError {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

async function main(argv: string[]): Promise<number> {
  const [name, ...rest] = argv;

  if (!name || name === '--help' || name === '-h') {
    displayMainHelp();
    return name ? EXIT_CODES.success : EXIT_CODES.failure;
  }

  const command = COMMANDS[name];
  if (!command) {
    console.error(`Unknown command '${name}'. Use --help for usage information.`);
    return EXIT_CODES.failure;
  }

  try {
    return await command(rest);
  } catch (error) {
    if (error instanceof UsageError || isParseArgsError(error)) {
      console.error(`Error: ${error.message}\nUse ${name} --help for usage information.`);
      return EXIT_CODES.failure;
    }
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      return EXIT_CODES.failure;
    }
    throw error;
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = EXIT_CODES.failure;
  });
