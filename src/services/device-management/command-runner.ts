/**
 * Runs simctl, adb and emulator commands
 */

import { execFile, spawn } from 'node:child_process';
import { promisify } from 'node:util';
import { createModuleLogger } from '../../utils/logger.js';
import { CommandError } from './errors.js';
import type { BackgroundProcess, CommandOptions, CommandResult, CommandRunner } from './types.js';

const execFileAsync = promisify(execFile);
const logger = createModuleLogger('device-management:command');

const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_BUFFER = 32 * 1024 * 1024;

function outputOf(error: object, key: 'stdout' | 'stderr'): string {
  if (key in error) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'string') {
      return value;
    }
  }
  return '';
}

/**
 * Limit a log to its tail, marking the cut
 */
export function truncateLog(text: string, maxLength: number, marker: string): string {
  if (text.length <= maxLength) {
    return text;
  }
  return marker + text.slice(text.length - maxLength);
}

export class ExecCommandRunner implements CommandRunner {
  async run(command: string, args: readonly string[], options: CommandOptions = {}): Promise<CommandResult> {
    const commandLine = [command, ...args].join(' ');
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    logger.debug({ command: commandLine, timeoutMs }, 'Running command');

    try {
      const { stdout, stderr } = await execFileAsync(command, [...args], {
        timeout: timeoutMs,
        signal: options.signal,
        maxBuffer: MAX_BUFFER,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        encoding: 'utf8',
      });
      return { exitCode: 0, stdout, stderr };
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      if (!(error instanceof Error)) {
        throw error;
      }

      const stdout = outputOf(error, 'stdout');
      const stderr = outputOf(error, 'stderr');
      const code: unknown = Reflect.get(error, 'code');
      const killed: unknown = Reflect.get(error, 'killed');

      if (killed === true) {
        throw new CommandError(
          `Command timed out after ${timeoutMs}ms: ${commandLine}`,
          'COMMAND_TIMEOUT',
          commandLine,
          undefined,
          stderr
        );
      }

      if (typeof code === 'number') {
        logger.debug({ command: commandLine, exitCode: code, stderr: stderr.trim() }, 'Command exited with failure');
        return { exitCode: code, stdout, stderr };
      }

      // ENOENT and friends: the tool itself could not be started
      throw new CommandError(
        `Command could not be started: ${commandLine}: ${error.message}`,
        'COMMAND_FAILED',
        commandLine,
        undefined,
        stderr
      );
    }
  }

  spawnBackground(
    command: string,
    args: readonly string[],
    options: Omit<CommandOptions, 'timeoutMs'> = {}
  ): BackgroundProcess {
    const commandLine = [command, ...args].join(' ');
    logger.debug({ command: commandLine }, 'Spawning background process');

    const child = spawn(command, [...args], {
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: 'ignore',
      detached: false,
      signal: options.signal,
    });

    child.on('error', (error) => {
      logger.warn({ command: commandLine, error: error.message }, 'Background process error');
    });
    child.on('exit', (code, signal) => {
      logger.debug({ command: commandLine, code, signal }, 'Background process exited');
    });

    return {
      pid: child.pid,
      kill: (signal?: NodeJS.Signals) => child.kill(signal),
    };
  }
}
