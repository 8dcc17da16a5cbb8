/**
 * Structured logging utility using Pino
 * Features:
 * - JSON format for CI, pretty-print for local runs
 * - Configurable log levels
 * - File output with rotation
 * - Sensitive data redaction
 */

import pino from 'pino';
import * as rfs from 'rotating-file-stream';
import { existsSync, mkdirSync } from 'node:fs';
import { basename, dirname } from 'node:path';

/**
 * Log levels compatible with Pino
 */
export enum LogLevel {
  TRACE = 'trace',
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  SILENT = 'silent',
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   */
  level?: LogLevel | string;

  /**
   * Path to log file (if omitted, logs only to stdout)
   */
  file?: string;

  /**
   * Enable pretty printing (default: true in development)
   */
  pretty?: boolean;

  /**
   * Rotate the log file instead of appending to it forever
   */
  enableFileRotation?: boolean;

  /**
   * Maximum size of each log file before rotation (e.g., '10M')
   */
  maxSize?: string;

  /**
   * Maximum number of rotated log files to keep
   */
  maxFiles?: number;

  /**
   * Additional redaction paths, 'path.to.property' or 'path.*'
   */
  redactPaths?: string[];

  /**
   * Service/module name for log context
   */
  name?: string;
}

/**
 * Default paths to redact. Capability maps and env overrides can carry
 * cloud-device credentials.
 */
const DEFAULT_REDACT_PATHS = [
  'password',
  'secret',
  'token',
  'apiKey',
  'accessKey',
  'authorization',
  'capabilities.accessKey',
  'capabilities.extensions.accessKey',
  'env.*_TOKEN',
  '*.password',
  '*.token',
  '*.apiKey',
  '*.*.password',
  '*.*.token',
];

const VALID_LEVELS: readonly pino.LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLevel(value: string): value is pino.LevelWithSilent {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Map string level to Pino level
 */
function normalizeLevel(level: string | undefined): pino.LevelWithSilent {
  const normalized = (level || 'info').toLowerCase();
  return isLevel(normalized) ? normalized : 'info';
}

/**
 * Create a rotating file stream for log output
 */
function createRotatingFileStream(
  filePath: string,
  maxSize: string = '10M',
  maxFiles: number = 5
): rfs.RotatingFileStream {
  const dir = dirname(filePath);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filename = basename(filePath) || 'screenshot-matrix.log';

  return rfs.createStream(filename, {
    path: dir,
    size: maxSize,
    interval: '1d',
    compress: 'gzip',
    maxFiles,
    history: `${filename}.history`,
  });
}

function shouldUsePrettyPrint(config: LoggerConfig): boolean {
  if (config.pretty !== undefined) {
    return config.pretty;
  }
  return process.env.NODE_ENV === 'development';
}

/**
 * Create a Pino logger with the given configuration
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const level = normalizeLevel(config.level);
  const isPretty = shouldUsePrettyPrint(config);

  const redactPaths = [...DEFAULT_REDACT_PATHS, ...(config.redactPaths ?? [])];

  const baseOptions: pino.LoggerOptions = {
    level,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  };

  if (config.name) {
    baseOptions.name = config.name;
  }

  // Rotation needs a live stream, so console and file are combined with multistream
  if (config.file && config.enableFileRotation) {
    const fileStream = createRotatingFileStream(config.file, config.maxSize, config.maxFiles);
    const streamLevel: pino.Level = level === 'silent' ? 'fatal' : level;

    return pino(
      baseOptions,
      pino.multistream([
        { stream: process.stdout, level: streamLevel },
        { stream: fileStream, level: streamLevel },
      ])
    );
  }

  const transports: pino.TransportTargetOptions[] = [];

  if (isPretty) {
    transports.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    });
  }

  if (config.file && !config.enableFileRotation) {
    transports.push({
      target: 'pino/file',
      options: { destination: config.file, mkdir: true },
    });
  }

  if (transports.length === 1) {
    baseOptions.transport = transports[0];
  } else if (transports.length > 1) {
    baseOptions.transport = { targets: transports };
  }

  return pino(baseOptions);
}

/**
 * Logger class that wraps Pino for a familiar API
 */
export class Logger {
  private pinoInstance: pino.Logger;
  private config: LoggerConfig;

  constructor(config: LoggerConfig = {}, instance?: pino.Logger) {
    this.config = config;
    this.pinoInstance = instance ?? createLogger(config);
  }

  /**
   * Log a trace message
   */
  trace(msg: string, ...args: unknown[]): void;
  trace(obj: object, msg?: string): void;
  trace(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('trace', msgOrObj, rest);
  }

  /**
   * Log a debug message
   */
  debug(msg: string, ...args: unknown[]): void;
  debug(obj: object, msg?: string): void;
  debug(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('debug', msgOrObj, rest);
  }

  /**
   * Log an info message
   */
  info(msg: string, ...args: unknown[]): void;
  info(obj: object, msg?: string): void;
  info(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('info', msgOrObj, rest);
  }

  /**
   * Log a warning message
   */
  warn(msg: string, ...args: unknown[]): void;
  warn(obj: object, msg?: string): void;
  warn(msgOrObj: string | object, ...rest: unknown[]): void {
    this.write('warn', msgOrObj, rest);
  }

  /**
   * Log an error message
   */
  error(msg: string, ...args: unknown[]): void;
  error(err: Error, msg?: string): void;
  error(obj: object, msg?: string): void;
  error(msgOrErrOrObj: string | Error | object, ...rest: unknown[]): void {
    if (msgOrErrOrObj instanceof Error) {
      const msg = typeof rest[0] === 'string' ? rest[0] : msgOrErrOrObj.message;
      this.pinoInstance.error({ err: msgOrErrOrObj }, msg);
      return;
    }
    this.write('error', msgOrErrOrObj, rest);
  }

  private write(level: 'trace' | 'debug' | 'info' | 'warn' | 'error', msgOrObj: string | object, rest: unknown[]): void {
    if (typeof msgOrObj === 'string') {
      if (rest.length > 0) {
        this.pinoInstance[level]({ args: rest }, msgOrObj);
      } else {
        this.pinoInstance[level](msgOrObj);
      }
      return;
    }
    const msg = typeof rest[0] === 'string' ? rest[0] : undefined;
    this.pinoInstance[level](msgOrObj, msg);
  }

  setLevel(level: LogLevel | string): void {
    this.pinoInstance.level = normalizeLevel(level);
  }

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, string | number>): Logger {
    return new Logger({ ...this.config }, this.pinoInstance.child(bindings));
  }
}

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

/**
 * Default global logger instance, configured from the environment
 */
const globalLogger = new Logger({
  level: defaultLevel(),
  file: process.env.LOG_FILE,
  pretty: process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV !== 'test',
  enableFileRotation: true,
  maxSize: '10M',
  maxFiles: 5,
  name: 'screenshot-matrix',
});

export { globalLogger as logger };

/**
 * Create a new logger with a module name prefix
 */
export function createModuleLogger(moduleName: string): Logger {
  return globalLogger.child({ module: moduleName });
}

export type { pino };
