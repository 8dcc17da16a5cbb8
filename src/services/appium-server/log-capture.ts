/**
 * Log capture utilities for Appium server output
 */

import { Writable } from 'node:stream';
import type { AppiumLogEntry, AppiumLogLevel } from './types.js';

/**
 * Parse log level from a log line
 */
export function parseLogLevel(line: string): AppiumLogLevel {
  const lowerLine = line.toLowerCase();

  if (lowerLine.includes('[error]') || lowerLine.includes('error:') || lowerLine.includes('err:')) {
    return 'error';
  }
  if (lowerLine.includes('[warn]') || lowerLine.includes('warning:') || lowerLine.includes('warn:')) {
    return 'warn';
  }
  if (lowerLine.includes('[debug]') || lowerLine.includes('debug:')) {
    return 'debug';
  }
  return 'info';
}

/**
 * Ring buffer of the most recent lines
 */
export class LogBuffer {
  private entries: AppiumLogEntry[] = [];

  constructor(private maxSize: number = 200) {}

  add(entry: AppiumLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxSize) {
      this.entries.shift();
    }
  }

  getRecent(count: number): AppiumLogEntry[] {
    return this.entries.slice(-count);
  }

  size(): number {
    return this.entries.length;
  }
}

/**
 * Writable stream that splits process output into entries. Partial lines
 * are held until their newline arrives.
 */
export class LogCaptureStream extends Writable {
  private pending = '';

  constructor(
    private buffer: LogBuffer,
    private onEntry?: (entry: AppiumLogEntry) => void
  ) {
    super();
  }

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    const text = this.pending + chunk.toString();
    const lines = text.split('\n');
    this.pending = lines.pop() ?? '';

    for (const line of lines) {
      this.emitLine(line);
    }
    callback();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.emitLine(this.pending);
    this.pending = '';
    callback();
  }

  private emitLine(line: string): void {
    const message = line.trim();
    if (!message) return;

    const entry: AppiumLogEntry = { timestamp: new Date(), level: parseLogLevel(message), message };
    this.buffer.add(entry);
    this.onEntry?.(entry);
  }

  getBuffer(): LogBuffer {
    return this.buffer;
  }
}
