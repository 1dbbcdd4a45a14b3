/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/* eslint-disable no-console */
import * as fs from 'node:fs';
import * as util from 'node:util';

export const DEBUG_LOG_FILE_ENV = 'LINEPAD_DEBUG_LOG_FILE';

type LogLevel = 'LOG' | 'WARN' | 'ERROR' | 'DEBUG';

/**
 * Developer-facing diagnostics for the editing engine: decode fallbacks,
 * settings entries that were rejected, and every document load and save
 * (path, encoding, size).
 *
 * Entries go to the console. When LINEPAD_DEBUG_LOG_FILE is set they are
 * also appended to that file, since a full-screen terminal session leaves
 * no console output to read afterwards.
 */
class DebugLogger {
  private logStream: fs.WriteStream | undefined;

  constructor(logFile: string | undefined = process.env[DEBUG_LOG_FILE_ENV]) {
    this.logStream = logFile
      ? fs.createWriteStream(logFile, { flags: 'a' })
      : undefined;
    this.logStream?.on('error', (err) => {
      console.error('Error writing to debug log stream:', err);
    });
  }

  private write(level: LogLevel, args: unknown[]): void {
    this.logStream?.write(
      `[${new Date().toISOString()}] [${level}] ${util.format(...args)}\n`,
    );
    switch (level) {
      case 'WARN':
        console.warn(...args);
        break;
      case 'ERROR':
        console.error(...args);
        break;
      case 'DEBUG':
        console.debug(...args);
        break;
      default:
        console.log(...args);
    }
  }

  log(...args: unknown[]): void {
    this.write('LOG', args);
  }

  warn(...args: unknown[]): void {
    this.write('WARN', args);
  }

  error(...args: unknown[]): void {
    this.write('ERROR', args);
  }

  debug(...args: unknown[]): void {
    this.write('DEBUG', args);
  }

  /** Flushes and closes the log file, if one is open. */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = undefined;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }
}

export { DebugLogger };
export const debugLogger = new DebugLogger();
