/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DebugLogger, debugLogger } from './debugLogger.js';

describe('DebugLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should call console.log with the correct arguments', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const data = { key: 'value' };
    debugLogger.log('This is a log message', data);
    expect(spy).toHaveBeenCalledWith('This is a log message', data);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('should call console.warn with the correct arguments', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    debugLogger.warn('Decoding fell back', 'latin-1');
    expect(spy).toHaveBeenCalledWith('Decoding fell back', 'latin-1');
  });

  it('should call console.error with the correct arguments', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new Error('Something went wrong');
    debugLogger.error('This is an error message', error);
    expect(spy).toHaveBeenCalledWith('This is an error message', error);
  });

  it('should call console.debug with the correct arguments', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    debugLogger.debug('Loaded', 3, true);
    expect(spy).toHaveBeenCalledWith('Loaded', 3, true);
  });

  it('appends formatted entries to the log file when one is configured', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'debugLogger-test-'));
    const logFile = path.join(dir, 'debug.log');
    try {
      const logger = new DebugLogger(logFile);
      logger.warn('count=%d', 7);
      await logger.close();

      const content = fs.readFileSync(logFile, 'utf-8');
      expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN\] count=7\n$/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
