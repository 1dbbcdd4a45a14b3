/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Keep a developer's debug log file out of test runs
if (process.env.LINEPAD_DEBUG_LOG_FILE !== undefined) {
  delete process.env.LINEPAD_DEBUG_LOG_FILE;
}

import { vi, afterEach } from 'vitest';
import { editorEvents } from './src/utils/events.js';

// Increase max listeners to avoid warnings in large test suites
editorEvents.setMaxListeners(100);

afterEach(() => {
  vi.unstubAllEnvs();
  editorEvents.drainBacklogs();
});
