/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import stripJsonComments from 'strip-json-comments';
import { debugLogger } from '../utils/debugLogger.js';
import { getErrorMessage } from '../utils/errors.js';
import { editorEvents } from '../utils/events.js';
import {
  createSettings,
  editorSettingsSchema,
  type EditorSettings,
} from './settingsSchema.js';

export const LINEPAD_DIR = '.linepad';
export const SETTINGS_FILENAME = 'settings.json';

export interface SettingsError {
  message: string;
  path: string;
  severity: 'error' | 'warning';
}

export interface LoadedSettings {
  settings: EditorSettings;
  errors: SettingsError[];
}

export function getUserSettingsPath(): string {
  const homeDir = os.homedir();
  if (!homeDir) {
    return path.join(os.tmpdir(), LINEPAD_DIR, SETTINGS_FILENAME);
  }
  return path.join(homeDir, LINEPAD_DIR, SETTINGS_FILENAME);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function reportErrors(errors: readonly SettingsError[]): void {
  for (const error of errors) {
    const message = `${error.message} (${error.path})`;
    debugLogger.warn(message);
    editorEvents.emitFeedback(error.severity, message);
  }
}

/**
 * Reads a JSON-with-comments settings file on top of the defaults.
 *
 * A missing file is not an error. An unreadable file, or one that is not a
 * JSON object, yields the defaults plus an `error` entry. A key whose value
 * fails validation keeps its default and yields a `warning` entry. Unknown
 * keys are ignored.
 */
export function loadSettings(
  filePath: string = getUserSettingsPath(),
): LoadedSettings {
  const errors: SettingsError[] = [];

  let raw: unknown;
  try {
    if (!fs.existsSync(filePath)) {
      return { settings: createSettings(), errors };
    }
    const content = fs.readFileSync(filePath, 'utf-8');
    raw = JSON.parse(stripJsonComments(content));
  } catch (error: unknown) {
    errors.push({
      message: getErrorMessage(error),
      path: filePath,
      severity: 'error',
    });
    reportErrors(errors);
    return { settings: createSettings(), errors };
  }

  if (!isRecord(raw)) {
    errors.push({
      message: 'Settings file is not a valid JSON object.',
      path: filePath,
      severity: 'error',
    });
    reportErrors(errors);
    return { settings: createSettings(), errors };
  }

  const valid: Record<string, unknown> = {};
  for (const [key, fieldSchema] of Object.entries(editorSettingsSchema.shape)) {
    if (!(key in raw)) {
      continue;
    }
    const result = fieldSchema.safeParse(raw[key]);
    if (result.success) {
      valid[key] = result.data;
    } else {
      const reason = result.error.issues[0]?.message ?? 'Invalid value';
      errors.push({
        message: `Invalid value for "${key}": ${reason}. Using the default.`,
        path: filePath,
        severity: 'warning',
      });
    }
  }

  reportErrors(errors);
  return {
    settings: editorSettingsSchema.parse({ ...createSettings(), ...valid }),
    errors,
  };
}

/**
 * Writes `settings` as indented JSON, creating the parent directory if
 * needed, and notifies `settings-changed` subscribers.
 */
export function saveSettings(
  filePath: string,
  settings: EditorSettings,
): void {
  const dirPath = path.dirname(filePath);
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
  fs.writeFileSync(filePath, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  editorEvents.emitSettingsChanged();
}
