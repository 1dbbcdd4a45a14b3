/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_ENCODING, decodeBytes, encodeText } from '../codec/encoding.js';
import {
  detectLineEnding,
  splitLines,
  type LineEndingStyle,
} from '../codec/lineEndings.js';
import { FileNotFoundError, isNodeError } from '../utils/errors.js';

export const BACKUP_SUFFIX = '.bak';

export interface ReadDocumentResult {
  lines: string[];
  encoding: string;
  hasBOM: boolean;
  /** Dominant line ending on disk, or null when the file has no line break. */
  lineEnding: LineEndingStyle | null;
}

export interface WriteDocumentOptions {
  encoding: string;
  lineEnding: LineEndingStyle;
  bom?: boolean;
  /** Copy an existing file to `<path>.bak` before overwriting it. */
  backup?: boolean;
}

export interface FileInfo {
  exists: boolean;
  size: number;
  modified: Date | null;
  readable: boolean;
  writable: boolean;
}

/**
 * Reads and decodes a text file into buffer lines.
 *
 * @throws FileNotFoundError if nothing exists at `filePath`.
 */
export function readDocument(
  filePath: string,
  encodingHint?: string,
  defaultEncoding: string = DEFAULT_ENCODING,
): ReadDocumentResult {
  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(filePath);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new FileNotFoundError(filePath);
    }
    throw error;
  }

  const { text, encoding, hasBOM } = decodeBytes(
    bytes,
    encodingHint,
    defaultEncoding,
  );
  return {
    lines: splitLines(text),
    encoding,
    hasBOM,
    lineEnding: detectLineEnding(text),
  };
}

/**
 * Encodes `lines` and writes them to `filePath`, creating missing parent
 * directories. Every line, the last one included, ends with
 * `options.lineEnding`, so a blank last line survives a reload.
 *
 * Encoding happens before anything touches the disk, so an EncodingError
 * leaves the existing file (and any backup) as it was.
 *
 * @returns The number of bytes written.
 */
export function writeDocument(
  filePath: string,
  lines: readonly string[],
  options: WriteDocumentOptions,
): number {
  const bytes = encodeText(
    lines.map((line) => line + '\n').join(''),
    options.encoding,
    options.lineEnding,
    { bom: options.bom },
  );

  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  if (options.backup) {
    backupFile(filePath);
  }
  fs.writeFileSync(filePath, bytes);
  return bytes.length;
}

/**
 * Copies `filePath` to `<filePath>.bak` if it exists.
 * @returns The backup path, whether or not a copy was made.
 */
export function backupFile(filePath: string): string {
  const backupPath = filePath + BACKUP_SUFFIX;
  if (fs.existsSync(filePath)) {
    fs.copyFileSync(filePath, backupPath);
  }
  return backupPath;
}

function canAccess(filePath: string, mode: number): boolean {
  try {
    fs.accessSync(filePath, mode);
    return true;
  } catch (_: unknown) {
    return false;
  }
}

export function getFileInfo(filePath: string): FileInfo {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(filePath);
  } catch (error: unknown) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return {
        exists: false,
        size: 0,
        modified: null,
        readable: false,
        writable: false,
      };
    }
    throw error;
  }

  const isFile = stats.isFile();
  return {
    exists: true,
    size: stats.size,
    modified: stats.mtime,
    readable: isFile && canAccess(filePath, fs.constants.R_OK),
    writable: isFile && canAccess(filePath, fs.constants.W_OK),
  };
}
