/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'Failed to get error details';
  }
}

/** Raised by load when the target path does not exist. */
export class FileNotFoundError extends Error {
  constructor(readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Raised at save time when the target encoding is unknown or cannot represent
 * a character of the content. Nothing has been written when this is thrown.
 */
export class EncodingError extends Error {
  constructor(
    readonly encoding: string,
    message: string,
    readonly character?: string,
  ) {
    super(message);
    this.name = 'EncodingError';
  }
}

/**
 * Raised when even the universal fallback encoding fails to decode a byte
 * sequence. Single-byte fallback decoding is total, so reaching this is an
 * invariant violation.
 */
export class DecodeError extends Error {
  constructor(
    readonly encoding: string,
    message: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class NoFilePathError extends Error {
  constructor(message = 'No file path specified') {
    super(message);
    this.name = 'NoFilePathError';
  }
}
