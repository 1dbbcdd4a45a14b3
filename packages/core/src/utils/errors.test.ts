/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect } from 'vitest';
import {
  DecodeError,
  EncodingError,
  FileNotFoundError,
  NoFilePathError,
  getErrorMessage,
  isNodeError,
} from './errors.js';

describe('isNodeError', () => {
  it('should return true for errors carrying a code', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isNodeError(error)).toBe(true);
  });

  it('should return false for plain errors and non-errors', () => {
    expect(isNodeError(new Error('plain'))).toBe(false);
    expect(isNodeError({ code: 'ENOENT' })).toBe(false);
  });
});

describe('getErrorMessage', () => {
  it('should return the message of an Error', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify other values', () => {
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage('text')).toBe('text');
  });
});

describe('error classes', () => {
  it('FileNotFoundError keeps the path and a readable message', () => {
    const error = new FileNotFoundError('/tmp/missing.txt');
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('FileNotFoundError');
    expect(error.filePath).toBe('/tmp/missing.txt');
    expect(error.message).toBe('File not found: /tmp/missing.txt');
  });

  it('EncodingError keeps the encoding and offending character', () => {
    const error = new EncodingError('ascii', 'cannot encode', 'é');
    expect(error.name).toBe('EncodingError');
    expect(error.encoding).toBe('ascii');
    expect(error.character).toBe('é');
  });

  it('DecodeError and NoFilePathError set their names', () => {
    expect(new DecodeError('latin-1', 'x').name).toBe('DecodeError');
    const noPath = new NoFilePathError();
    expect(noPath.name).toBe('NoFilePathError');
    expect(noPath.message).toBe('No file path specified');
  });
});
