/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  backupFile,
  getFileInfo,
  readDocument,
  writeDocument,
} from './documentFile.js';
import { EncodingError, FileNotFoundError } from '../utils/errors.js';
import { debugLogger } from '../utils/debugLogger.js';
import { LINE_ENDING_STYLES } from '../codec/lineEndings.js';

vi.mock('chardet', () => ({ analyse: vi.fn(() => []) }));

describe('documentFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'linepad-doc-'));
    vi.spyOn(debugLogger, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readDocument', () => {
    it('splits lines and drops the final line break', () => {
      const filePath = path.join(tempDir, 'hello.txt');
      fs.writeFileSync(filePath, 'Hello\nWorld\n');

      expect(readDocument(filePath)).toEqual({
        lines: ['Hello', 'World'],
        encoding: 'utf-8',
        hasBOM: false,
        lineEnding: 'LF',
      });
    });

    it('reports CRLF files and strips a UTF-8 BOM', () => {
      const filePath = path.join(tempDir, 'bom.txt');
      fs.writeFileSync(
        filePath,
        Buffer.concat([
          Buffer.from([0xef, 0xbb, 0xbf]),
          Buffer.from('café\r\nbar', 'utf-8'),
        ]),
      );

      expect(readDocument(filePath)).toEqual({
        lines: ['café', 'bar'],
        encoding: 'utf-8',
        hasBOM: true,
        lineEnding: 'CRLF',
      });
    });

    it('reads an empty file as a single empty line', () => {
      const filePath = path.join(tempDir, 'empty.txt');
      fs.writeFileSync(filePath, '');
      const result = readDocument(filePath);
      expect(result.lines).toEqual(['']);
      expect(result.lineEnding).toBeNull();
    });

    it('honours an encoding hint', () => {
      const filePath = path.join(tempDir, 'dos.txt');
      fs.writeFileSync(filePath, Buffer.from([0xc4, 0xc4, 0x0d, 0x0a, 0x41]));
      expect(readDocument(filePath, 'cp437').lines).toEqual(['──', 'A']);
    });

    it('falls back to latin-1 when the bytes are not UTF-8', () => {
      const filePath = path.join(tempDir, 'legacy.txt');
      fs.writeFileSync(filePath, Buffer.from([0x63, 0x61, 0x66, 0xe9]));

      const result = readDocument(filePath);
      expect(result.lines).toEqual(['café']);
      expect(result.encoding).toBe('latin-1');
      expect(debugLogger.warn).toHaveBeenCalledWith(
        'Could not decode as utf-8, fell back to latin-1',
      );
    });

    it('throws FileNotFoundError for a missing path', () => {
      const filePath = path.join(tempDir, 'missing.txt');
      expect(() => readDocument(filePath)).toThrow(FileNotFoundError);
      expect(() => readDocument(filePath)).toThrow(`File not found: ${filePath}`);
    });
  });

  describe('writeDocument', () => {
    it('ends every line with the requested line ending and creates directories', () => {
      const filePath = path.join(tempDir, 'nested', 'dir', 'out.txt');
      const written = writeDocument(filePath, ['one', 'two', 'three'], {
        encoding: 'utf-8',
        lineEnding: 'CRLF',
      });

      expect(fs.readFileSync(filePath, 'utf-8')).toBe(
        'one\r\ntwo\r\nthree\r\n',
      );
      expect(written).toBe(17);
    });

    it('writes a BOM when asked', () => {
      const filePath = path.join(tempDir, 'bom.txt');
      writeDocument(filePath, ['a'], {
        encoding: 'utf-8',
        lineEnding: 'LF',
        bom: true,
      });
      expect([...fs.readFileSync(filePath)]).toEqual([
        0xef, 0xbb, 0xbf, 0x61, 0x0a,
      ]);
    });

    it('leaves the existing file untouched when encoding fails', () => {
      const filePath = path.join(tempDir, 'keep.txt');
      fs.writeFileSync(filePath, 'original');

      expect(() =>
        writeDocument(filePath, ['snow ☃'], {
          encoding: 'latin-1',
          lineEnding: 'LF',
          backup: true,
        }),
      ).toThrow(EncodingError);
      expect(fs.readFileSync(filePath, 'utf-8')).toBe('original');
      expect(fs.existsSync(filePath + '.bak')).toBe(false);
    });

    it('keeps the previous contents in a .bak file', () => {
      const filePath = path.join(tempDir, 'doc.txt');
      fs.writeFileSync(filePath, 'old');

      writeDocument(filePath, ['new'], {
        encoding: 'utf-8',
        lineEnding: 'LF',
        backup: true,
      });
      expect(fs.readFileSync(filePath, 'utf-8')).toBe('new\n');
      expect(fs.readFileSync(filePath + '.bak', 'utf-8')).toBe('old');
    });

    it('round-trips through readDocument in a single-byte encoding', () => {
      const filePath = path.join(tempDir, 'cp1252.txt');
      writeDocument(filePath, ['price: 5€', 'naïve'], {
        encoding: 'cp1252',
        lineEnding: 'CR',
      });
      const result = readDocument(filePath, 'windows-1252');
      expect(result.lines).toEqual(['price: 5€', 'naïve']);
      expect(result.encoding).toBe('cp1252');
      expect(result.lineEnding).toBe('CR');
    });
  });

  describe('save and reload', () => {
    const documents: string[][] = [
      [''],
      ['', ''],
      ['a'],
      ['a', ''],
      ['x', '', 'y'],
      ['café', 'naïve', ''],
    ];
    const cases = ['utf-8', 'utf-16le', 'cp437', 'latin-1'].flatMap(
      (encoding) =>
        LINE_ENDING_STYLES.flatMap((lineEnding) =>
          documents.map((lines) => ({
            encoding,
            lineEnding,
            lines,
            label: JSON.stringify(lines),
          })),
        ),
    );

    it.each(cases)(
      'gives back $label in $encoding with $lineEnding',
      ({ encoding, lineEnding, lines }) => {
        const filePath = path.join(tempDir, 'roundtrip.txt');
        writeDocument(filePath, lines, { encoding, lineEnding });

        const result = readDocument(filePath, encoding);
        expect(result.lines).toEqual(lines);
        expect(result.encoding).toBe(encoding);
        expect(result.lineEnding).toBe(lineEnding);
      },
    );
  });

  describe('backupFile', () => {
    it('returns the backup path without copying a missing file', () => {
      const filePath = path.join(tempDir, 'none.txt');
      expect(backupFile(filePath)).toBe(filePath + '.bak');
      expect(fs.existsSync(filePath + '.bak')).toBe(false);
    });
  });

  describe('getFileInfo', () => {
    it('describes a missing file', () => {
      expect(getFileInfo(path.join(tempDir, 'nope.txt'))).toEqual({
        exists: false,
        size: 0,
        modified: null,
        readable: false,
        writable: false,
      });
    });

    it('describes an existing file', () => {
      const filePath = path.join(tempDir, 'info.txt');
      fs.writeFileSync(filePath, 'abc');
      const info = getFileInfo(filePath);
      expect(info.exists).toBe(true);
      expect(info.size).toBe(3);
      expect(info.modified).toBeInstanceOf(Date);
      expect(info.readable).toBe(true);
    });

    it('reports a directory as neither readable nor writable', () => {
      const info = getFileInfo(tempDir);
      expect(info.exists).toBe(true);
      expect(info.readable).toBe(false);
      expect(info.writable).toBe(false);
    });
  });
});
