/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { TextDecoder } from 'node:util';
import { analyse } from 'chardet';
import iconv from 'iconv-lite';
import { debugLogger } from '../utils/debugLogger.js';
import { DecodeError, EncodingError } from '../utils/errors.js';
import { applyLineEnding, type LineEndingStyle } from './lineEndings.js';

export const SUPPORTED_ENCODINGS = [
  'utf-8',
  'utf-16le',
  'utf-16be',
  'utf-32le',
  'utf-32be',
  'latin-1',
  'cp1252',
  'cp437',
  'ascii',
] as const;

export type SupportedEncoding = (typeof SUPPORTED_ENCODINGS)[number];

export const DEFAULT_ENCODING: SupportedEncoding = 'utf-8';

/** Single-byte encoding that maps every byte value, so decoding cannot fail. */
export const FALLBACK_ENCODING: SupportedEncoding = 'latin-1';

/** Minimum statistical confidence (0-100) for a detected encoding to be used. */
export const DETECTION_CONFIDENCE_THRESHOLD = 70;

const ENCODING_ALIASES: Record<string, SupportedEncoding> = {
  utf8: 'utf-8',
  utf16le: 'utf-16le',
  ucs2: 'utf-16le',
  utf16be: 'utf-16be',
  utf32le: 'utf-32le',
  utf32be: 'utf-32be',
  latin1: 'latin-1',
  iso88591: 'latin-1',
  l1: 'latin-1',
  cp1252: 'cp1252',
  windows1252: 'cp1252',
  cp437: 'cp437',
  ibm437: 'cp437',
  '437': 'cp437',
  ascii: 'ascii',
  usascii: 'ascii',
};

const UTF_ENCODINGS: ReadonlySet<string> = new Set([
  'utf-8',
  'utf-16le',
  'utf-16be',
  'utf-32le',
  'utf-32be',
]);

/**
 * Maps an encoding label to its canonical spelling (`UTF8` -> `utf-8`,
 * `windows-1252` -> `cp1252`). Labels without an alias come back lower-cased.
 */
export function normalizeEncodingLabel(label: string): string {
  const lowered = label.trim().toLowerCase();
  return ENCODING_ALIASES[lowered.replace(/[^0-9a-z]/g, '')] ?? lowered;
}

export function isSupportedEncoding(label: string): label is SupportedEncoding {
  return (SUPPORTED_ENCODINGS as readonly string[]).includes(label);
}

// --- Unicode BOM detection ---------------------------------------------------

interface BOMInfo {
  encoding: SupportedEncoding;
  bomLength: number;
}

const BOM_BYTES: Partial<Record<string, readonly number[]>> = {
  'utf-8': [0xef, 0xbb, 0xbf],
  'utf-16le': [0xff, 0xfe],
  'utf-16be': [0xfe, 0xff],
  'utf-32le': [0xff, 0xfe, 0x00, 0x00],
  'utf-32be': [0x00, 0x00, 0xfe, 0xff],
};

/**
 * Detect a Unicode BOM (Byte Order Mark) if present.
 * Reads up to the first 4 bytes and returns encoding + BOM length, else null.
 */
export function detectBOM(buf: Uint8Array): BOMInfo | null {
  if (buf.length >= 4) {
    // UTF-32 LE: FF FE 00 00
    if (
      buf[0] === 0xff &&
      buf[1] === 0xfe &&
      buf[2] === 0x00 &&
      buf[3] === 0x00
    ) {
      return { encoding: 'utf-32le', bomLength: 4 };
    }
    // UTF-32 BE: 00 00 FE FF
    if (
      buf[0] === 0x00 &&
      buf[1] === 0x00 &&
      buf[2] === 0xfe &&
      buf[3] === 0xff
    ) {
      return { encoding: 'utf-32be', bomLength: 4 };
    }
  }
  if (buf.length >= 3) {
    // UTF-8: EF BB BF
    if (buf[0] === 0xef && buf[1] === 0xbb && buf[2] === 0xbf) {
      return { encoding: 'utf-8', bomLength: 3 };
    }
  }
  if (buf.length >= 2) {
    // UTF-16 LE: FF FE  (UTF-32 LE already matched above)
    if (buf[0] === 0xff && buf[1] === 0xfe) {
      return { encoding: 'utf-16le', bomLength: 2 };
    }
    // UTF-16 BE: FE FF
    if (buf[0] === 0xfe && buf[1] === 0xff) {
      return { encoding: 'utf-16be', bomLength: 2 };
    }
  }
  return null;
}

// --- Detection ---------------------------------------------------------------

function isAsciiBytes(bytes: Uint8Array): boolean {
  for (const byte of bytes) {
    if (byte > 0x7f) return false;
  }
  return true;
}

function isValidUtf8(bytes: Uint8Array): boolean {
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return true;
  } catch {
    return false;
  }
}

/**
 * Detects the text encoding of raw file bytes.
 *
 * 1. Empty input: `defaultEncoding`.
 * 2. A BOM names its encoding.
 * 3. Pure 7-bit input: `defaultEncoding` when it is ASCII-compatible, else UTF-8.
 * 4. Strictly valid UTF-8: UTF-8.
 * 5. Otherwise the statistical best guess, if its confidence exceeds
 *    DETECTION_CONFIDENCE_THRESHOLD; `defaultEncoding` if not.
 */
export function detectEncoding(
  bytes: Uint8Array,
  defaultEncoding: string = DEFAULT_ENCODING,
): string {
  if (bytes.length === 0) {
    return defaultEncoding;
  }

  const bom = detectBOM(bytes);
  if (bom) {
    return bom.encoding;
  }

  if (isAsciiBytes(bytes)) {
    return UTF_ENCODINGS.has(defaultEncoding) && defaultEncoding !== 'utf-8'
      ? 'utf-8'
      : defaultEncoding;
  }

  if (isValidUtf8(bytes)) {
    return 'utf-8';
  }

  const [best] = analyse(bytes);
  if (best && best.confidence > DETECTION_CONFIDENCE_THRESHOLD) {
    return normalizeEncodingLabel(best.name);
  }
  return defaultEncoding;
}

// --- Decoding ----------------------------------------------------------------

export interface DecodeResult {
  text: string;
  /** Canonical label of the encoding that decoded the bytes. */
  encoding: string;
  hasBOM: boolean;
}

function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decodes with a single encoding. Returns null when the label is unknown or
 * the bytes are not a faithful representation in that encoding (decoding and
 * re-encoding does not reproduce them).
 */
function tryDecode(bytes: Uint8Array, encoding: string): string | null {
  if (!iconv.encodingExists(encoding)) {
    return null;
  }
  const buf = toBuffer(bytes);
  const text = iconv.decode(buf, encoding, { stripBOM: false });
  const reencoded = iconv.encode(text, encoding, { addBOM: false });
  return reencoded.equals(buf) ? text : null;
}

/**
 * Decodes file bytes into text.
 *
 * Tries the hinted (or detected) encoding, then UTF-8, then the universal
 * single-byte fallback. Byte-level problems never raise.
 */
export function decodeBytes(
  bytes: Uint8Array,
  encodingHint?: string,
  defaultEncoding: string = DEFAULT_ENCODING,
): DecodeResult {
  const requested = encodingHint
    ? normalizeEncodingLabel(encodingHint)
    : detectEncoding(bytes, defaultEncoding);
  const bom = detectBOM(bytes);
  const candidates = [
    ...new Set([requested, DEFAULT_ENCODING, FALLBACK_ENCODING]),
  ];

  for (const encoding of candidates) {
    const hasBOM = bom !== null && bom.encoding === encoding;
    const body = hasBOM && bom ? bytes.subarray(bom.bomLength) : bytes;
    const text = tryDecode(body, encoding);
    if (text === null) {
      continue;
    }
    if (encoding !== requested) {
      debugLogger.warn(
        `Could not decode as ${requested}, fell back to ${encoding}`,
      );
    }
    return { text, encoding, hasBOM };
  }

  throw new DecodeError(
    FALLBACK_ENCODING,
    `Unable to decode ${bytes.length} bytes even with ${FALLBACK_ENCODING}`,
  );
}

// --- Encoding ----------------------------------------------------------------

export interface EncodeOptions {
  /** Prepend a byte order mark. Ignored for non-Unicode encodings. */
  bom?: boolean;
}

function findUnencodableCharacter(
  text: string,
  encoding: string,
): string | undefined {
  for (const char of text) {
    const roundTripped = iconv.decode(
      iconv.encode(char, encoding, { addBOM: false }),
      encoding,
      { stripBOM: false },
    );
    if (roundTripped !== char) {
      return char;
    }
  }
  return undefined;
}

function describeCharacter(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  return `'${char}' (U+${codePoint.toString(16).toUpperCase().padStart(4, '0')})`;
}

/**
 * Encodes buffer text for writing: line breaks are normalized and expanded to
 * `lineEnding`, then the text is encoded.
 *
 * @throws EncodingError if the encoding is unknown or cannot represent a
 * character of the text.
 */
export function encodeText(
  text: string,
  encoding: string,
  lineEnding: LineEndingStyle,
  options: EncodeOptions = {},
): Uint8Array {
  const label = normalizeEncodingLabel(encoding);
  if (!iconv.encodingExists(label)) {
    throw new EncodingError(label, `Unknown encoding: ${encoding}`);
  }

  const content = applyLineEnding(text, lineEnding);
  const encoded = iconv.encode(content, label, { addBOM: false });
  if (iconv.decode(encoded, label, { stripBOM: false }) !== content) {
    const character = findUnencodableCharacter(content, label);
    const what = character ? describeCharacter(character) : 'the content';
    throw new EncodingError(
      label,
      `Cannot encode ${what} with ${label}`,
      character,
    );
  }

  const bomBytes = BOM_BYTES[label];
  if (options.bom && bomBytes) {
    return Buffer.concat([Buffer.from(bomBytes), encoded]);
  }
  return encoded;
}
