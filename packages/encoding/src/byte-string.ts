/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { TextDecodeError } from '@fem-canon/data';

/**
 * How a byte sequence is turned into text.
 * - strict: every value must be a byte and the bytes must be valid UTF-8
 * - lenient: non-byte values and invalid UTF-8 sequences are dropped
 */
export type DecodeMode = 'strict' | 'lenient';

const strictDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const plainDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * Decode a raw byte sequence (possibly nested, as exported matrices are)
 * into text. Strict mode throws TextDecodeError; lenient mode never throws.
 */
export function decodeBytes(raw: unknown, mode: DecodeMode, path?: string): string {
  const values: unknown[] = [];
  if (!collect(raw, values)) {
    if (mode === 'lenient') return '';
    throw new TextDecodeError('Expected a byte sequence', path);
  }

  if (mode === 'lenient') {
    const bytes = values.filter(isByte);
    return plainDecoder.decode(dropInvalidSequences(Uint8Array.from(bytes)));
  }

  const bytes = new Uint8Array(values.length);
  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    if (!isByte(value)) {
      throw new TextDecodeError(`Value ${String(value)} at offset ${i} is not a byte`, path);
    }
    bytes[i] = value;
  }
  try {
    return strictDecoder.decode(bytes);
  } catch (error) {
    throw new TextDecodeError('Invalid UTF-8 byte sequence', path, { cause: error });
  }
}

function collect(raw: unknown, out: unknown[]): boolean {
  if (!Array.isArray(raw)) return false;
  for (const item of raw) {
    if (Array.isArray(item)) {
      collect(item, out);
    } else {
      out.push(item);
    }
  }
  return true;
}

function isByte(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * Keep only well-formed UTF-8 sequences. A malformed sequence is dropped
 * one byte at a time, so a later valid sequence is never swallowed.
 */
function dropInvalidSequences(bytes: Uint8Array): Uint8Array {
  const kept: number[] = [];
  let i = 0;
  while (i < bytes.length) {
    const length = sequenceLength(bytes, i);
    if (length === 0) {
      i += 1;
      continue;
    }
    for (let k = 0; k < length; k++) kept.push(bytes[i + k]);
    i += length;
  }
  return Uint8Array.from(kept);
}

/** Length of the well-formed sequence starting at i, or 0 */
function sequenceLength(bytes: Uint8Array, i: number): number {
  const lead = bytes[i];
  if (lead < 0x80) return 1;

  let length: number;
  let low = 0x80;
  let high = 0xbf;
  if (lead >= 0xc2 && lead <= 0xdf) {
    length = 2;
  } else if (lead === 0xe0) {
    length = 3;
    low = 0xa0;
  } else if (lead === 0xed) {
    length = 3;
    high = 0x9f;
  } else if (lead >= 0xe1 && lead <= 0xef) {
    length = 3;
  } else if (lead === 0xf0) {
    length = 4;
    low = 0x90;
  } else if (lead >= 0xf1 && lead <= 0xf3) {
    length = 4;
  } else if (lead === 0xf4) {
    length = 4;
    high = 0x8f;
  } else {
    return 0;
  }

  if (i + length > bytes.length) return 0;
  const second = bytes[i + 1];
  if (second < low || second > high) return 0;
  for (let k = 2; k < length; k++) {
    const next = bytes[i + k];
    if (next < 0x80 || next > 0xbf) return 0;
  }
  return length;
}
