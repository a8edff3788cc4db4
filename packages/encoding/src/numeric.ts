/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Numeric coercion for exported arrays.
 *
 * Source arrays arrive as scalars or (nested) row-major matrices; the
 * canonical record only stores flat sequences.
 */

import { FemConversionError } from '@fem-canon/data';

/**
 * Flatten a scalar or nested array into a flat numeric sequence,
 * row-major. Anything that is not a finite number is rejected.
 */
export function flattenNumeric(raw: unknown, path?: string): number[] {
  const out: number[] = [];
  visit(raw, out, path);
  return out;
}

function visit(raw: unknown, out: number[], path: string | undefined): void {
  if (Array.isArray(raw)) {
    for (const item of raw) visit(item, out, path);
    return;
  }
  if (typeof raw !== 'number' || !Number.isFinite(raw)) {
    throw new FemConversionError(
      'InvalidFieldValue',
      `Expected a finite number, got ${describe(raw)}`,
      path
    );
  }
  out.push(raw);
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `"${value}"`;
  if (typeof value === 'object') return 'an object';
  return String(value);
}

/** Flatten and coerce to unsigned 32-bit integers (truncating, modulo 2^32) */
export function toUint32(raw: unknown, path?: string): number[] {
  return flattenNumeric(raw, path).map((value) => Math.trunc(value) >>> 0);
}

/** Flatten and coerce to signed 32-bit integers (truncating, modulo 2^32) */
export function toInt32(raw: unknown, path?: string): number[] {
  return flattenNumeric(raw, path).map((value) => Math.trunc(value) | 0);
}
