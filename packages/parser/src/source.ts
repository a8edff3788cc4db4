/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Source adapter capabilities
 *
 * The extraction engine never touches a source document directly. Each
 * encoding supplies a SourceAdapter that answers four questions: which
 * groups exist, how many channels a group holds, what a channel's field
 * holds, and whether a field is there at all.
 */

import type { ChannelKind, SourceFormat } from '@fem-canon/data';
import type { DecodeMode } from '@fem-canon/encoding';

/** A decoded source document, or any nested mapping inside one */
export type RawRecord = Readonly<Record<string, unknown>>;

/** Explicit present/absent value. A null source value counts as absent. */
export type FieldLookup =
  | { readonly present: true; readonly value: unknown }
  | { readonly present: false };

/**
 * strict: the older, fully specified generation; partial export is corrupt input.
 * lenient: optional fields that are absent or undecodable are omitted.
 */
export type FieldPolicy = 'strict' | 'lenient';

export const ABSENT: FieldLookup = Object.freeze({ present: false });

export function lookup(record: RawRecord, key: string): FieldLookup {
  if (!Object.prototype.hasOwnProperty.call(record, key)) return ABSENT;
  const value = record[key];
  if (value === null || value === undefined) return ABSENT;
  return { present: true, value };
}

export function isRawRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Property sub-record of one channel */
export interface PropertySource {
  /** Field names in source order, including null-valued ones */
  readonly fieldNames: readonly string[];
  get(field: string): FieldLookup;
}

/** One named channel group as seen through an adapter */
export interface ChannelGroupSource {
  readonly kind: ChannelKind;
  readonly name: string;
  /** Number of channels, from the source array extent */
  readonly count: number;
  /** Per-channel field (types, descriptions, indices, exciteIDs) */
  field(index: number, field: string): FieldLookup;
  /** Per-channel property sub-record, absent when the source has none */
  properties(index: number): PropertySource | undefined;
  /** Source path of a channel, for diagnostics */
  path(index: number, ...rest: string[]): string;
}

export interface SourceAdapter {
  readonly format: SourceFormat;
  readonly policy: FieldPolicy;
  /** How the top-level modelDescription bytes are decoded */
  readonly descriptionMode: DecodeMode;
  /** Group names in source order */
  groupNames(kind: ChannelKind): readonly string[];
  group(kind: ChannelKind, name: string): ChannelGroupSource;
  /** Top-level key of the source document */
  topLevel(key: string): FieldLookup;
}
