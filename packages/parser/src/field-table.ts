/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Field classification table
 *
 * Which source fields must exist, how each one is coerced, and whether a
 * value that cannot be coerced is dropped or aborts the run.
 */

import { PROPERTY_KEYS, SOURCE_KEYS } from '@fem-canon/data';
import type { ChannelKind } from '@fem-canon/data';
import type { FieldPolicy } from './source.js';

export type FieldPresence = 'mandatory' | 'optional';

export type FieldCoercion = 'text' | 'uint32' | 'int32';

/**
 * When an undecodable value is dropped instead of aborting the run:
 * never, only under the lenient policy, or under both policies.
 */
export type FieldRecovery = 'never' | 'lenient' | 'always';

export interface PropertyFieldRule {
  /** Source key, e.g. nodeID */
  readonly source: string;
  /** Canonical key, e.g. nodeId */
  readonly canonical: string;
  readonly presence: FieldPresence;
  readonly coercion: FieldCoercion;
  readonly recovery: FieldRecovery;
}

/** Channel-level field. Its decoding is fixed per field by the normalizer. */
export interface ChannelFieldRule {
  readonly source: string;
  readonly presence: FieldPresence;
  /** Nested property sub-record, read through the property extractor */
  readonly record?: true;
}

const channelFields = (kind: ChannelKind): readonly ChannelFieldRule[] => [
  { source: SOURCE_KEYS.types, presence: 'mandatory' },
  ...(kind === 'input' ? [{ source: SOURCE_KEYS.excitationIds, presence: 'mandatory' } as const] : []),
  { source: SOURCE_KEYS.descriptions, presence: 'mandatory' },
  { source: SOURCE_KEYS.indices, presence: 'mandatory' },
  { source: SOURCE_KEYS.properties, presence: 'mandatory', record: true },
];

export const CHANNEL_FIELDS: Readonly<Record<ChannelKind, readonly ChannelFieldRule[]>> = {
  input: channelFields('input'),
  output: channelFields('output'),
};

const coordinateSystemLabel = (kind: ChannelKind): PropertyFieldRule => ({
  source: SOURCE_KEYS.coordinateSystemLabel,
  canonical: PROPERTY_KEYS.coordinateSystemLabel,
  // outputs drop a label that is absent or undecodable, inputs never do
  presence: kind === 'input' ? 'mandatory' : 'optional',
  coercion: 'text',
  recovery: kind === 'input' ? 'never' : 'always',
});

const nodeId: PropertyFieldRule = {
  source: SOURCE_KEYS.nodeId,
  canonical: PROPERTY_KEYS.nodeId,
  presence: 'mandatory',
  coercion: 'uint32',
  recovery: 'never',
};

const coordinateSystemNumber: PropertyFieldRule = {
  source: SOURCE_KEYS.coordinateSystemNumber,
  canonical: PROPERTY_KEYS.coordinateSystemNumber,
  presence: 'optional',
  coercion: 'uint32',
  recovery: 'lenient',
};

const component: PropertyFieldRule = {
  source: SOURCE_KEYS.component,
  canonical: PROPERTY_KEYS.component,
  presence: 'optional',
  coercion: 'int32',
  recovery: 'lenient',
};

/** Special property fields per channel kind, in canonical output order */
export const PROPERTY_FIELDS: Readonly<Record<ChannelKind, readonly PropertyFieldRule[]>> = {
  input: [coordinateSystemLabel('input'), nodeId, coordinateSystemNumber],
  output: [coordinateSystemLabel('output'), nodeId, coordinateSystemNumber, component],
};

export function propertyRule(kind: ChannelKind, source: string): PropertyFieldRule | undefined {
  return PROPERTY_FIELDS[kind].find((rule) => rule.source === source);
}

/** Whether a coercion failure on this field is dropped under the given policy */
export function recovers(rule: PropertyFieldRule, policy: FieldPolicy): boolean {
  return rule.recovery === 'always' || (rule.recovery === 'lenient' && policy === 'lenient');
}
