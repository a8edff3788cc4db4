/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Channel Descriptor Normalizer
 *
 * Turns one raw channel group into its ordered canonical channel entries.
 */

import { MandatoryFieldMissingError, SOURCE_KEYS } from '@fem-canon/data';
import type { ChannelEntry } from '@fem-canon/data';
import { decodeBytes, toUint32 } from '@fem-canon/encoding';
import { CHANNEL_FIELDS } from './field-table.js';
import { extractPropertyRecord } from './property-extractor.js';
import type { ChannelGroupSource, FieldPolicy } from './source.js';

function required(group: ChannelGroupSource, index: number, field: string): unknown {
  const found = group.field(index, field);
  if (!found.present) {
    throw new MandatoryFieldMissingError(field, group.path(index, field));
  }
  return found.value;
}

/**
 * Normalize every channel of a group, in source order.
 * Type tags and descriptions are always decoded strictly.
 */
export function normalizeChannelGroup(
  group: ChannelGroupSource,
  policy: FieldPolicy
): ChannelEntry[] {
  const entries: ChannelEntry[] = [];

  for (let k = 0; k < group.count; k++) {
    for (const rule of CHANNEL_FIELDS[group.kind]) {
      if (rule.presence !== 'mandatory' || rule.record) continue;
      required(group, k, rule.source);
    }

    const typeTag = decodeBytes(
      required(group, k, SOURCE_KEYS.types),
      'strict',
      group.path(k, SOURCE_KEYS.types)
    );
    const description = decodeBytes(
      required(group, k, SOURCE_KEYS.descriptions),
      'strict',
      group.path(k, SOURCE_KEYS.descriptions)
    );
    const indices = toUint32(
      required(group, k, SOURCE_KEYS.indices),
      group.path(k, SOURCE_KEYS.indices)
    );
    const excitationIds =
      group.kind === 'input'
        ? toUint32(
            required(group, k, SOURCE_KEYS.excitationIds),
            group.path(k, SOURCE_KEYS.excitationIds)
          )
        : undefined;

    const propertySource = group.properties(k);
    if (!propertySource) {
      throw new MandatoryFieldMissingError(
        SOURCE_KEYS.properties,
        group.path(k, SOURCE_KEYS.properties)
      );
    }
    const properties = extractPropertyRecord(propertySource, {
      kind: group.kind,
      policy,
      path: group.path(k, SOURCE_KEYS.properties),
      group: group.name,
      channel: k,
    });

    entries.push(
      Object.freeze({
        typeTag,
        description,
        indices: Object.freeze(indices),
        ...(excitationIds ? { excitationIds: Object.freeze(excitationIds) } : {}),
        properties,
      })
    );
  }

  return entries;
}
