/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Format-B adapter (hierarchical source)
 *
 * Channel groups are lists of per-channel mappings:
 *
 *   "fem_outputs": {
 *     "MC_M2_lcl_6D": [
 *       { "types": [...], "descriptions": [...], "indices": [...], "properties": { ... } }
 *     ]
 *   }
 *
 * Lenient: optional property fields that are absent, null or undecodable
 * are left out. The model description drops invalid bytes.
 */

import { FemConversionError, joinPath } from '@fem-canon/data';
import type { ChannelKind } from '@fem-canon/data';
import { groupContainer, sourceKeyOf } from './groups.js';
import { ABSENT, isRawRecord, lookup } from './source.js';
import type { ChannelGroupSource, PropertySource, RawRecord, SourceAdapter } from './source.js';

function channelList(kind: ChannelKind, name: string, raw: unknown): RawRecord[] {
  const base = joinPath(sourceKeyOf(kind), name);
  if (!Array.isArray(raw)) {
    throw new FemConversionError('MalformedSource', 'Channel group must be a list of channels', base);
  }
  return raw.map((channel: unknown, index) => {
    if (!isRawRecord(channel)) {
      throw new FemConversionError('MalformedSource', 'Channel must be a mapping', joinPath(base, index));
    }
    return channel;
  });
}

function listGroup(kind: ChannelKind, name: string, channels: readonly RawRecord[]): ChannelGroupSource {
  const path = (index: number, ...rest: string[]) => joinPath(sourceKeyOf(kind), name, index, ...rest);
  return {
    kind,
    name,
    count: channels.length,
    field: (index, field) => {
      const channel = channels[index];
      return channel ? lookup(channel, field) : ABSENT;
    },
    properties(index: number): PropertySource | undefined {
      const channel = channels[index];
      const found = channel ? lookup(channel, 'properties') : ABSENT;
      if (!found.present) return undefined;
      const record = found.value;
      if (!isRawRecord(record)) {
        throw new FemConversionError('MalformedSource', 'Property record must be a mapping', path(index, 'properties'));
      }
      return {
        fieldNames: Object.keys(record),
        get: (field) => lookup(record, field),
      };
    },
    path,
  };
}

export function formatBAdapter(document: RawRecord): SourceAdapter {
  const containers = {
    input: groupContainer(document, 'input'),
    output: groupContainer(document, 'output'),
  };

  return {
    format: 'B',
    policy: 'lenient',
    descriptionMode: 'lenient',
    groupNames: (kind) => Object.keys(containers[kind]),
    group: (kind, name) => listGroup(kind, name, channelList(kind, name, containers[kind][name])),
    topLevel: (key) => lookup(document, key),
  };
}
