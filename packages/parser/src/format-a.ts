/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Format-A adapter (flat array-of-records source)
 *
 * Channel groups are struct arrays: a declared size and one column per
 * field, each column holding exactly one value per channel.
 *
 *   "fem_inputs": {
 *     "OSS_M1_lcl_6F": {
 *       "size": [1, 2],
 *       "fields": { "types": [[70], [70]], "indices": [[1, 2], [3, 4]], ... }
 *     }
 *   }
 *
 * Strict: every channel field column must exist and match the extent.
 */

import { FemConversionError, MandatoryFieldMissingError, joinPath } from '@fem-canon/data';
import type { ChannelKind } from '@fem-canon/data';
import { CHANNEL_FIELDS } from './field-table.js';
import { ABSENT, isRawRecord, lookup } from './source.js';
import type {
  ChannelGroupSource,
  FieldLookup,
  PropertySource,
  RawRecord,
  SourceAdapter,
} from './source.js';
import { groupContainer, sourceKeyOf } from './groups.js';

interface StructArray {
  count: number;
  columns: Readonly<Record<string, readonly unknown[]>>;
}

function structExtent(size: unknown, path: string): number {
  if (
    !Array.isArray(size) ||
    size.length === 0 ||
    !size.every((dim) => typeof dim === 'number' && Number.isInteger(dim) && dim >= 0)
  ) {
    throw new FemConversionError('MalformedSource', 'Struct array size must list non-negative integers', path);
  }
  return size.reduce((product: number, dim: number) => product * dim, 1);
}

function readStructArray(kind: ChannelKind, name: string, raw: unknown): StructArray {
  const base = joinPath(sourceKeyOf(kind), name);
  if (!isRawRecord(raw)) {
    throw new FemConversionError('MalformedSource', 'Channel group must be a struct array', base);
  }
  const sizeField = lookup(raw, 'size');
  if (!sizeField.present) throw new MandatoryFieldMissingError('size', base);
  const count = structExtent(sizeField.value, joinPath(base, 'size'));

  const fieldsField = lookup(raw, 'fields');
  if (!fieldsField.present) throw new MandatoryFieldMissingError('fields', base);
  if (!isRawRecord(fieldsField.value)) {
    throw new FemConversionError('MalformedSource', 'Struct array fields must be a mapping', joinPath(base, 'fields'));
  }
  const fields = fieldsField.value;

  const columns: Record<string, readonly unknown[]> = {};
  for (const rule of CHANNEL_FIELDS[kind]) {
    const column = lookup(fields, rule.source);
    if (!column.present) throw new MandatoryFieldMissingError(rule.source, joinPath(base, 'fields'));
    if (!Array.isArray(column.value) || column.value.length !== count) {
      throw new FemConversionError(
        'MalformedSource',
        `Field column must hold ${count} value(s)`,
        joinPath(base, 'fields', rule.source)
      );
    }
    columns[rule.source] = column.value;
  }

  return { count, columns };
}

function propertySource(record: RawRecord): PropertySource {
  return {
    fieldNames: Object.keys(record),
    get: (field) => lookup(record, field),
  };
}

function structGroup(kind: ChannelKind, name: string, struct: StructArray): ChannelGroupSource {
  const path = (index: number, ...rest: string[]) => joinPath(sourceKeyOf(kind), name, index, ...rest);
  const field = (index: number, key: string): FieldLookup => {
    const column = struct.columns[key];
    if (!column) return ABSENT;
    const value = column[index];
    return value === null || value === undefined ? ABSENT : { present: true, value };
  };

  return {
    kind,
    name,
    count: struct.count,
    field,
    properties(index: number): PropertySource | undefined {
      const found = field(index, 'properties');
      if (!found.present) return undefined;
      if (!isRawRecord(found.value)) {
        throw new FemConversionError('MalformedSource', 'Property record must be a mapping', path(index, 'properties'));
      }
      return propertySource(found.value);
    },
    path,
  };
}

export function formatAAdapter(document: RawRecord): SourceAdapter {
  const containers = {
    input: groupContainer(document, 'input'),
    output: groupContainer(document, 'output'),
  };

  return {
    format: 'A',
    policy: 'strict',
    descriptionMode: 'strict',
    groupNames: (kind) => Object.keys(containers[kind]),
    group: (kind, name) => structGroup(kind, name, readStructArray(kind, name, containers[kind][name])),
    topLevel: (key) => lookup(document, key),
  };
}
