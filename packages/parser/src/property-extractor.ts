/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Property Record Extractor
 *
 * Decodes the per-channel metadata sub-record: coordinate system label,
 * node identifiers, coordinate system numbers, components and any other
 * numeric field the export carries.
 */

import {
  FemConversionError,
  MandatoryFieldMissingError,
  PROPERTY_KEYS,
  SOURCE_KEYS,
  createLogger,
  isFemConversionError,
  setOwnField,
} from '@fem-canon/data';
import type { ChannelKind, PropertyRecord, PropertyValue } from '@fem-canon/data';
import { decodeBytes, flattenNumeric, toInt32, toUint32 } from '@fem-canon/encoding';
import { PROPERTY_FIELDS, propertyRule, recovers } from './field-table.js';
import type { FieldCoercion } from './field-table.js';
import type { FieldPolicy, PropertySource } from './source.js';

const log = createLogger('PropertyExtractor');

export interface PropertyExtractionContext {
  kind: ChannelKind;
  policy: FieldPolicy;
  /** Source path of the sub-record, e.g. fem_inputs/M1/0/properties */
  path: string;
  group?: string;
  channel?: number;
}

export function coerceField(coercion: FieldCoercion, raw: unknown, path: string): PropertyValue {
  switch (coercion) {
    case 'text':
      return decodeBytes(raw, 'strict', path);
    case 'uint32':
      return toUint32(raw, path);
    case 'int32':
      return toInt32(raw, path);
  }
}

/**
 * Build the canonical property record of one channel.
 *
 * Special fields are coerced according to the field table; every other
 * field is copied as a flat numeric sequence. Optional fields that are
 * absent (or null) are left out of the record entirely.
 */
export function extractPropertyRecord(
  source: PropertySource,
  ctx: PropertyExtractionContext
): PropertyRecord {
  const { kind, policy } = ctx;
  const logCtx = { operation: 'extractPropertyRecord', group: ctx.group, channel: ctx.channel };
  const fields: Record<string, PropertyValue> = {};

  for (const rule of PROPERTY_FIELDS[kind]) {
    const fieldPath = `${ctx.path}/${rule.source}`;
    const found = source.get(rule.source);
    if (!found.present) {
      if (rule.presence === 'mandatory') {
        throw new MandatoryFieldMissingError(rule.source, fieldPath);
      }
      log.debug(`Optional field ${rule.source} absent`, undefined, logCtx);
      continue;
    }

    try {
      setOwnField(fields, rule.canonical, coerceField(rule.coercion, found.value, fieldPath));
    } catch (error) {
      if (!isFemConversionError(error) || !recovers(rule, policy)) throw error;
      log.caught(`Omitting ${rule.source}`, error, logCtx);
    }
  }

  const nodeId = fields[PROPERTY_KEYS.nodeId];
  if (nodeId === undefined || typeof nodeId === 'string' || nodeId.length === 0) {
    throw new FemConversionError(
      'InvalidFieldValue',
      'Node identifiers must not be empty',
      `${ctx.path}/${SOURCE_KEYS.nodeId}`
    );
  }

  for (const name of source.fieldNames) {
    if (propertyRule(kind, name)) continue;
    if (Object.prototype.hasOwnProperty.call(fields, name)) {
      log.warn(`Field ${name} shadows a canonical property and is ignored`, logCtx);
      continue;
    }
    const found = source.get(name);
    if (!found.present) continue;
    setOwnField(fields, name, flattenNumeric(found.value, `${ctx.path}/${name}`));
  }

  return Object.freeze({ ...fields, nodeId });
}
