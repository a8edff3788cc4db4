/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Reads a canonical record back (for inspection). Only the shape is
 * checked; matrix contents are taken as they are.
 */

import { readFileSync } from 'node:fs';
import { FemConversionError, joinPath, setOwnField } from '@fem-canon/data';
import type { CanonicalModel, ChannelEntry, ChannelGroup, PropertyValue } from '@fem-canon/data';

type Json = Record<string, unknown>;

function isJsonObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string, path: string): FemConversionError {
  return new FemConversionError('MalformedSource', message, path);
}

function numbers(value: unknown, path: string): number[] {
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'number')) {
    throw malformed('Expected a numeric sequence', path);
  }
  return value;
}

function text(value: unknown, path: string): string {
  if (typeof value !== 'string') throw malformed('Expected text', path);
  return value;
}

function readEntry(raw: unknown, path: string): ChannelEntry {
  if (!isJsonObject(raw)) throw malformed('Expected a channel mapping', path);
  const props = raw.properties;
  if (!isJsonObject(props)) throw malformed('Expected a property mapping', joinPath(path, 'properties'));

  const properties: Record<string, PropertyValue> = {};
  for (const [key, value] of Object.entries(props)) {
    setOwnField(
      properties,
      key,
      typeof value === 'string' ? value : numbers(value, joinPath(path, 'properties', key))
    );
  }
  const nodeId = numbers(props.nodeId, joinPath(path, 'properties', 'nodeId'));

  return {
    typeTag: text(raw.typeTag, joinPath(path, 'typeTag')),
    description: text(raw.description, joinPath(path, 'description')),
    indices: numbers(raw.indices, joinPath(path, 'indices')),
    ...(raw.excitationIds !== undefined
      ? { excitationIds: numbers(raw.excitationIds, joinPath(path, 'excitationIds')) }
      : {}),
    properties: { ...properties, nodeId },
  };
}

function readGroups(raw: unknown, path: string): ChannelGroup[] {
  if (!Array.isArray(raw)) throw malformed('Expected a list of channel groups', path);
  return raw.map((group: unknown, index) => {
    const groupPath = joinPath(path, index);
    if (!isJsonObject(group) || Object.keys(group).length !== 1) {
      throw malformed('Expected a one-entry group mapping', groupPath);
    }
    const [name, entries] = Object.entries(group)[0];
    if (!Array.isArray(entries)) throw malformed('Expected a list of channels', joinPath(groupPath, name));
    return { [name]: entries.map((entry: unknown, k) => readEntry(entry, joinPath(groupPath, name, k))) };
  });
}

export function parseCanonicalModel(json: string, source = 'canonical record'): CanonicalModel {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new FemConversionError('MalformedSource', `Invalid JSON in ${source}`, undefined, { cause: error });
  }
  if (!isJsonObject(raw)) throw malformed('Expected a model mapping', source);

  return {
    modelDescription: text(raw.modelDescription, 'modelDescription'),
    inputs: readGroups(raw.inputs, 'inputs'),
    outputs: readGroups(raw.outputs, 'outputs'),
    eigenfrequencies: numbers(raw.eigenfrequencies, 'eigenfrequencies'),
    inputsToModalForce: numbers(raw.inputsToModalForce, 'inputsToModalForce'),
    modalDisplacementToOutputs: numbers(raw.modalDisplacementToOutputs, 'modalDisplacementToOutputs'),
    proportionalDampingVector: numbers(raw.proportionalDampingVector, 'proportionalDampingVector'),
    gainMatrix: numbers(raw.gainMatrix, 'gainMatrix'),
  };
}

export function readCanonicalModel(path: string): CanonicalModel {
  return parseCanonicalModel(readFileSync(path, 'utf8'), path);
}
