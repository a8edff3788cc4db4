/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Test helpers: one logical model written out in both source encodings.
 */

import type { RawRecord } from '../src/source.js';

export const bytes = (text: string): number[] => Array.from(new TextEncoder().encode(text));

export interface LogicalChannel {
  type: string;
  description: string;
  indices: number[];
  exciteIDs?: number[];
  properties: Record<string, unknown>;
}

export interface LogicalModel {
  description: unknown;
  inputs: Record<string, LogicalChannel[]>;
  outputs: Record<string, LogicalChannel[]>;
  /** Extra top-level keys (payload matrices) */
  top: Record<string, unknown>;
}

function channelRecord(channel: LogicalChannel): Record<string, unknown> {
  return {
    types: bytes(channel.type),
    ...(channel.exciteIDs ? { exciteIDs: channel.exciteIDs } : {}),
    descriptions: bytes(channel.description),
    indices: channel.indices,
    properties: channel.properties,
  };
}

/** Format B: group -> list of channel mappings */
export function formatBDocument(model: LogicalModel): RawRecord {
  const groups = (source: Record<string, LogicalChannel[]>) =>
    Object.fromEntries(
      Object.entries(source).map(([name, channels]) => [name, channels.map(channelRecord)])
    );
  return {
    modelDescription: model.description,
    fem_inputs: groups(model.inputs),
    fem_outputs: groups(model.outputs),
    ...model.top,
  };
}

/** Wrap a property value the way a struct-array export nests it (1 x n row) */
const row = (value: unknown): unknown => (Array.isArray(value) ? [value] : value);

/** Format A: group -> struct array with one column per field */
export function formatADocument(model: LogicalModel): RawRecord {
  const structArray = (channels: LogicalChannel[], kind: 'input' | 'output') => {
    const fields: Record<string, unknown[]> = {
      types: channels.map((c) => [bytes(c.type)]),
      ...(kind === 'input' ? { exciteIDs: channels.map((c) => [c.exciteIDs ?? []]) } : {}),
      descriptions: channels.map((c) => [bytes(c.description)]),
      // indices come out as column vectors
      indices: channels.map((c) => c.indices.map((i) => [i])),
      properties: channels.map((c) =>
        Object.fromEntries(Object.entries(c.properties).map(([key, value]) => [key, row(value)]))
      ),
    };
    return { size: [1, channels.length], fields };
  };
  const groups = (source: Record<string, LogicalChannel[]>, kind: 'input' | 'output') =>
    Object.fromEntries(
      Object.entries(source).map(([name, channels]) => [name, structArray(channels, kind)])
    );
  return {
    modelDescription: model.description,
    fem_inputs: groups(model.inputs, 'input'),
    fem_outputs: groups(model.outputs, 'output'),
    ...model.top,
  };
}

export const MODAL_PAYLOAD = {
  eigenfrequencies: [0.5, 3, 12.5],
  inputs2ModalF: [
    [1, 2],
    [3, 4],
    [5, 6],
  ],
  modalDisp2Outputs: [
    [0.1, 0.2, 0.3],
    [0.4, 0.5, 0.6],
  ],
  proportionalDampingVec: [0.02, 0.02, 0.02],
};

export function sampleModel(top: Record<string, unknown> = MODAL_PAYLOAD): LogicalModel {
  return {
    description: bytes('Telescope structure, 2nd order modal model'),
    inputs: {
      OSS_M1_lcl_6F: [
        {
          type: 'F',
          description: 'M1 cell local force',
          indices: [10, 11, 12],
          exciteIDs: [1],
          properties: { csLabel: bytes('OSS_M1_lcl'), nodeID: [101], location: [0.5, 1, -2] },
        },
      ],
      MC_M2_lcl_force_6F: [
        {
          type: 'F',
          description: 'M2 local force x',
          indices: [20],
          exciteIDs: [7],
          properties: { nodeID: [201], csLabel: bytes('MC_M2_lcl') },
        },
        {
          type: 'M',
          description: 'M2 local moment x',
          indices: [21],
          exciteIDs: [8],
          properties: { nodeID: [201], csLabel: bytes('MC_M2_lcl') },
        },
      ],
    },
    outputs: {
      OSS_M1_lcl: [
        {
          type: 'D',
          description: 'M1 cell local displacement',
          indices: [1, 2, 3],
          properties: { nodeID: [301], csLabel: bytes('OSS_M1_lcl'), location: [0, 0, 1] },
        },
      ],
      MC_M2_lcl_6D: [
        {
          type: 'D',
          description: 'M2 local displacement',
          indices: [4, 5],
          properties: { nodeID: [401, 402], csNumber: [3], component: [-1, 2] },
        },
      ],
    },
    top,
  };
}
