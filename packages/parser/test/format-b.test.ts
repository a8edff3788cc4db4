/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Tests for the hierarchical (Format B) source
 */

import { describe, it, expect } from 'vitest';
import { FemConversionError, groupChannels } from '@fem-canon/data';
import { convertFem } from '../src/convert.js';
import type { RawRecord } from '../src/source.js';
import { bytes, formatBDocument, sampleModel } from './fixtures.js';

function converted(document: RawRecord) {
  const result = convertFem(document, 'B');
  if (result.status !== 'converted') throw new Error(`expected a converted model, got ${result.reason}`);
  return result;
}

function errorOf(fn: () => unknown): FemConversionError | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof FemConversionError) return error;
    throw error;
  }
  return undefined;
}

describe('Format B conversion', () => {
  it('produces the canonical channel groups', () => {
    const { model } = converted(formatBDocument(sampleModel()));

    expect(model.modelDescription).toBe('Telescope structure, 2nd order modal model');
    expect(model.inputs).toEqual([
      {
        OSS_M1_lcl_6F: [
          {
            typeTag: 'F',
            description: 'M1 cell local force',
            indices: [10, 11, 12],
            excitationIds: [1],
            properties: { coordinateSystemLabel: 'OSS_M1_lcl', nodeId: [101], location: [0.5, 1, -2] },
          },
        ],
      },
      {
        MC_M2_lcl_force_6F: [
          {
            typeTag: 'F',
            description: 'M2 local force x',
            indices: [20],
            excitationIds: [7],
            properties: { coordinateSystemLabel: 'MC_M2_lcl', nodeId: [201] },
          },
          {
            typeTag: 'M',
            description: 'M2 local moment x',
            indices: [21],
            excitationIds: [8],
            properties: { coordinateSystemLabel: 'MC_M2_lcl', nodeId: [201] },
          },
        ],
      },
    ]);
    expect(model.outputs).toEqual([
      {
        OSS_M1_lcl: [
          {
            typeTag: 'D',
            description: 'M1 cell local displacement',
            indices: [1, 2, 3],
            properties: { coordinateSystemLabel: 'OSS_M1_lcl', nodeId: [301], location: [0, 0, 1] },
          },
        ],
      },
      {
        MC_M2_lcl_6D: [
          {
            typeTag: 'D',
            description: 'M2 local displacement',
            indices: [4, 5],
            properties: { nodeId: [401, 402], coordinateSystemNumber: [3], component: [-1, 2] },
          },
        ],
      },
    ]);
  });

  it('leaves out the coordinate system number when the export lacks it', () => {
    const { model } = converted(formatBDocument(sampleModel()));
    const properties = groupChannels(model.outputs[0])[0].properties;
    expect(Object.keys(properties)).toEqual(['coordinateSystemLabel', 'nodeId', 'location']);
    expect(properties).not.toHaveProperty('coordinateSystemNumber');
  });

  it('converts a static-reduction model', () => {
    const gain = [
      [1.5, -2],
      [0, 4],
    ];
    const { model, variant } = converted(formatBDocument(sampleModel({ gainMatrix: gain })));

    expect(variant).toBe('static');
    expect(model.gainMatrix).toEqual([1.5, -2, 0, 4]);
    expect(model.eigenfrequencies).toEqual([]);
    expect(model.inputsToModalForce).toEqual([]);
    expect(model.modalDisplacementToOutputs).toEqual([]);
    expect(model.proportionalDampingVector).toEqual([]);
  });

  it('drops invalid bytes from the model description', () => {
    const model = sampleModel();
    model.description = [0x4d, 0x31, 0xff, 0x20, 0x6d, 0x6f, 0x64, 0x65, 0x6c];
    expect(converted(formatBDocument(model)).model.modelDescription).toBe('M1 model');
  });

  it('drops optional fields that cannot be coerced', () => {
    const model = sampleModel();
    model.outputs.MC_M2_lcl_6D[0].properties = { nodeID: [401], csNumber: 'n/a', component: null, csLabel: [0xfe] };
    const { model: canonical } = converted(formatBDocument(model));
    expect(groupChannels(canonical.outputs[1])[0].properties).toEqual({ nodeId: [401] });
  });

  it('still requires node identifiers', () => {
    const model = sampleModel();
    model.outputs.MC_M2_lcl_6D[0].properties = { csNumber: [3] };
    const error = errorOf(() => convertFem(formatBDocument(model), 'B'));
    expect(error?.kind).toBe('MandatoryFieldMissing');
    expect(error?.path).toBe('fem_outputs/MC_M2_lcl_6D/0/properties/nodeID');
  });

  it('still requires input coordinate system labels', () => {
    const model = sampleModel();
    model.inputs.OSS_M1_lcl_6F[0].properties = { nodeID: [101] };
    expect(errorOf(() => convertFem(formatBDocument(model), 'B'))?.kind).toBe('MandatoryFieldMissing');
  });

  it('decodes channel descriptions strictly', () => {
    const document = formatBDocument(sampleModel());
    const broken = {
      ...document,
      fem_outputs: {
        G: [{ types: bytes('D'), descriptions: [0xff], indices: [1], properties: { nodeID: [1] } }],
      },
    };
    const error = errorOf(() => convertFem(broken, 'B'));
    expect(error?.kind).toBe('TextDecodeError');
    expect(error?.path).toBe('fem_outputs/G/0/descriptions');
  });

  it('rejects a group that is not a list of channels', () => {
    const document = { ...formatBDocument(sampleModel()), fem_inputs: { G: { types: [] } } };
    const error = errorOf(() => convertFem(document, 'B'));
    expect(error?.kind).toBe('MalformedSource');
    expect(error?.path).toBe('fem_inputs/G');
  });

  it('reports the first missing channel field from the field table', () => {
    const document = {
      ...formatBDocument(sampleModel()),
      fem_outputs: { G: [{ types: bytes('D'), descriptions: bytes('x'), properties: { nodeID: [1] } }] },
    };
    const error = errorOf(() => convertFem(document, 'B'));
    expect(error?.kind).toBe('MandatoryFieldMissing');
    expect(error?.path).toBe('fem_outputs/G/0/indices');
  });

  it('keeps a group named __proto__', () => {
    const outputs: unknown = JSON.parse(
      '{"__proto__":[{"types":[68],"descriptions":[],"indices":[1],"properties":{"nodeID":[1],"__proto__":[5]}}]}'
    );
    const { model } = converted({ ...formatBDocument(sampleModel()), fem_outputs: outputs });
    expect(JSON.stringify(model.outputs)).toBe(
      '[{"__proto__":[{"typeTag":"D","description":"","indices":[1],"properties":{"nodeId":[1],"__proto__":[5]}}]}]'
    );
  });

  it('accepts empty groups', () => {
    const document = { ...formatBDocument(sampleModel()), fem_outputs: { Empty: [] } };
    expect(converted(document).model.outputs).toEqual([{ Empty: [] }]);
  });
});
