/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { SourceLoadError } from '@fem-canon/data';
import { resolveConvertConfig } from './config.js';
import { reportError, runConvert, runInspect } from './run.js';

const bytes = (text: string): number[] => Array.from(new TextEncoder().encode(text));

function gainOnlyDocument(top: Record<string, unknown> = { gainMatrix: [[0.5]] }): Record<string, unknown> {
  return {
    modelDescription: bytes('Gain only'),
    fem_inputs: {
      In: [
        {
          types: bytes('F'),
          exciteIDs: [1],
          descriptions: bytes('force'),
          indices: [1, 2],
          properties: { csLabel: bytes('CS'), nodeID: [10] },
        },
      ],
    },
    fem_outputs: {
      Out: [{ types: bytes('D'), descriptions: bytes('disp'), indices: [3], properties: { nodeID: [20] } }],
    },
    ...top,
  };
}

describe('runConvert', () => {
  let directory: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'fem-canon-cli-'));
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  function writeSource(name: string, document: Record<string, unknown>): string {
    const path = join(directory, name);
    writeFileSync(path, JSON.stringify(document));
    return path;
  }

  it('converts the static-reduction export found under the alternate name', async () => {
    const source = writeSource('static_reduction_model.json', gainOnlyDocument());
    const outcome = await runConvert(resolveConvertConfig({ sourceDir: directory }, {}));

    const target = join(directory, 'static_reduction_model.73.json');
    expect(outcome).toEqual({
      status: 'written',
      source,
      format: 'B',
      variant: 'static',
      written: { identifier: 'static_reduction_model.73', files: [target] },
    });
    expect(JSON.parse(readFileSync(target, 'utf8'))).toEqual({
      modelDescription: 'Gain only',
      inputs: [
        {
          In: [
            {
              typeTag: 'F',
              description: 'force',
              indices: [1, 2],
              excitationIds: [1],
              properties: { coordinateSystemLabel: 'CS', nodeId: [10] },
            },
          ],
        },
      ],
      outputs: [{ Out: [{ typeTag: 'D', description: 'disp', indices: [3], properties: { nodeId: [20] } }] }],
      eigenfrequencies: [],
      inputsToModalForce: [],
      modalDisplacementToOutputs: [],
      proportionalDampingVector: [],
      gainMatrix: [0.5],
    });
  });

  it('writes nothing for an unsupported variant', async () => {
    writeSource('modal_state_space_model_2ndOrder.json', gainOnlyDocument({}));
    const output = join(directory, 'out');
    const outcome = await runConvert(resolveConvertConfig({ sourceDir: directory, output }, {}));

    expect(outcome.status).toBe('unsupported');
    expect(existsSync(output)).toBe(false);
  });

  it('only looks for the primary name when the format is A', async () => {
    writeSource('static_reduction_model.json', gainOnlyDocument());
    await expect(runConvert(resolveConvertConfig({ sourceDir: directory, format: 'A' }, {}))).rejects.toBeInstanceOf(
      SourceLoadError
    );
  });

  it('does not accept a struct-array source under the alternate name', async () => {
    const source = writeSource('static_reduction_model.json', {
      modelDescription: bytes('struct array'),
      fem_inputs: {
        G: { size: [1, 0], fields: { types: [], exciteIDs: [], descriptions: [], indices: [], properties: [] } },
      },
      fem_outputs: {},
      gainMatrix: [[1]],
    });
    const pending = runConvert(resolveConvertConfig({ sourceDir: directory }, {}));
    await expect(pending).rejects.toBeInstanceOf(SourceLoadError);
    await expect(pending).rejects.toMatchObject({ attempted: [source] });
  });

  it('rejects a source whose encoding cannot be detected', async () => {
    writeSource('modal_state_space_model_2ndOrder.json', { modelDescription: bytes('x') });
    await expect(runConvert(resolveConvertConfig({ sourceDir: directory }, {}))).rejects.toMatchObject({
      kind: 'MalformedSource',
    });
  });

  it('reads an explicitly named file', async () => {
    const file = writeSource('custom.json', gainOnlyDocument());
    const outcome = await runConvert(resolveConvertConfig({ file, format: 'B', output: directory }, {}));
    expect(outcome.status === 'written' && outcome.written.identifier).toBe('static_reduction_model.73');
  });

  it('summarizes the written record', async () => {
    writeSource('static_reduction_model.json', gainOnlyDocument());
    await runConvert(resolveConvertConfig({ sourceDir: directory }, {}));

    expect(runInspect(join(directory, 'static_reduction_model.73.json'))).toBe(
      [
        'Model: Gain only',
        'Variant: static',
        'Modes: 0',
        'Inputs: 1 channel(s) in 1 group(s)',
        '  In: 1 channel(s), 2 dof',
        'Outputs: 1 channel(s) in 1 group(s)',
        '  Out: 1 channel(s), 1 dof',
      ].join('\n')
    );
  });
});

describe('reportError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs conversion failures with their kind', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    reportError(new SourceLoadError('Cannot load source document', ['a.json']), 'convert');
    expect(spy).toHaveBeenCalledWith(
      '[Cli] convert SourceLoadFailure:',
      'SourceLoadError: Cannot load source document'
    );
  });

  it('logs other failures as command failures', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    reportError(new Error('boom'), 'inspect');
    expect(spy).toHaveBeenCalledWith('[Cli] inspect Command failed:', 'Error: boom');
  });
});
