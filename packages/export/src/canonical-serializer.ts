/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Canonical Serializer
 *
 * Persists a converted model under an identifier that names its variant
 * and source generation. Output is deterministic: fixed key order, no
 * timestamps, so converting the same source twice gives identical bytes.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import JSZip from 'jszip';
import { createLogger, setOwnField } from '@fem-canon/data';
import type {
  CanonicalModel,
  ChannelEntry,
  ChannelGroup,
  ModelVariant,
  SourceFormat,
} from '@fem-canon/data';

const log = createLogger('Serializer');

const IDENTIFIERS: Readonly<Record<ModelVariant, Readonly<Record<SourceFormat, string>>>> = {
  modal: {
    A: 'modal_state_space_model_2ndOrder',
    B: 'modal_state_space_model_2ndOrder.73',
  },
  static: {
    A: 'static_reduction_model',
    B: 'static_reduction_model.73',
  },
};

/** Zip entries carry this date so archives are reproducible */
const ARCHIVE_ENTRY_DATE = new Date('2000-01-01T00:00:00Z');

export function canonicalIdentifier(variant: ModelVariant, format: SourceFormat): string {
  return IDENTIFIERS[variant][format];
}

function orderedEntry(entry: ChannelEntry): Record<string, unknown> {
  return {
    typeTag: entry.typeTag,
    description: entry.description,
    indices: entry.indices,
    ...(entry.excitationIds ? { excitationIds: entry.excitationIds } : {}),
    properties: entry.properties,
  };
}

function orderedGroups(groups: readonly ChannelGroup[]): Record<string, unknown>[] {
  return groups.map((group) => {
    const ordered: Record<string, unknown> = {};
    for (const [name, entries] of Object.entries(group)) {
      setOwnField(ordered, name, entries.map(orderedEntry));
    }
    return ordered;
  });
}

/** Canonical JSON text of a model */
export function serializeCanonicalModel(model: CanonicalModel, indent?: number): string {
  return JSON.stringify(
    {
      modelDescription: model.modelDescription,
      inputs: orderedGroups(model.inputs),
      outputs: orderedGroups(model.outputs),
      eigenfrequencies: model.eigenfrequencies,
      inputsToModalForce: model.inputsToModalForce,
      modalDisplacementToOutputs: model.modalDisplacementToOutputs,
      proportionalDampingVector: model.proportionalDampingVector,
      gainMatrix: model.gainMatrix,
    },
    null,
    indent
  );
}

export interface WriteCanonicalOptions {
  outputDir: string;
  variant: ModelVariant;
  format: SourceFormat;
  /** Also write <identifier>.zip holding the JSON record */
  archive?: boolean;
  indent?: number;
}

export interface WrittenModel {
  identifier: string;
  files: string[];
}

/** Zip archive holding the canonical record as <identifier>.json */
export async function archiveCanonicalModel(identifier: string, json: string): Promise<Uint8Array> {
  const zip = new JSZip();
  zip.file(`${identifier}.json`, json, { date: ARCHIVE_ENTRY_DATE });
  return zip.generateAsync({
    type: 'uint8array',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 },
  });
}

/**
 * Write the model to <outputDir>/<identifier>.json (and the archive when
 * asked). The record is fully serialized before anything touches disk.
 */
export async function writeCanonicalModel(
  model: CanonicalModel,
  options: WriteCanonicalOptions
): Promise<WrittenModel> {
  const identifier = canonicalIdentifier(options.variant, options.format);
  const json = serializeCanonicalModel(model, options.indent);
  const archive = options.archive ? await archiveCanonicalModel(identifier, json) : undefined;

  mkdirSync(options.outputDir, { recursive: true });
  const files: string[] = [];

  const jsonPath = join(options.outputDir, `${identifier}.json`);
  writeFileSync(jsonPath, json, 'utf8');
  files.push(jsonPath);

  if (archive) {
    const zipPath = join(options.outputDir, `${identifier}.zip`);
    writeFileSync(zipPath, archive);
    files.push(zipPath);
  }

  log.info(`Wrote ${files.join(', ')}`, { operation: 'writeCanonicalModel' });
  return { identifier, files };
}
