/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Model Variant Classifier
 *
 * Decides between the modal state-space variant and the static-reduction
 * variant from the top-level keys, and composes the canonical record.
 */

import { MandatoryFieldMissingError, SOURCE_KEYS, createLogger } from '@fem-canon/data';
import type { CanonicalModel, ChannelGroup, ModelVariant, SourceFormat } from '@fem-canon/data';
import { decodeBytes, flattenNumeric } from '@fem-canon/encoding';
import type { SourceAdapter } from './source.js';

const log = createLogger('Classifier');

export type ConversionResult =
  | {
      readonly status: 'converted';
      readonly format: SourceFormat;
      readonly variant: ModelVariant;
      readonly model: CanonicalModel;
    }
  | {
      readonly status: 'unsupported';
      readonly format: SourceFormat;
      readonly reason: string;
    };

const MODAL_SOURCE_KEYS = [
  SOURCE_KEYS.eigenfrequencies,
  SOURCE_KEYS.inputsToModalForce,
  SOURCE_KEYS.modalDisplacementToOutputs,
  SOURCE_KEYS.proportionalDampingVector,
] as const;

const EMPTY: readonly number[] = Object.freeze([]);

function matrix(adapter: SourceAdapter, key: string): readonly number[] {
  const found = adapter.topLevel(key);
  if (!found.present) throw new MandatoryFieldMissingError(key, key);
  return Object.freeze(flattenNumeric(found.value, key));
}

/**
 * Detect the model variant from the source's top-level keys.
 * Returns undefined when neither known shape matches.
 */
export function detectVariant(adapter: SourceAdapter): ModelVariant | undefined {
  if (MODAL_SOURCE_KEYS.every((key) => adapter.topLevel(key).present)) return 'modal';
  if (adapter.topLevel(SOURCE_KEYS.gainMatrix).present) return 'static';
  return undefined;
}

export function classifyModel(
  adapter: SourceAdapter,
  inputs: readonly ChannelGroup[],
  outputs: readonly ChannelGroup[]
): ConversionResult {
  const { format } = adapter;
  const variant = detectVariant(adapter);
  if (!variant) {
    const reason = `source has neither the modal payload (${MODAL_SOURCE_KEYS.join(', ')}) nor ${SOURCE_KEYS.gainMatrix}`;
    log.warn(`Unsupported model variant: ${reason}`, { operation: 'classifyModel' });
    return { status: 'unsupported', format, reason };
  }

  const description = adapter.topLevel(SOURCE_KEYS.modelDescription);
  if (!description.present) {
    throw new MandatoryFieldMissingError(SOURCE_KEYS.modelDescription, SOURCE_KEYS.modelDescription);
  }
  const modelDescription = decodeBytes(
    description.value,
    adapter.descriptionMode,
    SOURCE_KEYS.modelDescription
  );

  const modal = variant === 'modal';
  const model: CanonicalModel = Object.freeze({
    modelDescription,
    inputs: Object.freeze([...inputs]),
    outputs: Object.freeze([...outputs]),
    eigenfrequencies: modal ? matrix(adapter, SOURCE_KEYS.eigenfrequencies) : EMPTY,
    inputsToModalForce: modal ? matrix(adapter, SOURCE_KEYS.inputsToModalForce) : EMPTY,
    modalDisplacementToOutputs: modal ? matrix(adapter, SOURCE_KEYS.modalDisplacementToOutputs) : EMPTY,
    proportionalDampingVector: modal ? matrix(adapter, SOURCE_KEYS.proportionalDampingVector) : EMPTY,
    gainMatrix: modal ? EMPTY : matrix(adapter, SOURCE_KEYS.gainMatrix),
  });

  const payloadSize = modal
    ? model.eigenfrequencies.length +
      model.inputsToModalForce.length +
      model.modalDisplacementToOutputs.length +
      model.proportionalDampingVector.length
    : model.gainMatrix.length;
  if (payloadSize === 0) {
    const reason = `${variant} payload is present but empty`;
    log.warn(`Unsupported model variant: ${reason}`, { operation: 'classifyModel' });
    return { status: 'unsupported', format, reason };
  }

  log.info(`Classified as ${variant} model`, { operation: 'classifyModel' });
  return { status: 'converted', format, variant, model };
}
