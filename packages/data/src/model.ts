/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Canonical FEM model record
 *
 * The shape written by the serializer and read back by downstream
 * state-space builders. Field names here are the canonical ones; the
 * source documents use the short export names listed in SOURCE_KEYS.
 */

export type ChannelKind = 'input' | 'output';

/** Source generation a model was converted from */
export type SourceFormat = 'A' | 'B';

export type ModelVariant = 'modal' | 'static';

export type PropertyValue = string | readonly number[];

/**
 * Per-channel metadata.
 *
 * Special fields come first, in this order, each only when available:
 * coordinateSystemLabel (text), nodeId (uint32, always present),
 * coordinateSystemNumber (uint32), component (int32, outputs only).
 * Every other source field follows in source order under its source
 * name as a flat numeric sequence.
 */
export interface PropertyRecord {
  readonly nodeId: readonly number[];
  readonly [field: string]: PropertyValue;
}

export const PROPERTY_KEYS = {
  coordinateSystemLabel: 'coordinateSystemLabel',
  nodeId: 'nodeId',
  coordinateSystemNumber: 'coordinateSystemNumber',
  component: 'component',
} as const;

export interface ChannelEntry {
  typeTag: string;
  description: string;
  indices: readonly number[];
  /** Inputs only; the key is absent on output channels */
  excitationIds?: readonly number[];
  properties: PropertyRecord;
}

/** One-entry mapping: group name to its channels */
export type ChannelGroup = Readonly<Record<string, readonly ChannelEntry[]>>;

export interface ModalPayload {
  eigenfrequencies: readonly number[];
  inputsToModalForce: readonly number[];
  modalDisplacementToOutputs: readonly number[];
  proportionalDampingVector: readonly number[];
}

export interface StaticPayload {
  gainMatrix: readonly number[];
}

export interface CanonicalModel extends ModalPayload, StaticPayload {
  modelDescription: string;
  inputs: readonly ChannelGroup[];
  outputs: readonly ChannelGroup[];
}

export const MODAL_PAYLOAD_FIELDS = [
  'eigenfrequencies',
  'inputsToModalForce',
  'modalDisplacementToOutputs',
  'proportionalDampingVector',
] as const satisfies readonly (keyof ModalPayload)[];

/** Top-level and per-channel key names used by both source encodings */
export const SOURCE_KEYS = {
  inputs: 'fem_inputs',
  outputs: 'fem_outputs',
  modelDescription: 'modelDescription',
  eigenfrequencies: 'eigenfrequencies',
  inputsToModalForce: 'inputs2ModalF',
  modalDisplacementToOutputs: 'modalDisp2Outputs',
  proportionalDampingVector: 'proportionalDampingVec',
  gainMatrix: 'gainMatrix',
  types: 'types',
  excitationIds: 'exciteIDs',
  descriptions: 'descriptions',
  indices: 'indices',
  properties: 'properties',
  coordinateSystemLabel: 'csLabel',
  nodeId: 'nodeID',
  coordinateSystemNumber: 'csNumber',
  component: 'component',
} as const;

/**
 * Which payload carries data. Returns undefined when neither or both do,
 * which a converted model never allows.
 */
export function modelVariant(model: CanonicalModel): ModelVariant | undefined {
  const modal = MODAL_PAYLOAD_FIELDS.some((field) => model[field].length > 0);
  const stat = model.gainMatrix.length > 0;
  if (modal === stat) return undefined;
  return modal ? 'modal' : 'static';
}

export function groupName(group: ChannelGroup): string {
  const names = Object.keys(group);
  return names[0] ?? '';
}

export function groupChannels(group: ChannelGroup): readonly ChannelEntry[] {
  return group[groupName(group)] ?? [];
}

/**
 * Define an own enumerable key on a mapping. Plain assignment would treat
 * a source key named __proto__ as a prototype change and drop it.
 */
export function setOwnField<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}
