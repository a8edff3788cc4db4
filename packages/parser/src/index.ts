/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @fem-canon/parser - FEM descriptor parsing and normalization
 * Supports the flat struct-array export (Format A) and the hierarchical
 * export (Format B)
 */

export { convertFem, createAdapter, detectSourceFormat } from './convert.js';
export { classifyModel, detectVariant, type ConversionResult } from './variant-classifier.js';
export { extractChannels } from './extraction-engine.js';
export { normalizeChannelGroup } from './channel-normalizer.js';
export {
  extractPropertyRecord,
  coerceField,
  type PropertyExtractionContext,
} from './property-extractor.js';
export { formatAAdapter } from './format-a.js';
export { formatBAdapter } from './format-b.js';
export {
  CHANNEL_FIELDS,
  PROPERTY_FIELDS,
  propertyRule,
  recovers,
  type ChannelFieldRule,
  type PropertyFieldRule,
  type FieldPresence,
  type FieldCoercion,
  type FieldRecovery,
} from './field-table.js';
export {
  loadSource,
  sourceCandidates,
  jsonSourceReader,
  SOURCE_FILES,
  type SourceReader,
  type LoadedSource,
  type LoadSourceOptions,
} from './source-loader.js';
export { ABSENT, lookup, isRawRecord } from './source.js';
export type {
  RawRecord,
  FieldLookup,
  FieldPolicy,
  PropertySource,
  ChannelGroupSource,
  SourceAdapter,
} from './source.js';
