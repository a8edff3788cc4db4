/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @fem-canon/export - Canonical record persistence and inspection
 */

export {
  canonicalIdentifier,
  serializeCanonicalModel,
  archiveCanonicalModel,
  writeCanonicalModel,
  type WriteCanonicalOptions,
  type WrittenModel,
} from './canonical-serializer.js';
export { parseCanonicalModel, readCanonicalModel } from './canonical-reader.js';
export {
  summarizeModel,
  frequencyHistogram,
  formatModelSummary,
  type ModelSummary,
  type GroupSummary,
  type HistogramBin,
} from './model-summary.js';
