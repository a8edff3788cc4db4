/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Conversion pipeline: adapter -> normalizer -> classifier.
 *
 * Fatal problems throw FemConversionError; an unrecognised model shape
 * comes back as an 'unsupported' result. Nothing here writes output.
 */

import { SOURCE_KEYS, createLogger } from '@fem-canon/data';
import type { SourceFormat } from '@fem-canon/data';
import { extractChannels } from './extraction-engine.js';
import { formatAAdapter } from './format-a.js';
import { formatBAdapter } from './format-b.js';
import { isRawRecord } from './source.js';
import type { RawRecord, SourceAdapter } from './source.js';
import { classifyModel } from './variant-classifier.js';
import type { ConversionResult } from './variant-classifier.js';

const log = createLogger('Convert');

export function createAdapter(document: RawRecord, format: SourceFormat): SourceAdapter {
  return format === 'A' ? formatAAdapter(document) : formatBAdapter(document);
}

/**
 * Guess the encoding from the first channel group found: struct arrays
 * (size + fields) are Format A, channel lists are Format B.
 */
export function detectSourceFormat(document: RawRecord): SourceFormat | undefined {
  for (const key of [SOURCE_KEYS.inputs, SOURCE_KEYS.outputs]) {
    const container = document[key];
    if (!isRawRecord(container)) continue;
    for (const group of Object.values(container)) {
      if (Array.isArray(group)) return 'B';
      if (isRawRecord(group) && 'size' in group && 'fields' in group) return 'A';
    }
  }
  return undefined;
}

export function convertFem(document: RawRecord, format: SourceFormat): ConversionResult {
  const adapter = createAdapter(document, format);
  const inputs = extractChannels(adapter, 'input');
  const outputs = extractChannels(adapter, 'output');
  log.info(`Extracted ${inputs.length} input and ${outputs.length} output group(s)`, {
    operation: 'convertFem',
    data: { format },
  });
  return classifyModel(adapter, inputs, outputs);
}
