/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Source document loading
 *
 * Documents are read once, in full. Format B models come in two
 * artifacts (full modal model, static-reduction-only model) under
 * different names, so loading tries the primary name and then exactly
 * one alternate.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { FemConversionError, SourceLoadError, createLogger } from '@fem-canon/data';
import type { SourceFormat } from '@fem-canon/data';
import { isRawRecord } from './source.js';
import type { RawRecord } from './source.js';

const log = createLogger('SourceLoader');

/** Opaque structured-file reader: path in, decoded nested records out */
export interface SourceReader {
  read(path: string): unknown;
}

/** Reads the JSON export of a source document */
export const jsonSourceReader: SourceReader = {
  read(path: string): unknown {
    return JSON.parse(readFileSync(path, 'utf8'));
  },
};

export const SOURCE_FILES = {
  primary: 'modal_state_space_model_2ndOrder.json',
  alternate: 'static_reduction_model.json',
} as const;

/** File names tried, in order, for a source format */
export function sourceCandidates(format: SourceFormat | 'auto'): readonly string[] {
  return format === 'A' ? [SOURCE_FILES.primary] : [SOURCE_FILES.primary, SOURCE_FILES.alternate];
}

export interface LoadedSource {
  path: string;
  document: RawRecord;
}

export interface LoadSourceOptions {
  directory: string;
  candidates: readonly string[];
  reader?: SourceReader;
}

export function loadSource(options: LoadSourceOptions): LoadedSource {
  const reader = options.reader ?? jsonSourceReader;
  const attempted: string[] = [];
  let lastError: unknown;

  for (const name of options.candidates) {
    const path = join(options.directory, name);
    attempted.push(path);
    let document: unknown;
    try {
      document = reader.read(path);
    } catch (error) {
      log.caught(`Cannot read ${path}`, error, { operation: 'loadSource' });
      lastError = error;
      continue;
    }
    if (!isRawRecord(document)) {
      throw new FemConversionError('MalformedSource', 'Source document must be a mapping', path);
    }
    log.info(`Loaded ${path}`, { operation: 'loadSource' });
    return { path, document };
  }

  throw new SourceLoadError(`Cannot load source document (tried ${attempted.join(', ')})`, attempted, {
    cause: lastError,
  });
}
