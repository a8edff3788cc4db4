/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * One conversion run: load -> convert -> write.
 */

import { basename, dirname } from 'node:path';
import { FemConversionError, SourceLoadError, createLogger, isFemConversionError } from '@fem-canon/data';
import type { ModelVariant, SourceFormat } from '@fem-canon/data';
import {
  convertFem,
  detectSourceFormat,
  loadSource,
  sourceCandidates,
  SOURCE_FILES,
} from '@fem-canon/parser';
import type { SourceReader } from '@fem-canon/parser';
import {
  formatModelSummary,
  readCanonicalModel,
  summarizeModel,
  writeCanonicalModel,
} from '@fem-canon/export';
import type { WrittenModel } from '@fem-canon/export';
import type { ConvertConfig } from './config.js';

const log = createLogger('Cli');

export type ConvertOutcome =
  | {
      status: 'written';
      source: string;
      format: SourceFormat;
      variant: ModelVariant;
      written: WrittenModel;
    }
  | {
      status: 'unsupported';
      source: string;
      format: SourceFormat;
      reason: string;
    };

export async function runConvert(config: ConvertConfig, reader?: SourceReader): Promise<ConvertOutcome> {
  const loaded = config.file
    ? loadSource({ directory: dirname(config.file), candidates: [basename(config.file)], reader })
    : loadSource({ directory: config.sourceDir, candidates: sourceCandidates(config.format), reader });

  const format = config.format === 'auto' ? detectSourceFormat(loaded.document) : config.format;
  if (!format) {
    throw new FemConversionError(
      'MalformedSource',
      'Cannot tell the source encoding from its channel groups; pass --format',
      loaded.path
    );
  }
  // the alternate name only ever holds Format B exports
  if (!config.file && format === 'A' && basename(loaded.path) === SOURCE_FILES.alternate) {
    throw new SourceLoadError(
      `Struct-array sources are only read from ${SOURCE_FILES.primary}`,
      [loaded.path]
    );
  }
  log.info(`Converting ${loaded.path} as format ${format}`, { operation: 'runConvert' });

  const result = convertFem(loaded.document, format);
  if (result.status === 'unsupported') {
    return { status: 'unsupported', source: loaded.path, format, reason: result.reason };
  }

  const written = await writeCanonicalModel(result.model, {
    outputDir: config.outputDir,
    variant: result.variant,
    format,
    archive: config.archive,
    indent: config.indent,
  });
  return { status: 'written', source: loaded.path, format, variant: result.variant, written };
}

/** Report a failed command on stderr, tagged with the error kind */
export function reportError(error: unknown, operation: string): void {
  log.error(isFemConversionError(error) ? error.kind : 'Command failed', error, { operation });
}

export function runInspect(path: string): string {
  return formatModelSummary(summarizeModel(readCanonicalModel(path)));
}
