/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Convert command configuration: command-line options first, then
 * environment variables, then defaults.
 */

import { resolve } from 'node:path';
import { InvalidArgumentError } from 'commander';
import type { SourceFormat } from '@fem-canon/data';

export type FormatOption = SourceFormat | 'auto';

/** Options as commander hands them over */
export interface ConvertCliOptions {
  format?: string;
  sourceDir?: string;
  file?: string;
  output?: string;
  archive?: boolean;
  indent?: number;
}

export interface ConvertConfig {
  format: FormatOption;
  /** Directory searched for the primary and alternate source names */
  sourceDir: string;
  /** Explicit source file; disables the file-name fallback */
  file?: string;
  outputDir: string;
  archive: boolean;
  indent?: number;
}

export function parseFormat(value: string): FormatOption {
  const normalized = value.trim().toUpperCase();
  if (normalized === 'A' || normalized === 'B') return normalized;
  if (normalized === 'AUTO') return 'auto';
  throw new InvalidArgumentError(`Unknown source format "${value}" (expected A, B or auto).`);
}

export function parseIndent(value: string): number {
  const indent = Number(value);
  if (!Number.isInteger(indent) || indent < 0 || indent > 10) {
    throw new InvalidArgumentError('Indent must be an integer between 0 and 10.');
  }
  return indent;
}

export function resolveConvertConfig(
  options: ConvertCliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ConvertConfig {
  const sourceDir = resolve(cwd, options.sourceDir ?? env.FEM_CANON_SOURCE_DIR ?? '.');
  const outputDir = resolve(cwd, options.output ?? env.FEM_CANON_OUTPUT_DIR ?? sourceDir);
  return {
    format: parseFormat(options.format ?? env.FEM_CANON_FORMAT ?? 'auto'),
    sourceDir,
    ...(options.file ? { file: resolve(cwd, options.file) } : {}),
    outputDir,
    archive: options.archive ?? false,
    ...(options.indent !== undefined ? { indent: options.indent } : {}),
  };
}
