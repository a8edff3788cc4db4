#!/usr/bin/env node
/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * CLI for FEM descriptor conversion
 *
 * Converts a Format-A or Format-B export into the canonical model record,
 * and prints summaries of canonical records.
 */

import { Command } from 'commander';
import { parseFormat, parseIndent, resolveConvertConfig } from './config.js';
import type { ConvertCliOptions } from './config.js';
import { reportError, runConvert, runInspect } from './run.js';

/** Exit code of a run whose source matched neither model variant */
const EXIT_UNSUPPORTED = 2;

function createProgram(): Command {
  const program = new Command();

  program
    .name('fem-canon')
    .description('Normalize exported FEM descriptors into the canonical model record')
    .version('0.1.0');

  program
    .command('convert')
    .description('Convert a FEM export (Format A or B) into the canonical record')
    .option('-f, --format <format>', 'Source encoding: A, B or auto (env FEM_CANON_FORMAT)', parseFormat)
    .option('-s, --source-dir <dir>', 'Directory holding the source export (env FEM_CANON_SOURCE_DIR)')
    .option('--file <path>', 'Explicit source file; no alternate name is tried')
    .option('-o, --output <dir>', 'Output directory (env FEM_CANON_OUTPUT_DIR, default: source directory)')
    .option('-a, --archive', 'Also write a zip archive of the record')
    .option('--indent <n>', 'Indent the JSON output', parseIndent)
    .action(async (options: ConvertCliOptions) => {
      try {
        const config = resolveConvertConfig(options);
        const start = Date.now();
        const outcome = await runConvert(config);

        if (outcome.status === 'unsupported') {
          console.warn(`⚠️  ${outcome.source}: unsupported model variant (${outcome.reason}); nothing written`);
          process.exitCode = EXIT_UNSUPPORTED;
          return;
        }

        console.log(`Source: ${outcome.source} (format ${outcome.format})`);
        console.log(`Model:  ${outcome.variant} -> ${outcome.written.identifier}`);
        for (const file of outcome.written.files) {
          console.log(`Wrote:  ${file}`);
        }
        console.log(`\n⏱️  Completed in ${Date.now() - start}ms`);
      } catch (error) {
        reportError(error, 'convert');
        process.exitCode = 1;
      }
    });

  program
    .command('inspect')
    .description('Summarize a canonical record')
    .argument('<file>', 'Canonical record (.json)')
    .action((file: string) => {
      try {
        console.log(runInspect(file));
      } catch (error) {
        reportError(error, 'inspect');
        process.exitCode = 1;
      }
    });

  return program;
}

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    reportError(error, 'parse');
    process.exitCode = 1;
  });
