/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Fatal conversion failures. Any of these aborts the run before output
 * is written. An unsupported model variant is not an error: the pipeline
 * returns it as a result.
 */

export type FemErrorKind =
  | 'MandatoryFieldMissing'
  | 'TextDecodeError'
  | 'SourceLoadFailure'
  | 'MalformedSource'
  | 'InvalidFieldValue';

export class FemConversionError extends Error {
  constructor(
    public readonly kind: FemErrorKind,
    message: string,
    /** Slash-separated location in the source document, e.g. fem_inputs/M1/0/properties/nodeID */
    public readonly path?: string,
    options?: { cause?: unknown }
  ) {
    super(path ? `${message} (at ${path})` : message, options);
    this.name = 'FemConversionError';
  }
}

export class MandatoryFieldMissingError extends FemConversionError {
  constructor(field: string, path: string) {
    super('MandatoryFieldMissing', `Mandatory field "${field}" is missing`, path);
    this.name = 'MandatoryFieldMissingError';
  }
}

export class TextDecodeError extends FemConversionError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super('TextDecodeError', message, path, options);
    this.name = 'TextDecodeError';
  }
}

export class SourceLoadError extends FemConversionError {
  constructor(
    message: string,
    /** Every file name that was tried, in order */
    public readonly attempted: readonly string[],
    options?: { cause?: unknown }
  ) {
    super('SourceLoadFailure', message, undefined, options);
    this.name = 'SourceLoadError';
  }
}

export function isFemConversionError(error: unknown): error is FemConversionError {
  return error instanceof FemConversionError;
}

/** Join source path segments the way error messages report them */
export function joinPath(...segments: (string | number)[]): string {
  return segments.map(String).join('/');
}
