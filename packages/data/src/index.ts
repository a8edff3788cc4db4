/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @fem-canon/data - Canonical model types, error kinds and logging
 */

export * from './model.js';
export {
  FemConversionError,
  MandatoryFieldMissingError,
  TextDecodeError,
  SourceLoadError,
  isFemConversionError,
  joinPath,
} from './errors.js';
export type { FemErrorKind } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogContext } from './logger.js';
