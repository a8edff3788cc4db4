/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { FemConversionError, MandatoryFieldMissingError, SOURCE_KEYS } from '@fem-canon/data';
import type { ChannelKind } from '@fem-canon/data';
import { isRawRecord, lookup } from './source.js';
import type { RawRecord } from './source.js';

export function sourceKeyOf(kind: ChannelKind): string {
  return kind === 'input' ? SOURCE_KEYS.inputs : SOURCE_KEYS.outputs;
}

/** The fem_inputs / fem_outputs mapping of group name to group */
export function groupContainer(document: RawRecord, kind: ChannelKind): RawRecord {
  const key = sourceKeyOf(kind);
  const found = lookup(document, key);
  if (!found.present) throw new MandatoryFieldMissingError(key, key);
  if (!isRawRecord(found.value)) {
    throw new FemConversionError('MalformedSource', 'Channel groups must be a mapping of group name to channels', key);
  }
  return found.value;
}
