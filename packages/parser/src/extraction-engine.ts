/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Extraction engine shared by both source encodings.
 */

import { createLogger } from '@fem-canon/data';
import type { ChannelGroup, ChannelKind } from '@fem-canon/data';
import { normalizeChannelGroup } from './channel-normalizer.js';
import type { SourceAdapter } from './source.js';

const log = createLogger('Extraction');

/**
 * Normalize every named group of one channel kind, preserving the
 * source's group order. Each group becomes a one-entry mapping.
 */
export function extractChannels(adapter: SourceAdapter, kind: ChannelKind): ChannelGroup[] {
  const groups: ChannelGroup[] = [];
  for (const name of adapter.groupNames(kind)) {
    const group = adapter.group(kind, name);
    const entries = normalizeChannelGroup(group, adapter.policy);
    log.debug(`${entries.length} channel(s)`, undefined, {
      operation: `extract ${kind}s`,
      group: name,
    });
    groups.push(Object.freeze({ [name]: Object.freeze(entries) }));
  }
  return groups;
}
