/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Model summary for `fem-canon inspect`
 */

import { groupChannels, groupName, modelVariant } from '@fem-canon/data';
import type { CanonicalModel, ChannelGroup, ModelVariant } from '@fem-canon/data';

export interface GroupSummary {
  name: string;
  channels: number;
  /** Total degrees of freedom, i.e. the summed length of every channel's indices */
  dof: number;
}

export interface HistogramBin {
  /** Inclusive lower edge [Hz] */
  lower: number;
  /** Exclusive upper edge [Hz] */
  upper: number;
  count: number;
}

export interface ModelSummary {
  description: string;
  variant: ModelVariant | undefined;
  modes: number;
  inputChannels: number;
  outputChannels: number;
  inputs: GroupSummary[];
  outputs: GroupSummary[];
  /** [min, max] eigenfrequency in Hz, absent for static models */
  frequencyRange?: [number, number];
  histogram: HistogramBin[];
}

/**
 * Count eigenfrequencies in octave bins [0, 2), [2, 4), [4, 8), ...
 * Bins are added until the lower edge passes maxFrequency.
 */
export function frequencyHistogram(
  frequencies: readonly number[],
  maxFrequency: number = frequencies.reduce((max, nu) => Math.max(max, nu), -Infinity)
): HistogramBin[] {
  const bins: HistogramBin[] = [];
  for (let i = 0; ; i++) {
    const upper = 2 ** (i + 1);
    const lower = i === 0 ? 0 : upper / 2;
    if (lower > maxFrequency) break;
    const count = frequencies.filter((nu) => nu >= lower && nu < upper).length;
    bins.push({ lower, upper, count });
  }
  return bins;
}

function summarizeGroups(groups: readonly ChannelGroup[]): GroupSummary[] {
  return groups.map((group) => {
    const channels = groupChannels(group);
    return {
      name: groupName(group),
      channels: channels.length,
      dof: channels.reduce((sum, channel) => sum + channel.indices.length, 0),
    };
  });
}

export function summarizeModel(model: CanonicalModel): ModelSummary {
  const inputs = summarizeGroups(model.inputs);
  const outputs = summarizeGroups(model.outputs);
  const nu = model.eigenfrequencies;
  const frequencyRange: [number, number] | undefined =
    nu.length > 0
      ? [nu.reduce((a, b) => Math.min(a, b)), nu.reduce((a, b) => Math.max(a, b))]
      : undefined;

  return {
    description: model.modelDescription,
    variant: modelVariant(model),
    modes: nu.length,
    inputChannels: inputs.reduce((sum, group) => sum + group.channels, 0),
    outputChannels: outputs.reduce((sum, group) => sum + group.channels, 0),
    inputs,
    outputs,
    ...(frequencyRange ? { frequencyRange } : {}),
    histogram: frequencyHistogram(nu),
  };
}

/** Plain-text report, one line per item */
export function formatModelSummary(summary: ModelSummary): string {
  const lines: string[] = [];
  lines.push(`Model: ${summary.description}`);
  lines.push(`Variant: ${summary.variant ?? 'unknown'}`);
  lines.push(`Modes: ${summary.modes}`);
  if (summary.frequencyRange) {
    const [min, max] = summary.frequencyRange;
    lines.push(`Eigenfrequencies: ${min.toFixed(3)} .. ${max.toFixed(3)} Hz`);
  }
  lines.push(`Inputs: ${summary.inputChannels} channel(s) in ${summary.inputs.length} group(s)`);
  for (const group of summary.inputs) {
    lines.push(`  ${group.name}: ${group.channels} channel(s), ${group.dof} dof`);
  }
  lines.push(`Outputs: ${summary.outputChannels} channel(s) in ${summary.outputs.length} group(s)`);
  for (const group of summary.outputs) {
    lines.push(`  ${group.name}: ${group.channels} channel(s), ${group.dof} dof`);
  }
  if (summary.histogram.length > 0) {
    lines.push('Frequency histogram:');
    for (const bin of summary.histogram) {
      lines.push(`  [${bin.lower}, ${bin.upper}) Hz: ${bin.count}`);
    }
  }
  return lines.join('\n');
}
