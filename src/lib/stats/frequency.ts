import type { FrequencyRow } from "../../types/analysis";
import { roundTo } from "./rounding";

export type FrequencyCount = {
  value: string;
  count: number;
};

/**
 * Counts labels and sorts by descending count. Equal counts keep the order in which the
 * labels were first seen.
 */
export const countFrequencies = (labels: string[]): FrequencyCount[] => {
  const counts = new Map<string, number>();
  labels.forEach((label) => {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  });
  return Array.from(counts.entries())
    .map(([value, count]) => ({ value, count }))
    .sort((a, b) => b.count - a.count);
};

/**
 * Percent of `total` per row, apportioned by largest remainder: every share is rounded
 * down to `percentDecimals`, then the units lost to rounding go to the largest
 * remainders (earlier rows first on ties). A list covering the whole total sums to
 * exactly 100.
 */
export const toFrequencyRows = (
  counts: FrequencyCount[],
  total: number,
  percentDecimals: number
): FrequencyRow[] => {
  if (total === 0) {
    return counts.map(({ value, count }) => ({ value, count, percent: 0 }));
  }
  const scale = 100 * 10 ** percentDecimals;
  const shares = counts.map(({ count }, index) => {
    const exact = (count * scale) / total;
    const units = Math.floor(exact);
    return { index, units, remainder: exact - units };
  });
  const exactSum = shares.reduce((sum, share) => sum + share.units + share.remainder, 0);
  const floorSum = shares.reduce((sum, share) => sum + share.units, 0);
  let leftover = Math.max(0, Math.min(shares.length, Math.round(exactSum) - floorSum));

  [...shares]
    .sort((a, b) => b.remainder - a.remainder || a.index - b.index)
    .forEach((share) => {
      if (leftover > 0 && share.remainder > 0) {
        share.units += 1;
        leftover -= 1;
      }
    });

  return counts.map(({ value, count }, index) => ({
    value,
    count,
    percent: roundTo(shares[index].units / 10 ** percentDecimals, percentDecimals)
  }));
};
