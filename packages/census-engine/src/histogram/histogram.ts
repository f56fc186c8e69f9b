import type { SparseMonthCounts } from "../adapters/types";
import type { MonthlyHistogram, PeakMonth } from "../schema";
import { MONTH_NAMES, NO_DATA } from "../schema";

export const emptyHistogram = (): MonthlyHistogram => new Array<number>(MONTH_NAMES.length).fill(0);

export const isEmptyHistogram = (histogram: readonly number[]): boolean => histogram.every((value) => value === 0);

/**
 * Keys are 1-indexed months; keys outside 1..12 are dropped.
 */
export const toMonthlyHistogram = (counts: SparseMonthCounts): MonthlyHistogram => {
  const histogram = emptyHistogram();
  for (const [month, count] of Object.entries(counts)) {
    const index = Number.parseInt(month, 10) - 1;
    if (Number.isInteger(index) && index >= 0 && index < histogram.length && count > 0) {
      histogram[index] = count;
    }
  }
  return histogram;
};

/**
 * First month holding the maximum wins ties.
 */
export const peakMonth = (histogram: readonly number[]): PeakMonth => {
  if (histogram.length === 0 || isEmptyHistogram(histogram)) {
    return NO_DATA;
  }
  let best = 0;
  for (let index = 1; index < histogram.length; index += 1) {
    if ((histogram[index] ?? 0) > (histogram[best] ?? 0)) {
      best = index;
    }
  }
  return MONTH_NAMES[best] ?? NO_DATA;
};
