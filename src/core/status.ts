import type { StatusCounts } from './types';

export const emptyCounts = (): StatusCounts => ({ pass: 0, fail: 0, error: 0, skip: 0 });

export const totalOf = (counts: Readonly<StatusCounts>): number =>
  counts.pass + counts.fail + counts.error + counts.skip;

export const roundTo = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

/** Percentage of passes, 0 for an empty run. */
export const percentPassed = (counts: Readonly<StatusCounts>, digits = 2): number => {
  const total = totalOf(counts);
  return total === 0 ? 0 : roundTo((counts.pass / total) * 100, digits);
};
