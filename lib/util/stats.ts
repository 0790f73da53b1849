export interface MeanSd {
  mean: number;
  sd: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new RangeError('mean of an empty sample');
  let s = 0;
  for (const v of values) s += v;
  return s / values.length;
}

/** Sample standard deviation (n - 1). A single sample has sd 0. */
export function sampleSd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const m = mean(values);
  let ss = 0;
  for (const v of values) {
    const d = v - m;
    ss += d * d;
  }
  return Math.sqrt(ss / (values.length - 1));
}

export function meanSd(values: readonly number[]): MeanSd {
  return { mean: mean(values), sd: sampleSd(values) };
}
