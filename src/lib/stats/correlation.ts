import { sampleCorrelation, sampleStandardDeviation } from "simple-statistics";
import type { CorrelationPair } from "../../types/analysis";

export type NumericSeries = {
  name: string;
  values: (number | null)[];
};

export type CorrelationMatrix = {
  columns: string[];
  matrix: (number | null)[][];
  pairs: CorrelationPair[];
};

const completePairs = (a: (number | null)[], b: (number | null)[]): [number[], number[]] => {
  const xs: number[] = [];
  const ys: number[] = [];
  const length = Math.min(a.length, b.length);
  for (let index = 0; index < length; index += 1) {
    const x = a[index];
    const y = b[index];
    if (x === null || y === null) {
      continue;
    }
    xs.push(x);
    ys.push(y);
  }
  return [xs, ys];
};

export const pearson = (xs: number[], ys: number[]): number | null => {
  if (xs.length < 2 || xs.length !== ys.length) {
    return null;
  }
  if (sampleStandardDeviation(xs) === 0 || sampleStandardDeviation(ys) === 0) {
    return null;
  }
  const r = sampleCorrelation(xs, ys);
  if (!Number.isFinite(r)) {
    return null;
  }
  return Math.max(-1, Math.min(1, r));
};

const presentCount = (values: (number | null)[]): number =>
  values.reduce<number>((count, value) => (value === null ? count : count + 1), 0);

/**
 * Pearson matrix with pairwise deletion: each pair uses the rows where both columns
 * have values. Only the upper triangle is computed; the lower one mirrors it.
 */
export const correlationMatrix = (series: NumericSeries[]): CorrelationMatrix => {
  const size = series.length;
  const matrix: (number | null)[][] = Array.from({ length: size }, () =>
    Array.from({ length: size }, (): number | null => null)
  );
  const pairs: CorrelationPair[] = [];

  for (let row = 0; row < size; row += 1) {
    matrix[row][row] = presentCount(series[row].values) >= 2 ? 1 : null;
    for (let column = row + 1; column < size; column += 1) {
      const [xs, ys] = completePairs(series[row].values, series[column].values);
      const r = pearson(xs, ys);
      matrix[row][column] = r;
      matrix[column][row] = r;
      pairs.push({ a: series[row].name, b: series[column].name, r, n: xs.length });
    }
  }

  return { columns: series.map((item) => item.name), matrix, pairs };
};
