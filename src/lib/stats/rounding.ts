export type RoundingPolicy = {
  statistics: number;
  percentages: number;
};

export const DEFAULT_ROUNDING: RoundingPolicy = {
  statistics: 2,
  percentages: 1
};

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Math.sign(value) * Number.EPSILON) * factor) / factor;
  return rounded === 0 ? 0 : rounded;
};

export const roundNullable = (value: number | null, decimals: number): number | null =>
  value === null ? null : roundTo(value, decimals);

export const toPercent = (count: number, total: number, decimals: number): number =>
  total === 0 ? 0 : roundTo((count / total) * 100, decimals);
