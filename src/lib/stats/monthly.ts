export type MonthlyAggregation = "count" | "sum" | "mean";

export type MonthlyObservation = {
  time: number;
  value: number | null;
};

export type MonthlyBucket = {
  month: string;
  value: number;
  rows: number;
};

const RATE_LIKE_PATTERN = /(rate|ratio|percent|pct|share|avg|average|mean|score|rating)/i;

export const pickAggregation = (metric: string | null): MonthlyAggregation => {
  if (metric === null) {
    return "count";
  }
  return RATE_LIKE_PATTERN.test(metric) ? "mean" : "sum";
};

// Months are counted as year * 12 + zero-based month, in UTC.
const monthIndex = (time: number | Date): number => {
  const date = new Date(time);
  return date.getUTCFullYear() * 12 + date.getUTCMonth();
};

const formatMonthIndex = (index: number): string => {
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}`;
};

export const monthKey = (time: number | Date): string => formatMonthIndex(monthIndex(time));

/**
 * Buckets observations by calendar month in UTC, covering every month between
 * the first and last observation. Months without rows report 0.
 */
export const aggregateByMonth = (
  observations: MonthlyObservation[],
  aggregation: MonthlyAggregation
): MonthlyBucket[] => {
  if (observations.length === 0) {
    return [];
  }

  const totals = new Map<string, { sum: number; rows: number }>();
  let first = observations[0].time;
  let last = observations[0].time;
  observations.forEach(({ time, value }) => {
    first = Math.min(first, time);
    last = Math.max(last, time);
    const key = monthKey(time);
    const current = totals.get(key) ?? { sum: 0, rows: 0 };
    totals.set(key, {
      sum: current.sum + (aggregation === "count" ? 1 : value ?? 0),
      rows: current.rows + 1
    });
  });

  const buckets: MonthlyBucket[] = [];
  const end = monthIndex(last);
  for (let cursor = monthIndex(first); cursor <= end; cursor += 1) {
    const key = formatMonthIndex(cursor);
    const bucket = totals.get(key);
    if (!bucket) {
      buckets.push({ month: key, value: 0, rows: 0 });
      continue;
    }
    buckets.push({
      month: key,
      value: aggregation === "mean" ? bucket.sum / bucket.rows : bucket.sum,
      rows: bucket.rows
    });
  }
  return buckets;
};
