import {
  max,
  mean,
  median,
  min,
  sampleSkewness,
  sampleStandardDeviation
} from "simple-statistics";

export type NumericSummary = {
  count: number;
  mean: number;
  median: number;
  stdDev: number;
  min: number;
  max: number;
  skewness: number;
};

/**
 * Sample statistics (n - 1 denominators) for a non-empty list. Skewness is the adjusted
 * Fisher-Pearson coefficient. A constant list reports 0 spread and 0 skew.
 */
export const summarizeNumbers = (values: number[]): NumericSummary => {
  if (values.length === 0) {
    throw new Error("Cannot summarize an empty list of numbers.");
  }
  const lowest = min(values);
  const highest = max(values);
  const constant = lowest === highest;

  return {
    count: values.length,
    mean: constant ? lowest : mean(values),
    median: constant ? lowest : median(values),
    stdDev: constant || values.length < 2 ? 0 : sampleStandardDeviation(values),
    min: lowest,
    max: highest,
    skewness: constant || values.length < 3 ? 0 : sampleSkewness(values)
  };
};

export type HistogramBin = {
  start: number;
  end: number;
  count: number;
};

export const MAX_HISTOGRAM_BINS = 50;

export const buildHistogram = (values: number[]): HistogramBin[] => {
  if (values.length === 0) {
    return [];
  }
  const lowest = min(values);
  const highest = max(values);
  const distinct = new Set(values).size;
  if (lowest === highest) {
    return [{ start: lowest, end: highest, count: values.length }];
  }

  const binCount = Math.min(MAX_HISTOGRAM_BINS, distinct);
  const width = (highest - lowest) / binCount;
  const bins: HistogramBin[] = Array.from({ length: binCount }, (_, index) => ({
    start: lowest + index * width,
    end: index === binCount - 1 ? highest : lowest + (index + 1) * width,
    count: 0
  }));

  values.forEach((value) => {
    const index = Math.min(binCount - 1, Math.floor((value - lowest) / width));
    bins[index].count += 1;
  });

  return bins;
};
