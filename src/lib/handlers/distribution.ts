import type { DistributionStatistics } from "../../types/analysis";
import type { ChartSink } from "../charts/types";
import { AnalysisError } from "../engine/errors";
import { buildHistogram, summarizeNumbers } from "../stats/descriptive";
import { roundTo } from "../stats/rounding";
import { expectSingle, numericValues, presentValues } from "./columns";
import type { AnalysisHandler, HandlerInput, HandlerOutput } from "./types";

export const runDistribution = async (
  { dataset, target, settings }: HandlerInput,
  charts: ChartSink,
  handlerId = "distribution"
): Promise<HandlerOutput> => {
  const column = expectSingle(target, handlerId);
  const values = presentValues(numericValues(dataset, column));
  if (values.length === 0) {
    throw new AnalysisError("InsufficientData", `Column "${column}" has no numeric values.`);
  }

  const decimals = settings.rounding.statistics;
  const summary = summarizeNumbers(values);
  const statistics: DistributionStatistics = {
    kind: "distribution",
    column,
    count: summary.count,
    mean: roundTo(summary.mean, decimals),
    median: roundTo(summary.median, decimals),
    stdDev: roundTo(summary.stdDev, decimals),
    min: roundTo(summary.min, decimals),
    max: roundTo(summary.max, decimals),
    skewness: roundTo(summary.skewness, decimals)
  };

  const chart = await charts.write({
    kind: "histogram",
    title: `Distribution of ${column}`,
    valueLabel: column,
    bins: buildHistogram(values).map((bin) => ({
      label: `${roundTo(bin.start, decimals)} to ${roundTo(bin.end, decimals)}`,
      count: bin.count
    }))
  });

  return { statistics, chart };
};

export const distributionHandler: AnalysisHandler = {
  id: "distribution",
  requirement: { shape: "single", accepts: ["numeric"] },
  run: (input, charts) => runDistribution(input, charts)
};
