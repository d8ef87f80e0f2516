import type { TrendStatistics } from "../../types/analysis";
import { AnalysisError } from "../engine/errors";
import { aggregateByMonth, pickAggregation, type MonthlyObservation } from "../stats/monthly";
import { roundTo } from "../stats/rounding";
import { numericValues, timeValues } from "./columns";
import type { AnalysisHandler } from "./types";

const AGGREGATION_LABELS = {
  count: "Rows",
  sum: "Total",
  mean: "Average"
} as const;

export const temporalTrendHandler: AnalysisHandler = {
  id: "temporal_trend",
  requirement: { shape: "trend" },
  run: async ({ dataset, target, settings }, charts) => {
    if (target.shape !== "trend") {
      throw new AnalysisError("InvalidPlanEntry", "temporal_trend expects a metric and time column.");
    }
    const { metric, time } = target;
    const times = timeValues(dataset, time);
    const metrics = metric === null ? null : numericValues(dataset, metric);

    const observations: MonthlyObservation[] = [];
    times.forEach((timestamp, index) => {
      if (timestamp === null) {
        return;
      }
      const value = metrics === null ? null : metrics[index];
      if (metrics !== null && value === null) {
        return;
      }
      observations.push({ time: timestamp, value });
    });

    if (observations.length === 0) {
      throw new AnalysisError(
        "InsufficientData",
        metric === null
          ? `Column "${time}" has no parseable dates.`
          : `No rows have both a date in "${time}" and a value in "${metric}".`
      );
    }

    const aggregation = pickAggregation(metric);
    const decimals = settings.rounding.statistics;
    const points = aggregateByMonth(observations, aggregation).map((bucket) => ({
      month: bucket.month,
      value: roundTo(bucket.value, decimals),
      rows: bucket.rows
    }));

    const statistics: TrendStatistics = {
      kind: "trend",
      metric,
      timeColumn: time,
      aggregation,
      points
    };

    const chart = await charts.write({
      kind: "line",
      title:
        metric === null
          ? `Temporal Trend - ${time}`
          : `${AGGREGATION_LABELS[aggregation]} ${metric} by month`,
      categories: points.map((point) => point.month),
      values: points.map((point) => point.value),
      valueLabel: metric === null ? "rows" : `${aggregation}(${metric})`
    });

    return { statistics, chart };
  }
};
