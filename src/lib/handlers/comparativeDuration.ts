import type { GroupSummary, GroupedStatistics } from "../../types/analysis";
import { AnalysisError } from "../engine/errors";
import { summarizeNumbers } from "../stats/descriptive";
import { roundTo } from "../stats/rounding";
import { labelValues, numericValues } from "./columns";
import type { AnalysisHandler } from "./types";

const groupValues = (
  values: (number | null)[],
  labels: (string | null)[]
): Map<string, number[]> => {
  const groups = new Map<string, number[]>();
  values.forEach((value, index) => {
    const label = labels[index];
    if (value === null || label === null) {
      return;
    }
    const bucket = groups.get(label);
    if (bucket) {
      bucket.push(value);
    } else {
      groups.set(label, [value]);
    }
  });
  return groups;
};

export const comparativeDurationHandler: AnalysisHandler = {
  id: "comparative_duration",
  requirement: { shape: "grouped" },
  run: async ({ dataset, target, settings }, charts) => {
    if (target.shape !== "grouped") {
      throw new AnalysisError(
        "InvalidPlanEntry",
        "comparative_duration expects a value column and a group column."
      );
    }
    const { value, group } = target;
    const groups = groupValues(numericValues(dataset, value), labelValues(dataset, group));
    if (groups.size === 0) {
      throw new AnalysisError(
        "InsufficientData",
        `No rows have both a value in "${value}" and a group in "${group}".`
      );
    }

    const decimals = settings.rounding.statistics;
    const summaries: GroupSummary[] = Array.from(groups.entries()).map(([name, values]) => {
      const summary = summarizeNumbers(values);
      const stdDevDefined = values.length >= 2;
      return {
        group: name,
        count: summary.count,
        mean: roundTo(summary.mean, decimals),
        median: roundTo(summary.median, decimals),
        stdDev: stdDevDefined ? roundTo(summary.stdDev, decimals) : null,
        stdDevDefined
      };
    });

    let highest = summaries[0];
    let lowest = summaries[0];
    summaries.forEach((summary) => {
      if (summary.median > highest.median) {
        highest = summary;
      }
      if (summary.median < lowest.median) {
        lowest = summary;
      }
    });

    const statistics: GroupedStatistics = {
      kind: "grouped",
      valueColumn: value,
      groupColumn: group,
      groups: summaries,
      highestMedianGroup: highest.group,
      lowestMedianGroup: lowest.group
    };

    const chart = await charts.write({
      kind: "groupedBar",
      title: `${value} by ${group}`,
      categories: summaries.map((summary) => summary.group),
      series: [
        { name: "mean", values: summaries.map((summary) => summary.mean) },
        { name: "median", values: summaries.map((summary) => summary.median) }
      ]
    });

    return { statistics, chart };
  }
};
