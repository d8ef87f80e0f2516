import type { AnalysisStatistics } from "../../types/analysis";

const HIGH_SKEW = 1;
const DOMINANT_PERCENT = 60;
const STRONG_CORRELATION = 0.7;

/** One-line finding for a successful result, handed to report synthesis as-is. */
export const describeStatistics = (statistics: AnalysisStatistics): string => {
  switch (statistics.kind) {
    case "distribution": {
      const { column, mean, median, skewness } = statistics;
      if (Math.abs(skewness) > HIGH_SKEW) {
        const direction = skewness > 0 ? "right-skewed" : "left-skewed";
        return `The distribution of '${column}' is highly skewed (${direction}), with values concentrated near ${statistics.min} (mean ${mean}).`;
      }
      return `The distribution of '${column}' is roughly symmetrical (mean ${mean}, median ${median}).`;
    }
    case "frequency": {
      const { column, topValue, topPercent, frequencies, distinctCount } = statistics;
      if (topPercent > DOMINANT_PERCENT) {
        return `'${column}' is dominated by ${topValue}, which accounts for ${topPercent}% of entries.`;
      }
      if (distinctCount > 1 && frequencies.length < 2) {
        return `The most common value of '${column}' is ${topValue} (${topPercent}%), out of ${distinctCount} distinct values.`;
      }
      if (distinctCount > 1) {
        const [first, second] = frequencies;
        return `The top categories for '${column}' are ${first.value} (${first.percent}%) and ${second.value} (${second.percent}%).`;
      }
      return `The only category observed for '${column}' is ${topValue}.`;
    }
    case "trend": {
      const { points, metric, timeColumn, aggregation } = statistics;
      const peak = points.reduce((best, point) => (point.value > best.value ? point : best));
      const subject = metric === null ? `entries in '${timeColumn}'` : `${aggregation} of '${metric}'`;
      return `Across ${points.length} month(s), ${subject} peaks in ${peak.month} at ${peak.value}.`;
    }
    case "correlation": {
      const pair = statistics.strongestPair;
      if (!pair || pair.r === null) {
        return "No pair of columns had enough overlapping values to correlate.";
      }
      const strength = Math.abs(pair.r) > STRONG_CORRELATION ? "strong" : "moderate";
      const sign = pair.r > 0 ? "positive" : "negative";
      return `The strongest relationship is a ${strength} ${sign} correlation (r=${pair.r}) between ${pair.a} and ${pair.b}.`;
    }
    case "grouped": {
      const { groups, valueColumn, groupColumn, highestMedianGroup, lowestMedianGroup } =
        statistics;
      if (groups.length < 2) {
        return `Only one ${groupColumn} group (${groups[0].group}) was found; its median ${valueColumn} is ${groups[0].median}.`;
      }
      const high = groups.find((group) => group.group === highestMedianGroup);
      const low = groups.find((group) => group.group === lowestMedianGroup);
      if (!high || !low) {
        return `Median ${valueColumn} was compared across ${groups.length} ${groupColumn} groups.`;
      }
      return `Median '${valueColumn}' is highest for ${high.group} (${high.median}) and lowest for ${low.group} (${low.median}).`;
    }
    case "coverage": {
      const { column, missingCount, totalRows, frequencies } = statistics;
      const leader = frequencies[0];
      return `'${column}' is missing in ${missingCount} of ${totalRows} rows; the most common recorded value is ${leader.value} (${leader.percent}%).`;
    }
  }
};
