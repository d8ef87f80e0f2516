import type { CoverageStatistics } from "../../types/analysis";
import { AnalysisError } from "../engine/errors";
import { countFrequencies, toFrequencyRows } from "../stats/frequency";
import { roundTo, toPercent } from "../stats/rounding";
import { expectSingle, labelValues, presentValues } from "./columns";
import type { AnalysisHandler } from "./types";

export const categoryImpactHandler: AnalysisHandler = {
  id: "category_impact",
  requirement: { shape: "single", accepts: ["categorical", "numeric"] },
  run: async ({ dataset, target, settings }, charts) => {
    const column = expectSingle(target, "category_impact");
    const cells = labelValues(dataset, column);
    const labels = presentValues(cells);
    if (labels.length === 0) {
      throw new AnalysisError("InsufficientData", `Column "${column}" has no recorded values.`);
    }

    const { percentages } = settings.rounding;
    const totalRows = cells.length;
    const missingCount = totalRows - labels.length;
    const frequencies = toFrequencyRows(countFrequencies(labels), labels.length, percentages);
    const shown = frequencies.slice(0, settings.topN);

    // Ratio carries two more digits than the percentages so 0.333 pairs with 33.3%.
    const statistics: CoverageStatistics = {
      kind: "coverage",
      column,
      totalRows,
      nonMissingCount: labels.length,
      missingCount,
      missingRatio: roundTo(missingCount / totalRows, percentages + 2),
      frequencies
    };

    const chart = await charts.write({
      kind: "bar",
      title: `Distribution of ${column}`,
      subtitle: `Missing in ${missingCount} of ${totalRows} rows (${toPercent(
        missingCount,
        totalRows,
        percentages
      )}%)`,
      categories: shown.map((row) => row.value),
      values: shown.map((row) => row.count),
      valueLabel: "count"
    });

    return { statistics, chart };
  }
};
