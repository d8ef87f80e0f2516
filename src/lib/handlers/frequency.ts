import type { FrequencyStatistics } from "../../types/analysis";
import type { SemanticType } from "../../types/dataset";
import type { ChartSink } from "../charts/types";
import { AnalysisError } from "../engine/errors";
import { countFrequencies, toFrequencyRows } from "../stats/frequency";
import { expectSingle, labelValues, presentValues } from "./columns";
import type { AnalysisHandler, HandlerInput, HandlerOutput } from "./types";

export const runTopCategories = async (
  { dataset, target, settings }: HandlerInput,
  charts: ChartSink,
  handlerId: string
): Promise<HandlerOutput> => {
  const column = expectSingle(target, handlerId);
  const labels = presentValues(labelValues(dataset, column));
  if (labels.length === 0) {
    throw new AnalysisError("InsufficientData", `Column "${column}" has no values to count.`);
  }

  const counts = countFrequencies(labels);
  const rows = toFrequencyRows(counts, labels.length, settings.rounding.percentages);
  const shown = rows.slice(0, settings.topN);
  const shownTotal = shown.reduce((sum, row) => sum + row.count, 0);

  const statistics: FrequencyStatistics = {
    kind: "frequency",
    column,
    totalNonMissing: labels.length,
    distinctCount: counts.length,
    topValue: rows[0].value,
    topCount: rows[0].count,
    topPercent: rows[0].percent,
    frequencies: shown,
    shownCount: shown.length,
    otherCount: labels.length - shownTotal
  };

  const chart = await charts.write({
    kind: "bar",
    title:
      counts.length > settings.topN
        ? `Top ${settings.topN} values of ${column}`
        : `Distribution of ${column}`,
    categories: shown.map((row) => row.value),
    values: shown.map((row) => row.count),
    valueLabel: "count"
  });

  return { statistics, chart };
};

const createFrequencyHandler = (id: string, accepts: SemanticType[]): AnalysisHandler => ({
  id,
  requirement: { shape: "single", accepts },
  run: (input, charts) => runTopCategories(input, charts, id)
});

export const topCategoricalHandler = createFrequencyHandler("top_n_categorical", [
  "categorical",
  "numeric"
]);

// Location strings are counted as opaque labels; nothing is geocoded.
export const geographicHandler = createFrequencyHandler("geographic", ["categorical"]);

export const demographicHandler = createFrequencyHandler("demographic", [
  "categorical",
  "numeric"
]);
