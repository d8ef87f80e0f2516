import type { CorrelationPair, CorrelationStatistics } from "../../types/analysis";
import { AnalysisError } from "../engine/errors";
import { correlationMatrix } from "../stats/correlation";
import { roundNullable } from "../stats/rounding";
import { expectMulti, numericValues } from "./columns";
import type { AnalysisHandler } from "./types";

const strongest = (pairs: CorrelationPair[]): CorrelationPair | null =>
  pairs.reduce<CorrelationPair | null>((best, pair) => {
    if (pair.r === null) {
      return best;
    }
    if (best === null || best.r === null || Math.abs(pair.r) > Math.abs(best.r)) {
      return pair;
    }
    return best;
  }, null);

export const correlationHandler: AnalysisHandler = {
  id: "correlation",
  requirement: { shape: "multi", min: 2, accepts: ["numeric"] },
  run: async ({ dataset, target, settings }, charts) => {
    const columns = expectMulti(target, "correlation");
    const series = columns.map((name) => ({ name, values: numericValues(dataset, name) }));
    const result = correlationMatrix(series);

    if (result.matrix.every((row, index) => row[index] === null)) {
      throw new AnalysisError(
        "InsufficientData",
        "Correlation needs at least two values in some target column."
      );
    }

    const decimals = settings.rounding.statistics;
    const matrix = result.matrix.map((row) => row.map((value) => roundNullable(value, decimals)));
    const pairs = result.pairs.map((pair) => ({ ...pair, r: roundNullable(pair.r, decimals) }));

    const statistics: CorrelationStatistics = {
      kind: "correlation",
      columns: result.columns,
      matrix,
      pairs,
      strongestPair: strongest(pairs)
    };

    const chart = await charts.write({
      kind: "heatmap",
      title: "Correlation Heatmap",
      labels: result.columns,
      matrix
    });

    return { statistics, chart };
  }
};
