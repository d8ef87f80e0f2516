import { runDistribution } from "./distribution";
import { expectSingle } from "./columns";
import { runTopCategories } from "./frequency";
import type { AnalysisHandler } from "./types";

// Numeric columns get a distribution summary, anything else a frequency table.
export const univariateHandler: AnalysisHandler = {
  id: "univariate",
  requirement: { shape: "single", accepts: ["numeric", "categorical", "datetime"] },
  run: (input, charts) => {
    const column = expectSingle(input.target, "univariate");
    return input.schema[column] === "numeric"
      ? runDistribution(input, charts, "univariate")
      : runTopCategories(input, charts, "univariate");
  }
};
