import { AnalysisError } from "../engine/errors";
import type { AnalysisHandler } from "./types";

// TODO: pick the rule-mining algorithm and its support/confidence thresholds with product before implementing.
export const associationRulesHandler: AnalysisHandler = {
  id: "association_rules",
  requirement: { shape: "multi", min: 1, accepts: ["numeric", "categorical", "datetime"] },
  run: async () => {
    throw new AnalysisError(
      "UnsupportedAnalysisType",
      "Association rule mining is recognised but not implemented."
    );
  }
};
