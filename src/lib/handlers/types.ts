import type { AnalysisStatistics, ChartArtifact } from "../../types/analysis";
import type { DatasetSchema, TabularDataset } from "../../types/dataset";
import type { ChartSink } from "../charts/types";
import type { ResolvedTarget, TargetRequirement } from "../schema/validateTarget";
import type { RoundingPolicy } from "../stats/rounding";

export type HandlerSettings = {
  topN: number;
  rounding: RoundingPolicy;
};

export type HandlerInput = {
  dataset: TabularDataset;
  schema: DatasetSchema;
  target: ResolvedTarget;
  settings: HandlerSettings;
};

export type HandlerOutput = {
  statistics: AnalysisStatistics;
  chart: ChartArtifact;
};

/**
 * Strategy for one analysis type. Handlers are stateless: everything they read comes
 * from the input, and the only thing they write is their chart through the sink.
 * Typed failures are thrown as AnalysisError.
 */
export type AnalysisHandler = {
  id: string;
  requirement: TargetRequirement;
  run: (input: HandlerInput, charts: ChartSink) => Promise<HandlerOutput>;
};
