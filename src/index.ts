export type * from "./types/analysis";
export type * from "./types/dataset";
export { ANALYSIS_TYPES } from "./types/analysis";

export {
  createDataset,
  datasetFromRawTable,
  datasetFromRecords,
  findDatasetIssues
} from "./lib/dataset/buildDataset";
export { isMissing, parseDateCell, parseNumericCell } from "./lib/dataset/cells";
export { classify, classifyColumn, profileColumns } from "./lib/schema/inspector";
export {
  validateTarget,
  type ResolvedTarget,
  type TargetRequirement,
  type TargetValidation
} from "./lib/schema/validateTarget";
export { parsePlan, parsePlanEntry, type PlanEntryParseResult } from "./lib/plan/parsePlan";
export { normalizeTypeId, resolveAnalysisType } from "./lib/plan/analysisTypes";
export {
  builtinHandler,
  createHandlerRegistry,
  type HandlerRegistry,
  type HandlerResolution
} from "./lib/handlers/registry";
export type {
  AnalysisHandler,
  HandlerInput,
  HandlerOutput,
  HandlerSettings
} from "./lib/handlers/types";
export { chartPath } from "./lib/charts/chartNamer";
export { createFileChartSink } from "./lib/charts/chartSink";
export { renderChartSvg, toEChartsOption } from "./lib/charts/renderChart";
export type { ChartRenderer, ChartSink, ChartSize, ChartSpec } from "./lib/charts/types";
export {
  engineConfigSchema,
  loadEngineConfig,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigInput
} from "./lib/config";
export {
  AnalysisError,
  ConfigError,
  MalformedDatasetError,
  PlanFormatError
} from "./lib/engine/errors";
export { runAnalysisPlan, type ChartSinkFactory, type RunPlanOptions } from "./lib/engine/runPlan";
export {
  createAnalysisEngine,
  type AnalysisEngine,
  type AnalysisEngineOptions,
  type EngineRun,
  type EngineRunOptions
} from "./lib/engine/engine";
export {
  aggregateResults,
  serializeResult,
  serializeResultSet,
  summarizeResults,
  type AggregatedOutput,
  type SerializedResult
} from "./lib/engine/aggregate";
export { describeStatistics } from "./lib/insights/describeStatistics";
export type { EngineLogger } from "./lib/logger";
