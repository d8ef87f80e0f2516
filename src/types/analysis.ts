export const ANALYSIS_TYPES = [
  "distribution",
  "top_n_categorical",
  "temporal_trend",
  "correlation",
  "geographic",
  "comparative_duration",
  "category_impact",
  "demographic",
  "univariate",
  "association_rules"
] as const;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export type ErrorCategory =
  | "UnsupportedAnalysisType"
  | "ColumnNotFound"
  | "SemanticTypeMismatch"
  | "InsufficientData"
  | "ChartRenderFailure"
  | "InvalidPlanEntry"
  | "Timeout"
  | "Cancelled"
  | "InternalError";

export type AnalysisPlanEntry = {
  analysisType: string;
  targetColumns: string[];
  rationale?: string;
};

export type ChartArtifact = {
  path: string;
  analysisType: string;
  targetColumns: string[];
};

export type FrequencyRow = {
  value: string;
  count: number;
  percent: number;
};

export type DistributionStatistics = {
  kind: "distribution";
  column: string;
  count: number;
  mean: number;
  median: number;
  stdDev: number;
  min: number;
  max: number;
  skewness: number;
};

export type FrequencyStatistics = {
  kind: "frequency";
  column: string;
  totalNonMissing: number;
  distinctCount: number;
  topValue: string;
  topCount: number;
  topPercent: number;
  frequencies: FrequencyRow[];
  shownCount: number;
  otherCount: number;
};

export type TrendPoint = {
  month: string;
  value: number;
  rows: number;
};

export type TrendStatistics = {
  kind: "trend";
  metric: string | null;
  timeColumn: string;
  aggregation: "count" | "sum" | "mean";
  points: TrendPoint[];
};

export type CorrelationPair = {
  a: string;
  b: string;
  r: number | null;
  n: number;
};

export type CorrelationStatistics = {
  kind: "correlation";
  columns: string[];
  matrix: (number | null)[][];
  pairs: CorrelationPair[];
  strongestPair: CorrelationPair | null;
};

export type GroupSummary = {
  group: string;
  count: number;
  mean: number;
  median: number;
  stdDev: number | null;
  stdDevDefined: boolean;
};

export type GroupedStatistics = {
  kind: "grouped";
  valueColumn: string;
  groupColumn: string;
  groups: GroupSummary[];
  highestMedianGroup: string;
  lowestMedianGroup: string;
};

export type CoverageStatistics = {
  kind: "coverage";
  column: string;
  totalRows: number;
  nonMissingCount: number;
  missingCount: number;
  missingRatio: number;
  frequencies: FrequencyRow[];
};

export type AnalysisStatistics =
  | DistributionStatistics
  | FrequencyStatistics
  | TrendStatistics
  | CorrelationStatistics
  | GroupedStatistics
  | CoverageStatistics;

type ResultBase = {
  analysisType: string;
  targetColumns: string[];
  rationale?: string;
};

export type AnalysisSuccess = ResultBase & {
  status: "success";
  statistics: AnalysisStatistics;
  chart: ChartArtifact;
  insight: string;
};

export type AnalysisFailure = ResultBase & {
  status: "failed";
  error: {
    category: ErrorCategory;
    message: string;
  };
};

export type AnalysisResult = AnalysisSuccess | AnalysisFailure;

export type ResultSet = readonly AnalysisResult[];

export type EntryState = "pending" | "validating" | "running" | "succeeded" | "failed";

export type RunState = "idle" | "processing" | "done";
