import type {
  AnalysisResult,
  AnalysisStatistics,
  ErrorCategory,
  ResultSet
} from "../../types/analysis";
import type { DatasetSchema, SemanticType, TabularDataset } from "../../types/dataset";
import { isMissing } from "../dataset/cells";
import { rowCount } from "../dataset/buildDataset";
import { toPercent } from "../stats/rounding";

export type ResultCollector = {
  set: (index: number, result: AnalysisResult) => void;
  toResultSet: () => ResultSet;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
};

/**
 * One slot per plan index. Slots are written once, so completion order never affects
 * the order of the final result set.
 */
export const createResultCollector = (size: number): ResultCollector => {
  const slots: (AnalysisResult | undefined)[] = Array.from({ length: size }, () => undefined);

  return {
    set: (index, result) => {
      if (index < 0 || index >= size) {
        throw new RangeError(`Result index ${index} is outside the plan (size ${size}).`);
      }
      if (slots[index] !== undefined) {
        throw new Error(`Result for plan entry ${index} was already recorded.`);
      }
      slots[index] = deepFreeze(result);
    },
    toResultSet: () => {
      const results = slots.filter((slot): slot is AnalysisResult => slot !== undefined);
      if (results.length !== size) {
        throw new Error(`Only ${results.length} of ${size} plan entries produced a result.`);
      }
      return Object.freeze(results);
    }
  };
};

export type SerializedResult = {
  analysis_type: string;
  target_columns: string[];
  rationale?: string;
  status: "success" | "failed";
  statistics?: AnalysisStatistics;
  chart_path?: string;
  insight?: string;
  error_category?: ErrorCategory;
  error_message?: string;
};

export const serializeResult = (result: AnalysisResult): SerializedResult => {
  const base: SerializedResult = {
    analysis_type: result.analysisType,
    target_columns: [...result.targetColumns],
    status: result.status
  };
  if (result.rationale !== undefined) {
    base.rationale = result.rationale;
  }
  if (result.status === "success") {
    return {
      ...base,
      statistics: result.statistics,
      chart_path: result.chart.path,
      insight: result.insight
    };
  }
  return {
    ...base,
    error_category: result.error.category,
    error_message: result.error.message
  };
};

export const serializeResultSet = (results: ResultSet): SerializedResult[] =>
  results.map(serializeResult);

export type ResultSummary = {
  total: number;
  succeeded: number;
  failed: number;
  failures_by_category: Partial<Record<ErrorCategory, number>>;
};

export const summarizeResults = (results: ResultSet): ResultSummary => {
  const failuresByCategory: Partial<Record<ErrorCategory, number>> = {};
  let succeeded = 0;
  results.forEach((result) => {
    if (result.status === "success") {
      succeeded += 1;
      return;
    }
    const category = result.error.category;
    failuresByCategory[category] = (failuresByCategory[category] ?? 0) + 1;
  });
  return {
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    failures_by_category: failuresByCategory
  };
};

export type DatasetOverview = {
  rows: number;
  columns: number;
  column_types: Record<string, SemanticType>;
  missing: Record<string, { count: number; percent: number }>;
};

export const describeDataset = (
  dataset: TabularDataset,
  schema: DatasetSchema,
  percentDecimals: number
): DatasetOverview => {
  const rows = rowCount(dataset);
  const missing: DatasetOverview["missing"] = {};
  dataset.columns.forEach((column) => {
    const count = column.values.filter(isMissing).length;
    if (count > 0) {
      missing[column.name] = { count, percent: toPercent(count, rows, percentDecimals) };
    }
  });
  return {
    rows,
    columns: dataset.columns.length,
    column_types: { ...schema },
    missing
  };
};

export type AggregatedOutput = {
  dataset: DatasetOverview;
  summary: ResultSummary;
  results: SerializedResult[];
};

export const aggregateResults = (
  dataset: TabularDataset,
  schema: DatasetSchema,
  results: ResultSet,
  percentDecimals: number
): AggregatedOutput => ({
  dataset: describeDataset(dataset, schema, percentDecimals),
  summary: summarizeResults(results),
  results: serializeResultSet(results)
});
