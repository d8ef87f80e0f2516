import type { AnalysisPlanEntry, ErrorCategory } from "../../types/analysis";
import type { DatasetSchema, SemanticType } from "../../types/dataset";

export type TargetRequirement =
  | { shape: "single"; accepts: SemanticType[] }
  | { shape: "multi"; min: number; max?: number; accepts: SemanticType[] }
  | { shape: "grouped" }
  | { shape: "trend" };

export type ResolvedTarget =
  | { shape: "single"; column: string }
  | { shape: "multi"; columns: string[] }
  | { shape: "grouped"; value: string; group: string }
  | { shape: "trend"; metric: string | null; time: string };

export type TargetValidation =
  | { ok: true; target: ResolvedTarget }
  | { ok: false; category: ErrorCategory; message: string };

const fail = (category: ErrorCategory, message: string): TargetValidation => ({
  ok: false,
  category,
  message
});

const describeTypes = (types: SemanticType[]): string => types.join(" or ");

const checkCount = (
  requirement: TargetRequirement,
  count: number
): string | null => {
  switch (requirement.shape) {
    case "single":
      return count === 1 ? null : `expects exactly 1 column, got ${count}`;
    case "grouped":
      return count === 2 ? null : `expects a value column and a group column, got ${count} columns`;
    case "trend":
      return count === 1 || count === 2 ? null : `expects 1 or 2 columns, got ${count}`;
    case "multi": {
      if (count < requirement.min) {
        return `expects at least ${requirement.min} columns, got ${count}`;
      }
      if (requirement.max !== undefined && count > requirement.max) {
        return `expects at most ${requirement.max} columns, got ${count}`;
      }
      return null;
    }
  }
};

const resolveTrend = (columns: string[], schema: DatasetSchema): TargetValidation => {
  const metric = columns.find((column) => schema[column] === "numeric") ?? null;
  const explicitTime = columns.find((column) => schema[column] === "datetime");
  const others = columns.filter((column) => column !== metric && column !== explicitTime);
  if (others.length > 0) {
    return fail(
      "SemanticTypeMismatch",
      `Temporal trend needs a numeric metric and/or a datetime column; "${others[0]}" is ${schema[others[0]]}.`
    );
  }
  const time =
    explicitTime ?? Object.keys(schema).find((column) => schema[column] === "datetime");
  if (!time) {
    return fail(
      "SemanticTypeMismatch",
      "Temporal trend needs a datetime column but the dataset has none."
    );
  }
  return { ok: true, target: { shape: "trend", metric, time } };
};

/**
 * Checks an entry's target columns against the dataset schema: existence first, then
 * arity, then semantic compatibility. Returns the columns arranged by role.
 */
export const validateTarget = (
  entry: AnalysisPlanEntry,
  schema: DatasetSchema,
  requirement: TargetRequirement
): TargetValidation => {
  const columns = entry.targetColumns;
  const missing = columns.filter((column) => schema[column] === undefined);
  if (missing.length > 0) {
    return fail(
      "ColumnNotFound",
      `Column${missing.length > 1 ? "s" : ""} not found in dataset: ${missing
        .map((column) => `"${column}"`)
        .join(", ")}.`
    );
  }

  if (new Set(columns).size !== columns.length) {
    return fail("InvalidPlanEntry", "Target columns must not repeat.");
  }

  const countIssue = checkCount(requirement, columns.length);
  if (countIssue) {
    return fail("InvalidPlanEntry", `${entry.analysisType} ${countIssue}.`);
  }

  switch (requirement.shape) {
    case "single": {
      const column = columns[0];
      const type = schema[column];
      if (!requirement.accepts.includes(type)) {
        return fail(
          "SemanticTypeMismatch",
          `Column "${column}" is ${type}; ${entry.analysisType} needs ${describeTypes(requirement.accepts)}.`
        );
      }
      return { ok: true, target: { shape: "single", column } };
    }
    case "multi": {
      const mismatched = columns.find((column) => !requirement.accepts.includes(schema[column]));
      if (mismatched) {
        return fail(
          "SemanticTypeMismatch",
          `Column "${mismatched}" is ${schema[mismatched]}; ${entry.analysisType} needs ${describeTypes(requirement.accepts)}.`
        );
      }
      return { ok: true, target: { shape: "multi", columns: [...columns] } };
    }
    case "grouped": {
      const value = columns.find((column) => schema[column] === "numeric");
      const group = columns.find(
        (column) => column !== value && schema[column] === "categorical"
      );
      if (!value || !group) {
        return fail(
          "SemanticTypeMismatch",
          `${entry.analysisType} needs one numeric and one categorical column; got ${columns
            .map((column) => `${column} (${schema[column]})`)
            .join(", ")}.`
        );
      }
      return { ok: true, target: { shape: "grouped", value, group } };
    }
    case "trend":
      return resolveTrend(columns, schema);
  }
};
