import type { DatasetColumn, TabularDataset } from "../../types/dataset";
import { parseDateCell, parseNumericCell, toCategoryLabel } from "../dataset/cells";
import { findColumn } from "../dataset/buildDataset";
import { AnalysisError } from "../engine/errors";
import type { ResolvedTarget } from "../schema/validateTarget";

const requireColumn = (dataset: TabularDataset, columnName: string): DatasetColumn => {
  const column = findColumn(dataset, columnName);
  if (!column) {
    throw new AnalysisError("ColumnNotFound", `Column "${columnName}" not found in dataset.`);
  }
  return column;
};

export const numericValues = (dataset: TabularDataset, columnName: string): (number | null)[] =>
  requireColumn(dataset, columnName).values.map(parseNumericCell);

export const labelValues = (dataset: TabularDataset, columnName: string): (string | null)[] =>
  requireColumn(dataset, columnName).values.map(toCategoryLabel);

export const timeValues = (dataset: TabularDataset, columnName: string): (number | null)[] => {
  const column = requireColumn(dataset, columnName);
  const acceptEpoch = column.declaredType === "datetime";
  return column.values.map((value) => parseDateCell(value, acceptEpoch));
};

export const presentValues = <T>(values: (T | null)[]): T[] =>
  values.filter((value): value is T => value !== null);

export const expectSingle = (target: ResolvedTarget, handlerId: string): string => {
  if (target.shape !== "single") {
    throw new AnalysisError("InvalidPlanEntry", `${handlerId} expects a single target column.`);
  }
  return target.column;
};

export const expectMulti = (target: ResolvedTarget, handlerId: string): string[] => {
  if (target.shape !== "multi") {
    throw new AnalysisError("InvalidPlanEntry", `${handlerId} expects a list of target columns.`);
  }
  return target.columns;
};
