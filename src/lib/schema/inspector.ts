import type {
  ColumnProfile,
  DatasetColumn,
  DatasetSchema,
  SemanticType,
  TabularDataset
} from "../../types/dataset";
import { isMissing, parseDateCell, parseNumericCell, toCategoryLabel } from "../dataset/cells";

const MAX_EXAMPLES = 5;
const MAX_EXAMPLE_LENGTH = 120;

const isNumericColumn = (column: DatasetColumn): boolean => {
  let present = 0;
  for (const value of column.values) {
    if (isMissing(value)) {
      continue;
    }
    if (parseNumericCell(value) === null) {
      return false;
    }
    present += 1;
  }
  return present > 0;
};

const isDatetimeColumn = (column: DatasetColumn): boolean => {
  const acceptEpoch = column.declaredType === "datetime";
  let present = 0;
  for (const value of column.values) {
    if (isMissing(value)) {
      continue;
    }
    if (parseDateCell(value, acceptEpoch) === null) {
      return false;
    }
    present += 1;
  }
  return present > 0;
};

export const classifyColumn = (column: DatasetColumn): SemanticType => {
  if (column.declaredType === "categorical") {
    return "categorical";
  }
  if (column.declaredType === "datetime" && isDatetimeColumn(column)) {
    return "datetime";
  }
  if (isNumericColumn(column)) {
    return "numeric";
  }
  if (isDatetimeColumn(column)) {
    return "datetime";
  }
  return "categorical";
};

export const classify = (dataset: TabularDataset): DatasetSchema => {
  const schema: DatasetSchema = {};
  dataset.columns.forEach((column) => {
    schema[column.name] = classifyColumn(column);
  });
  return schema;
};

export const profileColumns = (
  dataset: TabularDataset,
  schema: DatasetSchema = classify(dataset)
): ColumnProfile[] =>
  dataset.columns.map((column) => {
    const labels = column.values
      .map(toCategoryLabel)
      .filter((label): label is string => label !== null);
    const distinct = Array.from(new Set(labels));
    const ratio = column.values.length === 0 ? 0 : labels.length / column.values.length;

    return {
      name: column.name,
      semanticType: schema[column.name] ?? classifyColumn(column),
      nonNullRatio: Math.min(1, Math.max(0, Number(ratio.toFixed(3)))),
      distinctCount: distinct.length,
      examples: distinct
        .slice(0, MAX_EXAMPLES)
        .map((label) => label.slice(0, MAX_EXAMPLE_LENGTH))
    };
  });
