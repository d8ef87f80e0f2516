import type {
  CellValue,
  DatasetColumn,
  RawTable,
  SemanticType,
  TabularDataset
} from "../../types/dataset";
import { MalformedDatasetError } from "../engine/errors";

export const findDatasetIssues = (dataset: TabularDataset): string[] => {
  const issues: string[] = [];
  const seen = new Set<string>();
  const expectedRows = dataset.columns[0]?.values.length ?? 0;

  dataset.columns.forEach((column, index) => {
    const name = column.name.trim();
    if (!name) {
      issues.push(`column ${index + 1} has no name`);
    } else if (seen.has(name)) {
      issues.push(`column "${name}" appears more than once`);
    }
    seen.add(name);
    if (column.values.length !== expectedRows) {
      issues.push(
        `column "${name || index + 1}" has ${column.values.length} rows, expected ${expectedRows}`
      );
    }
  });

  return issues;
};

export const assertDatasetShape = (dataset: TabularDataset): void => {
  const issues = findDatasetIssues(dataset);
  if (issues.length > 0) {
    throw new MalformedDatasetError(issues);
  }
};

export const createDataset = (columns: DatasetColumn[], name?: string): TabularDataset => {
  const dataset: TabularDataset = {
    name,
    columns: columns.map((column) => ({
      ...column,
      name: column.name.trim(),
      values: [...column.values]
    }))
  };
  assertDatasetShape(dataset);
  return dataset;
};

/**
 * Builds a dataset from row records. Column order follows first appearance of each
 * key; keys missing from a record become missing cells.
 */
export const datasetFromRecords = (
  records: Record<string, CellValue>[],
  declaredTypes: Record<string, SemanticType> = {},
  name?: string
): TabularDataset => {
  const columnNames: string[] = [];
  const known = new Set<string>();
  records.forEach((record) => {
    Object.keys(record).forEach((key) => {
      if (!known.has(key)) {
        known.add(key);
        columnNames.push(key);
      }
    });
  });

  return createDataset(
    columnNames.map((columnName) => ({
      name: columnName,
      declaredType: declaredTypes[columnName],
      values: records.map((record) => record[columnName] ?? null)
    })),
    name
  );
};

export const datasetFromRawTable = (
  table: RawTable,
  declaredTypes: Record<string, SemanticType> = {},
  name?: string
): TabularDataset => {
  const headers = table.headers.map((header, index) => {
    const trimmed = String(header ?? "").trim();
    return trimmed ? trimmed : `Column ${index + 1}`;
  });
  const raggedRows = table.rows
    .map((row, index) => ({ index, length: row.length }))
    .filter((row) => row.length > headers.length);
  if (raggedRows.length > 0) {
    throw new MalformedDatasetError(
      raggedRows.map(
        (row) => `row ${row.index + 1} has ${row.length} cells, expected at most ${headers.length}`
      )
    );
  }

  return createDataset(
    headers.map((header, columnIndex) => ({
      name: header,
      declaredType: declaredTypes[header],
      values: table.rows.map((row) => row[columnIndex] ?? null)
    })),
    name
  );
};

export const rowCount = (dataset: TabularDataset): number =>
  dataset.columns[0]?.values.length ?? 0;

export const findColumn = (
  dataset: TabularDataset,
  columnName: string
): DatasetColumn | undefined => dataset.columns.find((column) => column.name === columnName);
