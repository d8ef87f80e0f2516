export type SemanticType = "numeric" | "categorical" | "datetime";

export type CellValue = string | number | Date | null | undefined;

export type DatasetColumn = {
  name: string;
  declaredType?: SemanticType;
  values: CellValue[];
};

export type TabularDataset = {
  name?: string;
  columns: DatasetColumn[];
};

export type RawTable = {
  headers: string[];
  rows: CellValue[][];
};

export type DatasetSchema = Record<string, SemanticType>;

export type ColumnProfile = {
  name: string;
  semanticType: SemanticType;
  nonNullRatio: number;
  distinctCount: number;
  examples: string[];
};
