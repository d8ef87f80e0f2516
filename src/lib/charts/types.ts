import type { ChartArtifact } from "../../types/analysis";

export type ChartSpec =
  | {
      kind: "histogram";
      title: string;
      bins: { label: string; count: number }[];
      valueLabel: string;
    }
  | {
      kind: "bar";
      title: string;
      subtitle?: string;
      categories: string[];
      values: number[];
      valueLabel: string;
    }
  | {
      kind: "line";
      title: string;
      categories: string[];
      values: number[];
      valueLabel: string;
    }
  | {
      kind: "heatmap";
      title: string;
      labels: string[];
      matrix: (number | null)[][];
    }
  | {
      kind: "groupedBar";
      title: string;
      categories: string[];
      series: { name: string; values: number[] }[];
    };

export type ChartSize = {
  width: number;
  height: number;
};

export type ChartRenderer = (spec: ChartSpec, size: ChartSize) => string;

export interface ChartSink {
  write(spec: ChartSpec): Promise<ChartArtifact>;
}
