import * as echarts from "echarts";
import type { EChartsOption } from "echarts";
import type { ChartRenderer, ChartSpec } from "./types";

const PALETTE = ["#3b4cc0", "#b40426", "#2a9d8f", "#e9c46a", "#6d597a"];

const baseOption = (title: string, subtitle?: string): EChartsOption => ({
  animation: false,
  color: PALETTE,
  backgroundColor: "#ffffff",
  title: { text: title, subtext: subtitle, left: "center" },
  grid: { left: 24, right: 32, top: subtitle ? 72 : 56, bottom: 32, containLabel: true }
});

export const toEChartsOption = (spec: ChartSpec): EChartsOption => {
  switch (spec.kind) {
    case "histogram":
      return {
        ...baseOption(spec.title),
        xAxis: { type: "category", data: spec.bins.map((bin) => bin.label), name: spec.valueLabel },
        yAxis: { type: "value", name: "count" },
        series: [{ type: "bar", barCategoryGap: "0%", data: spec.bins.map((bin) => bin.count) }]
      };
    case "bar":
      return {
        ...baseOption(spec.title, spec.subtitle),
        xAxis: { type: "value", name: spec.valueLabel },
        yAxis: { type: "category", inverse: true, data: spec.categories },
        series: [{ type: "bar", data: spec.values, label: { show: true, position: "right" } }]
      };
    case "line":
      return {
        ...baseOption(spec.title),
        xAxis: { type: "category", data: spec.categories, axisLabel: { rotate: 45 } },
        yAxis: { type: "value", name: spec.valueLabel },
        series: [{ type: "line", data: spec.values, showSymbol: true }]
      };
    case "heatmap":
      return {
        ...baseOption(spec.title),
        grid: { left: 24, right: 32, top: 56, bottom: 72, containLabel: true },
        xAxis: { type: "category", data: spec.labels, splitArea: { show: true } },
        yAxis: { type: "category", data: spec.labels, splitArea: { show: true } },
        visualMap: {
          min: -1,
          max: 1,
          calculable: false,
          orient: "horizontal",
          left: "center",
          bottom: 8,
          inRange: { color: ["#3b4cc0", "#f7f7f7", "#b40426"] }
        },
        series: [
          {
            type: "heatmap",
            label: { show: true },
            data: spec.matrix.flatMap((row, y) =>
              row.map((value, x) => [x, y, value === null ? "-" : value])
            )
          }
        ]
      };
    case "groupedBar":
      return {
        ...baseOption(spec.title),
        legend: { top: 28 },
        grid: { left: 24, right: 32, top: 72, bottom: 32, containLabel: true },
        xAxis: { type: "category", data: spec.categories },
        yAxis: { type: "value" },
        series: spec.series.map((series) => ({
          type: "bar",
          name: series.name,
          data: series.values
        }))
      };
  }
};

/**
 * Renders a chart to an SVG document. Every call owns its own ECharts instance, so
 * concurrent renders share no state.
 */
export const renderChartSvg: ChartRenderer = (spec, size) => {
  const chart = echarts.init(null, null, {
    renderer: "svg",
    ssr: true,
    width: size.width,
    height: size.height
  });
  try {
    chart.setOption(toEChartsOption(spec));
    return chart.renderToSVGString();
  } finally {
    chart.dispose();
  }
};
