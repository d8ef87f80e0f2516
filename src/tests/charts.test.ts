import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { chartPath } from "../lib/charts/chartNamer";
import { createFileChartSink } from "../lib/charts/chartSink";
import { renderChartSvg, toEChartsOption } from "../lib/charts/renderChart";
import type { ChartSpec } from "../lib/charts/types";
import { createSilentLogger } from "./testUtils";

const barSpec: ChartSpec = {
  kind: "bar",
  title: "Distribution of city",
  categories: ["Oslo", "Rome"],
  values: [2, 1],
  valueLabel: "count"
};

describe("chartPath", () => {
  it("joins clean parts without a suffix", () => {
    expect(chartPath("distribution", ["price"])).toBe("charts/distribution__price.svg");
  });

  it("adds a hash when slugging changes a part", () => {
    expect(chartPath("correlation", ["Unit Price", "qty"])).toMatch(
      /^charts\/correlation__unit_price__qty-[0-9a-f]{8}\.svg$/
    );
  });

  it("keeps inputs that slug alike apart", () => {
    expect(chartPath("top_n_categorical", ["a_b"])).toBe("charts/top_n_categorical__a_b.svg");
    expect(chartPath("top_n_categorical", ["a b"])).not.toBe(
      chartPath("top_n_categorical", ["a_b"])
    );
    expect(chartPath("top_n_categorical", ["A B"])).not.toBe(
      chartPath("top_n_categorical", ["a b"])
    );
  });

  it("is stable for the same input", () => {
    expect(chartPath("geographic", ["Región"])).toBe(chartPath("geographic", ["Región"]));
  });

  it("substitutes a placeholder for parts with no letters or digits", () => {
    expect(chartPath("distribution", ["%%%"])).toMatch(/^charts\/distribution__x-[0-9a-f]{8}\.svg$/);
  });

  it("truncates very long stems", () => {
    const path = chartPath("distribution", ["a".repeat(300)]);
    expect(path).toMatch(/^charts\/distribution__a+-[0-9a-f]{8}\.svg$/);
    expect(path.length).toBeLessThan(150);
  });
});

describe("toEChartsOption", () => {
  it("places missing correlations as placeholders in the heatmap", () => {
    const option = toEChartsOption({
      kind: "heatmap",
      title: "Correlation Heatmap",
      labels: ["a", "b"],
      matrix: [
        [1, null],
        [null, 1]
      ]
    });

    expect(option.series).toEqual([
      expect.objectContaining({
        type: "heatmap",
        data: [
          [0, 0, 1],
          [1, 0, "-"],
          [0, 1, "-"],
          [1, 1, 1]
        ]
      })
    ]);
    expect(option.animation).toBe(false);
  });

  it("draws bar charts horizontally with the first category on top", () => {
    const option = toEChartsOption(barSpec);
    expect(option.yAxis).toEqual({ type: "category", inverse: true, data: ["Oslo", "Rome"] });
  });
});

describe("renderChartSvg", () => {
  it("renders an SVG document at the requested size", () => {
    const svg = renderChartSvg(barSpec, { width: 400, height: 300 });
    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain('width="400"');
    expect(svg).toContain("Distribution of city");
  });
});

describe("createFileChartSink", () => {
  let outputDir: string | null = null;

  afterEach(async () => {
    if (outputDir) {
      await rm(outputDir, { recursive: true, force: true });
      outputDir = null;
    }
  });

  it("writes the chart under the output directory", async () => {
    outputDir = await mkdtemp(join(tmpdir(), "analysis-charts-"));
    const sink = createFileChartSink({
      outputDir,
      analysisType: "top_n_categorical",
      targetColumns: ["city"],
      size: { width: 400, height: 300 },
      logger: createSilentLogger()
    });

    const artifact = await sink.write(barSpec);

    expect(artifact).toEqual({
      path: "charts/top_n_categorical__city.svg",
      analysisType: "top_n_categorical",
      targetColumns: ["city"]
    });
    const contents = await readFile(join(outputDir, artifact.path), "utf8");
    expect(contents.startsWith("<svg")).toBe(true);
  });

  it("turns render errors into chart failures", async () => {
    outputDir = await mkdtemp(join(tmpdir(), "analysis-charts-"));
    const logger = createSilentLogger();
    const sink = createFileChartSink({
      outputDir,
      analysisType: "distribution",
      targetColumns: ["price"],
      size: { width: 400, height: 300 },
      logger,
      render: () => {
        throw new Error("renderer unavailable");
      }
    });

    await expect(sink.write({ ...barSpec, title: "Broken" })).rejects.toMatchObject({
      category: "ChartRenderFailure",
      message:
        'Chart "Broken" could not be written to charts/distribution__price.svg: renderer unavailable'
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});
