import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { resolveEngineConfig } from "../lib/config";
import { createDataset } from "../lib/dataset/buildDataset";
import { serializeResultSet } from "../lib/engine/aggregate";
import { createAnalysisEngine } from "../lib/engine/engine";
import { MalformedDatasetError, PlanFormatError } from "../lib/engine/errors";
import { runAnalysisPlan } from "../lib/engine/runPlan";
import { createHandlerRegistry } from "../lib/handlers/registry";
import type { AnalysisHandler } from "../lib/handlers/types";
import type { EntryState, RunState } from "../types/analysis";
import { createRecordingSinkFactory, createSilentLogger } from "./testUtils";

const buildDataset = () =>
  createDataset(
    [
      { name: "price", values: [10, 20, 30, 40] },
      { name: "city", values: ["Oslo", "Rome", "Oslo", null] },
      { name: "order_date", values: ["2024-01-05", "2024-02-10", "2024-02-11", "2024-04-01"] }
    ],
    "orders"
  );

const wait = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const createExtension = (
  run: (column: string) => Promise<void>
): AnalysisHandler => ({
  id: "extension",
  requirement: { shape: "single", accepts: ["numeric"] },
  run: async ({ target }, charts) => {
    const column = target.shape === "single" ? target.column : "";
    await run(column);
    const chart = await charts.write({
      kind: "bar",
      title: column,
      categories: [column],
      values: [1],
      valueLabel: "count"
    });
    return {
      statistics: {
        kind: "distribution",
        column,
        count: 1,
        mean: 1,
        median: 1,
        stdDev: 0,
        min: 1,
        max: 1,
        skewness: 0
      },
      chart
    };
  }
});

describe("runAnalysisPlan", () => {
  it("records one result per entry in plan order, isolating failures", async () => {
    const { factory } = createRecordingSinkFactory();
    const { results } = await runAnalysisPlan(
      buildDataset(),
      [
        { analysisType: "distribution", targetColumns: ["price"] },
        { analysisType: "distribution", targetColumns: ["zzz"] },
        { analysisType: "sentiment", targetColumns: ["city"] },
        { analysisType: "distribution", targetColumns: ["city"] },
        42,
        { type: "Temporal Trend Analysis", columns: ["order_date"], reason: "seasonality" }
      ],
      {
        config: resolveEngineConfig(),
        logger: createSilentLogger(),
        createChartSink: factory
      }
    );

    expect(results.map((result) => result.status)).toEqual([
      "success",
      "failed",
      "failed",
      "failed",
      "failed",
      "success"
    ]);
    expect(results[0]).toMatchObject({
      analysisType: "distribution",
      targetColumns: ["price"],
      chart: { path: "charts/distribution__price.svg" },
      statistics: { kind: "distribution", mean: 25, median: 25 }
    });
    expect(results[1]).toMatchObject({
      error: { category: "ColumnNotFound", message: 'Column not found in dataset: "zzz".' }
    });
    expect(results[2]).toMatchObject({
      error: {
        category: "UnsupportedAnalysisType",
        message: 'No handler for analysis type "sentiment".'
      }
    });
    expect(results[3]).toMatchObject({ error: { category: "SemanticTypeMismatch" } });
    expect(results[4]).toEqual({
      analysisType: "",
      targetColumns: [],
      status: "failed",
      error: { category: "InvalidPlanEntry", message: "Plan entry must be an object." }
    });
    expect(results[5]).toMatchObject({
      analysisType: "temporal_trend",
      targetColumns: ["order_date"],
      rationale: "seasonality",
      statistics: { kind: "trend", aggregation: "count", timeColumn: "order_date" },
      chart: { path: "charts/temporal_trend__order_date.svg" }
    });
  });

  it("covers price, gender, correlation and missing column entries in one run", async () => {
    const { factory } = createRecordingSinkFactory();
    const dataset = createDataset([
      { name: "price", values: [1, 2, 3] },
      { name: "gender", values: ["M", "M", "F"] },
      { name: "x", values: [1, 2, 3] },
      { name: "y", values: [3, 2, 1] }
    ]);

    const { results } = await runAnalysisPlan(
      dataset,
      [
        { analysisType: "distribution", targetColumns: ["price"] },
        { analysisType: "top_n_categorical", targetColumns: ["gender"] },
        { analysisType: "correlation", targetColumns: ["x", "y"] },
        { analysisType: "distribution", targetColumns: ["zzz"] }
      ],
      { config: resolveEngineConfig(), logger: createSilentLogger(), createChartSink: factory }
    );

    expect(results).toHaveLength(4);
    expect(results[0]).toMatchObject({
      statistics: { mean: 2, median: 2, min: 1, max: 3, stdDev: 1, skewness: 0 }
    });
    expect(results[1]).toMatchObject({
      statistics: {
        topValue: "M",
        frequencies: [
          { value: "M", percent: 66.7 },
          { value: "F", percent: 33.3 }
        ]
      }
    });
    expect(results[2]).toMatchObject({
      statistics: {
        matrix: [
          [1, -1],
          [-1, 1]
        ]
      }
    });
    expect(results[3]).toMatchObject({
      status: "failed",
      error: { category: "ColumnNotFound" }
    });
  });

  it("returns frozen results", async () => {
    const { factory } = createRecordingSinkFactory();
    const { results } = await runAnalysisPlan(
      buildDataset(),
      [{ analysisType: "distribution", targetColumns: ["price"] }],
      { config: resolveEngineConfig(), logger: createSilentLogger(), createChartSink: factory }
    );

    expect(Object.isFrozen(results)).toBe(true);
    expect(Object.isFrozen(results[0])).toBe(true);
    expect(Object.isFrozen(results[0].targetColumns)).toBe(true);
  });

  it("keeps plan order when entries finish out of order", async () => {
    const finished: string[] = [];
    const delays: Record<string, number> = { price: 40, quantity: 1, discount: 15 };
    const registry = createHandlerRegistry();
    registry.register(
      "delayed",
      createExtension(async (column) => {
        await wait(delays[column] ?? 0);
        finished.push(column);
      })
    );
    const dataset = createDataset([
      { name: "price", values: [1, 2] },
      { name: "quantity", values: [3, 4] },
      { name: "discount", values: [5, 6] }
    ]);
    const { factory } = createRecordingSinkFactory();

    const { results } = await runAnalysisPlan(
      dataset,
      ["price", "quantity", "discount"].map((column) => ({
        analysisType: "delayed",
        targetColumns: [column]
      })),
      {
        config: resolveEngineConfig({ concurrency: 3 }),
        registry,
        logger: createSilentLogger(),
        createChartSink: factory
      }
    );

    expect(finished).toEqual(["quantity", "discount", "price"]);
    expect(results.map((result) => result.targetColumns[0])).toEqual([
      "price",
      "quantity",
      "discount"
    ]);
    expect(results.every((result) => result.status === "success")).toBe(true);
  });

  it("fails an entry that runs past the timeout", async () => {
    const registry = createHandlerRegistry();
    registry.register("hang", createExtension(() => new Promise<void>(() => undefined)));
    const { factory } = createRecordingSinkFactory();

    const { results } = await runAnalysisPlan(
      buildDataset(),
      [{ analysisType: "hang", targetColumns: ["price"] }],
      {
        config: resolveEngineConfig({ entryTimeoutMs: 20 }),
        registry,
        logger: createSilentLogger(),
        createChartSink: factory
      }
    );

    expect(results[0]).toMatchObject({
      analysisType: "hang",
      status: "failed",
      error: { category: "Timeout", message: "hang on price did not finish within 20ms." }
    });
  });

  it("reports unexpected handler errors as internal failures", async () => {
    const registry = createHandlerRegistry();
    registry.register(
      "explode",
      createExtension(async () => {
        throw new Error("boom");
      })
    );
    const { factory } = createRecordingSinkFactory();

    const { results } = await runAnalysisPlan(
      buildDataset(),
      [
        { analysisType: "explode", targetColumns: ["price"] },
        { analysisType: "distribution", targetColumns: ["price"] }
      ],
      {
        config: resolveEngineConfig(),
        registry,
        logger: createSilentLogger(),
        createChartSink: factory
      }
    );

    expect(results[0]).toMatchObject({
      status: "failed",
      error: { category: "InternalError", message: "boom" }
    });
    expect(results[1].status).toBe("success");
  });

  it("cancels entries that have not started when the signal aborts", async () => {
    const controller = new AbortController();
    const registry = createHandlerRegistry();
    registry.register(
      "abort_after",
      createExtension(async () => {
        controller.abort();
      })
    );
    const { factory } = createRecordingSinkFactory();

    const { results } = await runAnalysisPlan(
      buildDataset(),
      [
        { analysisType: "abort_after", targetColumns: ["price"] },
        { analysisType: "distribution", targetColumns: ["price"] }
      ],
      {
        config: resolveEngineConfig({ concurrency: 1 }),
        registry,
        logger: createSilentLogger(),
        signal: controller.signal,
        createChartSink: factory
      }
    );

    expect(results[0].status).toBe("success");
    expect(results[1]).toMatchObject({
      analysisType: "distribution",
      status: "failed",
      error: { category: "Cancelled", message: "Run was cancelled before this entry started." }
    });
  });

  it("reports entry and run state transitions", async () => {
    const entryStates: [number, EntryState][] = [];
    const runStates: RunState[] = [];
    const { factory } = createRecordingSinkFactory();

    await runAnalysisPlan(
      buildDataset(),
      [
        { analysisType: "distribution", targetColumns: ["price"] },
        { analysisType: "distribution", targetColumns: ["zzz"] }
      ],
      {
        config: resolveEngineConfig({ concurrency: 1 }),
        logger: createSilentLogger(),
        createChartSink: factory,
        onEntryState: (index, state) => entryStates.push([index, state]),
        onRunState: (state) => runStates.push(state)
      }
    );

    expect(runStates).toEqual(["processing", "done"]);
    expect(entryStates.filter(([index]) => index === 0).map(([, state]) => state)).toEqual([
      "pending",
      "validating",
      "running",
      "succeeded"
    ]);
    expect(entryStates.filter(([index]) => index === 1).map(([, state]) => state)).toEqual([
      "pending",
      "validating",
      "failed"
    ]);
  });

  it("keeps running when a state observer throws", async () => {
    const logger = createSilentLogger();
    const { factory } = createRecordingSinkFactory();

    const { results } = await runAnalysisPlan(
      buildDataset(),
      [{ analysisType: "distribution", targetColumns: ["price"] }],
      {
        config: resolveEngineConfig(),
        logger,
        createChartSink: factory,
        onEntryState: () => {
          throw new Error("observer broke");
        }
      }
    );

    expect(results[0].status).toBe("success");
    expect(logger.warn).toHaveBeenCalledWith(
      "[analysis-engine] observer error",
      expect.objectContaining({ message: "observer broke" })
    );
  });

  it("produces identical results for identical inputs", async () => {
    const plan = [
      { analysisType: "top_n_categorical", targetColumns: ["city"] },
      { analysisType: "temporal_trend", targetColumns: ["price"] },
      { analysisType: "distribution", targetColumns: ["zzz"] }
    ];
    const run = async () => {
      const { factory } = createRecordingSinkFactory();
      const { results } = await runAnalysisPlan(buildDataset(), plan, {
        config: resolveEngineConfig(),
        logger: createSilentLogger(),
        createChartSink: factory
      });
      return serializeResultSet(results);
    };

    expect(await run()).toEqual(await run());
  });

  it("throws for a malformed dataset", async () => {
    await expect(
      runAnalysisPlan(
        {
          columns: [
            { name: "a", values: [1, 2] },
            { name: "b", values: [1] }
          ]
        },
        [],
        { config: resolveEngineConfig(), logger: createSilentLogger() }
      )
    ).rejects.toBeInstanceOf(MalformedDatasetError);
  });

  it("throws for a plan that is not a list", async () => {
    await expect(
      runAnalysisPlan(
        buildDataset(),
        { analysisType: "distribution" },
        { config: resolveEngineConfig(), logger: createSilentLogger() }
      )
    ).rejects.toBeInstanceOf(PlanFormatError);
  });

  it("returns an empty result set for an empty plan", async () => {
    const { results } = await runAnalysisPlan(buildDataset(), [], {
      config: resolveEngineConfig(),
      logger: createSilentLogger()
    });
    expect(results).toEqual([]);
  });
});

describe("createAnalysisEngine", () => {
  let outputDir: string | null = null;

  afterEach(async () => {
    if (outputDir) {
      await rm(outputDir, { recursive: true, force: true });
      outputDir = null;
    }
  });

  it("writes charts to disk and builds the aggregated report", async () => {
    outputDir = await mkdtemp(join(tmpdir(), "analysis-engine-"));
    const engine = createAnalysisEngine({
      config: { outputDir, chart: { width: 400, height: 300 } },
      logger: createSilentLogger()
    });

    const { report } = await engine.run(buildDataset(), [
      { analysisType: "distribution", targetColumns: ["price"], rationale: "price spread" },
      { analysisType: "distribution", targetColumns: ["zzz"] }
    ]);

    expect(report.dataset).toEqual({
      rows: 4,
      columns: 3,
      column_types: { price: "numeric", city: "categorical", order_date: "datetime" },
      missing: { city: { count: 1, percent: 25 } }
    });
    expect(report.summary).toEqual({
      total: 2,
      succeeded: 1,
      failed: 1,
      failures_by_category: { ColumnNotFound: 1 }
    });
    expect(report.results[0]).toMatchObject({
      analysis_type: "distribution",
      target_columns: ["price"],
      rationale: "price spread",
      status: "success",
      chart_path: "charts/distribution__price.svg"
    });
    expect(report.results[1]).toEqual({
      analysis_type: "distribution",
      target_columns: ["zzz"],
      status: "failed",
      error_category: "ColumnNotFound",
      error_message: 'Column not found in dataset: "zzz".'
    });

    const svg = await readFile(join(outputDir, "charts/distribution__price.svg"), "utf8");
    expect(svg.startsWith("<svg")).toBe(true);
  });
});
