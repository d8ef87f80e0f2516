import type {
  AnalysisPlanEntry,
  AnalysisResult,
  EntryState,
  ErrorCategory,
  ResultSet,
  RunState
} from "../../types/analysis";
import type { DatasetSchema, TabularDataset } from "../../types/dataset";
import { createFileChartSink } from "../charts/chartSink";
import type { ChartSink } from "../charts/types";
import type { EngineConfig } from "../config";
import { assertDatasetShape } from "../dataset/buildDataset";
import { createHandlerRegistry, type HandlerRegistry } from "../handlers/registry";
import { describeStatistics } from "../insights/describeStatistics";
import { consoleLogger, describeError, type EngineLogger } from "../logger";
import { parsePlan } from "../plan/parsePlan";
import { classify } from "../schema/inspector";
import { validateTarget } from "../schema/validateTarget";
import { createResultCollector } from "./aggregate";
import { toFailureDetails } from "./errors";
import { runPool } from "./pool";
import { withTimeout } from "./timeout";

export type ChartSinkFactory = (context: {
  analysisType: string;
  targetColumns: string[];
}) => ChartSink;

export type RunPlanOptions = {
  config: EngineConfig;
  registry?: HandlerRegistry;
  logger?: EngineLogger;
  signal?: AbortSignal;
  createChartSink?: ChartSinkFactory;
  onEntryState?: (index: number, state: EntryState) => void;
  onRunState?: (state: RunState) => void;
};

export type PlanRun = {
  schema: DatasetSchema;
  results: ResultSet;
};

const failed = (
  entry: AnalysisPlanEntry,
  category: ErrorCategory,
  message: string
): AnalysisResult => ({
  analysisType: entry.analysisType,
  targetColumns: [...entry.targetColumns],
  ...(entry.rationale !== undefined ? { rationale: entry.rationale } : {}),
  status: "failed",
  error: { category, message }
});

/**
 * Executes every plan entry against the dataset and returns one result per entry, in
 * plan order. Only a structurally invalid dataset or a plan that is not an array
 * throws; everything else is recorded as a failed result.
 */
export const runAnalysisPlan = async (
  dataset: TabularDataset,
  plan: unknown,
  {
    config,
    registry = createHandlerRegistry(),
    logger = consoleLogger,
    signal,
    createChartSink,
    onEntryState,
    onRunState
  }: RunPlanOptions
): Promise<PlanRun> => {
  assertDatasetShape(dataset);
  const entries = parsePlan(plan);
  const schema = classify(dataset);
  const collector = createResultCollector(entries.length);

  const notify = (index: number, state: EntryState) => {
    try {
      onEntryState?.(index, state);
    } catch (error) {
      logger.warn("[analysis-engine] observer error", {
        index,
        state,
        ...describeError(error, "entry observer failed")
      });
    }
  };

  const sinkFor: ChartSinkFactory =
    createChartSink ??
    ((context) =>
      createFileChartSink({
        ...context,
        outputDir: config.outputDir,
        size: config.chart,
        logger
      }));

  const record = (index: number, result: AnalysisResult) => {
    collector.set(index, result);
    if (result.status === "success") {
      logger.info("[analysis-engine] entry:success", {
        index,
        analysisType: result.analysisType,
        chart: result.chart.path
      });
      notify(index, "succeeded");
    } else {
      logger.warn("[analysis-engine] entry:fail", {
        index,
        analysisType: result.analysisType,
        category: result.error.category,
        message: result.error.message
      });
      notify(index, "failed");
    }
  };

  const executeEntry = async (index: number): Promise<AnalysisResult> => {
    const parsed = entries[index];
    if (!parsed.ok) {
      return failed(parsed.fallback, "InvalidPlanEntry", parsed.message);
    }
    const entry = parsed.entry;
    const resolution = registry.resolve(entry.analysisType);
    if (!resolution.ok) {
      return failed(entry, resolution.category, resolution.message);
    }
    const canonical: AnalysisPlanEntry = { ...entry, analysisType: resolution.analysisType };
    const validation = validateTarget(canonical, schema, resolution.handler.requirement);
    if (!validation.ok) {
      return failed(canonical, validation.category, validation.message);
    }

    notify(index, "running");
    const charts = sinkFor({
      analysisType: canonical.analysisType,
      targetColumns: canonical.targetColumns
    });
    try {
      const output = await withTimeout(
        Promise.resolve().then(() =>
          resolution.handler.run(
            {
              dataset,
              schema,
              target: validation.target,
              settings: { topN: config.topN, rounding: config.rounding }
            },
            charts
          )
        ),
        config.entryTimeoutMs,
        `${canonical.analysisType} on ${canonical.targetColumns.join(", ")}`
      );
      return {
        analysisType: canonical.analysisType,
        targetColumns: [...canonical.targetColumns],
        ...(canonical.rationale !== undefined ? { rationale: canonical.rationale } : {}),
        status: "success",
        statistics: output.statistics,
        chart: output.chart,
        insight: describeStatistics(output.statistics)
      };
    } catch (error) {
      const details = toFailureDetails(error);
      return failed(canonical, details.category, details.message);
    }
  };

  onRunState?.("processing");
  logger.info("[analysis-engine] start", {
    dataset: dataset.name ?? null,
    columns: dataset.columns.length,
    entries: entries.length,
    concurrency: config.concurrency
  });
  entries.forEach((_, index) => notify(index, "pending"));

  await runPool(entries.length, config.concurrency, async (index) => {
    if (signal?.aborted) {
      const parsed = entries[index];
      record(
        index,
        failed(
          parsed.ok ? parsed.entry : parsed.fallback,
          "Cancelled",
          "Run was cancelled before this entry started."
        )
      );
      return;
    }
    notify(index, "validating");
    let result: AnalysisResult;
    try {
      result = await executeEntry(index);
    } catch (error) {
      const parsed = entries[index];
      const details = toFailureDetails(error);
      result = failed(parsed.ok ? parsed.entry : parsed.fallback, details.category, details.message);
    }
    record(index, result);
  });

  const results = collector.toResultSet();
  const succeeded = results.filter((result) => result.status === "success").length;
  logger.info("[analysis-engine] done", {
    entries: results.length,
    succeeded,
    failed: results.length - succeeded
  });
  onRunState?.("done");
  return { schema, results };
};
