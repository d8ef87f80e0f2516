import type { EntryState, RunState } from "../../types/analysis";
import type { TabularDataset } from "../../types/dataset";
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from "../config";
import { createHandlerRegistry, type HandlerRegistry } from "../handlers/registry";
import { consoleLogger, type EngineLogger } from "../logger";
import { aggregateResults, type AggregatedOutput } from "./aggregate";
import { runAnalysisPlan, type ChartSinkFactory, type PlanRun } from "./runPlan";

export type AnalysisEngineOptions = {
  config?: EngineConfigInput | EngineConfig;
  registry?: HandlerRegistry;
  logger?: EngineLogger;
  createChartSink?: ChartSinkFactory;
};

export type EngineRunOptions = {
  signal?: AbortSignal;
  onEntryState?: (index: number, state: EntryState) => void;
  onRunState?: (state: RunState) => void;
};

export type EngineRun = PlanRun & {
  report: AggregatedOutput;
};

export type AnalysisEngine = {
  config: EngineConfig;
  registry: HandlerRegistry;
  run: (dataset: TabularDataset, plan: unknown, options?: EngineRunOptions) => Promise<EngineRun>;
};

export const createAnalysisEngine = ({
  config,
  registry = createHandlerRegistry(),
  logger = consoleLogger,
  createChartSink
}: AnalysisEngineOptions = {}): AnalysisEngine => {
  const resolved = resolveEngineConfig(config);

  return {
    config: resolved,
    registry,
    run: async (dataset, plan, options = {}) => {
      const planRun = await runAnalysisPlan(dataset, plan, {
        ...options,
        config: resolved,
        registry,
        logger,
        createChartSink
      });
      return {
        ...planRun,
        report: aggregateResults(
          dataset,
          planRun.schema,
          planRun.results,
          resolved.rounding.percentages
        )
      };
    }
  };
};
