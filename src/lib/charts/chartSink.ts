import { mkdir, writeFile } from "fs/promises";
import { dirname, join } from "path";
import type { ChartArtifact } from "../../types/analysis";
import { AnalysisError } from "../engine/errors";
import { describeError, type EngineLogger } from "../logger";
import { chartPath } from "./chartNamer";
import { renderChartSvg } from "./renderChart";
import type { ChartRenderer, ChartSink, ChartSize, ChartSpec } from "./types";

export type FileChartSinkOptions = {
  outputDir: string;
  analysisType: string;
  targetColumns: string[];
  size: ChartSize;
  logger: EngineLogger;
  render?: ChartRenderer;
};

export const createFileChartSink = ({
  outputDir,
  analysisType,
  targetColumns,
  size,
  logger,
  render = renderChartSvg
}: FileChartSinkOptions): ChartSink => ({
  async write(spec: ChartSpec): Promise<ChartArtifact> {
    const path = chartPath(analysisType, targetColumns);
    const absolutePath = join(outputDir, path);
    try {
      const svg = render(spec, size);
      await mkdir(dirname(absolutePath), { recursive: true });
      await writeFile(absolutePath, svg, "utf8");
    } catch (error) {
      const details = describeError(error, "unknown chart error");
      logger.error("[chart] fail", { path, ...details });
      throw new AnalysisError(
        "ChartRenderFailure",
        `Chart "${spec.title}" could not be written to ${path}: ${details.message}`
      );
    }
    logger.info("[chart] saved", { path });
    return { path, analysisType, targetColumns: [...targetColumns] };
  }
});
