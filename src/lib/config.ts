import { z } from "zod";
import { ConfigError } from "./engine/errors";

export const engineConfigSchema = z
  .object({
    outputDir: z.string().trim().min(1).default("analysis_outputs"),
    topN: z.number().int().min(1).max(100).default(10),
    concurrency: z.number().int().min(1).max(64).default(4),
    entryTimeoutMs: z.number().int().min(1).default(30_000),
    rounding: z
      .object({
        statistics: z.number().int().min(0).max(10).default(2),
        percentages: z.number().int().min(0).max(10).default(1)
      })
      .strict()
      .default({}),
    chart: z
      .object({
        width: z.number().int().min(100).max(4000).default(800),
        height: z.number().int().min(100).max(4000).default(500)
      })
      .strict()
      .default({})
  })
  .strict();

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;

const envSchema = z.object({
  ANALYSIS_OUTPUT_DIR: z.string().optional(),
  ANALYSIS_TOP_N: z.coerce.number().optional(),
  ANALYSIS_CONCURRENCY: z.coerce.number().optional(),
  ANALYSIS_ENTRY_TIMEOUT_MS: z.coerce.number().optional(),
  ANALYSIS_STAT_DECIMALS: z.coerce.number().optional(),
  ANALYSIS_PERCENT_DECIMALS: z.coerce.number().optional(),
  ANALYSIS_CHART_WIDTH: z.coerce.number().optional(),
  ANALYSIS_CHART_HEIGHT: z.coerce.number().optional()
});

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`);

export const resolveEngineConfig = (input: EngineConfigInput = {}): EngineConfig => {
  const parsed = engineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
};

/**
 * Reads ANALYSIS_* variables, then applies explicit overrides on top. Blank variables
 * count as unset.
 */
export const loadEngineConfig = (
  env: Record<string, string | undefined> = process.env,
  overrides: EngineConfigInput = {}
): EngineConfig => {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== ""
    )
  );
  const parsedEnv = envSchema.safeParse(present);
  if (!parsedEnv.success) {
    throw new ConfigError(formatIssues(parsedEnv.error));
  }
  const vars = parsedEnv.data;

  return resolveEngineConfig({
    outputDir: vars.ANALYSIS_OUTPUT_DIR,
    topN: vars.ANALYSIS_TOP_N,
    concurrency: vars.ANALYSIS_CONCURRENCY,
    entryTimeoutMs: vars.ANALYSIS_ENTRY_TIMEOUT_MS,
    rounding: {
      statistics: vars.ANALYSIS_STAT_DECIMALS,
      percentages: vars.ANALYSIS_PERCENT_DECIMALS
    },
    chart: {
      width: vars.ANALYSIS_CHART_WIDTH,
      height: vars.ANALYSIS_CHART_HEIGHT
    },
    ...overrides
  });
};
