import { ANALYSIS_TYPES, type AnalysisType } from "../../types/analysis";

export const normalizeTypeId = (raw: string): string =>
  raw
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");

// Planner labels seen in generated plans, keyed by their normalized form.
const TYPE_ALIASES: Record<string, AnalysisType> = {
  distribution_analysis: "distribution",
  histogram: "distribution",
  top_n: "top_n_categorical",
  frequency: "top_n_categorical",
  categorical_distribution: "top_n_categorical",
  categorical_distribution_analysis: "top_n_categorical",
  temporal_trend_analysis: "temporal_trend",
  time_series: "temporal_trend",
  trend: "temporal_trend",
  correlation_analysis: "correlation",
  correlation_heatmap: "correlation",
  geographical: "geographic",
  geographic_distribution: "geographic",
  geographical_distribution: "geographic",
  geographical_distribution_analysis: "geographic",
  comparative_duration_analysis: "comparative_duration",
  category_impact_analysis: "category_impact",
  product_category_impact_analysis: "category_impact",
  demographic_distribution: "demographic",
  demographic_distribution_analysis: "demographic",
  univariate_analysis: "univariate",
  association_rule_mining: "association_rules",
  association_rule_analysis: "association_rules"
};

const KNOWN_TYPES: ReadonlySet<string> = new Set(ANALYSIS_TYPES);

const isAnalysisType = (value: string): value is AnalysisType => KNOWN_TYPES.has(value);

export const resolveAnalysisType = (raw: string): AnalysisType | null => {
  const normalized = normalizeTypeId(raw);
  if (isAnalysisType(normalized)) {
    return normalized;
  }
  return TYPE_ALIASES[normalized] ?? null;
};
