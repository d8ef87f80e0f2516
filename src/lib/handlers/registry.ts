import type { AnalysisType } from "../../types/analysis";
import { normalizeTypeId, resolveAnalysisType } from "../plan/analysisTypes";
import { associationRulesHandler } from "./associationRules";
import { categoryImpactHandler } from "./categoryImpact";
import { comparativeDurationHandler } from "./comparativeDuration";
import { correlationHandler } from "./correlation";
import { distributionHandler } from "./distribution";
import { demographicHandler, geographicHandler, topCategoricalHandler } from "./frequency";
import { temporalTrendHandler } from "./temporalTrend";
import type { AnalysisHandler } from "./types";
import { univariateHandler } from "./univariate";

const assertNever = (value: never): never => {
  throw new Error(`Unhandled analysis type: ${String(value)}`);
};

export const builtinHandler = (type: AnalysisType): AnalysisHandler => {
  switch (type) {
    case "distribution":
      return distributionHandler;
    case "top_n_categorical":
      return topCategoricalHandler;
    case "temporal_trend":
      return temporalTrendHandler;
    case "correlation":
      return correlationHandler;
    case "geographic":
      return geographicHandler;
    case "comparative_duration":
      return comparativeDurationHandler;
    case "category_impact":
      return categoryImpactHandler;
    case "demographic":
      return demographicHandler;
    case "univariate":
      return univariateHandler;
    case "association_rules":
      return associationRulesHandler;
    default:
      return assertNever(type);
  }
};

export type HandlerResolution =
  | { ok: true; analysisType: string; handler: AnalysisHandler }
  | { ok: false; category: "UnsupportedAnalysisType"; message: string };

export type HandlerRegistry = {
  register: (id: string, handler: AnalysisHandler) => void;
  resolve: (analysisType: string) => HandlerResolution;
  extensionIds: () => string[];
};

/**
 * Built-in types resolve through the closed AnalysisType set. Extension handlers are
 * registered under their own ids at startup and may not shadow a built-in.
 */
export const createHandlerRegistry = (): HandlerRegistry => {
  const extensions = new Map<string, AnalysisHandler>();

  return {
    register: (id, handler) => {
      const normalized = normalizeTypeId(id);
      if (!normalized) {
        throw new Error("Extension handler id must contain letters or digits.");
      }
      if (resolveAnalysisType(normalized)) {
        throw new Error(`"${id}" is a built-in analysis type and cannot be replaced.`);
      }
      if (extensions.has(normalized)) {
        throw new Error(`A handler is already registered for "${id}".`);
      }
      extensions.set(normalized, handler);
    },
    resolve: (analysisType) => {
      const builtin = resolveAnalysisType(analysisType);
      if (builtin) {
        return { ok: true, analysisType: builtin, handler: builtinHandler(builtin) };
      }
      const normalized = normalizeTypeId(analysisType);
      const extension = extensions.get(normalized);
      if (extension) {
        return { ok: true, analysisType: normalized, handler: extension };
      }
      return {
        ok: false,
        category: "UnsupportedAnalysisType",
        message: analysisType.trim()
          ? `No handler for analysis type "${analysisType}".`
          : "Plan entry has an empty analysis type."
      };
    },
    extensionIds: () => Array.from(extensions.keys())
  };
};
