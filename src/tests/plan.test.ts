import { describe, expect, it } from "vitest";
import { normalizeTypeId, resolveAnalysisType } from "../lib/plan/analysisTypes";
import { parsePlan, parsePlanEntry } from "../lib/plan/parsePlan";
import { PlanFormatError } from "../lib/engine/errors";

describe("resolveAnalysisType", () => {
  it("normalizes separators and case", () => {
    expect(normalizeTypeId("  Temporal Trend-Analysis ")).toBe("temporal_trend_analysis");
    expect(resolveAnalysisType("Top N Categorical")).toBe("top_n_categorical");
  });

  it("maps planner labels onto built-in types", () => {
    expect(resolveAnalysisType("Temporal Trend Analysis")).toBe("temporal_trend");
    expect(resolveAnalysisType("Association Rule Mining")).toBe("association_rules");
    expect(resolveAnalysisType("Geographical Distribution")).toBe("geographic");
  });

  it("returns null for unknown labels", () => {
    expect(resolveAnalysisType("sentiment")).toBeNull();
  });
});

describe("parsePlanEntry", () => {
  it("accepts camel case entries and keeps the rationale", () => {
    expect(
      parsePlanEntry({
        analysisType: "distribution",
        targetColumns: [" price "],
        rationale: "spread of prices"
      })
    ).toEqual({
      ok: true,
      entry: {
        analysisType: "distribution",
        targetColumns: ["price"],
        rationale: "spread of prices"
      }
    });
  });

  it("accepts snake case and planner shaped entries", () => {
    expect(
      parsePlanEntry({ analysis_type: "correlation", target_columns: ["a", "b"] })
    ).toEqual({ ok: true, entry: { analysisType: "correlation", targetColumns: ["a", "b"] } });
    expect(parsePlanEntry({ type: "geographic", columns: ["city"], reason: "where" })).toEqual({
      ok: true,
      entry: { analysisType: "geographic", targetColumns: ["city"], rationale: "where" }
    });
  });

  it("rejects entries without target columns and salvages their identity", () => {
    const result = parsePlanEntry({ analysisType: "distribution", targetColumns: [] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.message).toMatch(/^targetColumns: /);
      expect(result.fallback).toEqual({
        analysisType: "distribution",
        targetColumns: [],
        rationale: undefined
      });
    }
  });

  it("rejects values that are not objects", () => {
    expect(parsePlanEntry("distribution")).toEqual({
      ok: false,
      message: "Plan entry must be an object.",
      fallback: { analysisType: "", targetColumns: [] }
    });
  });

  it("rejects objects that do not name a type", () => {
    const result = parsePlanEntry({ columns_to_use: ["a"] });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.message).toBe("Plan entry does not name an analysis type.");
    }
  });
});

describe("parsePlan", () => {
  it("parses each entry independently", () => {
    const results = parsePlan([
      { analysisType: "distribution", targetColumns: ["price"] },
      42
    ]);
    expect(results.map((result) => result.ok)).toEqual([true, false]);
  });

  it("throws when the plan is not an array", () => {
    expect(() => parsePlan({ analysisType: "distribution" })).toThrow(PlanFormatError);
  });
});
