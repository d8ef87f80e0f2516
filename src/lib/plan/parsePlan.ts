import { z } from "zod";
import type { AnalysisPlanEntry } from "../../types/analysis";
import { PlanFormatError } from "../engine/errors";

const columnsSchema = z.array(z.string().trim().min(1)).min(1);

const camelEntrySchema = z.object({
  analysisType: z.string().trim().min(1),
  targetColumns: columnsSchema,
  rationale: z.string().optional()
});

const snakeEntrySchema = z
  .object({
    analysis_type: z.string().trim().min(1),
    target_columns: columnsSchema,
    rationale: z.string().optional()
  })
  .transform((entry) => ({
    analysisType: entry.analysis_type,
    targetColumns: entry.target_columns,
    rationale: entry.rationale
  }));

const plannerEntrySchema = z
  .object({
    type: z.string().trim().min(1),
    columns: columnsSchema,
    reason: z.string().optional()
  })
  .transform((entry) => ({
    analysisType: entry.type,
    targetColumns: entry.columns,
    rationale: entry.reason
  }));

export type PlanEntryParseResult =
  | { ok: true; entry: AnalysisPlanEntry }
  | { ok: false; message: string; fallback: AnalysisPlanEntry };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readString = (record: Record<string, unknown>, keys: string[]): string | undefined => {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string") {
      return value;
    }
  }
  return undefined;
};

const readStrings = (record: Record<string, unknown>, keys: string[]): string[] => {
  for (const key of keys) {
    const value = record[key];
    if (Array.isArray(value)) {
      return value.filter((item): item is string => typeof item === "string");
    }
  }
  return [];
};

// Best-effort identity for an entry that failed validation, so its result row still
// says what was asked for.
const salvageEntry = (raw: unknown): AnalysisPlanEntry => {
  if (!isRecord(raw)) {
    return { analysisType: "", targetColumns: [] };
  }
  return {
    analysisType: readString(raw, ["analysisType", "analysis_type", "type"]) ?? "",
    targetColumns: readStrings(raw, ["targetColumns", "target_columns", "columns"]),
    rationale: readString(raw, ["rationale", "reason"])
  };
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "entry"}: ${issue.message}`)
    .join("; ");

type EntrySchema = z.ZodType<AnalysisPlanEntry, z.ZodTypeDef, unknown>;

const pickSchema = (raw: Record<string, unknown>): EntrySchema | null => {
  if ("analysisType" in raw) {
    return camelEntrySchema;
  }
  if ("analysis_type" in raw) {
    return snakeEntrySchema;
  }
  if ("type" in raw) {
    return plannerEntrySchema;
  }
  return null;
};

export const parsePlanEntry = (raw: unknown): PlanEntryParseResult => {
  if (!isRecord(raw)) {
    return {
      ok: false,
      message: "Plan entry must be an object.",
      fallback: salvageEntry(raw)
    };
  }
  const schema = pickSchema(raw);
  if (!schema) {
    return {
      ok: false,
      message: "Plan entry does not name an analysis type.",
      fallback: salvageEntry(raw)
    };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, message: formatIssues(parsed.error), fallback: salvageEntry(raw) };
  }
  const entry: AnalysisPlanEntry = {
    analysisType: parsed.data.analysisType,
    targetColumns: parsed.data.targetColumns
  };
  if (parsed.data.rationale !== undefined) {
    entry.rationale = parsed.data.rationale;
  }
  return { ok: true, entry };
};

export const parsePlan = (raw: unknown): PlanEntryParseResult[] => {
  if (!Array.isArray(raw)) {
    throw new PlanFormatError("Analysis plan must be an array of entries.");
  }
  return raw.map(parsePlanEntry);
};
