import type { ErrorCategory } from "../../types/analysis";

export class AnalysisError extends Error {
  category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = "AnalysisError";
    this.category = category;
  }
}

export class MalformedDatasetError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Dataset is malformed: ${issues.join("; ")}`);
    this.name = "MalformedDatasetError";
    this.issues = issues;
  }
}

export class PlanFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanFormatError";
  }
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid engine configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const toFailureDetails = (
  error: unknown
): { category: ErrorCategory; message: string } => {
  if (error instanceof AnalysisError) {
    return { category: error.category, message: error.message };
  }
  if (error instanceof Error) {
    return { category: "InternalError", message: error.message };
  }
  return { category: "InternalError", message: String(error) };
};
