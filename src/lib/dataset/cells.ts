import { isValid, parseISO } from "date-fns";
import type { CellValue } from "../../types/dataset";

const numericPattern = /^-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?$/;
const thousandsPattern = /^-?\d{1,3}(?:,\d{3})+(?:\.\d+)?$/;
// A comma followed by exactly three digits is a thousands separator, never a decimal mark.
const commaDecimalPattern = /^-?\d+,(?:\d{1,2}|\d{4,})(?:[eE][+-]?\d+)?$/;
const offsetPattern = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

export const isMissing = (value: CellValue): boolean => {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "number") {
    return Number.isNaN(value);
  }
  if (value instanceof Date) {
    return Number.isNaN(value.valueOf());
  }
  return value.trim().length === 0;
};

export const parseNumericCell = (value: CellValue): number | null => {
  if (value === null || value === undefined || value instanceof Date) {
    return null;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const cleaned = trimmed.replace(/\s+/g, "");
  if (thousandsPattern.test(cleaned)) {
    const parsed = Number(cleaned.replace(/,/g, ""));
    return Number.isFinite(parsed) ? parsed : null;
  }
  if (commaDecimalPattern.test(cleaned)) {
    const parsed = Number(cleaned.replace(",", "."));
    return Number.isFinite(parsed) ? parsed : null;
  }
  if (numericPattern.test(cleaned)) {
    const parsed = Number(cleaned);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

/**
 * Converts a cell to epoch milliseconds. Strings must be ISO-8601; one without an offset
 * is read as UTC wall-clock time. Bare numbers are only accepted as epoch values when the
 * column is declared as datetime.
 */
export const parseDateCell = (value: CellValue, acceptEpoch = false): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    const time = value.valueOf();
    return Number.isNaN(time) ? null : time;
  }
  if (typeof value === "number") {
    return acceptEpoch && Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  const parsed = parseISO(trimmed);
  if (!isValid(parsed)) {
    return null;
  }
  if (offsetPattern.test(trimmed) && trimmed.includes("T")) {
    return parsed.valueOf();
  }
  return Date.UTC(
    parsed.getFullYear(),
    parsed.getMonth(),
    parsed.getDate(),
    parsed.getHours(),
    parsed.getMinutes(),
    parsed.getSeconds(),
    parsed.getMilliseconds()
  );
};

export const toCategoryLabel = (value: CellValue): string | null => {
  if (isMissing(value) || value === null || value === undefined) {
    return null;
  }
  if (typeof value === "number") {
    return value.toString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return value.trim();
};
