import { createHash } from "crypto";

export const CHART_DIRECTORY = "charts";
const MAX_STEM_LENGTH = 120;

const toSlug = (value: string): string =>
  value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");

const shortHash = (parts: string[]): string =>
  createHash("sha1").update(JSON.stringify(parts)).digest("hex").slice(0, 8);

/**
 * Relative chart path for an analysis type and its target columns. Parts are joined
 * with "__"; when slugging changes any part (case, punctuation, length) a hash of the
 * raw parts is appended so two different inputs never share a file.
 */
export const chartPath = (analysisType: string, targetColumns: string[]): string => {
  const parts = [analysisType, ...targetColumns];
  const slugs = parts.map((part) => toSlug(part) || "x");
  let stem = slugs.join("__");
  let lossy = slugs.some((slug, index) => slug !== parts[index]);
  if (stem.length > MAX_STEM_LENGTH) {
    stem = stem.slice(0, MAX_STEM_LENGTH).replace(/_+$/, "");
    lossy = true;
  }
  const suffix = lossy ? `-${shortHash(parts)}` : "";
  return `${CHART_DIRECTORY}/${stem}${suffix}.svg`;
};
