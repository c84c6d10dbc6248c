import { FALLBACK_FEATURE_BASENAME, PLAN_FILE_SUFFIX, SPEC_FILE_SUFFIX } from "./constants/index.js";

/**
 * Convert a feature name into a filesystem-safe base filename.
 * "My Cool-Feature!" -> "my_cool_feature"; "" -> "feature_plan".
 */
export function sanitizeFilename(text: string): string {
  const base = text
    .toLowerCase()
    .trim()
    .replace(/[\s-]/g, "_")
    .replace(/[^a-z0-9_]/g, "")
    .replace(/^_+|_+$/g, "");
  return base || FALLBACK_FEATURE_BASENAME;
}

export function getPlanFilename(baseName: string): string {
  return `${baseName}${PLAN_FILE_SUFFIX}`;
}

export function getSpecFilename(baseName: string): string {
  return `${baseName}${SPEC_FILE_SUFFIX}`;
}
