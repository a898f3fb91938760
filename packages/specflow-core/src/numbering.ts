import { UsageError } from "./errors.js";

export const MIN_FEATURE_NUMBER = 1;
export const MAX_FEATURE_NUMBER = 999;

const LEADING_DIGITS = /^[0-9]+/;

/**
 * Leading digit run of a directory name, read as base 10 so `010` is ten.
 * Names without a numeric prefix count as 0.
 */
export function parseFeaturePrefix(name: string): number {
  const match = LEADING_DIGITS.exec(name);
  if (!match) return 0;
  return Number.parseInt(match[0], 10);
}

export function nextFeatureNumber(existingNames: Iterable<string>): number {
  let highest = 0;
  for (const name of existingNames) {
    const value = parseFeaturePrefix(name);
    if (value > highest) highest = value;
  }
  return highest + 1;
}

export function formatFeatureNumber(value: number): string {
  return String(value).padStart(3, "0");
}

export function parseFeatureNumberOption(raw: string | undefined): number {
  const value = raw?.trim() ?? "";
  if (!value || value.startsWith("-")) {
    throw new UsageError(`--feature-num requires a number (${MIN_FEATURE_NUMBER}-${MAX_FEATURE_NUMBER})`);
  }
  if (!/^[0-9]+$/.test(value)) {
    throw new UsageError("--feature-num must be a positive integer");
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < MIN_FEATURE_NUMBER || parsed > MAX_FEATURE_NUMBER) {
    throw new UsageError(`--feature-num must be between ${MIN_FEATURE_NUMBER} and ${MAX_FEATURE_NUMBER}`);
  }
  return parsed;
}
