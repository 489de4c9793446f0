import { InvalidArgumentError } from "commander";

/**
 * Parse a strictly positive integer option value.
 * Examples: "4" => 4; "0", "-1", "2.5", "abc" => InvalidArgumentError
 */
export function parsePositiveInt(value: string): number {
  const trimmed = String(value).trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  const n = Number.parseInt(trimmed, 10);
  if (!Number.isFinite(n) || n < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return n;
}

/**
 * Parse the policy applied when a re-scan of a processed folder is declined.
 */
export function parseDeclinedRescanPolicy(value: string): "abort" | "skip" {
  const normalized = String(value).trim().toLowerCase();
  if (normalized === "abort" || normalized === "skip") {
    return normalized;
  }
  throw new InvalidArgumentError(`Expected 'abort' or 'skip', got '${value}'`);
}
