/**
 * Pure validation helpers for config values
 */

/**
 * Validate if string is empty or only whitespace
 */
export function isEmpty(str: string): boolean {
  return !str || str.trim().length === 0;
}

/**
 * Validate if value is a positive integer.
 * Numeric strings are rejected: YAML already types numbers.
 */
export function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}
