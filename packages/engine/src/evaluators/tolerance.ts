import { InvalidConfigurationError } from "../errors.js";

export function assertTolerance(parameter: string, value: number): void {
  // `!(value >= 0)` also rejects NaN.
  if (typeof value !== "number" || !(value >= 0)) {
    throw new InvalidConfigurationError(parameter, value);
  }
}

/**
 * Whether `actual` lies in `[expected - tolerance, expected + tolerance]`.
 *
 * Bounds are rounded, not the difference: 3.0 + 0.0001 === 3.0001, while
 * 3.0001 - 3.0 > 0.0001. A NaN bound (-Infinity + Infinity) rejects.
 */
export function withinRange(expected: number, actual: number, tolerance: number): boolean {
  const lo = expected - tolerance;
  const hi = expected + tolerance;
  if (lo <= hi) return lo <= actual && actual <= hi;
  return hi <= actual && actual <= lo;
}

// Identical operands are equal up front: Infinity - Infinity is NaN.
export function withinMargin(expected: number, actual: number, margin: number): boolean {
  if (expected === actual) return true;
  return withinRange(expected, actual, margin);
}

export function withinMultiplier(expected: number, actual: number, multiplier: number): boolean {
  if (expected === actual) return true;
  // A relative tolerance against an infinite operand is meaningless.
  if (!Number.isFinite(expected) || !Number.isFinite(actual)) return false;
  const scale = Math.max(Math.abs(expected), Math.abs(actual));
  return withinRange(expected, actual, multiplier * scale);
}
