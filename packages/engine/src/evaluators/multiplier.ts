import { assertTolerance, withinMultiplier } from "./tolerance.js";
import type { ApproxEvaluator } from "./types.js";

/**
 * Relative tolerance, scaled by the larger magnitude of the two operands:
 * equal iff `|actual - expected| <= multiplier * max(|expected|, |actual|)`.
 *
 * When both operands are zero the allowed difference is zero too.
 */
export class MultiplierEvaluator implements ApproxEvaluator {
  readonly kind = "multiplier";
  readonly multiplier: number;

  constructor(multiplier: number) {
    assertTolerance("multiplier", multiplier);
    this.multiplier = multiplier;
  }

  decide(expected: number, actual: number): boolean {
    return withinMultiplier(expected, actual, this.multiplier);
  }
}

/**
 * Create an evaluator that applies `value` as a relative multiplier.
 *
 * Throws `InvalidConfigurationError` when `value` is negative or NaN.
 */
export function multiplier(value: number): MultiplierEvaluator {
  return Object.freeze(new MultiplierEvaluator(value));
}
