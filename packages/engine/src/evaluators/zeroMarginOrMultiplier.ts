import { assertTolerance, withinMargin, withinMultiplier } from "./tolerance.js";
import type { ApproxEvaluator } from "./types.js";

/**
 * Multiplier semantics, except when either operand is zero: a relative
 * tolerance collapses to nothing there, so `margin` is applied instead.
 */
export class ZeroMarginOrMultiplierEvaluator implements ApproxEvaluator {
  readonly kind = "zero-margin-or-multiplier";
  readonly margin: number;
  readonly multiplier: number;

  constructor(margin: number, multiplier: number) {
    assertTolerance("margin", margin);
    assertTolerance("multiplier", multiplier);
    this.margin = margin;
    this.multiplier = multiplier;
  }

  decide(expected: number, actual: number): boolean {
    if (expected === 0 || actual === 0) {
      return withinMargin(expected, actual, this.margin);
    }
    return withinMultiplier(expected, actual, this.multiplier);
  }
}

/**
 * Create an evaluator applying `marginValue` when either operand is zero and
 * `multiplierValue` otherwise.
 *
 * Throws `InvalidConfigurationError` when either tolerance is negative or NaN.
 */
export function zeroMarginOrMultiplier(
  marginValue: number,
  multiplierValue: number,
): ZeroMarginOrMultiplierEvaluator {
  return Object.freeze(new ZeroMarginOrMultiplierEvaluator(marginValue, multiplierValue));
}
