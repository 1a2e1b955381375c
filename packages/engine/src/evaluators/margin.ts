import { assertTolerance, withinMargin } from "./tolerance.js";
import type { ApproxEvaluator } from "./types.js";

/** Absolute tolerance: equal iff `|actual - expected| <= margin`. */
export class MarginEvaluator implements ApproxEvaluator {
  readonly kind = "margin";
  readonly margin: number;

  constructor(margin: number) {
    assertTolerance("margin", margin);
    this.margin = margin;
  }

  decide(expected: number, actual: number): boolean {
    return withinMargin(expected, actual, this.margin);
  }
}

/**
 * Create an evaluator that applies `value` as an absolute margin.
 *
 * Throws `InvalidConfigurationError` when `value` is negative or NaN.
 */
export function margin(value: number): MarginEvaluator {
  return Object.freeze(new MarginEvaluator(value));
}
