import type { ScalarComparisonResult, VectorComparisonResult } from "@approx-eq/engine";

export type Polarity = "equal" | "not-equal";

/** Thrown by the `assert*Approx` helpers when a comparison contradicts the asserted polarity. */
export class ApproxAssertionError extends Error {
  override name = "ApproxAssertionError";

  readonly polarity: Polarity;
  readonly result: ScalarComparisonResult | VectorComparisonResult;

  constructor(message: string, polarity: Polarity, result: ScalarComparisonResult | VectorComparisonResult) {
    super(message);
    this.polarity = polarity;
    this.result = result;
  }
}

/** Error used for invalid or unreadable approx-eq configuration. */
export class ConfigError extends Error {
  override name = "ConfigError";
}
