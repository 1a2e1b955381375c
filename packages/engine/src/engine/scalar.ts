import { DEFAULT_MARGIN } from "../constants.js";
import { testableAsF64, type TestableAsF64 } from "../convert/toF64.js";
import { margin } from "../evaluators/margin.js";
import { describeEvaluator, type ApproxEvaluator, type EvaluatorInfo } from "../evaluators/types.js";
import type { EvaluateOptions, ScalarComparisonResult } from "./types.js";

/** Evaluator used when a caller supplies none: `margin(DEFAULT_MARGIN)`. */
export const DEFAULT_EVALUATOR: ApproxEvaluator = margin(DEFAULT_MARGIN);

/** Compare two already-converted floats. Shared with the vector engine. */
export function compareFloats(
  expected: number,
  actual: number,
  evaluator: ApproxEvaluator,
  info: EvaluatorInfo,
  nanEquality: boolean,
): ScalarComparisonResult {
  const expectedNaN = Number.isNaN(expected);
  const actualNaN = Number.isNaN(actual);

  // Evaluators never see a NaN operand.
  if (expectedNaN || actualNaN) {
    if (nanEquality && expectedNaN && actualNaN) {
      return { outcome: "equal", exact: true, expected, actual, evaluator: info };
    }
    return { outcome: "not-equal", diff: Number.NaN, expected, actual, evaluator: info };
  }

  if (evaluator.decide(expected, actual)) {
    return { outcome: "equal", exact: expected === actual, expected, actual, evaluator: info };
  }

  return {
    outcome: "not-equal",
    diff: Math.abs(actual - expected),
    expected,
    actual,
    evaluator: info,
  };
}

/**
 * Decide whether `actual` is approximately equal to `expected`.
 *
 * Both comparands are converted with {@link testableAsF64} first. When
 * `evaluator` is omitted, {@link DEFAULT_EVALUATOR} is used.
 */
export function evaluateScalarEqApprox(
  expected: TestableAsF64,
  actual: TestableAsF64,
  evaluator: ApproxEvaluator = DEFAULT_EVALUATOR,
  options: EvaluateOptions = {},
): ScalarComparisonResult {
  return compareFloats(
    testableAsF64(expected),
    testableAsF64(actual),
    evaluator,
    describeEvaluator(evaluator),
    options.nanEquality === true,
  );
}
