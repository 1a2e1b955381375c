import {
  evaluateScalarEqApprox,
  evaluateVectorEqApprox,
  type ApproxEvaluator,
  type EvaluateOptions,
  type TestableAsF64,
} from "@approx-eq/engine";

import { DEFAULT_ASSERTION_EVALUATOR } from "./defaults.js";
import { ApproxAssertionError } from "./errors.js";
import { formatScalarFailure, formatVectorFailure } from "./format.js";

/**
 * Throw {@link ApproxAssertionError} unless `actual` is approximately equal to `expected`.
 *
 * `evaluator` defaults to {@link DEFAULT_ASSERTION_EVALUATOR}, as in the other helpers.
 */
export function assertScalarEqApprox(
  expected: TestableAsF64,
  actual: TestableAsF64,
  evaluator: ApproxEvaluator = DEFAULT_ASSERTION_EVALUATOR,
  options?: EvaluateOptions,
): void {
  const result = evaluateScalarEqApprox(expected, actual, evaluator, options);
  if (result.outcome !== "equal") {
    throw new ApproxAssertionError(formatScalarFailure(result, "equal"), "equal", result);
  }
}

/** Throw {@link ApproxAssertionError} if `actual` is approximately equal to `expected`. */
export function assertScalarNeApprox(
  expected: TestableAsF64,
  actual: TestableAsF64,
  evaluator: ApproxEvaluator = DEFAULT_ASSERTION_EVALUATOR,
  options?: EvaluateOptions,
): void {
  const result = evaluateScalarEqApprox(expected, actual, evaluator, options);
  if (result.outcome !== "not-equal") {
    throw new ApproxAssertionError(formatScalarFailure(result, "not-equal"), "not-equal", result);
  }
}

/** Throw {@link ApproxAssertionError} unless both sequences have the same length and every element matches. */
export function assertVectorEqApprox(
  expected: ArrayLike<TestableAsF64>,
  actual: ArrayLike<TestableAsF64>,
  evaluator: ApproxEvaluator = DEFAULT_ASSERTION_EVALUATOR,
  options?: EvaluateOptions,
): void {
  const result = evaluateVectorEqApprox(expected, actual, evaluator, options);
  if (result.outcome !== "equal") {
    throw new ApproxAssertionError(formatVectorFailure(result, "equal"), "equal", result);
  }
}

/**
 * Throw {@link ApproxAssertionError} if the sequences are approximately equal.
 *
 * Sequences of different length always pass.
 */
export function assertVectorNeApprox(
  expected: ArrayLike<TestableAsF64>,
  actual: ArrayLike<TestableAsF64>,
  evaluator: ApproxEvaluator = DEFAULT_ASSERTION_EVALUATOR,
  options?: EvaluateOptions,
): void {
  const result = evaluateVectorEqApprox(expected, actual, evaluator, options);
  if (result.outcome !== "not-equal") {
    throw new ApproxAssertionError(formatVectorFailure(result, "not-equal"), "not-equal", result);
  }
}
