import { invariant } from "@approx-eq/core";

import { testableAsF64, type TestableAsF64 } from "../convert/toF64.js";
import { describeEvaluator, type ApproxEvaluator } from "../evaluators/types.js";
import { compareFloats, DEFAULT_EVALUATOR } from "./scalar.js";
import type { EvaluateOptions, ScalarComparisonResult, VectorComparisonResult } from "./types.js";

/**
 * Compare two sequences element-wise.
 *
 * Sequences of different length are never approximately equal and are not
 * compared element-wise. Otherwise every index is compared (no short-circuit),
 * so `unequalIndices` lists all failures, not only the first.
 */
export function evaluateVectorEqApprox(
  expected: ArrayLike<TestableAsF64>,
  actual: ArrayLike<TestableAsF64>,
  evaluator: ApproxEvaluator = DEFAULT_EVALUATOR,
  options: EvaluateOptions = {},
): VectorComparisonResult {
  const info = describeEvaluator(evaluator);
  const expectedLength = expected.length;
  const actualLength = actual.length;

  if (expectedLength !== actualLength) {
    return {
      outcome: "not-equal",
      perIndex: [],
      lengthMismatch: true,
      expectedLength,
      actualLength,
      unequalIndices: [],
      firstUnequalIndex: undefined,
      evaluator: info,
    };
  }

  const nanEquality = options.nanEquality === true;
  const perIndex: ScalarComparisonResult[] = [];
  const unequalIndices: number[] = [];

  for (let i = 0; i < expectedLength; i++) {
    const e = expected[i];
    const a = actual[i];
    invariant(e !== undefined && a !== undefined, `missing element at index ${i}`);

    const result = compareFloats(testableAsF64(e), testableAsF64(a), evaluator, info, nanEquality);
    perIndex.push(result);
    if (result.outcome === "not-equal") unequalIndices.push(i);
  }

  return {
    outcome: unequalIndices.length === 0 ? "equal" : "not-equal",
    perIndex,
    lengthMismatch: false,
    expectedLength,
    actualLength,
    unequalIndices,
    firstUnequalIndex: unequalIndices[0],
    evaluator: info,
  };
}
