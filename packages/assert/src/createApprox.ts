import {
  evaluateScalarEqApprox,
  evaluateVectorEqApprox,
  resolveFeatureFlags,
  type ApproxEvaluator,
  type EvaluateOptions,
  type FeatureFlags,
  type ScalarComparisonResult,
  type TestableAsF64,
  type VectorComparisonResult,
} from "@approx-eq/engine";

import {
  assertScalarEqApprox,
  assertScalarNeApprox,
  assertVectorEqApprox,
  assertVectorNeApprox,
} from "./assertions.js";
import { DEFAULT_ASSERTION_EVALUATOR } from "./defaults.js";

export type CreateApproxOptions = {
  /** Evaluator used when a call passes none. Defaults to {@link DEFAULT_ASSERTION_EVALUATOR}. */
  defaultEvaluator?: ApproxEvaluator;
  /** Feature flags. When omitted they are resolved from `env`. */
  features?: FeatureFlags;
  env?: Record<string, string | undefined>;
  onWarning?: (message: string) => void;
};

type Scalar = TestableAsF64;
type Vector = ArrayLike<TestableAsF64>;

export type Approx = {
  readonly defaultEvaluator: ApproxEvaluator;
  readonly features: Readonly<FeatureFlags>;
  evaluateScalarEqApprox(expected: Scalar, actual: Scalar, evaluator?: ApproxEvaluator): ScalarComparisonResult;
  evaluateVectorEqApprox(expected: Vector, actual: Vector, evaluator?: ApproxEvaluator): VectorComparisonResult;
  assertScalarEqApprox(expected: Scalar, actual: Scalar, evaluator?: ApproxEvaluator): void;
  assertScalarNeApprox(expected: Scalar, actual: Scalar, evaluator?: ApproxEvaluator): void;
  assertVectorEqApprox(expected: Vector, actual: Vector, evaluator?: ApproxEvaluator): void;
  assertVectorNeApprox(expected: Vector, actual: Vector, evaluator?: ApproxEvaluator): void;
};

/**
 * Bind the engines and assertions to one configuration, so a test suite
 * picks its default evaluator and feature flags once.
 *
 * Accepts the `config` returned by `loadConfig()` directly.
 */
export function createApprox(opts: CreateApproxOptions = {}): Approx {
  const defaultEvaluator = opts.defaultEvaluator ?? DEFAULT_ASSERTION_EVALUATOR;
  const features = Object.freeze({
    ...(opts.features ?? resolveFeatureFlags(opts.env ?? process.env, { onWarning: opts.onWarning })),
  });
  const options: EvaluateOptions = { nanEquality: features.nanEquality };

  return Object.freeze({
    defaultEvaluator,
    features,
    evaluateScalarEqApprox: (expected: Scalar, actual: Scalar, evaluator?: ApproxEvaluator) =>
      evaluateScalarEqApprox(expected, actual, evaluator ?? defaultEvaluator, options),
    evaluateVectorEqApprox: (expected: Vector, actual: Vector, evaluator?: ApproxEvaluator) =>
      evaluateVectorEqApprox(expected, actual, evaluator ?? defaultEvaluator, options),
    assertScalarEqApprox: (expected: Scalar, actual: Scalar, evaluator?: ApproxEvaluator) =>
      assertScalarEqApprox(expected, actual, evaluator ?? defaultEvaluator, options),
    assertScalarNeApprox: (expected: Scalar, actual: Scalar, evaluator?: ApproxEvaluator) =>
      assertScalarNeApprox(expected, actual, evaluator ?? defaultEvaluator, options),
    assertVectorEqApprox: (expected: Vector, actual: Vector, evaluator?: ApproxEvaluator) =>
      assertVectorEqApprox(expected, actual, evaluator ?? defaultEvaluator, options),
    assertVectorNeApprox: (expected: Vector, actual: Vector, evaluator?: ApproxEvaluator) =>
      assertVectorNeApprox(expected, actual, evaluator ?? defaultEvaluator, options),
  });
}
