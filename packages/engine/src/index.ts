export { DEFAULT_MARGIN, DEFAULT_MULTIPLIER } from "./constants.js";
export { InvalidConfigurationError } from "./errors.js";

export type { TestableAsF64, ToF64 } from "./convert/toF64.js";
export { testableAsF64 } from "./convert/toF64.js";

export type { ApproxEvaluator, BuiltinEvaluatorKind, EvaluatorInfo } from "./evaluators/types.js";
export { BUILTIN_EVALUATOR_KINDS, describeEvaluator, isBuiltinEvaluatorKind } from "./evaluators/types.js";
export { MarginEvaluator, margin } from "./evaluators/margin.js";
export { MultiplierEvaluator, multiplier } from "./evaluators/multiplier.js";
export { ZeroMarginOrMultiplierEvaluator, zeroMarginOrMultiplier } from "./evaluators/zeroMarginOrMultiplier.js";

export type { EvaluateOptions, ScalarComparisonResult, VectorComparisonResult } from "./engine/types.js";
export { DEFAULT_EVALUATOR, evaluateScalarEqApprox } from "./engine/scalar.js";
export { evaluateVectorEqApprox } from "./engine/vector.js";

export type { FeatureFlags, FeatureName, FeatureOptions } from "./config/features.js";
export {
  DEFAULT_FEATURES,
  FEATURES_ENV_VAR,
  KNOWN_FEATURES,
  featureFlagsFrom,
  isKnownFeature,
  parseFeatureList,
  resolveFeatureFlags,
} from "./config/features.js";
