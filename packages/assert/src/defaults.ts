import {
  DEFAULT_MARGIN,
  DEFAULT_MULTIPLIER,
  zeroMarginOrMultiplier,
  type ApproxEvaluator,
} from "@approx-eq/engine";

/**
 * Evaluator the `assert*Approx` helpers and `createApprox` use when a call
 * passes none: `DEFAULT_MULTIPLIER` relative tolerance, `DEFAULT_MARGIN`
 * when either operand is zero.
 *
 * The engines on their own default to `margin(DEFAULT_MARGIN)`.
 */
export const DEFAULT_ASSERTION_EVALUATOR: ApproxEvaluator = zeroMarginOrMultiplier(DEFAULT_MARGIN, DEFAULT_MULTIPLIER);
