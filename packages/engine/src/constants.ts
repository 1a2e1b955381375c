/** Absolute tolerance used when no evaluator is supplied. */
export const DEFAULT_MARGIN = 0.0001;

/** Relative tolerance paired with {@link DEFAULT_MARGIN} by `zeroMarginOrMultiplier`-based defaults. */
export const DEFAULT_MULTIPLIER = 0.000001;
