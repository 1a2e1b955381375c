export type { Polarity } from "./errors.js";
export { ApproxAssertionError, ConfigError } from "./errors.js";

export {
  assertScalarEqApprox,
  assertScalarNeApprox,
  assertVectorEqApprox,
  assertVectorNeApprox,
} from "./assertions.js";
export { DEFAULT_ASSERTION_EVALUATOR } from "./defaults.js";
export { formatEvaluatorParams, formatScalarFailure, formatVectorFailure } from "./format.js";

export type { Approx, CreateApproxOptions } from "./createApprox.js";
export { createApprox } from "./createApprox.js";

export type { ApproxEqConfig } from "./config/types.js";
export { DEFAULT_CONFIG_FILE } from "./config/types.js";
export type { LoadConfigOptions, ParseConfigOptions } from "./config/loadConfig.js";
export { loadConfig, parseConfig } from "./config/loadConfig.js";

// The engine surface, so test code needs a single import.
export * from "@approx-eq/engine";
