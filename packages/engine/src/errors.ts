/**
 * Thrown by the evaluator factories when a tolerance is not a non-negative number.
 *
 * Raised at construction time only; comparisons never throw it.
 */
export class InvalidConfigurationError extends Error {
  override name = "InvalidConfigurationError";

  readonly parameter: string;
  readonly value: number;

  constructor(parameter: string, value: number, options?: { cause?: unknown }) {
    super(`${parameter} must be a non-negative number (got ${String(value)})`, options);
    this.parameter = parameter;
    this.value = value;
  }
}
