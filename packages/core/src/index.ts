export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/** Narrow an unknown (e.g. parsed YAML) value to a non-null object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Render a float for diagnostics. Like `String(n)`, but `-0` keeps its sign. */
export function formatFloat(value: number): string {
  if (Object.is(value, -0)) return "-0";
  return String(value);
}
