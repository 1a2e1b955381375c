/** Adapter for numeric-like types that can take part in approximate comparisons. */
export interface ToF64 {
  toF64(): number;
}

export type TestableAsF64 = number | bigint | ToF64;

function isToF64(value: unknown): value is ToF64 {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof (value as { toF64?: unknown }).toF64 === "function"
  );
}

/**
 * Convert a comparand to the float64 the engines operate on.
 *
 * Numbers pass through and bigints go through `Number()`. Anything outside
 * {@link TestableAsF64} throws a `TypeError`.
 */
export function testableAsF64(value: TestableAsF64): number {
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (isToF64(value)) {
    const out = value.toF64();
    if (typeof out !== "number") {
      throw new TypeError(`toF64() must return a number (got ${typeof out})`);
    }
    return out;
  }
  throw new TypeError(`value is not testable as f64: ${String(value)}`);
}
