/**
 * Strategy deciding whether two float64 values are approximately equal.
 *
 * Implement this to plug a custom tolerance policy into the engines. `margin`
 * and `multiplier` are optional and only feed failure diagnostics; an
 * evaluator reporting neither is described by its `kind`.
 */
export interface ApproxEvaluator {
  readonly kind: string;
  readonly margin?: number;
  readonly multiplier?: number;
  /** Must be pure: same inputs, same answer, no side effects. */
  decide(expected: number, actual: number): boolean;
}

export type BuiltinEvaluatorKind = "margin" | "multiplier" | "zero-margin-or-multiplier";

export const BUILTIN_EVALUATOR_KINDS: readonly BuiltinEvaluatorKind[] = [
  "margin",
  "multiplier",
  "zero-margin-or-multiplier",
];

export function isBuiltinEvaluatorKind(value: string): value is BuiltinEvaluatorKind {
  return (BUILTIN_EVALUATOR_KINDS as readonly string[]).includes(value);
}

/** Plain-data snapshot of an evaluator, carried by comparison results. */
export type EvaluatorInfo = {
  kind: string;
  margin?: number;
  multiplier?: number;
};

export function describeEvaluator(evaluator: ApproxEvaluator): EvaluatorInfo {
  const info: EvaluatorInfo = { kind: evaluator.kind };
  if (typeof evaluator.margin === "number") info.margin = evaluator.margin;
  if (typeof evaluator.multiplier === "number") info.multiplier = evaluator.multiplier;
  return info;
}
