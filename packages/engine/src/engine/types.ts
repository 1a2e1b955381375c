import type { EvaluatorInfo } from "../evaluators/types.js";

export type EvaluateOptions = {
  /**
   * Treat NaN vs NaN as equal (the `nan-equality` feature). Defaults to false.
   *
   * NaN against any other value is unequal either way.
   */
  nanEquality?: boolean;
};

export type ScalarComparisonResult =
  | {
      outcome: "equal";
      /** True when the operands are identical (or both NaN under `nanEquality`). */
      exact: boolean;
      expected: number;
      actual: number;
      evaluator: EvaluatorInfo;
    }
  | {
      outcome: "not-equal";
      /** `|actual - expected|`, or NaN when either operand is NaN. Diagnostic only. */
      diff: number;
      expected: number;
      actual: number;
      evaluator: EvaluatorInfo;
    };

export type VectorComparisonResult = {
  outcome: "equal" | "not-equal";
  /** One entry per index, in input order. Empty on a length mismatch. */
  perIndex: readonly ScalarComparisonResult[];
  lengthMismatch: boolean;
  expectedLength: number;
  actualLength: number;
  /** Ascending indices whose scalar comparison is `not-equal`. */
  unequalIndices: readonly number[];
  firstUnequalIndex: number | undefined;
  evaluator: EvaluatorInfo;
};
