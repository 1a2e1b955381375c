import { formatFloat } from "@approx-eq/core";
import type { EvaluatorInfo, ScalarComparisonResult, VectorComparisonResult } from "@approx-eq/engine";

import type { Polarity } from "./errors.js";

export function formatEvaluatorParams(info: EvaluatorInfo): string {
  const parts: string[] = [];
  if (info.margin !== undefined) parts.push(`margin=${formatFloat(info.margin)}`);
  if (info.multiplier !== undefined) parts.push(`multiplier=${formatFloat(info.multiplier)}`);
  return parts.length > 0 ? parts.join(", ") : `evaluator=${info.kind}`;
}

function formatOperands(result: ScalarComparisonResult): string {
  const base = `expected=${formatFloat(result.expected)}, actual=${formatFloat(result.actual)}`;
  return result.outcome === "not-equal" ? `${base}, diff=${formatFloat(result.diff)}` : base;
}

export function formatScalarFailure(result: ScalarComparisonResult, polarity: Polarity): string {
  const what = polarity === "equal" ? "equality" : "inequality";
  return `failed to verify approximate ${what}: ${formatOperands(result)}, ${formatEvaluatorParams(result.evaluator)}`;
}

export function formatVectorFailure(result: VectorComparisonResult, polarity: Polarity): string {
  const params = formatEvaluatorParams(result.evaluator);

  if (polarity === "not-equal") {
    return `failed to verify approximate inequality for vectors: all ${result.expectedLength} elements are approximately equal, ${params}`;
  }

  if (result.lengthMismatch) {
    return `failed to verify approximate equality for vectors: expected-length ${result.expectedLength} differs from actual-length ${result.actualLength}`;
  }

  const lines = [
    `failed to verify approximate equality for vectors: ${result.unequalIndices.length} of ${result.expectedLength} elements differ, first at index ${String(result.firstUnequalIndex)}, ${params}`,
  ];
  for (const i of result.unequalIndices) {
    const element = result.perIndex[i];
    if (element === undefined) continue;
    lines.push(`  [${i}] ${formatOperands(element)}`);
  }
  return lines.join("\n");
}
