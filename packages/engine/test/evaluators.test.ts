import { describe, expect, it } from "vitest";

import { InvalidConfigurationError } from "../src/errors.js";
import { margin, MarginEvaluator } from "../src/evaluators/margin.js";
import { multiplier } from "../src/evaluators/multiplier.js";
import type { ApproxEvaluator } from "../src/evaluators/types.js";
import { describeEvaluator, isBuiltinEvaluatorKind } from "../src/evaluators/types.js";
import { zeroMarginOrMultiplier } from "../src/evaluators/zeroMarginOrMultiplier.js";

const SAMPLES = [0, -0, 1, -1, 0.5, 3, 3.0001, -40404, 1e-9, 1e9, 123.456];

// |x - y| <= tol, evaluated as x - tol <= y <= x + tol.
function inRange(x: number, y: number, tol: number): boolean {
  return x - tol <= y && y <= x + tol;
}

describe("margin", () => {
  it("is reflexive", () => {
    for (const m of [0, 0.0001, 1, Infinity]) {
      const ev = margin(m);
      for (const x of [...SAMPLES, Infinity, -Infinity]) {
        expect(ev.decide(x, x)).toBe(true);
      }
    }
  });

  it("matches |x - y| <= m for finite pairs", () => {
    for (const m of [0, 0.0001, 0.5, 2]) {
      const ev = margin(m);
      for (const x of SAMPLES) {
        for (const y of SAMPLES) {
          expect(ev.decide(x, y)).toBe(inRange(x, y, m));
        }
      }
    }
  });

  it("treats the bound as inclusive", () => {
    expect(margin(0.0001).decide(3.0, 3.0001)).toBe(true);
    expect(margin(0.5).decide(1, 1.5)).toBe(true);
    expect(margin(0.5).decide(1, 1.5000001)).toBe(false);
  });

  it("is symmetric", () => {
    const ev = margin(0.25);
    expect(ev.decide(1, 1.25)).toBe(true);
    expect(ev.decide(1.25, 1)).toBe(true);
    expect(ev.decide(1, 1.3)).toBe(false);
    expect(ev.decide(1.3, 1)).toBe(false);
  });

  it("requires exact equality with a zero margin", () => {
    const ev = margin(0);
    expect(ev.decide(1, 1)).toBe(true);
    expect(ev.decide(1, 1 + Number.EPSILON)).toBe(false);
  });

  it("accepts everything finite with an infinite margin, but not opposite infinities", () => {
    const ev = margin(Infinity);
    expect(ev.decide(-1e300, 1e300)).toBe(true);
    expect(ev.decide(0, Infinity)).toBe(true);
    expect(ev.decide(0, -Infinity)).toBe(true);
    expect(ev.decide(-Infinity, Infinity)).toBe(false);
    expect(ev.decide(Infinity, -Infinity)).toBe(false);
  });

  it("rejects infinities against a finite margin", () => {
    expect(margin(1).decide(0, Infinity)).toBe(false);
    expect(margin(1).decide(Infinity, 1e308)).toBe(false);
  });

  it("produces frozen instances", () => {
    const ev = margin(0.1);
    expect(ev).toBeInstanceOf(MarginEvaluator);
    expect(Object.isFrozen(ev)).toBe(true);
    expect(ev.kind).toBe("margin");
    expect(ev.margin).toBe(0.1);
  });
});

describe("multiplier", () => {
  it("matches |x - y| <= k * max(|x|, |y|) when not both zero", () => {
    for (const k of [0, 0.00015, 0.01, 0.5]) {
      const ev = multiplier(k);
      for (const x of SAMPLES) {
        for (const y of SAMPLES) {
          if (x === 0 && y === 0) continue;
          expect(ev.decide(x, y)).toBe(inRange(x, y, k * Math.max(Math.abs(x), Math.abs(y))));
        }
      }
    }
  });

  it("treats the bound as inclusive", () => {
    // max(1, 2) * 0.5 = 1
    expect(multiplier(0.5).decide(1, 2)).toBe(true);
    expect(multiplier(0.5).decide(2, 1)).toBe(true);
    expect(multiplier(0.5).decide(1, 2.0000001)).toBe(false);
  });

  it("never accepts a finite value against an infinity", () => {
    expect(multiplier(Infinity).decide(1, Infinity)).toBe(false);
    expect(multiplier(0.5).decide(-Infinity, 1)).toBe(false);
  });

  it("scales with the larger operand", () => {
    const ev = multiplier(0.01);
    // max(100, 101) * 0.01 = 1.01
    expect(ev.decide(100, 101)).toBe(true);
    expect(ev.decide(101, 100)).toBe(true);
    expect(ev.decide(100, 102)).toBe(false);
  });

  it("accepts relative differences within the multiplier", () => {
    const ev = multiplier(0.00015);
    expect(ev.decide(-40404.0, -40410.0)).toBe(true);
    expect(ev.decide(1.23456, 1.234567)).toBe(true);
    expect(ev.decide(-40404.0, -40420.0)).toBe(false);
  });

  it("degenerates to exact equality around zero", () => {
    const ev = multiplier(0.1);
    expect(ev.decide(0, 0)).toBe(true);
    expect(ev.decide(0, -0)).toBe(true);
    // Any non-zero vs zero differs by 100% of the larger magnitude.
    expect(ev.decide(0, 1e-300)).toBe(false);
  });

  it("treats identical infinities as equal", () => {
    expect(multiplier(0.1).decide(Infinity, Infinity)).toBe(true);
    expect(multiplier(0.1).decide(Infinity, -Infinity)).toBe(false);
  });
});

describe("zeroMarginOrMultiplier", () => {
  it("uses the margin when either operand is zero", () => {
    const ev = zeroMarginOrMultiplier(0.001, 0.000001);
    expect(ev.decide(0, 0.0005)).toBe(true);
    expect(ev.decide(0.0005, 0)).toBe(true);
    expect(ev.decide(0, 0.002)).toBe(false);
  });

  it("uses the multiplier otherwise", () => {
    const ev = zeroMarginOrMultiplier(0.001, 0.000001);
    // 0.5 <= 1e-6 * 1000000.5
    expect(ev.decide(1e6, 1e6 + 0.5)).toBe(true);
    // Within the margin, but the margin does not apply away from zero.
    expect(ev.decide(1, 1.0005)).toBe(false);
  });

  it("treats both bounds as inclusive", () => {
    const ev = zeroMarginOrMultiplier(0.5, 0.5);
    expect(ev.decide(0, 0.5)).toBe(true);
    expect(ev.decide(0, -0.5)).toBe(true);
    expect(ev.decide(0, 0.5000001)).toBe(false);
    expect(ev.decide(1, 2)).toBe(true);
    expect(ev.decide(1, 2.0000001)).toBe(false);
  });

  it("agrees with margin(m) whenever expected is zero", () => {
    for (const m of [0, 0.001, 0.5]) {
      const combined = zeroMarginOrMultiplier(m, 0.01);
      const plain = margin(m);
      for (const y of SAMPLES) {
        expect(combined.decide(0, y)).toBe(plain.decide(0, y));
      }
    }
  });

  it("exposes both tolerances", () => {
    expect(describeEvaluator(zeroMarginOrMultiplier(0.1, 0.2))).toEqual({
      kind: "zero-margin-or-multiplier",
      margin: 0.1,
      multiplier: 0.2,
    });
  });
});

describe("factory validation", () => {
  it("rejects negative tolerances at construction time", () => {
    expect(() => margin(-1.0)).toThrow(InvalidConfigurationError);
    expect(() => margin(-1.0)).toThrow("margin must be a non-negative number (got -1)");
    expect(() => multiplier(-0.5)).toThrow("multiplier must be a non-negative number (got -0.5)");
  });

  it("rejects NaN tolerances", () => {
    expect(() => margin(Number.NaN)).toThrow(InvalidConfigurationError);
    expect(() => multiplier(Number.NaN)).toThrow(InvalidConfigurationError);
  });

  it("names the offending parameter", () => {
    try {
      zeroMarginOrMultiplier(0.1, -2);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidConfigurationError);
      if (!(err instanceof InvalidConfigurationError)) return;
      expect(err.name).toBe("InvalidConfigurationError");
      expect(err.parameter).toBe("multiplier");
      expect(err.value).toBe(-2);
    }
  });

  it("accepts zero and infinite tolerances", () => {
    expect(() => margin(0)).not.toThrow();
    expect(() => multiplier(Infinity)).not.toThrow();
    expect(() => zeroMarginOrMultiplier(0, 0)).not.toThrow();
  });
});

describe("describeEvaluator", () => {
  it("snapshots built-in evaluators", () => {
    expect(describeEvaluator(margin(0.25))).toEqual({ kind: "margin", margin: 0.25 });
    expect(describeEvaluator(multiplier(0.5))).toEqual({ kind: "multiplier", multiplier: 0.5 });
  });

  it("describes custom evaluators by kind", () => {
    const sameSign: ApproxEvaluator = {
      kind: "same-sign",
      decide: (expected, actual) => Math.sign(expected) === Math.sign(actual),
    };
    expect(describeEvaluator(sameSign)).toEqual({ kind: "same-sign" });
  });

  it("recognizes built-in kinds", () => {
    expect(isBuiltinEvaluatorKind("margin")).toBe(true);
    expect(isBuiltinEvaluatorKind("zero-margin-or-multiplier")).toBe(true);
    expect(isBuiltinEvaluatorKind("same-sign")).toBe(false);
  });
});
