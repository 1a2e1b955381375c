import type { ApproxEvaluator, FeatureFlags } from "@approx-eq/engine";

export const DEFAULT_CONFIG_FILE = "approx-eq.yml";

export const KNOWN_CONFIG_KEYS = ["schemaVersion", "features", "defaultEvaluator"] as const;

export interface ApproxEqConfig {
  schemaVersion: 1;
  features: FeatureFlags;
  defaultEvaluator: ApproxEvaluator;
}
