import { assertNever } from "@approx-eq/core";

export const KNOWN_FEATURES = ["nan-equality", "null-feature"] as const;

export type FeatureName = (typeof KNOWN_FEATURES)[number];

export type FeatureFlags = {
  /** NaN compares equal to NaN in the scalar and vector engines. */
  nanEquality: boolean;
  /** Has no effect. Lets driver scripts always pass some feature. */
  nullFeature: boolean;
};

/** Environment variable holding a comma/space separated feature list. */
export const FEATURES_ENV_VAR = "APPROX_EQ_FEATURES";

export const DEFAULT_FEATURES: Readonly<FeatureFlags> = Object.freeze({
  nanEquality: false,
  nullFeature: false,
});

export type FeatureOptions = {
  /**
   * Warning hook for unknown feature names.
   *
   * When not provided, warnings fall back to `console.warn` (if available).
   */
  onWarning?: (message: string) => void;
};

const defaultOnWarning = (message: string): void => {
  if (typeof console !== "undefined" && typeof console.warn === "function") {
    console.warn(message);
  }
};

export function isKnownFeature(name: string): name is FeatureName {
  return (KNOWN_FEATURES as readonly string[]).includes(name);
}

/** Build flags from a list of feature names. Unknown names are warned about and ignored. */
export function featureFlagsFrom(names: Iterable<string>, options: FeatureOptions = {}): FeatureFlags {
  const onWarning = options.onWarning ?? defaultOnWarning;
  const flags: FeatureFlags = { ...DEFAULT_FEATURES };
  const unknown: string[] = [];

  for (const name of names) {
    if (!isKnownFeature(name)) {
      unknown.push(name);
      continue;
    }
    switch (name) {
      case "nan-equality":
        flags.nanEquality = true;
        break;
      case "null-feature":
        flags.nullFeature = true;
        break;
      default:
        assertNever(name, "Unhandled feature");
    }
  }

  if (unknown.length > 0) {
    onWarning(`approx-eq: unknown feature(s): ${unknown.sort().join(", ")} (ignoring)`);
  }

  return flags;
}

/** Parse `"nan-equality, null-feature"` style lists (commas and/or whitespace). */
export function parseFeatureList(raw: string, options: FeatureOptions = {}): FeatureFlags {
  const names = raw
    .split(/[\s,]+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return featureFlagsFrom(names, options);
}

/** Resolve feature flags from {@link FEATURES_ENV_VAR}; all off when it is unset. */
export function resolveFeatureFlags(
  env: Record<string, string | undefined> = process.env,
  options: FeatureOptions = {},
): FeatureFlags {
  const raw = env[FEATURES_ENV_VAR];
  if (raw === undefined) return { ...DEFAULT_FEATURES };
  return parseFeatureList(raw, options);
}
