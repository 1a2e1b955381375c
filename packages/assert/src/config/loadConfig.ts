import fs from "node:fs/promises";
import path from "node:path";

import { assertNever, isRecord } from "@approx-eq/core";
import {
  BUILTIN_EVALUATOR_KINDS,
  DEFAULT_MARGIN,
  DEFAULT_MULTIPLIER,
  InvalidConfigurationError,
  featureFlagsFrom,
  isBuiltinEvaluatorKind,
  margin,
  multiplier,
  zeroMarginOrMultiplier,
  type ApproxEvaluator,
  type BuiltinEvaluatorKind,
  type FeatureFlags,
} from "@approx-eq/engine";
import YAML from "yaml";

import { DEFAULT_ASSERTION_EVALUATOR } from "../defaults.js";
import { ConfigError } from "../errors.js";
import { DEFAULT_CONFIG_FILE, KNOWN_CONFIG_KEYS, type ApproxEqConfig } from "./types.js";

export interface ParseConfigOptions {
  /**
   * Warning hook for ignored keys and unknown feature names.
   *
   * When not provided, warnings fall back to `console.warn` (if available).
   */
  onWarning?: (message: string) => void;
}

export interface LoadConfigOptions extends ParseConfigOptions {
  rootDir: string;
  /** Relative to `rootDir`. Defaults to {@link DEFAULT_CONFIG_FILE}. */
  configPath?: string;
}

const defaultOnWarning = (message: string): void => {
  if (typeof console !== "undefined" && typeof console.warn === "function") {
    console.warn(message);
  }
};

function optionalNumber(value: unknown, field: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new ConfigError(`${field} must be a number`);
  }
  return value;
}

function buildEvaluator(kind: BuiltinEvaluatorKind, marginValue: number, multiplierValue: number): ApproxEvaluator {
  switch (kind) {
    case "margin":
      return margin(marginValue);
    case "multiplier":
      return multiplier(multiplierValue);
    case "zero-margin-or-multiplier":
      return zeroMarginOrMultiplier(marginValue, multiplierValue);
    default:
      return assertNever(kind, "Unhandled evaluator kind");
  }
}

function parseDefaultEvaluator(value: unknown, onWarning: (message: string) => void): ApproxEvaluator {
  if (value === undefined) return DEFAULT_ASSERTION_EVALUATOR;
  if (!isRecord(value)) {
    throw new ConfigError("defaultEvaluator must be an object");
  }

  const kind = value.kind;
  if (typeof kind !== "string" || !isBuiltinEvaluatorKind(kind)) {
    throw new ConfigError(
      `defaultEvaluator.kind must be one of ${BUILTIN_EVALUATOR_KINDS.join(", ")} (got ${String(kind)})`,
    );
  }

  const marginValue = optionalNumber(value.margin, "defaultEvaluator.margin");
  const multiplierValue = optionalNumber(value.multiplier, "defaultEvaluator.multiplier");

  if (kind === "margin" && multiplierValue !== undefined) {
    onWarning("approx-eq: defaultEvaluator.multiplier is ignored for kind margin");
  }
  if (kind === "multiplier" && marginValue !== undefined) {
    onWarning("approx-eq: defaultEvaluator.margin is ignored for kind multiplier");
  }

  try {
    return buildEvaluator(kind, marginValue ?? DEFAULT_MARGIN, multiplierValue ?? DEFAULT_MULTIPLIER);
  } catch (err) {
    if (err instanceof InvalidConfigurationError) {
      throw new ConfigError(`defaultEvaluator.${err.message}`, { cause: err });
    }
    throw err;
  }
}

function parseFeatures(value: unknown, onWarning: (message: string) => void): FeatureFlags {
  if (value === undefined || value === null) return featureFlagsFrom([], { onWarning });
  if (!Array.isArray(value) || !value.every((f): f is string => typeof f === "string")) {
    throw new ConfigError("features must be a string[]");
  }
  return featureFlagsFrom(value, { onWarning });
}

/** Validate raw YAML text. `source` names the file in error and warning messages. */
export function parseConfig(raw: string, source: string, options: ParseConfigOptions = {}): ApproxEqConfig {
  const onWarning = options.onWarning ?? defaultOnWarning;

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML in ${source}: ${msg}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError("config root must be an object");
  }

  const schemaVersion = parsed.schemaVersion;
  if (schemaVersion !== 1) {
    throw new ConfigError(`schemaVersion must be 1 (got ${String(schemaVersion)})`);
  }

  const unknownKeys = Object.keys(parsed).filter((k) => !(KNOWN_CONFIG_KEYS as readonly string[]).includes(k));
  if (unknownKeys.length > 0) {
    onWarning(`approx-eq: unknown key(s) in ${source}: ${unknownKeys.sort().join(", ")} (ignoring)`);
  }

  return {
    schemaVersion: 1,
    features: parseFeatures(parsed.features, onWarning),
    defaultEvaluator: parseDefaultEvaluator(parsed.defaultEvaluator, onWarning),
  };
}

/** Read and validate a YAML config file relative to `rootDir`. */
export async function loadConfig(
  opts: LoadConfigOptions,
): Promise<{ configPath: string; config: ApproxEqConfig }> {
  const configPath = opts.configPath ?? DEFAULT_CONFIG_FILE;
  const absPath = path.resolve(opts.rootDir, configPath);

  let raw: string;
  try {
    raw = await fs.readFile(absPath, "utf8");
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;

    if (code === "ENOENT") {
      throw new ConfigError(`config not found: ${configPath}`, { cause: err });
    }

    if (code === "EACCES" || code === "EPERM") {
      throw new ConfigError(`cannot read config (permission denied): ${configPath}`, { cause: err });
    }

    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`failed to read config ${configPath}: ${msg}`, { cause: err });
  }

  return {
    configPath,
    config: parseConfig(raw, configPath, opts),
  };
}
