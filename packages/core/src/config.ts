/**
 * packages/core/src/config.ts — Engine configuration and defaults.
 */

import { EngineError } from "./errors.js";
import { DEFAULT_EQUALITY_TOLERANCE } from "./linear/linearize.js";
import { DEFAULT_DEV_MODE, type WarnSink, consoleWarn } from "./warnings.js";

/**
 * What `addConstraint` does with a relation that reduces to no variable terms but
 * holds numerically: `"throw"` rejects it as overconstrained, `"skip"` registers it
 * without sending anything to the solver.
 */
export type ConstantOnlyPolicy = "throw" | "skip";

export type EngineConfig = Readonly<{
  constantOnlyConstraints?: ConstantOnlyPolicy;
  /** Slack for deciding whether a constant-only relation holds. Default `1e-8`. */
  equalityTolerance?: number;
  /** Emit development warnings. Defaults to `NODE_ENV !== "production"`. */
  devMode?: boolean;
  warn?: WarnSink;
}>;

export type ResolvedEngineConfig = Readonly<{
  constantOnlyConstraints: ConstantOnlyPolicy;
  equalityTolerance: number;
  devMode: boolean;
  warn: WarnSink;
}>;

export const DEFAULT_ENGINE_CONFIG: ResolvedEngineConfig = Object.freeze({
  constantOnlyConstraints: "throw",
  equalityTolerance: DEFAULT_EQUALITY_TOLERANCE,
  devMode: DEFAULT_DEV_MODE,
  warn: consoleWarn,
});

function invalidConfig(detail: string): never {
  throw new EngineError("INVALID_CONFIG", detail);
}

function readPolicy(value: unknown): ConstantOnlyPolicy {
  if (value === "throw" || value === "skip") return value;
  return invalidConfig(`constantOnlyConstraints must be "throw" or "skip" (got ${String(value)})`);
}

function requireNonNegativeFinite(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    invalidConfig(`${name} must be a non-negative finite number`);
  }
  return value;
}

/** Apply defaults to user-provided config, validating all values. */
export function resolveEngineConfig(config: EngineConfig | undefined): ResolvedEngineConfig {
  if (!config) return DEFAULT_ENGINE_CONFIG;
  const constantOnlyConstraints =
    config.constantOnlyConstraints === undefined
      ? DEFAULT_ENGINE_CONFIG.constantOnlyConstraints
      : readPolicy(config.constantOnlyConstraints);
  const equalityTolerance =
    config.equalityTolerance === undefined
      ? DEFAULT_ENGINE_CONFIG.equalityTolerance
      : requireNonNegativeFinite("equalityTolerance", config.equalityTolerance);
  const devMode = config.devMode === undefined ? DEFAULT_ENGINE_CONFIG.devMode : config.devMode;
  const warn = typeof config.warn === "function" ? config.warn : DEFAULT_ENGINE_CONFIG.warn;

  return Object.freeze({
    constantOnlyConstraints,
    equalityTolerance,
    devMode,
    warn,
  });
}
