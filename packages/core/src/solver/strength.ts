/**
 * packages/core/src/solver/strength.ts — Conventional Cassowary strengths.
 *
 * The engine passes strengths through untouched; these are the values adapters built
 * on a Cassowary tableau expect, and `Strength.required` is the numeric engine's
 * default. Each tier is weighted a thousand times the one below it.
 */

function clampTier(value: number): number {
  return Math.max(0, Math.min(1000, value));
}

export function createStrength(strong: number, medium: number, weak: number, weight = 1): number {
  return (
    clampTier(strong * weight) * 1_000_000 +
    clampTier(medium * weight) * 1_000 +
    clampTier(weak * weight)
  );
}

export const Strength = Object.freeze({
  required: createStrength(1000, 1000, 1000),
  strong: createStrength(1, 0, 0),
  medium: createStrength(0, 1, 0),
  weak: createStrength(0, 0, 1),
});

/** Limits a strength to the `[0, required]` range, for adapters that need it bounded. */
export function clipStrength(value: number): number {
  return Math.max(0, Math.min(Strength.required, value));
}
