/**
 * packages/core/src/constants/evaluator.ts — Constant resolution and dependent sweeps.
 *
 * Why: Resolves a single definition against the table, and re-resolves the transitive
 * dependents of a changed constant in dependency order.
 */

import { type ConstantLookup, evaluateScalar } from "./scalar.js";
import type {
  ConstantDefinition,
  ConstantId,
  ConstantView,
  DependentWarning,
  EvalFault,
  ResolutionFault,
  Result,
} from "./types.js";

export type SweepResult = Readonly<{
  /** Dependents in the order they were re-resolved. */
  order: readonly ConstantId[];
  /** New cached value per dependent; `undefined` when re-resolution failed. */
  values: ReadonlyMap<ConstantId, number | undefined>;
  warnings: readonly DependentWarning[];
}>;

const EMPTY_IDS: readonly ConstantId[] = Object.freeze([]);

function mapEvalFault(id: ConstantId, fault: EvalFault): ResolutionFault {
  switch (fault.code) {
    case "UNRESOLVED_CONSTANT":
      return { code: "UNRESOLVED_DEPENDENCY", missing: fault.id, whileSetting: id };
    case "DIVIDE_BY_ZERO":
      return { code: "DIVISION_BY_ZERO", id };
    case "NON_FINITE_RESULT":
      return { code: "NON_FINITE_VALUE", id, value: fault.value };
  }
}

export function resolveDefinition(
  id: ConstantId,
  definition: ConstantDefinition,
  lookup: ConstantLookup,
): Result<number, ResolutionFault> {
  switch (definition.kind) {
    case "unset":
      return { ok: false, fatal: { code: "CONSTANT_NOT_SET", id } };
    case "literal":
      if (!Number.isFinite(definition.value)) {
        return { ok: false, fatal: { code: "NON_FINITE_VALUE", id, value: definition.value } };
      }
      return { ok: true, value: definition.value };
    case "formula": {
      const res = evaluateScalar(definition.expr, lookup);
      if (!res.ok) return { ok: false, fatal: mapEvalFault(id, res.fatal) };
      return res;
    }
  }
}

export function resolveConstant(
  id: ConstantId,
  view: ConstantView,
  lookup: ConstantLookup = (ref) => view.valueOf(ref),
): Result<number, ResolutionFault> {
  return resolveDefinition(id, view.definitionOf(id), lookup);
}

/** Breadth-first walk of the dependent index; `root` itself is excluded. */
export function collectDependentClosure(root: ConstantId, view: ConstantView): readonly ConstantId[] {
  const first = view.dependentsOf(root);
  if (first.size === 0) return EMPTY_IDS;

  const seen = new Set<ConstantId>([root]);
  const queue: ConstantId[] = [];
  for (const dep of first) {
    seen.add(dep);
    queue.push(dep);
  }
  let head = 0;
  while (head < queue.length) {
    const id = queue[head];
    head++;
    if (id === undefined) continue;
    for (const dep of view.dependentsOf(id)) {
      if (seen.has(dep)) continue;
      seen.add(dep);
      queue.push(dep);
    }
  }
  return Object.freeze(queue);
}

function takeLowest(ready: ConstantId[]): ConstantId | undefined {
  let bestIndex = -1;
  let best: ConstantId | undefined;
  for (let i = 0; i < ready.length; i++) {
    const id = ready[i];
    if (id === undefined) continue;
    if (best === undefined || id < best) {
      best = id;
      bestIndex = i;
    }
  }
  if (bestIndex >= 0) ready.splice(bestIndex, 1);
  return best;
}

/**
 * Orders a dependent closure so each constant comes after every closure member it
 * references. Ties resolve by declaration order.
 */
export function orderClosure(
  closure: readonly ConstantId[],
  view: ConstantView,
): readonly ConstantId[] {
  if (closure.length <= 1) return closure;

  const members = new Set<ConstantId>(closure);
  const inDegree = new Map<ConstantId, number>();
  for (const id of closure) {
    let degree = 0;
    for (const ref of view.referencesOf(id)) {
      if (members.has(ref)) degree++;
    }
    inDegree.set(id, degree);
  }

  const ready: ConstantId[] = [];
  for (const id of closure) {
    if ((inDegree.get(id) ?? 0) === 0) ready.push(id);
  }

  const ordered: ConstantId[] = [];
  while (ready.length > 0) {
    const id = takeLowest(ready);
    if (id === undefined) break;
    ordered.push(id);
    for (const dep of view.dependentsOf(id)) {
      const degree = inDegree.get(dep);
      if (degree === undefined) continue;
      inDegree.set(dep, degree - 1);
      if (degree - 1 === 0) ready.push(dep);
    }
  }

  if (ordered.length < closure.length) {
    const placed = new Set<ConstantId>(ordered);
    const rest = closure.filter((id) => !placed.has(id)).sort((a, b) => a - b);
    ordered.push(...rest);
  }
  return Object.freeze(ordered);
}

/**
 * Re-resolves every transitive dependent of `root` against `staged` (values already
 * decided during this update) and the table. `staged` is extended in place.
 */
export function sweepDependents(
  root: ConstantId,
  view: ConstantView,
  staged: Map<ConstantId, number | undefined>,
): SweepResult {
  const order = orderClosure(collectDependentClosure(root, view), view);
  const values = new Map<ConstantId, number | undefined>();
  const warnings: DependentWarning[] = [];
  const lookup: ConstantLookup = (id) => (staged.has(id) ? staged.get(id) : view.valueOf(id));

  for (const id of order) {
    const res = resolveConstant(id, view, lookup);
    const next = res.ok ? res.value : undefined;
    if (!res.ok) warnings.push({ id, fault: res.fatal });
    staged.set(id, next);
    values.set(id, next);
  }

  return { order, values, warnings: Object.freeze(warnings) };
}
