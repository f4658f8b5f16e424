/**
 * packages/core/src/solver/adapter.ts — Boundary to the tableau solver.
 *
 * Why: The engine never pivots or solves. It hands finished linear forms to whatever
 * tableau implementation backs it and asks for one re-optimization per update.
 *
 * `T` is the adapter's own token for an installed constraint; `S` is the strength type
 * the adapter understands (opaque to the engine).
 */

import type { Result } from "../constants/types.js";
import type { LinearConstraint } from "../linear/types.js";

export type Infeasible = Readonly<{
  code: "INFEASIBLE";
  detail: string;
}>;

export type AdapterResult<T> = Result<T, Infeasible>;

export interface SolverAdapter<T = unknown, S = number> {
  install(constraint: LinearConstraint<S>): AdapterResult<T>;
  /** Swaps the coefficients of a previously installed constraint in place. */
  replace(token: T, constraint: LinearConstraint<S>): AdapterResult<void>;
  remove(token: T): void;
  /** Re-derives variable values after structural or coefficient changes. */
  reoptimize(): AdapterResult<void>;
}

export function infeasible(detail: string): Readonly<{ ok: false; fatal: Infeasible }> {
  return { ok: false, fatal: { code: "INFEASIBLE", detail } };
}
