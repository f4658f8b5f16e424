/**
 * packages/core/src/propagation/types.ts — Registry and propagation result shapes.
 */

import type { ConstantId, ConstantUpdate, ResolutionFault } from "../constants/types.js";
import type { ConstraintDefinition, LinearConstraint, LinearizeFault } from "../linear/types.js";

/** Install sequence number; handles compare in install order. */
export type ConstraintHandle = number;

export type RelinearizationFailedFault = Readonly<{
  code: "RELINEARIZATION_FAILED";
  handle: ConstraintHandle;
  cause: LinearizeFault;
}>;

export type ConstantFault = ResolutionFault | RelinearizationFailedFault;

export type PropagationReport = Readonly<{
  update: ConstantUpdate;
  /** Constraints recomputed by this call, in install order. */
  relinearized: readonly ConstraintHandle[];
  /** Whether the solver was asked to re-optimize (at most once per call). */
  reoptimized: boolean;
}>;

export type ConstraintSnapshot<S = number> = Readonly<{
  handle: ConstraintHandle;
  definition: ConstraintDefinition;
  strength: S;
  /** Current linear form; `null` for a detached constant-only constraint. */
  linear: LinearConstraint<S> | null;
  installed: boolean;
  constants: ReadonlySet<ConstantId>;
}>;
