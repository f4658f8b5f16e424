/**
 * packages/core/src/linear/types.ts — Constraint expressions and linear forms.
 *
 * Why: Constraint expressions extend the scalar tree with decision-variable leaves.
 * The linearizer reduces them to the `Σ coeff·var + offset REL 0` form a tableau takes.
 */

import type { BinaryOp, ConstantId, ScalarNode } from "../constants/types.js";

export type VariableId = string;
export type Relation = "==" | "<=" | ">=";

export type ConstraintNode =
  | Readonly<{ kind: "literal"; value: number }>
  | Readonly<{ kind: "constant"; id: ConstantId }>
  | Readonly<{ kind: "variable"; id: VariableId }>
  | Readonly<{ kind: "binary"; op: BinaryOp; left: ConstraintNode; right: ConstraintNode }>;

/** Anything the node builders accept as an operand. */
export type Operand = number | ConstraintNode;
export type ScalarOperand = number | ScalarNode;

export type ConstraintDefinition = Readonly<{
  lhs: ConstraintNode;
  relation: Relation;
  rhs: ConstraintNode;
}>;

export type LinearTerm = Readonly<{ variable: VariableId; coefficient: number }>;

export type LinearConstraint<S = number> = Readonly<{
  /** Nonzero terms, in order of first appearance in the definition. */
  terms: readonly LinearTerm[];
  /** Constant part of `lhs - rhs`; the constraint reads `Σ terms + offset REL 0`. */
  offset: number;
  relation: Relation;
  strength: S;
  /** Constants whose resolved values were substituted into this form. */
  constants: ReadonlySet<ConstantId>;
  definition: ConstraintDefinition;
}>;

export type NonlinearFault = Readonly<{
  code: "NONLINEAR";
  operator: "*" | "/";
  detail: string;
}>;

export type NoVariablesFault = Readonly<{ code: "NO_VARIABLES"; offset: number }>;

export type TriviallyUnsatisfiableFault = Readonly<{
  code: "TRIVIALLY_UNSATISFIABLE";
  offset: number;
  relation: Relation;
}>;

export type UnresolvedConstantFault = Readonly<{ code: "UNRESOLVED_CONSTANT"; id: ConstantId }>;

export type LinearDivisionByZeroFault = Readonly<{ code: "DIVISION_BY_ZERO" }>;

export type NonFiniteCoefficientFault = Readonly<{ code: "NON_FINITE_COEFFICIENT"; value: number }>;

export type LinearizeFault =
  | NonlinearFault
  | NoVariablesFault
  | TriviallyUnsatisfiableFault
  | UnresolvedConstantFault
  | LinearDivisionByZeroFault
  | NonFiniteCoefficientFault;
