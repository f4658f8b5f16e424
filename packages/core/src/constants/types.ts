/**
 * packages/core/src/constants/types.ts — Constant table and scalar expression model.
 *
 * Why: Shared contract between the scalar evaluator, the constant table, and the
 * dependency evaluator. Nothing here knows about decision variables.
 */

export type ConstantId = number;
export type BinaryOp = "+" | "-" | "*" | "/";

export type ScalarNode =
  | Readonly<{ kind: "literal"; value: number }>
  | Readonly<{ kind: "constant"; id: ConstantId }>
  | Readonly<{ kind: "binary"; op: BinaryOp; left: ScalarNode; right: ScalarNode }>;

export type ConstantDefinition =
  | Readonly<{ kind: "unset" }>
  | Readonly<{ kind: "literal"; value: number }>
  | Readonly<{ kind: "formula"; expr: ScalarNode }>;

/** Accepted by `set`: a bare number is shorthand for a literal definition. */
export type ConstantInput = number | ScalarNode;

export type EvalFault =
  | Readonly<{ code: "UNRESOLVED_CONSTANT"; id: ConstantId }>
  | Readonly<{ code: "DIVIDE_BY_ZERO" }>
  | Readonly<{ code: "NON_FINITE_RESULT"; value: number }>;

export type ConstantNotSetFault = Readonly<{ code: "CONSTANT_NOT_SET"; id: ConstantId }>;

export type UnresolvedDependencyFault = Readonly<{
  code: "UNRESOLVED_DEPENDENCY";
  missing: ConstantId;
  whileSetting: ConstantId;
}>;

export type DivisionByZeroFault = Readonly<{ code: "DIVISION_BY_ZERO"; id: ConstantId }>;

export type UnknownConstantFault = Readonly<{
  code: "UNKNOWN_CONSTANT";
  id: ConstantId;
  whileSetting: ConstantId;
}>;

export type SelfReferenceFault = Readonly<{ code: "SELF_REFERENCE"; id: ConstantId }>;

export type NonFiniteValueFault = Readonly<{
  code: "NON_FINITE_VALUE";
  id: ConstantId;
  value: number;
}>;

/** Failures of constant definition and resolution (the table never partially writes). */
export type ResolutionFault =
  | ConstantNotSetFault
  | UnresolvedDependencyFault
  | DivisionByZeroFault
  | UnknownConstantFault
  | SelfReferenceFault
  | NonFiniteValueFault;

export type Result<T, F> = Readonly<{ ok: true; value: T }> | Readonly<{ ok: false; fatal: F }>;

export type ConstantChange = Readonly<{
  id: ConstantId;
  previous: number | undefined;
  value: number | undefined;
}>;

/** A dependent that could not be re-resolved after an upstream change; it is now unresolved. */
export type DependentWarning = Readonly<{
  id: ConstantId;
  fault: ResolutionFault;
}>;

export type ConstantUpdate = Readonly<{
  id: ConstantId;
  value: number;
  /** Constants whose cached value differs from before the call, in evaluation order. */
  changed: readonly ConstantChange[];
  warnings: readonly DependentWarning[];
}>;

/** Read-only view of the table used by the evaluator and the linearizer. */
export interface ConstantView {
  has(id: ConstantId): boolean;
  valueOf(id: ConstantId): number | undefined;
  labelOf(id: ConstantId): string;
  definitionOf(id: ConstantId): ConstantDefinition;
  dependentsOf(id: ConstantId): ReadonlySet<ConstantId>;
  referencesOf(id: ConstantId): ReadonlySet<ConstantId>;
}
