/**
 * packages/core/src/linear/nodes.ts — Expression builders.
 *
 * Why: Programmatic construction of constant formulas and constraint expressions.
 * Builders return frozen nodes; combining only scalar operands yields a scalar node,
 * which `setConstant` accepts as a formula.
 */

import { constantRef, literal } from "../constants/scalar.js";
import type { BinaryOp, ConstantId, ScalarNode } from "../constants/types.js";
import type {
  ConstraintDefinition,
  ConstraintNode,
  Operand,
  Relation,
  ScalarOperand,
  VariableId,
} from "./types.js";

function toNode(operand: Operand): ConstraintNode {
  return typeof operand === "number" ? literal(operand) : operand;
}

function binary(op: BinaryOp, left: Operand, right: Operand): ConstraintNode {
  return Object.freeze({ kind: "binary", op, left: toNode(left), right: toNode(right) });
}

export function lit(value: number): ScalarNode {
  return literal(value);
}

export function ref(id: ConstantId): ScalarNode {
  return constantRef(id);
}

export function v(id: VariableId): ConstraintNode {
  return Object.freeze({ kind: "variable", id });
}

export function add(left: ScalarOperand, right: ScalarOperand): ScalarNode;
export function add(left: Operand, right: Operand): ConstraintNode;
export function add(left: Operand, right: Operand): ConstraintNode {
  return binary("+", left, right);
}

export function sub(left: ScalarOperand, right: ScalarOperand): ScalarNode;
export function sub(left: Operand, right: Operand): ConstraintNode;
export function sub(left: Operand, right: Operand): ConstraintNode {
  return binary("-", left, right);
}

export function mul(left: ScalarOperand, right: ScalarOperand): ScalarNode;
export function mul(left: Operand, right: Operand): ConstraintNode;
export function mul(left: Operand, right: Operand): ConstraintNode {
  return binary("*", left, right);
}

export function div(left: ScalarOperand, right: ScalarOperand): ScalarNode;
export function div(left: Operand, right: Operand): ConstraintNode;
export function div(left: Operand, right: Operand): ConstraintNode {
  return binary("/", left, right);
}

export function constraint(lhs: Operand, relation: Relation, rhs: Operand): ConstraintDefinition {
  return Object.freeze({ lhs: toNode(lhs), relation, rhs: toNode(rhs) });
}

export function eq(lhs: Operand, rhs: Operand): ConstraintDefinition {
  return constraint(lhs, "==", rhs);
}

export function le(lhs: Operand, rhs: Operand): ConstraintDefinition {
  return constraint(lhs, "<=", rhs);
}

export function ge(lhs: Operand, rhs: Operand): ConstraintDefinition {
  return constraint(lhs, ">=", rhs);
}

function collectInto(node: ConstraintNode, out: Set<ConstantId>): void {
  switch (node.kind) {
    case "constant":
      out.add(node.id);
      return;
    case "binary":
      collectInto(node.left, out);
      collectInto(node.right, out);
      return;
    default:
      return;
  }
}

/** Every constant referenced on either side of `definition`. */
export function collectDefinitionConstants(definition: ConstraintDefinition): ReadonlySet<ConstantId> {
  const out = new Set<ConstantId>();
  collectInto(definition.lhs, out);
  collectInto(definition.rhs, out);
  return out;
}
