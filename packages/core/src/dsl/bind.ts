/**
 * packages/core/src/dsl/bind.ts — Name binding for parsed expressions.
 */

import { constantRef, literal, scalarBinary } from "../constants/scalar.js";
import type { ConstantId, ScalarNode } from "../constants/types.js";
import type { ConstraintDefinition, ConstraintNode, VariableId } from "../linear/types.js";
import { type SourceNode, type SourceRelation, formatSourceError } from "./parser.js";

export type NameBinding =
  | Readonly<{ kind: "constant"; id: ConstantId }>
  | Readonly<{ kind: "variable"; id: VariableId }>
  | Readonly<{ kind: "ambiguous"; candidates: readonly ConstantId[] }>
  | Readonly<{ kind: "unknown" }>;

export type NameResolver = (name: string) => NameBinding;

export class ExpressionBindingError extends Error {
  readonly source: string;
  readonly position: number;
  readonly identifier: string;

  constructor(source: string, identifier: string, detail: string, position: number) {
    super(formatSourceError(source, detail, position));
    this.name = "ExpressionBindingError";
    this.source = source;
    this.identifier = identifier;
    this.position = position;
  }
}

type NameNode = Extract<SourceNode, { kind: "name" }>;

function bindingFailure(source: string, node: NameNode, binding: NameBinding): ExpressionBindingError {
  switch (binding.kind) {
    case "ambiguous":
      return new ExpressionBindingError(
        source,
        node.name,
        `Name "${node.name}" matches ${String(binding.candidates.length)} constants`,
        node.position,
      );
    case "variable":
      return new ExpressionBindingError(
        source,
        node.name,
        `"${node.name}" is not a constant; constant formulas cannot reference decision variables`,
        node.position,
      );
    default:
      return new ExpressionBindingError(
        source,
        node.name,
        `Unknown constant "${node.name}"`,
        node.position,
      );
  }
}

const MINUS_ONE = literal(-1);

export function bindScalar(source: string, node: SourceNode, resolve: NameResolver): ScalarNode {
  switch (node.kind) {
    case "number":
      return literal(node.value);
    case "name": {
      const binding = resolve(node.name);
      if (binding.kind !== "constant") throw bindingFailure(source, node, binding);
      return constantRef(binding.id);
    }
    case "negate": {
      const operand = node.operand;
      if (operand.kind === "number") return literal(-operand.value);
      return scalarBinary("*", MINUS_ONE, bindScalar(source, operand, resolve));
    }
    case "binary":
      return scalarBinary(
        node.op,
        bindScalar(source, node.left, resolve),
        bindScalar(source, node.right, resolve),
      );
  }
}

export function bindConstraintNode(
  source: string,
  node: SourceNode,
  resolve: NameResolver,
): ConstraintNode {
  switch (node.kind) {
    case "number":
      return literal(node.value);
    case "name": {
      const binding = resolve(node.name);
      if (binding.kind === "constant") return constantRef(binding.id);
      if (binding.kind === "variable") return Object.freeze({ kind: "variable", id: binding.id });
      throw bindingFailure(source, node, binding);
    }
    case "negate": {
      const operand = node.operand;
      if (operand.kind === "number") return literal(-operand.value);
      return Object.freeze({
        kind: "binary",
        op: "*",
        left: MINUS_ONE,
        right: bindConstraintNode(source, operand, resolve),
      });
    }
    case "binary":
      return Object.freeze({
        kind: "binary",
        op: node.op,
        left: bindConstraintNode(source, node.left, resolve),
        right: bindConstraintNode(source, node.right, resolve),
      });
  }
}

export function bindRelation(
  source: string,
  parsed: SourceRelation,
  resolve: NameResolver,
): ConstraintDefinition {
  return Object.freeze({
    lhs: bindConstraintNode(source, parsed.lhs, resolve),
    relation: parsed.relation,
    rhs: bindConstraintNode(source, parsed.rhs, resolve),
  });
}
