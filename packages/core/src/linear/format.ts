/**
 * packages/core/src/linear/format.ts — Human-readable rendering for diagnostics.
 */

import type { BinaryOp, ConstantId, ScalarNode } from "../constants/types.js";
import type { ConstraintDefinition, ConstraintNode, LinearConstraint } from "./types.js";

export type FormatOptions = Readonly<{
  /** Fraction digits kept for non-integer numbers (trailing zeros dropped). */
  precision?: number;
  labelOf?: (id: ConstantId) => string;
}>;

const DEFAULT_PRECISION = 4;

function precedence(op: BinaryOp): number {
  return op === "+" || op === "-" ? 1 : 2;
}

export function formatNumber(value: number, precision = DEFAULT_PRECISION): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toFixed(precision)));
}

function formatNode(
  node: ConstraintNode,
  labelOf: (id: ConstantId) => string,
  precision: number,
): string {
  switch (node.kind) {
    case "literal":
      return formatNumber(node.value, precision);
    case "constant":
      return labelOf(node.id);
    case "variable":
      return node.id;
    case "binary":
      break;
  }

  const op = node.op;
  const own = precedence(op);
  const wrap = (child: ConstraintNode, isRight: boolean): string => {
    const text = formatNode(child, labelOf, precision);
    if (child.kind !== "binary") return text;
    const childPrec = precedence(child.op);
    const needsParens =
      childPrec < own || (isRight && childPrec === own && (op === "-" || op === "/"));
    return needsParens ? `(${text})` : text;
  };
  return `${wrap(node.left, false)} ${op} ${wrap(node.right, true)}`;
}

function defaultLabel(id: ConstantId): string {
  return `#${String(id)}`;
}

export function formatConstraintNode(node: ConstraintNode, opts: FormatOptions = {}): string {
  return formatNode(node, opts.labelOf ?? defaultLabel, opts.precision ?? DEFAULT_PRECISION);
}

export function formatScalar(node: ScalarNode, opts: FormatOptions = {}): string {
  return formatConstraintNode(node, opts);
}

export function formatDefinition(definition: ConstraintDefinition, opts: FormatOptions = {}): string {
  return `${formatConstraintNode(definition.lhs, opts)} ${definition.relation} ${formatConstraintNode(definition.rhs, opts)}`;
}

export function formatLinearConstraint(
  linear: LinearConstraint<unknown>,
  opts: FormatOptions = {},
): string {
  const precision = opts.precision ?? DEFAULT_PRECISION;
  const parts: string[] = [];
  for (const term of linear.terms) {
    const magnitude = Math.abs(term.coefficient);
    const body =
      magnitude === 1 ? term.variable : `${formatNumber(magnitude, precision)} * ${term.variable}`;
    if (parts.length === 0) {
      parts.push(term.coefficient < 0 ? `-${body}` : body);
    } else {
      parts.push(term.coefficient < 0 ? `- ${body}` : `+ ${body}`);
    }
  }
  if (linear.offset !== 0) {
    const magnitude = formatNumber(Math.abs(linear.offset), precision);
    parts.push(linear.offset < 0 ? `- ${magnitude}` : `+ ${magnitude}`);
  }
  return `${parts.join(" ")} ${linear.relation} 0`;
}
