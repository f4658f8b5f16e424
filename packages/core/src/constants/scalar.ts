/**
 * packages/core/src/constants/scalar.ts — Scalar expression nodes and evaluator.
 *
 * Why: Constant formulas are immutable trees over literals and constant references.
 * Evaluation is pure; caching lives in the constant table.
 */

import type { BinaryOp, ConstantId, EvalFault, Result, ScalarNode } from "./types.js";

export type ConstantLookup = (id: ConstantId) => number | undefined;

export function literal(value: number): ScalarNode {
  return Object.freeze({ kind: "literal", value });
}

export function constantRef(id: ConstantId): ScalarNode {
  return Object.freeze({ kind: "constant", id });
}

export function scalarBinary(op: BinaryOp, left: ScalarNode, right: ScalarNode): ScalarNode {
  return Object.freeze({ kind: "binary", op, left, right });
}

function fail(fatal: EvalFault): Readonly<{ ok: false; fatal: EvalFault }> {
  return { ok: false, fatal };
}

function applyBinary(op: BinaryOp, a: number, b: number): Result<number, EvalFault> {
  if (op === "/" && b === 0) return fail({ code: "DIVIDE_BY_ZERO" });
  const out = op === "+" ? a + b : op === "-" ? a - b : op === "*" ? a * b : a / b;
  if (!Number.isFinite(out)) return fail({ code: "NON_FINITE_RESULT", value: out });
  return { ok: true, value: out };
}

export function evaluateScalar(node: ScalarNode, lookup: ConstantLookup): Result<number, EvalFault> {
  switch (node.kind) {
    case "literal":
      if (!Number.isFinite(node.value)) {
        return fail({ code: "NON_FINITE_RESULT", value: node.value });
      }
      return { ok: true, value: node.value };
    case "constant": {
      const value = lookup(node.id);
      if (value === undefined) return fail({ code: "UNRESOLVED_CONSTANT", id: node.id });
      return { ok: true, value };
    }
    case "binary": {
      const left = evaluateScalar(node.left, lookup);
      if (!left.ok) return left;
      const right = evaluateScalar(node.right, lookup);
      if (!right.ok) return right;
      return applyBinary(node.op, left.value, right.value);
    }
  }
}

function collectInto(node: ScalarNode, out: Set<ConstantId>): void {
  switch (node.kind) {
    case "literal":
      return;
    case "constant":
      out.add(node.id);
      return;
    case "binary":
      collectInto(node.left, out);
      collectInto(node.right, out);
      return;
  }
}

export function collectConstantRefs(node: ScalarNode): ReadonlySet<ConstantId> {
  const out = new Set<ConstantId>();
  collectInto(node, out);
  return out;
}
