/**
 * packages/core/src/linear/linearize.ts — Constraint linearization.
 *
 * Why: Substitutes resolved constant values into a constraint definition and reduces it
 * to `Σ coeff·var + offset REL 0`. Products of two variable-bearing subtrees and
 * division by a variable-bearing subtree are rejected; a relation left with no
 * variable term cannot be handed to a tableau and is rejected as well.
 */

import type { ConstantId, ConstantView, Result } from "../constants/types.js";
import type {
  ConstraintDefinition,
  ConstraintNode,
  LinearConstraint,
  LinearTerm,
  LinearizeFault,
  Relation,
  VariableId,
} from "./types.js";

export const DEFAULT_EQUALITY_TOLERANCE = 1e-8;

export type LinearizeOptions = Readonly<{
  /** Slack used when deciding whether a constant-only relation holds. */
  equalityTolerance?: number;
}>;

type LinearForm = Readonly<{
  terms: ReadonlyMap<VariableId, number>;
  offset: number;
  /** A decision variable occurs in the subtree, even if its terms cancelled. */
  variable: boolean;
}>;

type LinearizeContext = Readonly<{
  view: Pick<ConstantView, "valueOf">;
  constants: Set<ConstantId>;
}>;

type FormResult = Result<LinearForm, LinearizeFault>;

const NO_TERMS: ReadonlyMap<VariableId, number> = new Map<VariableId, number>();

function fail(fatal: LinearizeFault): Readonly<{ ok: false; fatal: LinearizeFault }> {
  return { ok: false, fatal };
}

function combine(left: LinearForm, right: LinearForm, sign: 1 | -1): LinearForm {
  const terms = new Map<VariableId, number>(left.terms);
  for (const [variable, coefficient] of right.terms) {
    terms.set(variable, (terms.get(variable) ?? 0) + sign * coefficient);
  }
  return {
    terms,
    offset: left.offset + sign * right.offset,
    variable: left.variable || right.variable,
  };
}

function scale(form: LinearForm, factor: number, mode: "multiply" | "divide"): LinearForm {
  const apply = (value: number): number => (mode === "multiply" ? value * factor : value / factor);
  const terms = new Map<VariableId, number>();
  for (const [variable, coefficient] of form.terms) {
    terms.set(variable, apply(coefficient));
  }
  return { terms, offset: apply(form.offset), variable: form.variable };
}

function constantFactor(form: LinearForm): Result<number, LinearizeFault> {
  if (!Number.isFinite(form.offset)) {
    return fail({ code: "NON_FINITE_COEFFICIENT", value: form.offset });
  }
  return { ok: true, value: form.offset };
}

/**
 * Each subtree is visited once; its form records whether it holds a variable, which
 * decides how a product or quotient above it combines.
 */
function linearizeNode(node: ConstraintNode, ctx: LinearizeContext): FormResult {
  switch (node.kind) {
    case "literal":
      return { ok: true, value: { terms: NO_TERMS, offset: node.value, variable: false } };
    case "constant": {
      ctx.constants.add(node.id);
      const value = ctx.view.valueOf(node.id);
      if (value === undefined) return fail({ code: "UNRESOLVED_CONSTANT", id: node.id });
      return { ok: true, value: { terms: NO_TERMS, offset: value, variable: false } };
    }
    case "variable":
      return { ok: true, value: { terms: new Map([[node.id, 1]]), offset: 0, variable: true } };
    case "binary":
      break;
  }

  const { op } = node;
  const left = linearizeNode(node.left, ctx);
  if (!left.ok) return left;
  const right = linearizeNode(node.right, ctx);
  if (!right.ok) return right;

  if (op === "+" || op === "-") {
    return { ok: true, value: combine(left.value, right.value, op === "+" ? 1 : -1) };
  }

  if (op === "/") {
    if (right.value.variable) {
      return fail({
        code: "NONLINEAR",
        operator: "/",
        detail: "divisor contains a decision variable",
      });
    }
    const divisor = constantFactor(right.value);
    if (!divisor.ok) return divisor;
    if (divisor.value === 0) return fail({ code: "DIVISION_BY_ZERO" });
    return { ok: true, value: scale(left.value, divisor.value, "divide") };
  }

  if (left.value.variable && right.value.variable) {
    return fail({
      code: "NONLINEAR",
      operator: "*",
      detail: "product of two decision-variable expressions",
    });
  }
  const other = left.value.variable ? left.value : right.value;
  const factor = constantFactor(left.value.variable ? right.value : left.value);
  if (!factor.ok) return factor;
  return { ok: true, value: scale(other, factor.value, "multiply") };
}

export function relationHolds(offset: number, relation: Relation, tolerance: number): boolean {
  switch (relation) {
    case "==":
      return Math.abs(offset) <= tolerance;
    case "<=":
      return offset <= tolerance;
    case ">=":
      return offset >= -tolerance;
  }
}

export function linearize<S>(
  definition: ConstraintDefinition,
  strength: S,
  view: Pick<ConstantView, "valueOf">,
  options: LinearizeOptions = {},
): Result<LinearConstraint<S>, LinearizeFault> {
  const ctx: LinearizeContext = { view, constants: new Set<ConstantId>() };
  const lhs = linearizeNode(definition.lhs, ctx);
  if (!lhs.ok) return lhs;
  const rhs = linearizeNode(definition.rhs, ctx);
  if (!rhs.ok) return rhs;

  const reduced = combine(lhs.value, rhs.value, -1);
  // `+ 0` folds negative zero.
  const offset = reduced.offset + 0;
  if (!Number.isFinite(offset)) return fail({ code: "NON_FINITE_COEFFICIENT", value: offset });

  const terms: LinearTerm[] = [];
  for (const [variable, coefficient] of reduced.terms) {
    if (!Number.isFinite(coefficient)) {
      return fail({ code: "NON_FINITE_COEFFICIENT", value: coefficient });
    }
    if (coefficient === 0) continue;
    terms.push(Object.freeze({ variable, coefficient }));
  }

  if (terms.length === 0) {
    const tolerance = options.equalityTolerance ?? DEFAULT_EQUALITY_TOLERANCE;
    if (!relationHolds(offset, definition.relation, tolerance)) {
      return fail({ code: "TRIVIALLY_UNSATISFIABLE", offset, relation: definition.relation });
    }
    return fail({ code: "NO_VARIABLES", offset });
  }

  return {
    ok: true,
    value: Object.freeze({
      terms: Object.freeze(terms),
      offset,
      relation: definition.relation,
      strength,
      constants: Object.freeze(ctx.constants),
      definition,
    }),
  };
}
