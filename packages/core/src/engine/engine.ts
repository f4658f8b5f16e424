/**
 * packages/core/src/engine/engine.ts — Caller-facing constant engine.
 *
 * Why: Wires the constant table, linearizer, and update propagator to one solver
 * adapter, and converts internal faults into thrown errors. All calls are synchronous
 * and must come from the thread that owns the solver.
 */

import { type ResolvedEngineConfig, type EngineConfig, resolveEngineConfig } from "../config.js";
import { resolveConstant } from "../constants/evaluator.js";
import { ConstantTable } from "../constants/table.js";
import type {
  ConstantDefinition,
  ConstantId,
  ConstantInput,
  ConstantUpdate,
  ScalarNode,
} from "../constants/types.js";
import { type NameResolver, bindRelation, bindScalar } from "../dsl/bind.js";
import { expressionSource, relationSource } from "../dsl/expr.js";
import {
  ConstantError,
  InfeasibleError,
  LinearizeError,
  describeConstantFault,
  describeLinearizeFault,
} from "../errors.js";
import { formatDefinition, formatLinearConstraint, formatNumber, formatScalar } from "../linear/format.js";
import { constraint } from "../linear/nodes.js";
import type {
  ConstraintDefinition,
  LinearConstraint,
  LinearizeFault,
  Operand,
  Relation,
} from "../linear/types.js";
import { UpdatePropagator } from "../propagation/propagator.js";
import type {
  ConstantFault,
  ConstraintHandle,
  ConstraintSnapshot,
  PropagationReport,
} from "../propagation/types.js";
import type { Infeasible, SolverAdapter } from "../solver/adapter.js";
import { Strength } from "../solver/strength.js";
import { createDevLogger } from "../warnings.js";

export type ConstantChangeEvent = Readonly<{
  /** The constant passed to `setConstant`. */
  source: ConstantId;
  changes: readonly Readonly<{
    id: ConstantId;
    label: string;
    previous: number | undefined;
    value: number | undefined;
  }>[];
}>;

export type ConstantChangeListener = (event: ConstantChangeEvent) => void;

export type ConstantInspection = Readonly<{
  id: ConstantId;
  label: string;
  kind: ConstantDefinition["kind"];
  /** Rendered definition; `null` while unset. */
  definition: string | null;
  value: number | undefined;
  dependents: readonly ConstantId[];
  constraints: readonly ConstraintHandle[];
}>;

export type ConstraintInspection<S = number> = ConstraintSnapshot<S> &
  Readonly<{
    text: string;
    linearText: string | null;
  }>;

export type EngineInspection<S = number> = Readonly<{
  constants: readonly ConstantInspection[];
  constraints: readonly ConstraintInspection<S>[];
}>;

export type ConstantEngineOptions<T, S = number> = Readonly<{
  solver: SolverAdapter<T, S>;
  config?: EngineConfig;
  /** Strength used when a constraint is added without one. Default `Strength.required`. */
  defaultStrength?: S;
}>;

/** Options for an adapter whose strengths are not numbers; the default must be given. */
export type StrengthEngineOptions<T, S> = ConstantEngineOptions<T, S> &
  Readonly<{ defaultStrength: S }>;

/**
 * Strengths are opaque: whatever the caller passes (or the default) reaches the
 * adapter unchanged, and any clipping or mapping is the adapter's business.
 */
export interface ConstantEngine<S = number> {
  readonly config: ResolvedEngineConfig;
  declareConstant(label: string): ConstantId;
  /**
   * Defines (or redefines) a constant from a number, a scalar formula, or formula
   * source such as `"base * 2"`. Referenced constants must already be set.
   */
  setConstant(id: ConstantId, value: number | ScalarNode | string): PropagationReport;
  addConstraint(lhs: Operand, relation: Relation, rhs: Operand, strength?: S): ConstraintHandle;
  addConstraintDefinition(definition: ConstraintDefinition, strength?: S): ConstraintHandle;
  /**
   * Parses `"width == aspectRatio * height"`. Names matching a declared constant label
   * bind to that constant; every other name is a decision variable.
   */
  addConstraintSource(source: string, strength?: S): ConstraintHandle;
  removeConstraint(handle: ConstraintHandle): boolean;
  valueOf(id: ConstantId): number | undefined;
  /** Like `valueOf`, but throws `ConstantError` when the constant is unresolved. */
  requireValue(id: ConstantId): number;
  findConstant(label: string): ConstantId | undefined;
  linearOf(handle: ConstraintHandle): LinearConstraint<S> | undefined;
  onConstantChange(listener: ConstantChangeListener): () => void;
  inspect(): EngineInspection<S>;
}

/** Engine over an adapter with numeric (Cassowary-style) strengths. */
export function createConstantEngine<T>(opts: ConstantEngineOptions<T>): ConstantEngine {
  const config = resolveEngineConfig(opts.config);
  return buildEngine(opts.solver, config, opts.defaultStrength ?? Strength.required);
}

/** Engine over an adapter with its own strength type, such as named priorities. */
export function createStrengthEngine<T, S>(opts: StrengthEngineOptions<T, S>): ConstantEngine<S> {
  return buildEngine(opts.solver, resolveEngineConfig(opts.config), opts.defaultStrength);
}

function buildEngine<T, S>(
  solver: SolverAdapter<T, S>,
  config: ResolvedEngineConfig,
  defaultStrength: S,
): ConstantEngine<S> {
  const logger = createDevLogger(config.devMode, config.warn);
  const table = new ConstantTable();
  const propagator = new UpdatePropagator<T, S>(table, solver, {
    constantOnlyConstraints: config.constantOnlyConstraints,
    equalityTolerance: config.equalityTolerance,
    logger,
  });
  const listeners = new Set<ConstantChangeListener>();

  const constantFailure = (fault: ConstantFault): ConstantError =>
    new ConstantError(fault, describeConstantFault(fault, table));

  const linearizeFailure = (fault: LinearizeFault): LinearizeError =>
    new LinearizeError(fault, describeLinearizeFault(fault, table));

  const resolveName =
    (variablesAllowed: boolean): NameResolver =>
    (name) => {
      const ids = table.findByLabel(name);
      const first = ids[0];
      if (ids.length === 1 && first !== undefined) return { kind: "constant", id: first };
      if (ids.length > 1) return { kind: "ambiguous", candidates: ids };
      return variablesAllowed ? { kind: "variable", id: name } : { kind: "unknown" };
    };

  const toInput = (value: number | ScalarNode | string): ConstantInput => {
    if (typeof value !== "string") return value;
    return bindScalar(value, expressionSource(value), resolveName(false));
  };

  const readStrength = (strength: S | undefined): S =>
    strength === undefined ? defaultStrength : strength;

  const emit = (source: ConstantId, update: ConstantUpdate): void => {
    if (update.changed.length === 0 || listeners.size === 0) return;
    const event: ConstantChangeEvent = Object.freeze({
      source,
      changes: Object.freeze(
        update.changed.map((change) =>
          Object.freeze({
            id: change.id,
            label: table.labelOf(change.id),
            previous: change.previous,
            value: change.value,
          }),
        ),
      ),
    });
    for (const listener of [...listeners]) listener(event);
  };

  const failSetConstant = (fault: ConstantFault | Infeasible): never => {
    if (fault.code === "INFEASIBLE") throw new InfeasibleError(fault);
    throw constantFailure(fault);
  };

  const addConstraintDefinition = (
    definition: ConstraintDefinition,
    strength?: S,
  ): ConstraintHandle => {
    const res = propagator.add(definition, readStrength(strength));
    if (res.ok) return res.value;
    if (res.fatal.code === "INFEASIBLE") throw new InfeasibleError(res.fatal);
    throw linearizeFailure(res.fatal);
  };

  const describeDefinition = (definition: ConstantDefinition): string | null => {
    switch (definition.kind) {
      case "unset":
        return null;
      case "literal":
        return formatNumber(definition.value);
      case "formula":
        return formatScalar(definition.expr, { labelOf: (id) => table.labelOf(id) });
    }
  };

  return {
    config,

    declareConstant(label: string): ConstantId {
      return table.declare(label);
    },

    setConstant(id: ConstantId, value: number | ScalarNode | string): PropagationReport {
      const input = toInput(value);
      const applied: { update: ConstantUpdate | null } = { update: null };
      const res = propagator.setConstant(id, input, (update) => {
        applied.update = update;
      });
      if (applied.update !== null) emit(id, applied.update);
      if (!res.ok) return failSetConstant(res.fatal);
      return res.value;
    },

    addConstraint(
      lhs: Operand,
      relation: Relation,
      rhs: Operand,
      strength?: S,
    ): ConstraintHandle {
      return addConstraintDefinition(constraint(lhs, relation, rhs), strength);
    },

    addConstraintDefinition,

    addConstraintSource(source: string, strength?: S): ConstraintHandle {
      const definition = bindRelation(source, relationSource(source), resolveName(true));
      return addConstraintDefinition(definition, strength);
    },

    removeConstraint(handle: ConstraintHandle): boolean {
      return propagator.remove(handle);
    },

    valueOf(id: ConstantId): number | undefined {
      return table.valueOf(id);
    },

    requireValue(id: ConstantId): number {
      const cached = table.valueOf(id);
      if (cached !== undefined) return cached;
      const res = resolveConstant(id, table);
      if (!res.ok) throw constantFailure(res.fatal);
      return res.value;
    },

    findConstant(label: string): ConstantId | undefined {
      const ids = table.findByLabel(label);
      return ids.length === 1 ? ids[0] : undefined;
    },

    linearOf(handle: ConstraintHandle): LinearConstraint<S> | undefined {
      return propagator.linearOf(handle);
    },

    onConstantChange(listener: ConstantChangeListener): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    inspect(): EngineInspection<S> {
      const labelOf = (id: ConstantId): string => table.labelOf(id);
      const constants = table.ids().map((id) =>
        Object.freeze({
          id,
          label: table.labelOf(id),
          kind: table.definitionOf(id).kind,
          definition: describeDefinition(table.definitionOf(id)),
          value: table.valueOf(id),
          dependents: Object.freeze([...table.dependentsOf(id)].sort((a, b) => a - b)),
          constraints: Object.freeze([...propagator.handlesFor(id)].sort((a, b) => a - b)),
        }),
      );
      const constraints = propagator.snapshot().map((entry) =>
        Object.freeze({
          ...entry,
          text: formatDefinition(entry.definition, { labelOf }),
          linearText: entry.linear === null ? null : formatLinearConstraint(entry.linear),
        }),
      );
      return Object.freeze({
        constants: Object.freeze(constants),
        constraints: Object.freeze(constraints),
      });
    },
  };
}
