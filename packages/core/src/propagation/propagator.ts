/**
 * packages/core/src/propagation/propagator.ts — Installed constraint registry and
 * constant update propagation.
 *
 * Why: The propagator is the authority for "what must be re-sent to the solver when a
 * constant changes". It keeps each constraint's original definition, so a constant
 * update relinearizes affected constraints without the caller resubmitting them, and
 * coalesces the whole update into a single re-optimization.
 */

import type { ConstantTable } from "../constants/table.js";
import type { ConstantId, ConstantInput, ConstantUpdate, Result } from "../constants/types.js";
import { describeResolutionFault } from "../errors.js";
import { formatDefinition } from "../linear/format.js";
import { linearize } from "../linear/linearize.js";
import { collectDefinitionConstants } from "../linear/nodes.js";
import type { ConstraintDefinition, LinearConstraint, LinearizeFault } from "../linear/types.js";
import type { Infeasible, SolverAdapter } from "../solver/adapter.js";
import type { DevLogger } from "../warnings.js";
import type {
  ConstantFault,
  ConstraintHandle,
  ConstraintSnapshot,
  PropagationReport,
} from "./types.js";

export type PropagatorOptions = Readonly<{
  constantOnlyConstraints: "throw" | "skip";
  equalityTolerance: number;
  logger: DevLogger;
}>;

type SolverSlot<T> = Readonly<{ kind: "installed"; token: T }> | Readonly<{ kind: "detached" }>;

type ConstraintEntry<T, S> = {
  readonly handle: ConstraintHandle;
  readonly definition: ConstraintDefinition;
  readonly strength: S;
  readonly constants: ReadonlySet<ConstantId>;
  linear: LinearConstraint<S> | null;
  slot: SolverSlot<T>;
};

const DETACHED: Readonly<{ kind: "detached" }> = Object.freeze({ kind: "detached" });
const EMPTY_HANDLES: ReadonlySet<ConstraintHandle> = Object.freeze(new Set<ConstraintHandle>());

/**
 * Strengths of type `S` are never inspected; each constraint's strength reaches the
 * adapter exactly as it was passed to `add`.
 */
export class UpdatePropagator<T, S = number> {
  readonly #table: ConstantTable;
  readonly #solver: SolverAdapter<T, S>;
  readonly #options: PropagatorOptions;
  #entries = new Map<ConstraintHandle, ConstraintEntry<T, S>>();
  #byConstant = new Map<ConstantId, Set<ConstraintHandle>>();
  #nextHandle = 1;

  constructor(table: ConstantTable, solver: SolverAdapter<T, S>, options: PropagatorOptions) {
    this.#table = table;
    this.#solver = solver;
    this.#options = options;
  }

  get size(): number {
    return this.#entries.size;
  }

  add(
    definition: ConstraintDefinition,
    strength: S,
  ): Result<ConstraintHandle, LinearizeFault | Infeasible> {
    const res = this.#linearize(definition, strength);
    if (!res.ok) {
      if (res.fatal.code === "NO_VARIABLES" && this.#options.constantOnlyConstraints === "skip") {
        const handle = this.#register(definition, strength, null, DETACHED);
        this.#options.logger.warn(
          "constraints",
          `detached:${String(handle)}`,
          `Constraint ${String(handle)} (${this.#format(definition)}) has no decision variables; it is tracked but not sent to the solver.`,
        );
        return { ok: true, value: handle };
      }
      return res;
    }

    const installed = this.#solver.install(res.value);
    if (!installed.ok) return installed;
    const handle = this.#register(definition, strength, res.value, {
      kind: "installed",
      token: installed.value,
    });
    return { ok: true, value: handle };
  }

  remove(handle: ConstraintHandle): boolean {
    const entry = this.#entries.get(handle);
    if (entry === undefined) return false;
    if (entry.slot.kind === "installed") {
      this.#solver.remove(entry.slot.token);
    } else {
      this.#options.logger.forget("constraints", `detached:${String(handle)}`);
    }
    for (const id of entry.constants) {
      const handles = this.#byConstant.get(id);
      if (handles === undefined) continue;
      handles.delete(handle);
      if (handles.size === 0) this.#byConstant.delete(id);
    }
    this.#entries.delete(handle);
    return true;
  }

  has(handle: ConstraintHandle): boolean {
    return this.#entries.has(handle);
  }

  linearOf(handle: ConstraintHandle): LinearConstraint<S> | undefined {
    return this.#entries.get(handle)?.linear ?? undefined;
  }

  handlesFor(id: ConstantId): ReadonlySet<ConstraintHandle> {
    return this.#byConstant.get(id) ?? EMPTY_HANDLES;
  }

  snapshot(): readonly ConstraintSnapshot<S>[] {
    const out: ConstraintSnapshot<S>[] = [];
    for (const entry of this.#entries.values()) {
      out.push(
        Object.freeze({
          handle: entry.handle,
          definition: entry.definition,
          strength: entry.strength,
          linear: entry.linear,
          installed: entry.slot.kind === "installed",
          constants: entry.constants,
        }),
      );
    }
    return Object.freeze(out);
  }

  /**
   * Redefines a constant, then relinearizes and replaces every installed constraint
   * that used a constant whose value changed. `onTableUpdate` runs once the table
   * has accepted the new definition, before any constraint is touched.
   *
   * A relinearization failure stops the sweep: constraints already replaced stay
   * replaced, the failing one keeps its previous form, and no re-optimization runs.
   */
  setConstant(
    id: ConstantId,
    input: ConstantInput,
    onTableUpdate?: (update: ConstantUpdate) => void,
  ): Result<PropagationReport, ConstantFault | Infeasible> {
    const updated = this.#table.set(id, input);
    if (!updated.ok) return updated;
    const update = updated.value;
    onTableUpdate?.(update);

    for (const warning of update.warnings) {
      this.#options.logger.warn(
        "constants",
        `dependent:${String(warning.id)}:${warning.fault.code}`,
        `Constant "${this.#table.labelOf(warning.id)}" is unresolved after "${this.#table.labelOf(id)}" changed: ${describeResolutionFault(warning.fault, this.#table)}`,
      );
    }

    const affected = new Set<ConstraintHandle>();
    for (const change of update.changed) {
      for (const handle of this.handlesFor(change.id)) affected.add(handle);
    }
    const ordered = [...affected].sort((a, b) => a - b);

    const relinearized: ConstraintHandle[] = [];
    let touchedSolver = false;
    for (const handle of ordered) {
      const entry = this.#entries.get(handle);
      if (entry === undefined) continue;
      const res = this.#linearize(entry.definition, entry.strength);

      if (!res.ok) {
        if (res.fatal.code === "NO_VARIABLES" && this.#options.constantOnlyConstraints === "skip") {
          if (entry.slot.kind === "installed") {
            this.#solver.remove(entry.slot.token);
            entry.slot = DETACHED;
            touchedSolver = true;
          }
          entry.linear = null;
          relinearized.push(handle);
          continue;
        }
        return { ok: false, fatal: { code: "RELINEARIZATION_FAILED", handle, cause: res.fatal } };
      }

      if (entry.slot.kind === "installed") {
        const replaced = this.#solver.replace(entry.slot.token, res.value);
        if (!replaced.ok) return replaced;
      } else {
        const installed = this.#solver.install(res.value);
        if (!installed.ok) return installed;
        entry.slot = { kind: "installed", token: installed.value };
      }
      entry.linear = res.value;
      touchedSolver = true;
      relinearized.push(handle);
    }

    if (touchedSolver) {
      const optimized = this.#solver.reoptimize();
      if (!optimized.ok) return optimized;
    }

    return {
      ok: true,
      value: {
        update,
        relinearized: Object.freeze(relinearized),
        reoptimized: touchedSolver,
      },
    };
  }

  #linearize(
    definition: ConstraintDefinition,
    strength: S,
  ): Result<LinearConstraint<S>, LinearizeFault> {
    return linearize(definition, strength, this.#table, {
      equalityTolerance: this.#options.equalityTolerance,
    });
  }

  #register(
    definition: ConstraintDefinition,
    strength: S,
    linear: LinearConstraint<S> | null,
    slot: SolverSlot<T>,
  ): ConstraintHandle {
    const handle = this.#nextHandle;
    this.#nextHandle++;
    const constants = collectDefinitionConstants(definition);
    this.#entries.set(handle, { handle, definition, strength, constants, linear, slot });
    for (const id of constants) {
      const handles = this.#byConstant.get(id);
      if (handles === undefined) {
        this.#byConstant.set(id, new Set([handle]));
      } else {
        handles.add(handle);
      }
    }
    return handle;
  }

  #format(definition: ConstraintDefinition): string {
    return formatDefinition(definition, { labelOf: (id) => this.#table.labelOf(id) });
  }
}
