/**
 * packages/core/src/constants/table.ts — Constant table and dependent index.
 *
 * Why: Owns every constant record. Resolution is call-ordered: a formula may only
 * reference constants that are already resolved when `set` runs, so definitions can
 * never form a cycle and no topological sort of definitions is needed.
 */

import { collectDependentClosure, resolveDefinition, sweepDependents } from "./evaluator.js";
import { collectConstantRefs } from "./scalar.js";
import type {
  ConstantChange,
  ConstantDefinition,
  ConstantId,
  ConstantInput,
  ConstantUpdate,
  ConstantView,
  ResolutionFault,
  Result,
} from "./types.js";

type ConstantRecord = {
  readonly id: ConstantId;
  readonly label: string;
  definition: ConstantDefinition;
  value: number | undefined;
  references: ReadonlySet<ConstantId>;
  readonly dependents: Set<ConstantId>;
};

const UNSET: ConstantDefinition = Object.freeze({ kind: "unset" });
const EMPTY_SET: ReadonlySet<ConstantId> = Object.freeze(new Set<ConstantId>());
const EMPTY_WARNINGS = Object.freeze([]);

function fail(fatal: ResolutionFault): Readonly<{ ok: false; fatal: ResolutionFault }> {
  return { ok: false, fatal };
}

export function toDefinition(input: ConstantInput): ConstantDefinition {
  if (typeof input === "number") return Object.freeze({ kind: "literal", value: input });
  if (input.kind === "literal") return Object.freeze({ kind: "literal", value: input.value });
  return Object.freeze({ kind: "formula", expr: input });
}

export class ConstantTable implements ConstantView {
  #records = new Map<ConstantId, ConstantRecord>();
  #labels = new Map<string, ConstantId[]>();
  #nextId = 1;

  get size(): number {
    return this.#records.size;
  }

  declare(label: string): ConstantId {
    const id = this.#nextId;
    this.#nextId++;
    this.#records.set(id, {
      id,
      label,
      definition: UNSET,
      value: undefined,
      references: EMPTY_SET,
      dependents: new Set<ConstantId>(),
    });
    const group = this.#labels.get(label);
    if (group === undefined) {
      this.#labels.set(label, [id]);
    } else {
      group.push(id);
    }
    return id;
  }

  has(id: ConstantId): boolean {
    return this.#records.has(id);
  }

  ids(): readonly ConstantId[] {
    return Object.freeze([...this.#records.keys()]);
  }

  valueOf(id: ConstantId): number | undefined {
    return this.#records.get(id)?.value;
  }

  labelOf(id: ConstantId): string {
    return this.#records.get(id)?.label ?? `#${String(id)}`;
  }

  definitionOf(id: ConstantId): ConstantDefinition {
    return this.#records.get(id)?.definition ?? UNSET;
  }

  dependentsOf(id: ConstantId): ReadonlySet<ConstantId> {
    return this.#records.get(id)?.dependents ?? EMPTY_SET;
  }

  referencesOf(id: ConstantId): ReadonlySet<ConstantId> {
    return this.#records.get(id)?.references ?? EMPTY_SET;
  }

  /** Every constant declared under `label`, in declaration order. */
  findByLabel(label: string): readonly ConstantId[] {
    const group = this.#labels.get(label);
    return group === undefined ? Object.freeze([]) : Object.freeze(group.slice());
  }

  set(id: ConstantId, input: ConstantInput): Result<ConstantUpdate, ResolutionFault> {
    const record = this.#records.get(id);
    if (record === undefined) return fail({ code: "UNKNOWN_CONSTANT", id, whileSetting: id });

    const definition = toDefinition(input);
    let references: ReadonlySet<ConstantId> = EMPTY_SET;
    if (definition.kind === "formula") {
      references = collectConstantRefs(definition.expr);
      if (references.has(id)) return fail({ code: "SELF_REFERENCE", id });
      for (const ref of references) {
        if (!this.#records.has(ref)) {
          return fail({ code: "UNKNOWN_CONSTANT", id: ref, whileSetting: id });
        }
      }
    }

    // Dependents of `id` were resolved after it; they are not visible to its new definition.
    const hidden = new Set<ConstantId>(collectDependentClosure(id, this));
    const resolved = resolveDefinition(id, definition, (ref) =>
      hidden.has(ref) ? undefined : this.valueOf(ref),
    );
    if (!resolved.ok) return resolved;

    const previous = record.value;
    this.#relink(record, references);
    record.definition = definition;
    record.value = resolved.value;

    if (Object.is(previous, resolved.value)) {
      return {
        ok: true,
        value: { id, value: resolved.value, changed: Object.freeze([]), warnings: EMPTY_WARNINGS },
      };
    }

    const changed: ConstantChange[] = [{ id, previous, value: resolved.value }];
    const staged = new Map<ConstantId, number | undefined>([[id, resolved.value]]);
    const sweep = sweepDependents(id, this, staged);
    for (const depId of sweep.order) {
      const dep = this.#records.get(depId);
      if (dep === undefined) continue;
      const before = dep.value;
      const after = sweep.values.get(depId);
      dep.value = after;
      if (!Object.is(before, after)) changed.push({ id: depId, previous: before, value: after });
    }

    return {
      ok: true,
      value: {
        id,
        value: resolved.value,
        changed: Object.freeze(changed),
        warnings: sweep.warnings,
      },
    };
  }

  #relink(record: ConstantRecord, references: ReadonlySet<ConstantId>): void {
    for (const ref of record.references) {
      this.#records.get(ref)?.dependents.delete(record.id);
    }
    for (const ref of references) {
      this.#records.get(ref)?.dependents.add(record.id);
    }
    record.references = references;
  }
}
