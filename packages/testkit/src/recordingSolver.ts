import {
  type AdapterResult,
  type LinearConstraint,
  type SolverAdapter,
  infeasible,
} from "@anchorline/core";

export type SolverCall<S = number> =
  | Readonly<{ kind: "install"; token: number; constraint: LinearConstraint<S> }>
  | Readonly<{ kind: "replace"; token: number; constraint: LinearConstraint<S> }>
  | Readonly<{ kind: "remove"; token: number }>
  | Readonly<{ kind: "reoptimize" }>;

export type RecordingSolverOptions<S = number> = Readonly<{
  /** Reject an install or replace with INFEASIBLE when this returns a reason. */
  rejectConstraint?: (constraint: LinearConstraint<S>) => string | null;
}>;

/**
 * In-process stand-in for a tableau solver. Records every call and keeps the current
 * linear form per token; nothing is actually solved.
 */
export type RecordingSolver<S = number> = SolverAdapter<number, S> &
  Readonly<{
    calls: readonly SolverCall<S>[];
    installed: ReadonlyMap<number, LinearConstraint<S>>;
    count(kind: SolverCall<S>["kind"]): number;
    clearCalls(): void;
    /** Makes the next `reoptimize` calls fail until reset with `null`. */
    failReoptimize(detail: string | null): void;
  }>;

export function createRecordingSolver<S = number>(
  opts: RecordingSolverOptions<S> = {},
): RecordingSolver<S> {
  const calls: SolverCall<S>[] = [];
  const installed = new Map<number, LinearConstraint<S>>();
  let nextToken = 1;
  let reoptimizeFailure: string | null = null;

  const rejected = (constraint: LinearConstraint<S>): string | null =>
    opts.rejectConstraint === undefined ? null : opts.rejectConstraint(constraint);

  return {
    calls,
    installed,

    install(constraint: LinearConstraint<S>): AdapterResult<number> {
      const reason = rejected(constraint);
      if (reason !== null) return infeasible(reason);
      const token = nextToken;
      nextToken++;
      installed.set(token, constraint);
      calls.push(Object.freeze({ kind: "install", token, constraint }));
      return { ok: true, value: token };
    },

    replace(token: number, constraint: LinearConstraint<S>): AdapterResult<void> {
      if (!installed.has(token)) throw new Error(`replace: token ${String(token)} is not installed`);
      const reason = rejected(constraint);
      if (reason !== null) return infeasible(reason);
      installed.set(token, constraint);
      calls.push(Object.freeze({ kind: "replace", token, constraint }));
      return { ok: true, value: undefined };
    },

    remove(token: number): void {
      if (!installed.delete(token)) throw new Error(`remove: token ${String(token)} is not installed`);
      calls.push(Object.freeze({ kind: "remove", token }));
    },

    reoptimize(): AdapterResult<void> {
      calls.push(Object.freeze({ kind: "reoptimize" }));
      if (reoptimizeFailure !== null) return infeasible(reoptimizeFailure);
      return { ok: true, value: undefined };
    },

    count(kind: SolverCall<S>["kind"]): number {
      let n = 0;
      for (const call of calls) {
        if (call.kind === kind) n++;
      }
      return n;
    },

    clearCalls(): void {
      calls.length = 0;
    },

    failReoptimize(detail: string | null): void {
      reoptimizeFailure = detail;
    },
  };
}
