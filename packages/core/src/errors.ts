/**
 * packages/core/src/errors.ts — Thrown error classes and fault messages.
 *
 * Internal layers return `{ ok: false, fatal }` results; the engine facade turns each
 * fault into one of the classes below. The original fault stays available on `fault`.
 */

import type { ConstantId, ResolutionFault } from "./constants/types.js";
import { formatNumber } from "./linear/format.js";
import type { LinearizeFault } from "./linear/types.js";
import type { ConstantFault } from "./propagation/types.js";
import type { Infeasible } from "./solver/adapter.js";

export type EngineErrorCode =
  | "INVALID_CONFIG"
  | ConstantFault["code"]
  | LinearizeFault["code"]
  | Infeasible["code"];

export type FaultContext = Readonly<{
  labelOf(id: ConstantId): string;
  valueOf(id: ConstantId): number | undefined;
}>;

/**
 * Base class for every error the engine throws.
 * The `code` property identifies the specific violation.
 */
export class EngineError extends Error {
  override readonly name: string = "EngineError";
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ConstantError extends EngineError {
  override readonly name: string = "ConstantError";
  readonly fault: ConstantFault;

  constructor(fault: ConstantFault, message: string) {
    super(fault.code, message);
    this.fault = fault;
  }
}

export class LinearizeError extends EngineError {
  override readonly name: string = "LinearizeError";
  readonly fault: LinearizeFault;

  constructor(fault: LinearizeFault, message: string) {
    super(fault.code, message);
    this.fault = fault;
  }
}

export class InfeasibleError extends EngineError {
  override readonly name: string = "InfeasibleError";
  readonly fault: Infeasible;

  constructor(fault: Infeasible) {
    super(fault.code, `Solver reported the constraint system infeasible: ${fault.detail}`);
    this.fault = fault;
  }
}

function quoted(ctx: FaultContext, id: ConstantId): string {
  return `"${ctx.labelOf(id)}"`;
}

export function describeResolutionFault(fault: ResolutionFault, ctx: FaultContext): string {
  switch (fault.code) {
    case "CONSTANT_NOT_SET":
      return `Constant ${quoted(ctx, fault.id)} is not set.`;
    case "UNRESOLVED_DEPENDENCY": {
      const base = `Can not set constant ${quoted(ctx, fault.whileSetting)} because ${quoted(ctx, fault.missing)} is not set.`;
      if (ctx.valueOf(fault.missing) === undefined) return base;
      return `${base} ${quoted(ctx, fault.missing)} depends on ${quoted(ctx, fault.whileSetting)} and resolves after it.`;
    }
    case "DIVISION_BY_ZERO":
      return `Can not resolve constant ${quoted(ctx, fault.id)}: division by zero.`;
    case "UNKNOWN_CONSTANT":
      if (fault.id === fault.whileSetting) return `Unknown constant #${String(fault.id)}.`;
      return `Can not set constant ${quoted(ctx, fault.whileSetting)}: it references undeclared constant #${String(fault.id)}.`;
    case "SELF_REFERENCE":
      return `Can not set constant ${quoted(ctx, fault.id)}: its formula references itself.`;
    case "NON_FINITE_VALUE":
      return `Can not resolve constant ${quoted(ctx, fault.id)}: ${String(fault.value)} is not a finite value.`;
  }
}

export function describeLinearizeFault(fault: LinearizeFault, ctx: FaultContext): string {
  switch (fault.code) {
    case "NONLINEAR":
      return `Nonlinear constraint: ${fault.detail}.`;
    case "NO_VARIABLES":
      return "Constraint contains no decision variables (overconstrained).";
    case "TRIVIALLY_UNSATISFIABLE":
      return `Constraint contains no decision variables and can never hold: ${formatNumber(fault.offset)} ${fault.relation} 0.`;
    case "UNRESOLVED_CONSTANT":
      return `Constraint references constant ${quoted(ctx, fault.id)}, which is not set.`;
    case "DIVISION_BY_ZERO":
      return "Constraint divides by a constant expression that evaluates to zero.";
    case "NON_FINITE_COEFFICIENT":
      return `Constraint produced a non-finite coefficient (${String(fault.value)}).`;
  }
}

export function describeConstantFault(fault: ConstantFault, ctx: FaultContext): string {
  if (fault.code === "RELINEARIZATION_FAILED") {
    return `Constraint ${String(fault.handle)} could not be relinearized: ${describeLinearizeFault(fault.cause, ctx)}`;
  }
  return describeResolutionFault(fault, ctx);
}
