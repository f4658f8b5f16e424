/**
 * @anchorline/core
 *
 * Named-constant layer for linear constraint solvers: constants and constant formulas,
 * constraint linearization, and propagation of constant updates into an installed
 * tableau through a `SolverAdapter`.
 */

// =============================================================================
// Engine
// =============================================================================

export {
  createConstantEngine,
  createStrengthEngine,
  type ConstantChangeEvent,
  type ConstantChangeListener,
  type ConstantEngine,
  type ConstantEngineOptions,
  type ConstantInspection,
  type ConstraintInspection,
  type EngineInspection,
  type StrengthEngineOptions,
} from "./engine/engine.js";

export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  type ConstantOnlyPolicy,
  type EngineConfig,
  type ResolvedEngineConfig,
} from "./config.js";

export {
  ConstantError,
  EngineError,
  InfeasibleError,
  LinearizeError,
  describeConstantFault,
  describeLinearizeFault,
  describeResolutionFault,
  type EngineErrorCode,
  type FaultContext,
} from "./errors.js";

export { createDevLogger, type DevLogger, type WarnSink, type WarningArea } from "./warnings.js";

// =============================================================================
// Constants
// =============================================================================

export type {
  BinaryOp,
  ConstantChange,
  ConstantDefinition,
  ConstantId,
  ConstantInput,
  ConstantUpdate,
  ConstantView,
  DependentWarning,
  EvalFault,
  ResolutionFault,
  Result,
  ScalarNode,
} from "./constants/types.js";
export { ConstantTable, toDefinition } from "./constants/table.js";
export { collectConstantRefs, evaluateScalar, type ConstantLookup } from "./constants/scalar.js";
export { resolveConstant, sweepDependents, type SweepResult } from "./constants/evaluator.js";

// =============================================================================
// Linear forms
// =============================================================================

export type {
  ConstraintDefinition,
  ConstraintNode,
  LinearConstraint,
  LinearTerm,
  LinearizeFault,
  Operand,
  Relation,
  ScalarOperand,
  VariableId,
} from "./linear/types.js";
export { add, constraint, div, eq, ge, le, lit, mul, ref, sub, v } from "./linear/nodes.js";
export {
  DEFAULT_EQUALITY_TOLERANCE,
  linearize,
  relationHolds,
  type LinearizeOptions,
} from "./linear/linearize.js";
export {
  formatDefinition,
  formatLinearConstraint,
  formatNumber,
  formatScalar,
  type FormatOptions,
} from "./linear/format.js";

// =============================================================================
// Propagation and solver boundary
// =============================================================================

export { UpdatePropagator, type PropagatorOptions } from "./propagation/propagator.js";
export type {
  ConstantFault,
  ConstraintHandle,
  ConstraintSnapshot,
  PropagationReport,
  RelinearizationFailedFault,
} from "./propagation/types.js";
export { infeasible, type AdapterResult, type Infeasible, type SolverAdapter } from "./solver/adapter.js";
export { Strength, clipStrength, createStrength } from "./solver/strength.js";

// =============================================================================
// Expression source
// =============================================================================

export {
  ExpressionSyntaxError,
  parseExpression,
  parseRelation,
  type SourceNode,
  type SourceRelation,
} from "./dsl/parser.js";
export { ExpressionBindingError, bindRelation, bindScalar, type NameBinding, type NameResolver } from "./dsl/bind.js";
export { clearParseCache, getParseCacheSize } from "./dsl/expr.js";
