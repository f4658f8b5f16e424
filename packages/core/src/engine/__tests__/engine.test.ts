import { assert, createRecordingSolver, describe, test } from "@anchorline/testkit";
import { ExpressionBindingError } from "../../dsl/bind.js";
import { v } from "../../linear/nodes.js";
import { Strength } from "../../solver/strength.js";
import { type ConstantChangeEvent, createConstantEngine, createStrengthEngine } from "../engine.js";

function quietEngine() {
  const solver = createRecordingSolver();
  const engine = createConstantEngine({ solver, config: { devMode: false } });
  return { solver, engine };
}

describe("aspect-ratio constraint", () => {
  test("a constant update re-solves with the new coefficient", () => {
    const { solver, engine } = quietEngine();
    const ratio = engine.declareConstant("aspectRatio");
    engine.setConstant(ratio, 16 / 9);
    const handle = engine.addConstraintSource("width == aspectRatio * height");

    assert.deepEqual(engine.linearOf(handle)?.terms, [
      { variable: "width", coefficient: 1 },
      { variable: "height", coefficient: -16 / 9 },
    ]);
    assert.equal(engine.linearOf(handle)?.strength, Strength.required);

    solver.clearCalls();
    const report = engine.setConstant(ratio, 4 / 3);
    assert.deepEqual(report.relinearized, [handle]);
    assert.equal(report.reoptimized, true);
    assert.equal(solver.count("reoptimize"), 1);
    assert.equal(solver.count("replace"), 1);
    assert.deepEqual(engine.linearOf(handle)?.terms, [
      { variable: "width", coefficient: 1 },
      { variable: "height", coefficient: -4 / 3 },
    ]);
  });

  test("inspect renders constants and constraints", () => {
    const { engine } = quietEngine();
    const ratio = engine.declareConstant("aspectRatio");
    engine.setConstant(ratio, 16 / 9);
    const handle = engine.addConstraintSource("width == aspectRatio * height");

    const snapshot = engine.inspect();
    assert.deepEqual(snapshot.constants, [
      {
        id: ratio,
        label: "aspectRatio",
        kind: "literal",
        definition: "1.7778",
        value: 16 / 9,
        dependents: [],
        constraints: [handle],
      },
    ]);
    assert.equal(snapshot.constraints.length, 1);
    assert.equal(snapshot.constraints[0]?.text, "width == aspectRatio * height");
    assert.equal(snapshot.constraints[0]?.linearText, "width - 1.7778 * height == 0");
    assert.equal(snapshot.constraints[0]?.installed, true);
  });
});

describe("setConstant", () => {
  test("formula source binds to declared labels", () => {
    const { engine } = quietEngine();
    const base = engine.declareConstant("base");
    const gutter = engine.declareConstant("gutter");
    engine.setConstant(base, 8);
    engine.setConstant(gutter, "base * 2");
    assert.equal(engine.valueOf(gutter), 16);
    assert.equal(engine.inspect().constants[1]?.definition, "base * 2");
    assert.deepEqual(engine.inspect().constants[0]?.dependents, [gutter]);
    assert.equal(engine.findConstant("gutter"), gutter);
  });

  test("referencing an unset constant throws with both labels", () => {
    const { engine } = quietEngine();
    engine.declareConstant("a");
    const b = engine.declareConstant("b");
    assert.throws(() => engine.setConstant(b, "a + 1"), {
      name: "ConstantError",
      code: "UNRESOLVED_DEPENDENCY",
      message: 'Can not set constant "b" because "a" is not set.',
    });
    assert.equal(engine.valueOf(b), undefined);
  });

  test("redefining a constant through its own dependent is rejected", () => {
    const { engine } = quietEngine();
    const a = engine.declareConstant("a");
    const b = engine.declareConstant("b");
    engine.setConstant(a, 1);
    engine.setConstant(b, "a + 1");
    assert.throws(() => engine.setConstant(a, "b * 2"), {
      code: "UNRESOLVED_DEPENDENCY",
      message:
        'Can not set constant "a" because "b" is not set. "b" depends on "a" and resolves after it.',
    });
    assert.equal(engine.valueOf(a), 1);
  });

  test("unknown names in formula source are binding errors", () => {
    const { engine } = quietEngine();
    const a = engine.declareConstant("a");
    assert.throws(
      () => engine.setConstant(a, "nope * 2"),
      (e: unknown) =>
        e instanceof ExpressionBindingError &&
        e.message === 'Unknown constant "nope" at position 0\n  nope * 2\n  ^',
    );
  });

  test("self reference is rejected", () => {
    const { engine } = quietEngine();
    const a = engine.declareConstant("a");
    engine.setConstant(a, 2);
    assert.throws(() => engine.setConstant(a, "a * 2"), {
      code: "SELF_REFERENCE",
      message: 'Can not set constant "a": its formula references itself.',
    });
  });
});

describe("requireValue", () => {
  test("throws for constants that never resolved", () => {
    const { engine } = quietEngine();
    const x = engine.declareConstant("x");
    assert.throws(() => engine.requireValue(x), {
      code: "CONSTANT_NOT_SET",
      message: 'Constant "x" is not set.',
    });
  });

  test("explains why a dependent stopped resolving", () => {
    const { engine } = quietEngine();
    const base = engine.declareConstant("base");
    const inv = engine.declareConstant("inv");
    engine.setConstant(base, 2);
    engine.setConstant(inv, "1 / base");
    assert.equal(engine.requireValue(inv), 0.5);
    engine.setConstant(base, 0);
    assert.equal(engine.valueOf(inv), undefined);
    assert.throws(() => engine.requireValue(inv), {
      code: "DIVISION_BY_ZERO",
      message: 'Can not resolve constant "inv": division by zero.',
    });
  });
});

describe("addConstraint", () => {
  test("nonlinear constraints are rejected", () => {
    const { engine } = quietEngine();
    assert.throws(() => engine.addConstraintSource("x * y == 1"), {
      name: "LinearizeError",
      code: "NONLINEAR",
      message: "Nonlinear constraint: product of two decision-variable expressions.",
    });
  });

  test("constant-only relations throw by default", () => {
    const { engine } = quietEngine();
    const gap = engine.declareConstant("gap");
    engine.setConstant(gap, 4);
    assert.throws(() => engine.addConstraintSource("gap == 4"), {
      code: "NO_VARIABLES",
      message: "Constraint contains no decision variables (overconstrained).",
    });
    assert.throws(() => engine.addConstraintSource("gap == 5"), {
      code: "TRIVIALLY_UNSATISFIABLE",
      message: "Constraint contains no decision variables and can never hold: -1 == 0.",
    });
  });

  test("constant-only relations are tracked under the skip policy", () => {
    const warnings: string[] = [];
    const engine = createConstantEngine({
      solver: createRecordingSolver(),
      config: {
        constantOnlyConstraints: "skip",
        devMode: true,
        warn: (message) => warnings.push(message),
      },
    });
    const gap = engine.declareConstant("gap");
    engine.setConstant(gap, 4);
    const handle = engine.addConstraintSource("gap == 4");
    const entry = engine.inspect().constraints[0];
    assert.equal(entry?.handle, handle);
    assert.equal(entry?.installed, false);
    assert.equal(entry?.linearText, null);
    assert.deepEqual(warnings, [
      "[anchorline][constraints] Constraint 1 (gap == 4) has no decision variables; it is tracked but not sent to the solver.",
    ]);
  });

  test("strengths reach the adapter unchanged", () => {
    const solver = createRecordingSolver();
    const engine = createConstantEngine({
      solver,
      config: { devMode: false },
      defaultStrength: Strength.weak,
    });
    const weak = engine.addConstraint(v("x"), ">=", 0);
    const large = engine.addConstraint(v("y"), "<=", 10, 5e9);
    const negative = engine.addConstraint(v("z"), "==", 1, -3);
    assert.equal(engine.linearOf(weak)?.strength, 1);
    assert.equal(engine.linearOf(large)?.strength, 5_000_000_000);
    assert.equal(engine.linearOf(negative)?.strength, -3);
    assert.deepEqual(
      solver.calls.map((call) => (call.kind === "install" ? call.constraint.strength : null)),
      [1, 5_000_000_000, -3],
    );
  });

  test("default strength is required", () => {
    const { engine } = quietEngine();
    const handle = engine.addConstraint(v("x"), "==", 1);
    assert.equal(engine.linearOf(handle)?.strength, Strength.required);
  });

  test("adapters may use their own strength type", () => {
    type Priority = "required" | "preferred";
    const solver = createRecordingSolver<Priority>();
    const engine = createStrengthEngine<number, Priority>({
      solver,
      config: { devMode: false },
      defaultStrength: "required",
    });
    const pinned = engine.addConstraint(v("x"), "==", 1);
    const ratio = engine.declareConstant("ratio");
    engine.setConstant(ratio, 2);
    const soft = engine.addConstraintSource("y == ratio * x", "preferred");

    solver.clearCalls();
    engine.setConstant(ratio, 3);
    assert.equal(engine.linearOf(pinned)?.strength, "required");
    assert.equal(engine.linearOf(soft)?.strength, "preferred");
    const replaced = solver.calls[0];
    assert.equal(replaced?.kind, "replace");
    assert.equal(replaced?.kind === "replace" ? replaced.constraint.strength : null, "preferred");
    assert.equal(engine.inspect().constraints[1]?.strength, "preferred");
  });

  test("ambiguous labels cannot be bound", () => {
    const { engine } = quietEngine();
    engine.declareConstant("w");
    engine.declareConstant("w");
    assert.equal(engine.findConstant("w"), undefined);
    assert.throws(
      () => engine.addConstraintSource("x == w"),
      (e: unknown) =>
        e instanceof ExpressionBindingError &&
        e.message === 'Name "w" matches 2 constants at position 5\n  x == w\n       ^',
    );
  });

  test("solver infeasibility surfaces as InfeasibleError", () => {
    const engine = createConstantEngine({
      solver: createRecordingSolver({ rejectConstraint: () => "x is already fixed" }),
      config: { devMode: false },
    });
    assert.throws(() => engine.addConstraint(v("x"), "==", 3), {
      name: "InfeasibleError",
      code: "INFEASIBLE",
      message: "Solver reported the constraint system infeasible: x is already fixed",
    });
  });
});

describe("removeConstraint", () => {
  test("removed constraints are not relinearized", () => {
    const { solver, engine } = quietEngine();
    const base = engine.declareConstant("base");
    engine.setConstant(base, 1);
    const handle = engine.addConstraintSource("x == base");
    assert.equal(engine.removeConstraint(handle), true);
    assert.equal(engine.removeConstraint(handle), false);
    solver.clearCalls();
    const report = engine.setConstant(base, 2);
    assert.equal(report.reoptimized, false);
    assert.deepEqual(solver.calls, []);
  });
});

describe("onConstantChange", () => {
  test("reports the changed constant and its dependents", () => {
    const { engine } = quietEngine();
    const base = engine.declareConstant("base");
    const gutter = engine.declareConstant("gutter");
    engine.setConstant(base, 1);
    engine.setConstant(gutter, "base * 2");

    const events: ConstantChangeEvent[] = [];
    const unsubscribe = engine.onConstantChange((event) => events.push(event));
    engine.setConstant(base, 3);
    engine.setConstant(base, 3);
    unsubscribe();
    engine.setConstant(base, 4);

    assert.deepEqual(events, [
      {
        source: base,
        changes: [
          { id: base, label: "base", previous: 1, value: 3 },
          { id: gutter, label: "gutter", previous: 2, value: 6 },
        ],
      },
    ]);
  });

  test("fires before a relinearization failure is thrown", () => {
    const { engine } = quietEngine();
    const d = engine.declareConstant("d");
    engine.setConstant(d, 2);
    engine.addConstraintSource("x / d == 1");

    const seen: number[] = [];
    engine.onConstantChange((event) => {
      for (const change of event.changes) seen.push(change.value ?? Number.NaN);
    });
    assert.throws(() => engine.setConstant(d, 0), {
      code: "RELINEARIZATION_FAILED",
      message:
        "Constraint 1 could not be relinearized: Constraint divides by a constant expression that evaluates to zero.",
    });
    assert.deepEqual(seen, [0]);
    assert.equal(engine.valueOf(d), 0);
  });

  test("a failed re-optimization still reports the committed change", () => {
    const { solver, engine } = quietEngine();
    const base = engine.declareConstant("base");
    engine.setConstant(base, 1);
    engine.addConstraintSource("x == base");
    solver.failReoptimize("cycle");

    let fired = 0;
    engine.onConstantChange(() => {
      fired++;
    });
    assert.throws(() => engine.setConstant(base, 2), {
      name: "InfeasibleError",
      code: "INFEASIBLE",
    });
    assert.equal(fired, 1);
  });

  test("listener errors propagate to the caller", () => {
    const { engine } = quietEngine();
    const a = engine.declareConstant("a");
    engine.onConstantChange(() => {
      throw new Error("listener failed");
    });
    assert.throws(() => engine.setConstant(a, 1), { message: "listener failed" });
    assert.equal(engine.valueOf(a), 1);
  });
});

describe("constant resolution order", () => {
  test("a literal reads back unchanged", () => {
    const { engine } = quietEngine();
    const a = engine.declareConstant("a");
    engine.setConstant(a, 12.5);
    assert.equal(engine.valueOf(a), 12.5);
  });

  test("a formula succeeds only after the constant it references is set", () => {
    const { engine } = quietEngine();
    const a = engine.declareConstant("a");
    const b = engine.declareConstant("b");
    assert.throws(() => engine.setConstant(a, "b * 3"), { code: "UNRESOLVED_DEPENDENCY" });
    assert.equal(engine.valueOf(a), undefined);
    engine.setConstant(b, 2);
    engine.setConstant(a, "b * 3");
    assert.equal(engine.valueOf(a), 6);
    engine.setConstant(b, 5);
    assert.equal(engine.valueOf(a), 15);
  });
});

describe("linear forms", () => {
  test("height == 200 installs a single term", () => {
    const { solver, engine } = quietEngine();
    const handle = engine.addConstraintSource("height == 200");
    assert.deepEqual(engine.linearOf(handle)?.terms, [{ variable: "height", coefficient: 1 }]);
    assert.equal(engine.linearOf(handle)?.offset, -200);
    assert.equal(solver.installed.size, 1);
  });

  test("an unset constant in a constraint is reported", () => {
    const { solver, engine } = quietEngine();
    engine.declareConstant("aspectRatio");
    assert.throws(() => engine.addConstraintSource("width == aspectRatio * height"), {
      code: "UNRESOLVED_CONSTANT",
      message: 'Constraint references constant "aspectRatio", which is not set.',
    });
    assert.equal(solver.installed.size, 0);
  });
});
