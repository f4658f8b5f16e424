import { assert, describe, test } from "@anchorline/testkit";
import { ConstantTable } from "../../constants/table.js";
import { add, div, eq, ge, le, mul, ref, sub, v } from "../nodes.js";
import { linearize, relationHolds } from "../linearize.js";
import type { ConstraintNode } from "../types.js";

function tableWith(entries: Record<string, number>): {
  table: ConstantTable;
  id: (label: string) => number;
} {
  const table = new ConstantTable();
  for (const [label, value] of Object.entries(entries)) {
    table.set(table.declare(label), value);
  }
  const id = (label: string): number => {
    const found = table.findByLabel(label)[0];
    if (found === undefined) throw new Error(`no constant "${label}"`);
    return found;
  };
  return { table, id };
}

describe("linearize", () => {
  test("substitutes a constant coefficient", () => {
    const { table, id } = tableWith({ ratio: 16 / 9 });
    const res = linearize(eq(v("width"), mul(ref(id("ratio")), v("height"))), 7, table);
    if (!res.ok) throw new Error(res.fatal.code);
    assert.deepEqual(res.value.terms, [
      { variable: "width", coefficient: 1 },
      { variable: "height", coefficient: -16 / 9 },
    ]);
    assert.equal(res.value.offset, 0);
    assert.equal(res.value.relation, "==");
    assert.equal(res.value.strength, 7);
    assert.deepEqual([...res.value.constants], [id("ratio")]);
  });

  test("constant terms move into the offset", () => {
    const { table, id } = tableWith({ h: 200 });
    const res = linearize(le(add(v("y"), 10), ref(id("h"))), 1, table);
    if (!res.ok) throw new Error(res.fatal.code);
    assert.deepEqual(res.value.terms, [{ variable: "y", coefficient: 1 }]);
    assert.equal(res.value.offset, -190);
    assert.equal(res.value.relation, "<=");
  });

  test("repeated variables merge and keep first-appearance order", () => {
    const { table } = tableWith({});
    const res = linearize(
      eq(add(add(v("b"), v("a")), mul(2, v("b"))), sub(v("c"), 9)),
      1,
      table,
    );
    if (!res.ok) throw new Error(res.fatal.code);
    assert.deepEqual(res.value.terms, [
      { variable: "b", coefficient: 3 },
      { variable: "a", coefficient: 1 },
      { variable: "c", coefficient: -1 },
    ]);
    assert.equal(res.value.offset, 9);
  });

  test("division by a constant divides every coefficient", () => {
    const { table } = tableWith({});
    const res = linearize(eq(div(v("x"), 4), 2), 1, table);
    if (!res.ok) throw new Error(res.fatal.code);
    assert.deepEqual(res.value.terms, [{ variable: "x", coefficient: 0.25 }]);
    assert.equal(res.value.offset, -2);
  });

  test("rejects products of variable expressions", () => {
    const { table } = tableWith({});
    assert.deepEqual(linearize(eq(mul(v("x"), v("y")), 1), 1, table), {
      ok: false,
      fatal: { code: "NONLINEAR", operator: "*", detail: "product of two decision-variable expressions" },
    });
  });

  test("rejects division by a variable expression", () => {
    const { table } = tableWith({});
    assert.deepEqual(linearize(eq(div(5, v("x")), 1), 1, table), {
      ok: false,
      fatal: { code: "NONLINEAR", operator: "/", detail: "divisor contains a decision variable" },
    });
  });

  test("long product chains scale on either side", () => {
    const { table, id } = tableWith({ two: 2, half: 0.5 });
    let node: ConstraintNode = v("x");
    for (let i = 0; i < 1000; i++) {
      node = i % 2 === 0 ? mul(node, ref(id("two"))) : mul(ref(id("half")), node);
    }
    const res = linearize(eq(node, 3), 1, table);
    if (!res.ok) throw new Error(res.fatal.code);
    assert.deepEqual(res.value.terms, [{ variable: "x", coefficient: 1 }]);
    assert.equal(res.value.offset, -3);
    assert.deepEqual(
      [...res.value.constants].sort((x, y) => x - y),
      [id("two"), id("half")],
    );
  });

  test("a cancelled variable still counts as a variable factor", () => {
    const { table } = tableWith({});
    assert.deepEqual(linearize(eq(mul(sub(v("x"), v("x")), v("y")), 1), 1, table), {
      ok: false,
      fatal: { code: "NONLINEAR", operator: "*", detail: "product of two decision-variable expressions" },
    });
  });

  test("an overflowing constant factor is rejected", () => {
    const { table } = tableWith({});
    assert.deepEqual(linearize(eq(mul(mul(1e308, 10), v("x")), 1), 1, table), {
      ok: false,
      fatal: { code: "NON_FINITE_COEFFICIENT", value: Number.POSITIVE_INFINITY },
    });
  });

  test("division by a zero-valued constant fails", () => {
    const { table, id } = tableWith({ zero: 0 });
    assert.deepEqual(linearize(eq(div(v("x"), ref(id("zero"))), 1), 1, table), {
      ok: false,
      fatal: { code: "DIVISION_BY_ZERO" },
    });
  });

  test("unresolved constants are reported", () => {
    const table = new ConstantTable();
    const gap = table.declare("gap");
    assert.deepEqual(linearize(eq(v("x"), ref(gap)), 1, table), {
      ok: false,
      fatal: { code: "UNRESOLVED_CONSTANT", id: gap },
    });
  });

  test("cancelled variables leave a constant-only relation", () => {
    const { table } = tableWith({});
    assert.deepEqual(linearize(eq(add(v("x"), 3), add(v("x"), 3)), 1, table), {
      ok: false,
      fatal: { code: "NO_VARIABLES", offset: 0 },
    });
    assert.deepEqual(linearize(eq(add(v("x"), 1), v("x")), 1, table), {
      ok: false,
      fatal: { code: "TRIVIALLY_UNSATISFIABLE", offset: 1, relation: "==" },
    });
    assert.deepEqual(linearize(ge(add(v("x"), 1), v("x")), 1, table), {
      ok: false,
      fatal: { code: "NO_VARIABLES", offset: 1 },
    });
  });

  test("equality tolerance decides near-zero constant-only relations", () => {
    const { table } = tableWith({});
    const nearly = eq(add(v("x"), 1e-9), v("x"));
    const loose = linearize(nearly, 1, table);
    assert.equal(loose.ok ? null : loose.fatal.code, "NO_VARIABLES");
    const exact = linearize(nearly, 1, table, { equalityTolerance: 0 });
    assert.equal(exact.ok ? null : exact.fatal.code, "TRIVIALLY_UNSATISFIABLE");
  });
});

describe("relationHolds", () => {
  test("compares the offset against zero with slack", () => {
    assert.equal(relationHolds(-3, "<=", 0), true);
    assert.equal(relationHolds(3, "<=", 0), false);
    assert.equal(relationHolds(-1e-9, ">=", 1e-8), true);
    assert.equal(relationHolds(0.5, "==", 1e-8), false);
  });
});
