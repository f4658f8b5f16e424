import { assert, describe, test } from "@anchorline/testkit";
import { ConstantTable } from "../../constants/table.js";
import {
  formatConstraintNode,
  formatDefinition,
  formatLinearConstraint,
  formatNumber,
} from "../format.js";
import { linearize } from "../linearize.js";
import { add, eq, mul, ref, sub, v } from "../nodes.js";

describe("formatNumber", () => {
  test("integers print as-is and fractions are rounded", () => {
    assert.equal(formatNumber(5), "5");
    assert.equal(formatNumber(-2.5), "-2.5");
    assert.equal(formatNumber(16 / 9), "1.7778");
    assert.equal(formatNumber(0.1 + 0.2), "0.3");
    assert.equal(formatNumber(16 / 9, 2), "1.78");
  });
});

describe("formatConstraintNode", () => {
  test("parenthesizes only where precedence requires", () => {
    assert.equal(formatConstraintNode(sub(v("a"), sub(v("b"), v("c")))), "a - (b - c)");
    assert.equal(formatConstraintNode(sub(sub(v("a"), v("b")), v("c"))), "a - b - c");
    assert.equal(formatConstraintNode(mul(add(v("a"), v("b")), 2)), "(a + b) * 2");
    assert.equal(formatConstraintNode(add(v("a"), mul(v("b"), 2))), "a + b * 2");
  });

  test("constants print by label, or by id without one", () => {
    assert.equal(formatConstraintNode(ref(3)), "#3");
    assert.equal(formatConstraintNode(ref(3), { labelOf: () => "gap" }), "gap");
  });
});

describe("formatLinearConstraint", () => {
  test("renders the reduced form", () => {
    const table = new ConstantTable();
    const ratio = table.declare("ratio");
    const height = table.declare("height");
    table.set(ratio, 16 / 9);
    table.set(height, 200);

    const aspect = linearize(eq(v("width"), mul(ref(ratio), v("height"))), 1, table);
    if (!aspect.ok) throw new Error(aspect.fatal.code);
    assert.equal(formatLinearConstraint(aspect.value), "width - 1.7778 * height == 0");
    assert.equal(
      formatDefinition(aspect.value.definition, { labelOf: (id) => table.labelOf(id) }),
      "width == ratio * height",
    );

    const fixed = linearize(eq(v("height"), ref(height)), 1, table);
    if (!fixed.ok) throw new Error(fixed.fatal.code);
    assert.equal(formatLinearConstraint(fixed.value), "height - 200 == 0");
  });

  test("signs of leading terms and positive offsets", () => {
    const table = new ConstantTable();
    const leading = linearize(eq(0, v("x")), 1, table);
    if (!leading.ok) throw new Error(leading.fatal.code);
    assert.equal(formatLinearConstraint(leading.value), "-x == 0");

    const offset = linearize(eq(add(mul(2, v("x")), 3), 0), 1, table);
    if (!offset.ok) throw new Error(offset.fatal.code);
    assert.equal(formatLinearConstraint(offset.value), "2 * x + 3 == 0");
  });
});
