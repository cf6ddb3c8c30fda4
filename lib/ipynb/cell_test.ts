import assert from "node:assert/strict";
import test from "node:test";
import { Cell, NotebookCellType } from "./cell.ts";

test("Cell", async (t) => {
  await t.test("code cells serialize with empty execution state", () => {
    assert.deepEqual(Cell.code("a = 1\nb = 2").toIpynb(), {
      cell_type: "code",
      execution_count: null,
      metadata: {},
      outputs: [],
      source: ["a = 1\n", "b = 2"],
    });
  });

  await t.test("markdown and raw cells serialize without outputs", () => {
    assert.deepEqual(Cell.markdown("# T\n").toIpynb(), {
      cell_type: "markdown",
      metadata: {},
      source: ["# T\n"],
    });
    assert.deepEqual(Cell.raw("").toIpynb(), {
      cell_type: "raw",
      metadata: {},
      source: [],
    });
  });

  await t.test("value semantics", () => {
    const cell = new Cell(NotebookCellType.Code, "x");
    assert.equal(cell.isCode, true);
    assert.equal(Cell.markdown("x").isCode, false);
    assert.equal(cell.equals(Cell.code("x")), true);
    assert.equal(cell.equals(Cell.raw("x")), false);
    assert.equal(Object.isFrozen(cell), true);
  });
});
