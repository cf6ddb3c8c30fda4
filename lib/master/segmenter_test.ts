import assert from "node:assert/strict";
import test from "node:test";
import { NotebookCellType } from "../ipynb/cell.ts";
import { eventBus } from "../universal/event-bus.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildBusEvents } from "./events.ts";
import {
  contentTypeMarkers,
  type FieldGroups,
  segmentCells,
} from "./segmenter.ts";
import { masterCellPairs } from "./test-fixtures.ts";

const md = (s: string): [NotebookCellType, string] => [
  NotebookCellType.Markdown,
  s,
];
const code = (s: string): [NotebookCellType, string] => [
  NotebookCellType.Code,
  s,
];

const structureError = (pattern: RegExp) => (error: unknown) =>
  error instanceof MasterDocumentError && error.code === "STRUCTURE" &&
  pattern.test(error.message);

const summary = (groups: FieldGroups) =>
  Array.from(groups, ([key, cells]) => [key, cells.map((c) => c.source)]);

test("contentTypeMarkers", () => {
  assert.deepEqual(contentTypeMarkers("***CONTENT_TYPE: CONTENT***"), [
    "CONTENT",
  ]);
  assert.deepEqual(
    contentTypeMarkers("***CONTENT_TYPE:A*** and ***CONTENT_TYPE: B***"),
    ["A", "B"],
  );
  assert.deepEqual(contentTypeMarkers("no marker"), []);
});

test("segmentCells", async (t) => {
  await t.test("groups cells under the preceding marker", () => {
    const groups = segmentCells([
      md("***CONTENT_TYPE: CONTENT***"),
      md("# T"),
      code("   "),
      md("***CONTENT_TYPE:  STUDENT_CODE_CELL ***"),
      code("x = 1"),
      [NotebookCellType.Raw, "raw text"],
    ]);
    assert.deepEqual(summary(groups), [
      ["CONTENT", ["# T"]],
      ["STUDENT_CODE_CELL", ["x = 1", "raw text"]],
    ]);
  });

  await t.test("a field with no cells yields an empty group", () => {
    const groups = segmentCells([
      md("***CONTENT_TYPE: EXPLANATION***"),
      md("***CONTENT_TYPE: CONTENT***"),
      md("# T"),
    ]);
    assert.deepEqual(groups.get("EXPLANATION"), []);
  });

  await t.test("blank cells before any field are ignored", () => {
    const groups = segmentCells([md(""), md("***CONTENT_TYPE: CONTENT***")]);
    assert.deepEqual(summary(groups), [["CONTENT", []]]);
  });

  await t.test("content before any field is fatal", () => {
    assert.throws(
      () => segmentCells([md("Intro"), md("***CONTENT_TYPE: CONTENT***")]),
      structureError(/^A cell appears before any field is declared: "Intro"$/),
    );
    assert.throws(
      () => segmentCells([code("x = 1")]),
      structureError(/before any field/),
    );
  });

  await t.test("a cell with several markers is fatal", () => {
    assert.throws(
      () =>
        segmentCells([
          md("***CONTENT_TYPE: CONTENT*** ***CONTENT_TYPE: EXPLANATION***"),
        ]),
      structureError(/^Multiple field keys found in cell /),
    );
  });

  await t.test("unknown fields are fatal", () => {
    assert.throws(
      () => segmentCells([md("***CONTENT_TYPE: HINTS***")]),
      structureError(/^Unknown field `HINTS`\.$/),
    );
  });

  await t.test("a field declared twice is fatal", () => {
    assert.throws(
      () =>
        segmentCells([
          md("***CONTENT_TYPE: CONTENT***"),
          md("# A"),
          md("***CONTENT_TYPE: EXPLANATION***"),
          md("***CONTENT_TYPE: CONTENT***"),
        ]),
      structureError(/^Field `CONTENT` is declared more than once\.$/),
    );
    assert.throws(
      () =>
        segmentCells([
          md("***CONTENT_TYPE: CONTENT***"),
          md("***CONTENT_TYPE: CONTENT***"),
        ]),
      structureError(/declared more than once/),
    );
  });

  await t.test("re-emitting groups with their markers segments identically", () => {
    const first = segmentCells(masterCellPairs());
    const reemitted = Array.from(first).flatMap(([key, cells]) => [
      md(`***CONTENT_TYPE: ${key}***`),
      ...cells.map((c): [NotebookCellType, string] => [c.cellType, c.source]),
    ]);
    const second = segmentCells(reemitted);
    assert.deepEqual(summary(second), summary(first));
    assert.equal(first.size, 7);
  });

  await t.test("traces every cell on the bus", () => {
    const bus = eventBus<BuildBusEvents>();
    const traced: Array<string | undefined> = [];
    bus.on("segment:trace", ({ field }) => {
      traced.push(field);
    });
    segmentCells(
      [md("***CONTENT_TYPE: CONTENT***"), md(""), md("# T")],
      { bus },
    );
    assert.deepEqual(traced, [undefined, "CONTENT", "CONTENT"]);
  });
});
