import assert from "node:assert/strict";
import test from "node:test";
import { Cell, NotebookCellType } from "../ipynb/cell.ts";
import { eventBus } from "../universal/event-bus.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildBusEvents } from "./events.ts";
import {
  bannerMarker,
  type Exercise,
  exerciseFromFieldGroups,
  redirectionNotice,
  splitFileCodeCell,
  submissionBanner,
} from "./exercise.ts";
import type { JudgeParameters } from "./judge-params.ts";
import { segmentCells } from "./segmenter.ts";
import {
  FIXTURE_ANSWER,
  FIXTURE_STUDENT_CODE,
  type MasterFixture,
  masterCellPairs,
} from "./test-fixtures.ts";

const exercise = (fixture: MasterFixture = {}, key = "ex1"): Exercise =>
  exerciseFromFieldGroups(segmentCells(masterCellPairs(fixture)), {
    key,
    dirpath: ".",
    version: "v1",
  });

const errorCode = (code: MasterDocumentError["code"], pattern?: RegExp) =>
(error: unknown) =>
  error instanceof MasterDocumentError && error.code === code &&
  (pattern ? pattern.test(error.message) : true);

test("splitFileCodeCell", async (t) => {
  await t.test("takes the file name from the heading line", () => {
    const cell = Cell.code("# notes.txt\nhello\n");
    assert.deepEqual(splitFileCodeCell(cell), {
      filename: "notes.txt",
      content: "hello\n",
      cell,
    });
  });

  await t.test("trims the body and ends it with one newline", () => {
    const { filename, content } = splitFileCodeCell(
      Cell.code("\n## my test.py  \n\n\nx = 1\n\n"),
    );
    assert.equal(filename, "my test.py");
    assert.equal(content, "x = 1\n");
  });

  await t.test("rejects cells without a file header", () => {
    assert.throws(
      () => splitFileCodeCell(Cell.code("print(1)")),
      errorCode("EXTRACTION", /does not match the first line/),
    );
    assert.throws(
      () => splitFileCodeCell(Cell.code("# data/input.txt\n1")),
      errorCode("EXTRACTION"),
    );
    assert.throws(
      () => splitFileCodeCell(Cell.markdown("# notes.txt\nhello")),
      errorCode("EXTRACTION", /must be a code cell/),
    );
  });

  await t.test("rejects the current and parent directory as file names", () => {
    assert.throws(
      () => splitFileCodeCell(Cell.code("# ..\nx = 1")),
      errorCode("EXTRACTION", /^`\.\.` is not a file name: `# \.\.`$/),
    );
    assert.throws(
      () => splitFileCodeCell(Cell.code("## .\nx = 1")),
      errorCode("EXTRACTION", /^`\.` is not a file name: `## \.`$/),
    );
  });
});

test("submission cells", async (t) => {
  await t.test("banner carries the exercise marker above the code", () => {
    assert.equal(bannerMarker("ex1"), "<[ ex1 ]>");
    assert.equal(
      submissionBanner("ex1", "x = $1"),
      [
        "##########################################################",
        "##  <[ ex1 ]> 解答セル (Answer cell)",
        "##  このコメントの書き変えを禁ず (Never edit this comment)",
        "##########################################################",
        "",
        "x = $1",
      ].join("\n"),
    );
  });

  await t.test("redirection notice names the target twice", () => {
    assert.equal(
      redirectionNotice("main.ipynb"),
      "# このセルではなく main.ipynb を使ってください\n# Use main.ipynb instead of this cell",
    );
  });
});

test("Exercise", async (t) => {
  await t.test("is built from validated field groups", () => {
    const ex = exercise();
    assert.equal(ex.key, "ex1");
    assert.equal(ex.title, "Sum of two");
    assert.deepEqual(ex.content.map((c) => c.source), [
      "# Sum of two\n\nWrite `add`.",
    ]);
    assert.equal(ex.studentCodeCell.source, FIXTURE_STUDENT_CODE);
    assert.deepEqual(ex.answerExamples.map((c) => c.source), [FIXTURE_ANSWER]);
    assert.equal(ex.studentTests.length, 1);
    assert.equal(ex.explanation.length, 1);
    assert.deepEqual(ex.systemTestCases.map((c) => c.filename), [
      "test_add.py",
    ]);
    assert.deepEqual(ex.deadlines, {
      begins_at: null,
      opens_at: null,
      checks_at: null,
      closes_at: null,
      ends_at: null,
    });
  });

  await t.test("absent optional fields become empty lists", () => {
    const ex = exercise({ requiredOnly: true });
    assert.deepEqual(ex.explanation, []);
    assert.deepEqual(ex.answerExamples, []);
    assert.deepEqual(ex.studentTests, []);
  });

  await t.test("missing required fields are fatal", () => {
    const pairs = masterCellPairs().slice(0, -2);
    assert.throws(
      () =>
        exerciseFromFieldGroups(segmentCells(pairs), {
          key: "ex1",
          dirpath: ".",
          version: "",
        }),
      errorCode(
        "STRUCTURE",
        /^Required field\(s\) `SYSTEM_TEST_SETTING` missing\.$/,
      ),
    );
  });

  await t.test("field violations surface as structure errors", () => {
    const pairs = masterCellPairs();
    pairs[1] = [NotebookCellType.Markdown, "Intro"];
    assert.throws(
      () =>
        exerciseFromFieldGroups(segmentCells(pairs), {
          key: "ex1",
          dirpath: ".",
          version: "",
        }),
      errorCode(
        "STRUCTURE",
        /^The first cell of `CONTENT` does not start with a heading in Markdown: `Intro`\.$/,
      ),
    );
  });

  await t.test("system test file names are unique and leave setting.json alone", () => {
    assert.throws(
      () =>
        exercise({
          systemTest: ["# test_a.py\nx = 1", "# test_a.py\ny = 2"],
        }),
      errorCode(
        "EXTRACTION",
        /^System test file `test_a\.py` is declared more than once\.$/,
      ),
    );
    assert.throws(
      () => exercise({ systemTest: "# setting.json\n{}" }),
      errorCode("EXTRACTION", /^`setting\.json` is reserved for the judge setting\.$/),
    );
    assert.deepEqual(
      exercise({ systemTest: ["# test_a.py\nx = 1", "# test_b.py\ny = 2"] })
        .systemTestCases.map((c) => c.filename),
      ["test_a.py", "test_b.py"],
    );
  });

  await t.test("emits one validation event per materialized field", () => {
    const bus = eventBus<BuildBusEvents>();
    const fields: string[] = [];
    bus.on("field:validated", ({ field }) => {
      fields.push(field);
    });
    exerciseFromFieldGroups(
      segmentCells(masterCellPairs()),
      { key: "ex1", dirpath: ".", version: "" },
      { bus },
    );
    assert.deepEqual(fields, [
      "CONTENT",
      "STUDENT_CODE_CELL",
      "ANSWER_EXAMPLES",
      "STUDENT_TESTS",
      "EXPLANATION",
      "SYSTEM_TEST_CASES",
      "SYSTEM_TEST_SETTING",
    ]);
  });

  await t.test("submission cell wraps the student code", () => {
    const ex = exercise();
    assert.equal(ex.submissionRedirection(), undefined);
    const cell = ex.submissionCell();
    assert.equal(cell.isCode, true);
    assert.equal(cell.source, submissionBanner("ex1", FIXTURE_STUDENT_CODE));
    assert.equal(
      ex.submissionCellFilled().source,
      submissionBanner("ex1", FIXTURE_ANSWER),
    );
  });

  await t.test("redirected exercises point to the target notebook", () => {
    const ex = exercise({ studentCode: "# redirect-to: main.ipynb\n" });
    assert.equal(ex.submissionRedirection(), "main.ipynb");
    assert.equal(ex.submissionCell().source, redirectionNotice("main.ipynb"));
    assert.equal(
      exercise({ studentCode: "#redirect-to:lab.ipynb" }).submissionRedirection(),
      "lab.ipynb",
    );
    assert.equal(
      exercise({ studentCode: "x = 1\n# redirect-to: main.ipynb" })
        .submissionRedirection(),
      undefined,
    );
  });

  await t.test("definition hash follows what students see", () => {
    const hash = exercise().definitionHash();
    assert.match(hash, /^[0-9a-f]{40}$/);
    assert.equal(exercise().definitionHash(), hash);
    assert.equal(exercise({}, "ex1").definitionHash(), hash);
    assert.notEqual(exercise({ title: "Sum of three" }).definitionHash(), hash);
    assert.notEqual(exercise({}, "ex2").definitionHash(), hash);
    assert.notEqual(
      exercise({ studentCode: "def add(a, b):\n    pass" }).definitionHash(),
      hash,
    );
    assert.notEqual(
      exercise({ studentTest: "assert add(2, 2) == 4" }).definitionHash(),
      hash,
    );
    assert.equal(
      exercise({ explanation: "## Other notes" }).definitionHash(),
      hash,
    );
    assert.equal(exercise({ answer: "def add(a, b): return b + a" })
      .definitionHash(), hash);
  });

  await t.test("generateSetting resolves judge parameters per exercise", () => {
    const params: JudgeParameters = {
      default: { environment: "python3", time_limit: 2, memory_limit: 256 },
      override: { ex1: { time_limit: 5 } },
    };
    assert.deepEqual(exercise().generateSetting(params), {
      mode: "strict",
      exercise_key: "ex1",
      version: "v1",
      environment: "python3",
      time_limit: 5,
      memory_limit: 256,
      student_code: FIXTURE_STUDENT_CODE,
      required_files: [],
    });
    assert.equal(exercise({}, "ex2").generateSetting(params).time_limit, 2);
  });
});
