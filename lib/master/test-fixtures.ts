/**
 * Master notebooks for tests: a complete, valid exercise whose parts can be
 * swapped out one at a time.
 */
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Cell, NotebookCellType } from "../ipynb/cell.ts";
import { type NotebookMetadata, saveAsNotebook } from "../ipynb/io.ts";
import { masterPath } from "./loader.ts";

export interface MasterFixture {
  readonly title?: string;
  readonly studentCode?: string;
  readonly answer?: string;
  readonly explanation?: string;
  readonly studentTest?: string;
  /** One code cell per entry under SYSTEM_TEST_CASES. */
  readonly systemTest?: string | readonly string[];
  readonly setting?: string;
  /** Leave out EXPLANATION, ANSWER_EXAMPLES and STUDENT_TESTS. */
  readonly requiredOnly?: boolean;
}

export const FIXTURE_STUDENT_CODE = "def add(a, b):\n    ...";
export const FIXTURE_ANSWER = "def add(a, b):\n    return a + b";
export const FIXTURE_STUDENT_TEST = "assert add(1, 2) == 3";
export const FIXTURE_SYSTEM_TEST =
  "# test_add.py\nimport judge_util\n\n@judge_util.check\ndef test_add():\n    assert add(2, 3) == 5\n";

const marker = (key: string): [NotebookCellType, string] => [
  NotebookCellType.Markdown,
  `***CONTENT_TYPE: ${key}***`,
];

export function masterCellPairs(
  fixture: MasterFixture = {},
): Array<[NotebookCellType, string]> {
  const md = NotebookCellType.Markdown;
  const code = NotebookCellType.Code;
  const pairs: Array<[NotebookCellType, string]> = [
    marker("CONTENT"),
    [md, `# ${fixture.title ?? "Sum of two"}\n\nWrite \`add\`.`],
    marker("STUDENT_CODE_CELL"),
    [code, fixture.studentCode ?? FIXTURE_STUDENT_CODE],
  ];
  if (!fixture.requiredOnly) {
    pairs.push(
      marker("ANSWER_EXAMPLES"),
      [code, fixture.answer ?? FIXTURE_ANSWER],
      marker("STUDENT_TESTS"),
      [code, fixture.studentTest ?? FIXTURE_STUDENT_TEST],
      marker("EXPLANATION"),
      [md, fixture.explanation ?? "## Notes\nUse `+`."],
    );
  }
  const systemTests = fixture.systemTest ?? FIXTURE_SYSTEM_TEST;
  pairs.push(marker("SYSTEM_TEST_CASES"));
  for (const source of typeof systemTests === "string" ? [systemTests] : systemTests) {
    pairs.push([code, source]);
  }
  pairs.push(
    marker("SYSTEM_TEST_SETTING"),
    [code, fixture.setting ?? `{ mode: "strict" }`],
  );
  return pairs;
}

export function masterIpynbCells(fixture: MasterFixture = {}) {
  return masterCellPairs(fixture).map(([t, s]) => new Cell(t, s).toIpynb());
}

/** Write `<dir>/<key>.ipynb` and return its path. */
export function writeMaster(
  dir: string,
  key: string,
  fixture: MasterFixture = {},
  metadata: NotebookMetadata = {},
): string {
  const filePath = masterPath(dir, key);
  saveAsNotebook(filePath, masterIpynbCells(fixture), metadata);
  return filePath;
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "masterbook-"));
}
