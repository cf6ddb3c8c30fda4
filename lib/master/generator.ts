/**
 * @module generator
 *
 * Pure renderings of exercise records into the cells and metadata of output
 * notebooks. Nothing here touches the filesystem; `publish.ts` decides where
 * the results go.
 *
 * | artifact       | cells                                                    |
 * | -------------- | -------------------------------------------------------- |
 * | answer key     | content, answer examples, summarized tests, explanation  |
 * | form           | content, submission cell, student tests                  |
 * | filled form    | one filled banner per exercise                           |
 * | configuration  | content + student code cell, setting, test/required files |
 *
 * Bundles prepend an introduction and concatenate their exercises in key
 * order.
 */
import * as path from "node:path";
import { Cell, type IpynbCell, NotebookCellType } from "../ipynb/cell.ts";
import {
  cellSourceText,
  type NotebookMetadata,
  type RawNotebookCell,
} from "../ipynb/io.ts";
import { submissionMetadata } from "../ipynb/metadata.ts";
import { splitLines } from "../universal/text-utils.ts";
import { MasterDocumentError } from "./errors.ts";
import { bannerMarker, type Exercise, type SystemTestCase } from "./exercise.ts";
import type { JudgeParameters } from "./judge-params.ts";
import { type JudgeSetting, requiredFiles } from "./judge-setting.ts";

/** Lines starting with this are judge decorators, hidden from answer keys. */
export const TEST_DECORATOR_PREFIX = "@judge_util.";

const isDecoratorLine = (line: string) => line.startsWith(TEST_DECORATOR_PREFIX);

/**
 * One code cell showing the system tests to instructors: each test file from
 * its first decorator on, without decorator lines, separated by blank lines.
 */
export function summarizeTestCases(exercise: Exercise): Cell {
  const contents: string[] = [];
  for (const { content } of exercise.systemTestCases) {
    const lines = splitLines(content);
    const start = lines.findIndex(isDecoratorLine);
    if (start >= 0) {
      contents.push(...lines.slice(start).filter((l) => !isDecoratorLine(l)));
    }
    contents.push("");
  }
  contents.pop();
  return new Cell(NotebookCellType.Code, contents.join("\n"));
}

export function answerCells(exercise: Exercise): Cell[] {
  return [
    ...exercise.content,
    ...exercise.answerExamples,
    summarizeTestCases(exercise),
    ...exercise.explanation,
  ];
}

export function formCells(exercise: Exercise): Cell[] {
  return [
    ...exercise.content,
    exercise.submissionCell(),
    ...exercise.studentTests,
  ];
}

/** `{ key: version }` of the exercises whose answers a form collects. */
export function formVersions(
  exercises: readonly Exercise[],
): Record<string, string> {
  return Object.fromEntries(
    exercises
      .filter((ex) => ex.submissionRedirection() === undefined)
      .map((ex) => [ex.key, ex.version]),
  );
}

export function sortedByKey(exercises: readonly Exercise[]): Exercise[] {
  return [...exercises].sort((a, b) =>
    a.key < b.key ? -1 : a.key > b.key ? 1 : 0
  );
}

/** The introduction of a bundle, or a single heading named after it. */
export function bundleIntroduction(
  dirpath: string,
  introCells?: readonly Cell[],
): Cell[] {
  if (introCells) return [...introCells];
  return [new Cell(NotebookCellType.Markdown, `# ${path.basename(dirpath)}`)];
}

export function bundledAnswerCells(
  intro: readonly Cell[],
  exercises: readonly Exercise[],
): Cell[] {
  return [...intro, ...sortedByKey(exercises).flatMap(answerCells)];
}

export function bundledFormCells(
  intro: readonly Cell[],
  exercises: readonly Exercise[],
): Cell[] {
  return [...intro, ...sortedByKey(exercises).flatMap(formCells)];
}

export function filledFormCells(exercises: readonly Exercise[]): Cell[] {
  return exercises.map((ex) => ex.submissionCellFilled());
}

export function filledFormMetadata(
  exercises: readonly Exercise[],
): NotebookMetadata {
  return submissionMetadata(
    Object.fromEntries(exercises.map((ex) => [ex.key, ex.version])),
    true,
  );
}

export function toIpynbCells(cells: readonly Cell[]): IpynbCell[] {
  return cells.map((c) => c.toIpynb());
}

function registeredExercises(metadata: NotebookMetadata): Record<string, string> {
  const section = metadata.judge_submission;
  if (typeof section !== "object" || section === null) return {};
  if (!("exercises" in section)) return {};
  const { exercises } = section;
  if (typeof exercises !== "object" || exercises === null) return {};
  return Object.fromEntries(
    Object.entries(exercises).filter((e): e is [string, string] =>
      typeof e[1] === "string"
    ),
  );
}

/**
 * Metadata for the notebook a redirected exercise points to. The target must
 * already hold a code cell with the exercise's banner marker; the exercise's
 * version is added to what the target already registers.
 */
export function redirectStubMetadata(
  exercise: Exercise,
  target: {
    readonly path: string;
    readonly cells: readonly RawNotebookCell[];
    readonly metadata: NotebookMetadata;
  },
): NotebookMetadata {
  const marker = bannerMarker(exercise.key);
  const hasBanner = target.cells.some((c) =>
    c.cell_type === "code" && cellSourceText(c.source).includes(marker)
  );
  if (!hasBanner) {
    throw new MasterDocumentError(
      `${path.basename(target.path)} has no answer cell for ${exercise.key}.`,
      "CROSS_REFERENCE",
      { path: target.path, field: "STUDENT_CODE_CELL" },
    );
  }
  return submissionMetadata(
    { ...registeredExercises(target.metadata), [exercise.key]: exercise.version },
    true,
  );
}

export interface ExerciseConfiguration {
  /** Stripped master: content and the student code cell only. */
  readonly masterCells: Cell[];
  readonly setting: JudgeSetting;
  readonly testFiles: readonly SystemTestCase[];
  /** Paths relative to the exercise directory, copied verbatim. */
  readonly requiredFiles: string[];
}

export function exerciseConfiguration(
  exercise: Exercise,
  params: JudgeParameters,
): ExerciseConfiguration {
  const setting = exercise.generateSetting(params);
  return {
    masterCells: [...exercise.content, exercise.studentCodeCell],
    setting,
    testFiles: exercise.systemTestCases,
    requiredFiles: requiredFiles(setting),
  };
}

/** `setting.json` body: one-space indentation, UTF-8 kept as is. */
export function settingJson(setting: JudgeSetting): string {
  return JSON.stringify(setting, null, 1);
}
