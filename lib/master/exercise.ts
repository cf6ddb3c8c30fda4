/**
 * @module exercise
 *
 * The validated record of one exercise and the views derived from it.
 *
 * A record is built once from the field groups of a master document
 * (`exerciseFromFieldGroups`) and is immutable afterwards except for its
 * administrative `version` and `deadlines`, which the cleanup pass may renew.
 *
 * Redirection: when the first line of the student code cell reads
 * `# redirect-to: <file>.ipynb`, the exercise's editable code lives in that
 * other notebook. Its own form then shows a pointer notice instead of the
 * banner cell, and its version is registered in the target's metadata.
 */
import { createHash } from "node:crypto";
import { Cell, NotebookCellType } from "../ipynb/cell.ts";
import { completeDeadlines, type Deadlines } from "../ipynb/metadata.ts";
import { firstLine, snippet, splitLinesKeepEnds } from "../universal/text-utils.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildEventBus } from "./events.ts";
import {
  type FieldKey,
  fieldSchema,
  requiredFieldKeys,
  validateField,
} from "./field-schema.ts";
import {
  type JudgeParameters,
  resolveJudgeParameters,
} from "./judge-params.ts";
import {
  type JudgeSetting,
  loadSystemTestSetting,
  type SettingGenerator,
} from "./judge-setting.ts";
import type { FieldGroups } from "./segmenter.ts";

/**
 * The banner wraps the editable code of every form. The `<[ key ]>` line is
 * what redirect validation searches for; it must stay exactly as it is.
 */
export const SUBMISSION_CELL_FORMAT = `
##########################################################
##  <[ {exercise_key} ]> 解答セル (Answer cell)
##  このコメントの書き変えを禁ず (Never edit this comment)
##########################################################

{content}`.trim();

export const REDIRECTION_CELL_FORMAT = `
# このセルではなく {redirect_to} を使ってください
# Use {redirect_to} instead of this cell
`.trim();

export const REDIRECT_DIRECTIVE = /^#[ \t]*redirect-to[ \t]*:[ \t]*(\S+?\.ipynb)/;

export const FILE_CELL_HEADER = /^#+\s+([^/]{1,255})$/;

/** Judge setting written beside the system test files. */
export const SETTING_FILE = "setting.json";

/** The marker a form must contain for `exerciseKey`. */
export function bannerMarker(exerciseKey: string): string {
  return `<[ ${exerciseKey} ]>`;
}

export function submissionBanner(exerciseKey: string, content: string): string {
  return SUBMISSION_CELL_FORMAT
    .replace("{exercise_key}", () => exerciseKey)
    .replace("{content}", () => content);
}

export function redirectionNotice(redirectTo: string): string {
  return REDIRECTION_CELL_FORMAT.replaceAll("{redirect_to}", () => redirectTo);
}

export interface SystemTestCase {
  readonly filename: string;
  readonly content: string;
  readonly cell: Cell;
}

/**
 * Split a file-bearing code cell into its file name (from the heading-style
 * first line) and its body.
 *
 * @example
 * ```ts
 * splitFileCodeCell(Cell.code("# notes.txt\nhello\n"));
 * // { filename: "notes.txt", content: "hello\n", cell }
 * ```
 */
export function splitFileCodeCell(cell: Cell): SystemTestCase {
  if (!cell.isCode) {
    throw new MasterDocumentError(
      `A file cell must be a code cell: ${snippet(cell.source)}`,
      "EXTRACTION",
      { field: "SYSTEM_TEST_CASES", snippet: snippet(cell.source) },
    );
  }
  const lines = splitLinesKeepEnds(cell.source.trim());
  const header = (lines[0] ?? "").trim();
  const m = FILE_CELL_HEADER.exec(header);
  if (!m) {
    throw new MasterDocumentError(
      `Pattern \`${FILE_CELL_HEADER.source}\` does not match the first line of a file code cell: \`${header}\``,
      "EXTRACTION",
      { field: "SYSTEM_TEST_CASES", snippet: snippet(cell.source) },
    );
  }
  const filename = m[1];
  if (filename === "." || filename === "..") {
    throw new MasterDocumentError(
      `\`${filename}\` is not a file name: \`${header}\``,
      "EXTRACTION",
      { field: "SYSTEM_TEST_CASES", snippet: snippet(cell.source) },
    );
  }
  return {
    filename,
    content: `${lines.slice(1).join("").trim()}\n`,
    cell,
  };
}

export interface ExerciseInit {
  readonly key: string;
  readonly dirpath: string;
  readonly version: string;
  readonly title: string;
  readonly content: readonly Cell[];
  readonly studentCodeCell: Cell;
  readonly explanation?: readonly Cell[];
  readonly answerExamples?: readonly Cell[];
  readonly studentTests?: readonly Cell[];
  readonly systemTestCases: readonly SystemTestCase[];
  readonly systemTestSetting: SettingGenerator;
  readonly deadlines?: Partial<Deadlines>;
}

export class Exercise {
  readonly key: string;
  readonly dirpath: string;
  readonly title: string;
  readonly content: readonly Cell[];
  readonly studentCodeCell: Cell;
  readonly explanation: readonly Cell[];
  readonly answerExamples: readonly Cell[];
  readonly studentTests: readonly Cell[];
  readonly systemTestCases: readonly SystemTestCase[];
  readonly systemTestSetting: SettingGenerator;
  version: string;
  deadlines: Deadlines;

  constructor(init: ExerciseInit) {
    this.key = init.key;
    this.dirpath = init.dirpath;
    this.version = init.version;
    this.title = init.title;
    this.content = Object.freeze([...init.content]);
    this.studentCodeCell = init.studentCodeCell;
    this.explanation = Object.freeze([...(init.explanation ?? [])]);
    this.answerExamples = Object.freeze([...(init.answerExamples ?? [])]);
    this.studentTests = Object.freeze([...(init.studentTests ?? [])]);
    this.systemTestCases = Object.freeze([...init.systemTestCases]);
    this.systemTestSetting = init.systemTestSetting;
    this.deadlines = completeDeadlines(init.deadlines);
  }

  /** Target notebook when the student code cell redirects, else undefined. */
  submissionRedirection(): string | undefined {
    const m = REDIRECT_DIRECTIVE.exec(firstLine(this.studentCodeCell.source));
    return m ? m[1] : undefined;
  }

  /** The cell students edit: the banner, or the redirect notice. */
  submissionCell(): Cell {
    const redirectTo = this.submissionRedirection();
    const source = redirectTo
      ? redirectionNotice(redirectTo)
      : submissionBanner(this.key, this.studentCodeCell.source);
    return new Cell(NotebookCellType.Code, source);
  }

  /** Banner filled with the first answer example, for a fully solved form. */
  submissionCellFilled(): Cell {
    const answer = this.answerExamples[0] ?? this.studentCodeCell;
    return new Cell(
      NotebookCellType.Code,
      submissionBanner(this.key, answer.source),
    );
  }

  /** SHA-1 over the canonical JSON of what students see of this exercise. */
  definitionHash(): string {
    const definition = {
      content: this.content.map((c) => c.toIpynb()),
      submission_cell: this.submissionCell().toIpynb(),
      student_tests: this.studentTests.map((c) => c.toIpynb()),
    };
    return createHash("sha1").update(JSON.stringify(definition)).digest("hex");
  }

  generateSetting(params: JudgeParameters): JudgeSetting {
    const { environment, time_limit, memory_limit } = resolveJudgeParameters(
      params,
      this.key,
    );
    return this.systemTestSetting(
      environment,
      time_limit,
      memory_limit,
      this.key,
      this.version,
      this.studentCodeCell.source,
    );
  }
}

/** Fields that are recognized in masters but never stored in the record. */
const isMaterialized = (key: FieldKey) => fieldSchema[key].materialized;

/**
 * Validate every field group and assemble the exercise record. The first
 * violation aborts with a `STRUCTURE` error.
 */
export function exerciseFromFieldGroups(
  groups: FieldGroups,
  identity: {
    readonly key: string;
    readonly dirpath: string;
    readonly version: string;
    readonly deadlines?: Partial<Deadlines>;
  },
  options?: { bus?: BuildEventBus },
): Exercise {
  let title: string | undefined;

  for (const [field, cells] of groups) {
    if (!isMaterialized(field)) continue;
    const result = validateField(field, cells);
    if (!result.ok) {
      throw new MasterDocumentError(result.violation.message, "STRUCTURE", {
        field,
        snippet: result.violation.snippet,
      });
    }
    if (field === "CONTENT") title = result.heading;
    options?.bus?.emit("field:validated", {
      key: identity.key,
      field,
      cells: cells.length,
    });
  }

  const missing = requiredFieldKeys.filter((k) => !groups.has(k));
  if (missing.length > 0) {
    throw new MasterDocumentError(
      `Required field(s) ${missing.map((k) => `\`${k}\``).join(", ")} missing.`,
      "STRUCTURE",
      { field: missing[0] },
    );
  }

  const cellsOf = (field: FieldKey): readonly Cell[] => groups.get(field) ?? [];
  const [studentCodeCell] = cellsOf("STUDENT_CODE_CELL");
  const [settingCell] = cellsOf("SYSTEM_TEST_SETTING");
  if (title === undefined || !studentCodeCell || !settingCell) {
    throw new MasterDocumentError(
      "Content heading, student code cell and system test setting are required.",
      "STRUCTURE",
    );
  }

  const systemTestCases = cellsOf("SYSTEM_TEST_CASES").map(splitFileCodeCell);
  const filenames = new Set<string>([SETTING_FILE]);
  for (const { filename, cell } of systemTestCases) {
    if (filenames.has(filename)) {
      throw new MasterDocumentError(
        filename === SETTING_FILE
          ? `\`${SETTING_FILE}\` is reserved for the judge setting.`
          : `System test file \`${filename}\` is declared more than once.`,
        "EXTRACTION",
        { field: "SYSTEM_TEST_CASES", snippet: snippet(cell.source) },
      );
    }
    filenames.add(filename);
  }

  return new Exercise({
    ...identity,
    title,
    content: cellsOf("CONTENT"),
    studentCodeCell,
    explanation: cellsOf("EXPLANATION"),
    answerExamples: cellsOf("ANSWER_EXAMPLES"),
    studentTests: cellsOf("STUDENT_TESTS"),
    systemTestCases,
    systemTestSetting: loadSystemTestSetting(settingCell),
  });
}
