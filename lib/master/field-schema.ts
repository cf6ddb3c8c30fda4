import { type Cell, NotebookCellType } from "../ipynb/cell.ts";
import { firstLine, snippet } from "../universal/text-utils.ts";

export const FIELD_KEYS = [
  "WARNING",
  "CONTENT",
  "STUDENT_CODE_CELL",
  "EXPLANATION",
  "ANSWER_EXAMPLES",
  "STUDENT_TESTS",
  "SYSTEM_TEST_CASES",
  "SYSTEM_TEST_CASES_EXECUTE_CELL",
  "SYSTEM_TEST_SETTING",
] as const;

export type FieldKey = typeof FIELD_KEYS[number];

export type FieldConstraint =
  | "SINGLE"
  | "LIST"
  | "OPTIONAL"
  | "MARKDOWN_HEADED"
  | "FILE"
  | "CODE";

/**
 * Constraints of one field.
 *
 * - `cardinality`: `single` means exactly one cell, `list` one or more,
 *   `unconstrained` no count at all. `optional` lifts the lower bound and,
 *   as shipped masters rely on, the upper bound too.
 * - `materialized`: whether the field ends up in the exercise record. Fields
 *   that are not are only recognized as valid markers.
 */
export interface FieldSpec {
  readonly key: FieldKey;
  readonly cardinality: "single" | "list" | "unconstrained";
  readonly optional: boolean;
  readonly markdownHeaded: boolean;
  readonly file: boolean;
  readonly code: boolean;
  readonly materialized: boolean;
}

const field = (
  key: FieldKey,
  cardinality: FieldSpec["cardinality"],
  flags: Partial<Omit<FieldSpec, "key" | "cardinality">> = {},
): FieldSpec =>
  Object.freeze({
    key,
    cardinality,
    optional: flags.optional ?? false,
    markdownHeaded: flags.markdownHeaded ?? false,
    file: flags.file ?? false,
    code: flags.code ?? false,
    materialized: flags.materialized ?? true,
  });

export const fieldSchema: Readonly<Record<FieldKey, FieldSpec>> = Object.freeze(
  {
    WARNING: field("WARNING", "unconstrained", { materialized: false }),
    CONTENT: field("CONTENT", "list", { markdownHeaded: true }),
    STUDENT_CODE_CELL: field("STUDENT_CODE_CELL", "single", { code: true }),
    EXPLANATION: field("EXPLANATION", "list", {
      markdownHeaded: true,
      optional: true,
    }),
    ANSWER_EXAMPLES: field("ANSWER_EXAMPLES", "list", { optional: true }),
    STUDENT_TESTS: field("STUDENT_TESTS", "list", { optional: true }),
    SYSTEM_TEST_CASES: field("SYSTEM_TEST_CASES", "list", { file: true }),
    SYSTEM_TEST_CASES_EXECUTE_CELL: field(
      "SYSTEM_TEST_CASES_EXECUTE_CELL",
      "single",
      { code: true, materialized: false },
    ),
    SYSTEM_TEST_SETTING: field("SYSTEM_TEST_SETTING", "single"),
  },
);

export function isFieldKey(name: string): name is FieldKey {
  return Object.hasOwn(fieldSchema, name);
}

/** Membership check in the flag vocabulary masters are documented with. */
export function fieldHas(spec: FieldSpec, constraint: FieldConstraint): boolean {
  switch (constraint) {
    case "SINGLE":
      return spec.cardinality === "single";
    case "LIST":
      return spec.cardinality === "list";
    case "OPTIONAL":
      return spec.optional;
    case "MARKDOWN_HEADED":
      return spec.markdownHeaded;
    case "FILE":
      return spec.file;
    case "CODE":
      return spec.code;
  }
}

/** Fields a master must declare for an exercise record to be built. */
export const requiredFieldKeys: readonly FieldKey[] = FIELD_KEYS.filter((k) =>
  fieldSchema[k].materialized && !fieldSchema[k].optional
);

export type FieldViolationKind =
  | "empty-field"
  | "not-single-cell"
  | "non-code-cell"
  | "missing-heading";

export interface FieldViolation {
  readonly kind: FieldViolationKind;
  readonly field: FieldKey;
  readonly message: string;
  readonly snippet?: string;
}

export type FieldValidation =
  | { readonly ok: true; readonly heading?: string }
  | { readonly ok: false; readonly violation: FieldViolation };

export const HEADING_LINE = /^#+\s+(.*)$/;

/**
 * Check one field group against its constraints. Returns the first violation
 * found; for markdown-headed fields a success carries the heading text.
 */
export function validateField(
  key: FieldKey,
  cells: readonly Cell[],
): FieldValidation {
  const spec = fieldSchema[key];
  const violation = (
    kind: FieldViolationKind,
    message: string,
    cell?: Cell,
  ): FieldValidation => ({
    ok: false,
    violation: {
      kind,
      field: key,
      message,
      snippet: cell ? snippet(cell.source) : undefined,
    },
  });

  if (!spec.optional) {
    if (spec.cardinality === "list" && cells.length === 0) {
      return violation("empty-field", `Field of \`${key}\` must not be empty.`);
    }
    if (spec.cardinality === "single" && cells.length !== 1) {
      return violation(
        "not-single-cell",
        `Field of \`${key}\` must have 1 cell but has ${cells.length}.`,
        cells[1],
      );
    }
  }

  if (spec.code) {
    const offending = cells.find((c) => !c.isCode);
    if (offending) {
      return violation(
        "non-code-cell",
        `Field of \`${key}\` must have only code cell(s).`,
        offending,
      );
    }
  }

  if (spec.markdownHeaded && cells.length > 0) {
    const head = cells[0];
    const line = firstLine(head.source.trim());
    const m = head.cellType === NotebookCellType.Markdown
      ? HEADING_LINE.exec(line)
      : null;
    if (!m) {
      return violation(
        "missing-heading",
        `The first cell of \`${key}\` does not start with a heading in Markdown: \`${line}\`.`,
        head,
      );
    }
    return { ok: true, heading: m[1] };
  }

  return { ok: true };
}
