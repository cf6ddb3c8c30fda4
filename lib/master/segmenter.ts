/**
 * @module segmenter
 *
 * Splits the flat cell sequence of a master document into field groups.
 *
 * A markdown cell containing exactly one `***CONTENT_TYPE: <FIELD>***` marker
 * opens the field `<FIELD>`; every following non-blank cell belongs to it until
 * the next marker. The marker cell itself belongs to no field.
 *
 * The scan is a two-state machine:
 *
 * - `no-field`: nothing declared yet; any content cell is a structural error.
 * - `in-field`: cells accumulate into the current field's group.
 *
 * Unknown field names, a cell with several markers and a field declared twice
 * are fatal. Validation of the groups against the field schema happens
 * afterwards (see `validateField`).
 */
import { Cell, NotebookCellType } from "../ipynb/cell.ts";
import { snippet } from "../universal/text-utils.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildEventBus } from "./events.ts";
import { type FieldKey, isFieldKey } from "./field-schema.ts";

export const CONTENT_TYPE_MARKER = /\*\*\*CONTENT_TYPE:\s*(.+?)\*\*\*/g;

export type SegmenterState =
  | { readonly kind: "no-field" }
  | { readonly kind: "in-field"; readonly key: FieldKey; readonly cells: Cell[] };

export type FieldGroups = ReadonlyMap<FieldKey, readonly Cell[]>;

/** Field names declared by the markers in `text`, in order. */
export function contentTypeMarkers(text: string): string[] {
  return Array.from(text.matchAll(CONTENT_TYPE_MARKER), (m) => m[1]);
}

export function segmentCells(
  cells: Iterable<readonly [NotebookCellType, string]>,
  options?: { bus?: BuildEventBus },
): FieldGroups {
  const bus = options?.bus;
  const groups = new Map<FieldKey, Cell[]>();
  let state: SegmenterState = { kind: "no-field" };

  const flush = () => {
    if (state.kind === "in-field") groups.set(state.key, state.cells);
  };

  const requireField = (source: string) => {
    if (state.kind === "no-field") {
      throw new MasterDocumentError(
        `A cell appears before any field is declared: ${snippet(source)}`,
        "STRUCTURE",
        { snippet: snippet(source) },
      );
    }
    return state;
  };

  for (const [cellType, source] of cells) {
    bus?.emit("segment:trace", {
      field: state.kind === "in-field" ? state.key : undefined,
      snippet: snippet(source),
    });
    if (source.trim() === "") continue;

    if (cellType !== NotebookCellType.Markdown) {
      requireField(source).cells.push(new Cell(cellType, source));
      continue;
    }

    const markers = contentTypeMarkers(source);
    if (markers.length === 0) {
      requireField(source).cells.push(new Cell(cellType, source));
      continue;
    }
    if (markers.length > 1) {
      throw new MasterDocumentError(
        `Multiple field keys found in cell ${snippet(source)}.`,
        "STRUCTURE",
        { snippet: snippet(source) },
      );
    }

    const name = markers[0].trim();
    if (!isFieldKey(name)) {
      throw new MasterDocumentError(
        `Unknown field \`${name}\`.`,
        "STRUCTURE",
        { field: name, snippet: snippet(source) },
      );
    }
    if (groups.has(name) || (state.kind === "in-field" && state.key === name)) {
      throw new MasterDocumentError(
        `Field \`${name}\` is declared more than once.`,
        "STRUCTURE",
        { field: name, snippet: snippet(source) },
      );
    }

    flush();
    state = { kind: "in-field", key: name, cells: [] };
  }

  flush();
  return groups;
}
