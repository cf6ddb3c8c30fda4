import * as fs from "node:fs";
import * as path from "node:path";
import { z } from "zod";
import { type IpynbCell, NotebookCellType } from "./cell.ts";

/**
 * Cells are validated just enough to be normalized; everything else a cell
 * carries (outputs, attachments, ids) is kept so a notebook can be written
 * back unchanged.
 */
export const rawNotebookCellSchema = z.looseObject({
  cell_type: z.enum(["code", "markdown", "raw"]),
  source: z.union([z.string(), z.array(z.string())]),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export const notebookFileSchema = z.looseObject({
  cells: z.array(rawNotebookCellSchema),
  metadata: z.record(z.string(), z.unknown()).default({}),
});

export type RawNotebookCell = z.infer<typeof rawNotebookCellSchema>;
export type NotebookMetadata = Record<string, unknown>;

export interface LoadedNotebook {
  readonly cells: RawNotebookCell[];
  readonly metadata: NotebookMetadata;
}

export class NotebookFormatError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "NotebookFormatError";
  }
}

export const NBFORMAT = 4;
export const NBFORMAT_MINOR = 4;

/** Read a notebook file and return its cells and metadata. */
export function loadCells(filePath: string): LoadedNotebook {
  const text = fs.readFileSync(filePath, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new NotebookFormatError(
      `Notebook \`${filePath}\` is not valid JSON.`,
      filePath,
      error,
    );
  }
  const parsed = notebookFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new NotebookFormatError(
      `Notebook \`${filePath}\` has an unexpected structure: ${
        z.prettifyError(parsed.error)
      }`,
      filePath,
      parsed.error,
    );
  }
  return { cells: parsed.data.cells, metadata: parsed.data.metadata };
}

/** Replace `filePath` with a notebook made of `cells` and `metadata`. */
export function saveAsNotebook(
  filePath: string,
  cells: readonly (RawNotebookCell | IpynbCell)[],
  metadata: NotebookMetadata,
): void {
  const dir = path.dirname(filePath);
  if (dir) fs.mkdirSync(dir, { recursive: true });
  const notebook = {
    cells,
    metadata,
    nbformat: NBFORMAT,
    nbformat_minor: NBFORMAT_MINOR,
  };
  fs.writeFileSync(filePath, `${JSON.stringify(notebook, null, 1)}\n`, "utf-8");
}

export function cellTypeOf(
  rawType: RawNotebookCell["cell_type"],
): NotebookCellType {
  switch (rawType) {
    case "code":
      return NotebookCellType.Code;
    case "markdown":
      return NotebookCellType.Markdown;
    case "raw":
      return NotebookCellType.Raw;
  }
}

export function cellSourceText(source: RawNotebookCell["source"]): string {
  return Array.isArray(source) ? source.join("") : source;
}

/** `(kind, text)` pairs in document order; array sources are joined. */
export function normalizedCells(
  cells: readonly RawNotebookCell[],
): Array<[NotebookCellType, string]> {
  return cells.map((cell) => [
    cellTypeOf(cell.cell_type),
    cellSourceText(cell.source),
  ]);
}
