import { splitLinesKeepEnds } from "../universal/text-utils.ts";

export enum NotebookCellType {
  Code = "code",
  Markdown = "markdown",
  Raw = "raw",
}

/** Code cell as stored in an `.ipynb` file. */
export interface IpynbCodeCell {
  readonly cell_type: "code";
  readonly execution_count: number | null;
  readonly metadata: Record<string, unknown>;
  readonly outputs: readonly unknown[];
  readonly source: readonly string[];
}

/** Markdown or raw cell as stored in an `.ipynb` file. */
export interface IpynbTextCell {
  readonly cell_type: "markdown" | "raw";
  readonly metadata: Record<string, unknown>;
  readonly source: readonly string[];
}

export type IpynbCell = IpynbCodeCell | IpynbTextCell;

/**
 * One notebook cell reduced to what the schema engine cares about: its kind
 * and its text. Instances are frozen and compare by value with `equals`.
 */
export class Cell {
  constructor(
    readonly cellType: NotebookCellType,
    readonly source: string,
  ) {
    Object.freeze(this);
  }

  get isCode(): boolean {
    return this.cellType === NotebookCellType.Code;
  }

  equals(other: Cell): boolean {
    return this.cellType === other.cellType && this.source === other.source;
  }

  /**
   * Serialize to the notebook cell representation. Code cells carry empty
   * execution state; the source is stored as lines keeping their endings.
   */
  toIpynb(): IpynbCell {
    const source = splitLinesKeepEnds(this.source);
    if (this.cellType === NotebookCellType.Code) {
      return {
        cell_type: "code",
        execution_count: null,
        metadata: {},
        outputs: [],
        source,
      };
    }
    const cellType = this.cellType === NotebookCellType.Raw
      ? "raw"
      : "markdown";
    return { cell_type: cellType, metadata: {}, source };
  }

  static code(source: string): Cell {
    return new Cell(NotebookCellType.Code, source);
  }

  static markdown(source: string): Cell {
    return new Cell(NotebookCellType.Markdown, source);
  }

  static raw(source: string): Cell {
    return new Cell(NotebookCellType.Raw, source);
  }
}
