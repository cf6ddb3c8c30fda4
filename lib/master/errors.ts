export type MasterDocumentErrorCode =
  | "STRUCTURE"
  | "IDENTITY"
  | "CROSS_REFERENCE"
  | "EXTRACTION"
  | "CONFIGURATION";

/** Where a fatal condition was found. */
export interface MasterDocumentErrorContext {
  readonly path?: string;
  readonly field?: string;
  readonly snippet?: string;
  readonly conflictsWith?: string;
}

/**
 * Every schema violation aborts the build; there is no warn-and-continue
 * mode. `code` tells which category the violation belongs to.
 */
export class MasterDocumentError extends Error {
  constructor(
    message: string,
    readonly code: MasterDocumentErrorCode,
    readonly context: MasterDocumentErrorContext = {},
  ) {
    super(message);
    this.name = "MasterDocumentError";
  }

  /** Same error with `path` filled in when it was not known at throw time. */
  located(path: string): MasterDocumentError {
    if (this.context.path) return this;
    const located = new MasterDocumentError(
      `${this.message} (in \`${path}\`)`,
      this.code,
      { ...this.context, path },
    );
    located.stack = this.stack;
    return located;
  }
}
