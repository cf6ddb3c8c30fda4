/**
 * @module release
 *
 * Releases masters as they are, without segmenting them: the master keeps its
 * cells and is marked `autograde: false`, and its form is a copy of it with
 * `extraction: false`.
 */
import { createHash } from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import { zipSync } from "fflate";
import { NotebookCellType } from "../ipynb/cell.ts";
import {
  loadCells,
  normalizedCells,
  type RawNotebookCell,
  saveAsNotebook,
} from "../ipynb/io.ts";
import {
  type Deadlines,
  masterMetadata,
  masterMetadataDeadlines,
  masterMetadataVersion,
  submissionMetadata,
} from "../ipynb/metadata.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildEventBus } from "./events.ts";
import { MASTER_EXTENSION } from "./loader.ts";
import type { VersionRenewal } from "./publish.ts";

export const AS_IS_ARCHIVE = "as-is_masters.zip";

const FIRST_HEADING = /^#+\s+(.*)$/m;

/** Text of the first Markdown heading in any Markdown cell. */
export function firstHeading(
  cells: readonly RawNotebookCell[],
): string | undefined {
  for (const [cellType, source] of normalizedCells(cells)) {
    if (cellType !== NotebookCellType.Markdown) continue;
    const m = FIRST_HEADING.exec(source);
    if (m) return m[1];
  }
  return undefined;
}

/** SHA-1 over the JSON of a master's cells as stored. */
export function rawCellsHash(cells: readonly RawNotebookCell[]): string {
  return createHash("sha1").update(JSON.stringify(cells)).digest("hex");
}

export interface ReleaseOptions {
  readonly deadlines?: Deadlines;
  readonly renewVersion?: VersionRenewal;
  readonly bus?: BuildEventBus;
}

export interface ReleasedMaster {
  readonly key: string;
  readonly version: string;
  readonly masterPath: string;
  readonly formPath: string;
}

export function releaseMaster(
  filePath: string,
  options: ReleaseOptions = {},
): ReleasedMaster {
  const { bus, renewVersion } = options;
  const key = path.basename(filePath, MASTER_EXTENSION);
  const { cells, metadata } = loadCells(filePath);

  let version = masterMetadataVersion(metadata);
  if (renewVersion) {
    version = renewVersion.kind === "hash"
      ? rawCellsHash(cells)
      : renewVersion.version;
  }
  const deadlines = options.deadlines ?? masterMetadataDeadlines(metadata);

  saveAsNotebook(
    filePath,
    cells,
    masterMetadata(key, false, version, firstHeading(cells), deadlines),
  );
  bus?.emit("release:master", { path: filePath });

  const formPath = path.join(path.dirname(filePath), `form_${key}.ipynb`);
  saveAsNotebook(formPath, cells, submissionMetadata({ [key]: version }, false));
  bus?.emit("release:form", { path: formPath });

  return { key, version, masterPath: filePath, formPath };
}

/**
 * Release every source master and, when `archivePath` is given, zip the
 * released masters flat into it. Sources are checked before anything is
 * written: each must be an `.ipynb` file and keys must be unique.
 */
export function releaseAsIs(
  sourcePaths: readonly string[],
  options: ReleaseOptions & { readonly archivePath?: string } = {},
): ReleasedMaster[] {
  const existingKeys = new Map<string, string>();
  for (const filePath of sourcePaths) {
    if (path.extname(filePath) !== MASTER_EXTENSION) {
      throw new MasterDocumentError(
        `Not ipynb: \`${filePath}\``,
        "IDENTITY",
        { path: filePath },
      );
    }
    const key = path.basename(filePath, MASTER_EXTENSION);
    const existing = existingKeys.get(key);
    if (existing !== undefined) {
      throw new MasterDocumentError(
        `Exercise key conflicts between \`${filePath}\` and \`${existing}\`.`,
        "IDENTITY",
        { path: filePath, conflictsWith: existing },
      );
    }
    existingKeys.set(key, filePath);
  }

  const released = sourcePaths.map((p) => releaseMaster(p, options));

  if (options.archivePath) {
    const entries: Record<string, Uint8Array> = {};
    for (const { masterPath } of released) {
      entries[path.basename(masterPath)] = fs.readFileSync(masterPath);
    }
    fs.writeFileSync(options.archivePath, zipSync(entries, { level: 6 }));
    options.bus?.emit("release:archive", { path: options.archivePath });
  }
  return released;
}
