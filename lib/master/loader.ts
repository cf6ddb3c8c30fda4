import * as fs from "node:fs";
import * as path from "node:path";
import { loadCells, normalizedCells } from "../ipynb/io.ts";
import {
  masterMetadataDeadlines,
  masterMetadataVersion,
} from "../ipynb/metadata.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildEventBus } from "./events.ts";
import { type Exercise, exerciseFromFieldGroups } from "./exercise.ts";
import { segmentCells } from "./segmenter.ts";

export const MASTER_EXTENSION = ".ipynb";

export function masterPath(dirpath: string, exerciseKey: string): string {
  return path.join(dirpath, `${exerciseKey}${MASTER_EXTENSION}`);
}

export type MasterLoader = (
  dirpath: string,
  exerciseKey: string,
  options?: { bus?: BuildEventBus },
) => Exercise;

/**
 * Load and validate the master `<dirpath>/<exerciseKey>.ipynb`. Errors raised
 * while parsing are tagged with the master's path.
 */
export const loadExercise: MasterLoader = (dirpath, exerciseKey, options) => {
  const filePath = masterPath(dirpath, exerciseKey);
  const { cells, metadata } = loadCells(filePath);
  try {
    const groups = segmentCells(normalizedCells(cells), options);
    return exerciseFromFieldGroups(groups, {
      key: exerciseKey,
      dirpath,
      version: masterMetadataVersion(metadata),
      deadlines: masterMetadataDeadlines(metadata),
    }, options);
  } catch (error) {
    if (error instanceof MasterDocumentError) throw error.located(filePath);
    throw error;
  }
};

export interface LoadedSources {
  /** Exercises given as individual files, in sorted path order. */
  readonly separates: Exercise[];
  /** Exercises found in directories, keyed by directory path. */
  readonly bundles: Map<string, Exercise[]>;
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Discover masters from files and directories.
 *
 * - A directory `<dir>` contributes every `<dir>-*.ipynb` / `<dir>_*.ipynb`
 *   inside it, as one bundle.
 * - A file contributes itself when it ends in `.ipynb`; anything else is
 *   skipped.
 *
 * Sources and directory listings are processed in sorted order. Exercise keys
 * must be unique across everything loaded; the first conflict aborts.
 */
export function loadSources(
  sourcePaths: Iterable<string>,
  options?: { bus?: BuildEventBus; loader?: MasterLoader },
): LoadedSources {
  const bus = options?.bus;
  const loader = options?.loader ?? loadExercise;
  const separates: Exercise[] = [];
  const bundles = new Map<string, Exercise[]>();
  const existingKeys = new Map<string, string>();

  const register = (exerciseKey: string, filePath: string) => {
    const existing = existingKeys.get(exerciseKey);
    if (existing !== undefined) {
      throw new MasterDocumentError(
        `Exercise key conflicts between \`${filePath}\` and \`${existing}\`.`,
        "IDENTITY",
        { path: filePath, conflictsWith: existing },
      );
    }
    existingKeys.set(exerciseKey, filePath);
  };

  for (const sourcePath of [...sourcePaths].sort()) {
    if (fs.statSync(sourcePath).isDirectory()) {
      const dirpath = sourcePath;
      const dirname = path.basename(dirpath);
      const pattern = new RegExp(
        `^(${escapeRegExp(dirname)}[-_].*)${escapeRegExp(MASTER_EXTENSION)}$`,
      );
      bus?.emit("source:scan", { dirpath });
      const exercises: Exercise[] = [];
      for (const entry of fs.readdirSync(dirpath).sort()) {
        const m = pattern.exec(entry);
        if (!m) continue;
        const exerciseKey = m[1];
        const filePath = path.join(dirpath, entry);
        register(exerciseKey, filePath);
        exercises.push(loader(dirpath, exerciseKey, { bus }));
        bus?.emit("source:loaded", { path: filePath, key: exerciseKey });
      }
      if (exercises.length > 0) bundles.set(dirpath, exercises);
      continue;
    }

    const filePath = sourcePath;
    if (!filePath.endsWith(MASTER_EXTENSION)) {
      bus?.emit("source:skipped", { path: filePath });
      continue;
    }
    const dirpath = path.dirname(filePath);
    const exerciseKey = path.basename(filePath, MASTER_EXTENSION);
    register(exerciseKey, filePath);
    separates.push(loader(dirpath, exerciseKey, { bus }));
    bus?.emit("source:loaded", { path: filePath, key: exerciseKey });
  }

  return { separates, bundles };
}

/** Every loaded exercise: bundles first, then separates. */
export function allExercises(sources: LoadedSources): Exercise[] {
  return [...Array.from(sources.bundles.values()).flat(), ...sources.separates];
}
