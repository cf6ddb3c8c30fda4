/**
 * @module publish
 *
 * Writes the artifacts rendered by `generator.ts` next to their masters.
 *
 * ```
 * <dir>/ans_<key>.ipynb            answer key of a separate exercise
 * <dir>/form_<key>.ipynb           form of a separate exercise
 * <dir>/pseudo-form_<key>.ipynb    form of a separate, redirected exercise
 * <dir>/ans_<dir>.ipynb            answer key of a bundle
 * <dir>/form_<dir>.ipynb           form of a bundle
 * autograde/<key>.ipynb            stripped master
 * autograde/<key>/setting.json     judge setting
 * autograde/<key>/<files>          system tests and required files
 * autograde.zip                    the whole autograde/ tree
 * ```
 *
 * Every file is replaced whole. A fatal error stops the run; files written
 * before it stay as they are.
 */
import * as fs from "node:fs";
import * as path from "node:path";
import { zipSync } from "fflate";
import { Cell } from "../ipynb/cell.ts";
import { loadCells, normalizedCells, saveAsNotebook } from "../ipynb/io.ts";
import {
  COMMON_METADATA,
  type Deadlines,
  masterMetadata,
  masterMetadataDeadlines,
  submissionMetadata,
} from "../ipynb/metadata.ts";
import { MasterDocumentError } from "./errors.ts";
import type { BuildEventBus } from "./events.ts";
import { type Exercise, SETTING_FILE } from "./exercise.ts";
import {
  answerCells,
  bundledAnswerCells,
  bundledFormCells,
  bundleIntroduction,
  exerciseConfiguration,
  filledFormCells,
  filledFormMetadata,
  formCells,
  formVersions,
  redirectStubMetadata,
  settingJson,
  toIpynbCells,
} from "./generator.ts";
import type { JudgeParameters } from "./judge-params.ts";
import { masterPath } from "./loader.ts";

export const INTRODUCTION_FILE = "intro.ipynb";
export const CONF_DIR = "autograde";
export const FILLED_FORM_DEFAULT = "form_filled_all.ipynb";

export type VersionRenewal =
  | { readonly kind: "hash" }
  | { readonly kind: "literal"; readonly version: string };

interface PublishOptions {
  readonly bus?: BuildEventBus;
}

export function renewedVersion(
  exercise: Exercise,
  renewal: VersionRenewal,
): string {
  return renewal.kind === "hash" ? exercise.definitionHash() : renewal.version;
}

/**
 * Rewrite every master with stripped cells and fresh master metadata,
 * renewing deadlines and versions when asked to. Versions are computed per
 * exercise.
 */
export function cleanupExerciseMasters(
  exercises: readonly Exercise[],
  options: PublishOptions & {
    readonly deadlines?: Deadlines;
    readonly renewVersion?: VersionRenewal;
  } = {},
): void {
  const { bus, deadlines, renewVersion } = options;
  for (const exercise of exercises) {
    const filePath = masterPath(exercise.dirpath, exercise.key);
    const { cells, metadata } = loadCells(filePath);
    const cellsNew = normalizedCells(cells).map(([cellType, source]) =>
      new Cell(cellType, source.trim()).toIpynb()
    );

    if (deadlines) {
      exercise.deadlines = { ...deadlines };
      bus?.emit("master:deadlines-renewed", { key: exercise.key });
    } else {
      exercise.deadlines = masterMetadataDeadlines(metadata);
    }

    if (renewVersion) {
      exercise.version = renewedVersion(exercise, renewVersion);
      bus?.emit("master:version-renewed", {
        key: exercise.key,
        version: exercise.version,
      });
    }

    saveAsNotebook(
      filePath,
      cellsNew,
      masterMetadata(
        exercise.key,
        true,
        exercise.version,
        exercise.title,
        exercise.deadlines,
      ),
    );
    bus?.emit("master:cleaned", { path: filePath });
  }
}

/** Cells of `<dirpath>/intro.ipynb`, or undefined when there is none. */
export function readIntroduction(dirpath: string): Cell[] | undefined {
  const introPath = path.join(dirpath, INTRODUCTION_FILE);
  if (!fs.existsSync(introPath)) return undefined;
  const { cells } = loadCells(introPath);
  return normalizedCells(cells).map(([t, s]) => new Cell(t, s));
}

/**
 * Register a redirected exercise in the notebook it points to. The target
 * must exist and already carry the exercise's banner.
 */
export function createRedirectForm(
  exercise: Exercise,
  options: PublishOptions = {},
): void {
  const redirectTo = exercise.submissionRedirection();
  if (redirectTo === undefined) return;
  const filePath = path.join(exercise.dirpath, redirectTo);
  if (!fs.existsSync(filePath)) {
    throw new MasterDocumentError(
      `${redirectTo} (redirect target of ${exercise.key}) does not exist.`,
      "CROSS_REFERENCE",
      { path: filePath },
    );
  }
  const { cells, metadata } = loadCells(filePath);
  saveAsNotebook(
    filePath,
    cells,
    redirectStubMetadata(exercise, { path: filePath, cells, metadata }),
  );
  options.bus?.emit("artifact:written", { path: filePath, kind: "redirect" });
}

export function createBundledForms(
  bundles: ReadonlyMap<string, readonly Exercise[]>,
  options: PublishOptions = {},
): void {
  const { bus } = options;
  for (const [dirpath, exercises] of bundles) {
    const dirname = path.basename(dirpath);
    const intro = bundleIntroduction(dirpath, readIntroduction(dirpath));

    const ansPath = path.join(dirpath, `ans_${dirname}.ipynb`);
    saveAsNotebook(
      ansPath,
      toIpynbCells(bundledAnswerCells(intro, exercises)),
      { ...COMMON_METADATA },
    );
    bus?.emit("artifact:written", { path: ansPath, kind: "answer" });

    const formPath = path.join(dirpath, `form_${dirname}.ipynb`);
    saveAsNotebook(
      formPath,
      toIpynbCells(bundledFormCells(intro, exercises)),
      submissionMetadata(formVersions(exercises), true),
    );
    bus?.emit("artifact:written", { path: formPath, kind: "form" });

    for (const exercise of exercises) {
      createRedirectForm(exercise, options);
    }
  }
}

export function createSingleForms(
  exercises: readonly Exercise[],
  options: PublishOptions = {},
): void {
  const { bus } = options;
  for (const exercise of exercises) {
    const ansPath = path.join(exercise.dirpath, `ans_${exercise.key}.ipynb`);
    saveAsNotebook(ansPath, toIpynbCells(answerCells(exercise)), {
      ...COMMON_METADATA,
    });
    bus?.emit("artifact:written", { path: ansPath, kind: "answer" });

    const cells = toIpynbCells(formCells(exercise));
    if (exercise.submissionRedirection() === undefined) {
      const formPath = path.join(exercise.dirpath, `form_${exercise.key}.ipynb`);
      saveAsNotebook(
        formPath,
        cells,
        submissionMetadata({ [exercise.key]: exercise.version }, true),
      );
      bus?.emit("artifact:written", { path: formPath, kind: "form" });
    } else {
      createRedirectForm(exercise, options);
      const formPath = path.join(
        exercise.dirpath,
        `pseudo-form_${exercise.key}.ipynb`,
      );
      saveAsNotebook(formPath, cells, { ...COMMON_METADATA });
      bus?.emit("artifact:written", { path: formPath, kind: "pseudo-form" });
    }
  }
}

export function createFilledForm(
  exercises: readonly Exercise[],
  filePath: string = FILLED_FORM_DEFAULT,
  options: PublishOptions = {},
): void {
  saveAsNotebook(
    filePath,
    toIpynbCells(filledFormCells(exercises)),
    filledFormMetadata(exercises),
  );
  options.bus?.emit("artifact:written", { path: filePath, kind: "filled-form" });
}

/** Files under `dir`, as sorted `/`-separated paths relative to it. */
export function listFilesRecursive(dir: string, prefix = ""): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...listFilesRecursive(path.join(dir, entry.name), rel));
    } else if (entry.isFile()) {
      files.push(rel);
    }
  }
  return files;
}

/** Zip the files under `dir` into `archivePath`; returns the entry names. */
export function archiveDirectory(dir: string, archivePath: string): string[] {
  const names = listFilesRecursive(dir);
  const entries: Record<string, Uint8Array> = {};
  for (const name of names) {
    entries[name] = fs.readFileSync(path.join(dir, ...name.split("/")));
  }
  fs.writeFileSync(archivePath, zipSync(entries, { level: 6 }));
  return names;
}

function writeExerciseConfiguration(
  exercise: Exercise,
  params: JudgeParameters,
  confDir: string,
): void {
  const testsDir = path.join(confDir, exercise.key);
  fs.mkdirSync(testsDir, { recursive: true });

  const conf = exerciseConfiguration(exercise, params);
  const { metadata } = loadCells(masterPath(exercise.dirpath, exercise.key));
  saveAsNotebook(
    path.join(confDir, `${exercise.key}.ipynb`),
    toIpynbCells(conf.masterCells),
    metadata,
  );
  fs.writeFileSync(
    path.join(testsDir, SETTING_FILE),
    settingJson(conf.setting),
    "utf-8",
  );
  for (const { filename, content } of conf.testFiles) {
    fs.writeFileSync(path.join(testsDir, filename), content, "utf-8");
  }
  for (const rel of conf.requiredFiles) {
    const src = path.join(exercise.dirpath, rel);
    if (!fs.existsSync(src)) {
      throw new MasterDocumentError(
        `Required file \`${rel}\` of ${exercise.key} not found.`,
        "EXTRACTION",
        { path: src, field: "SYSTEM_TEST_SETTING" },
      );
    }
    const dest = path.join(testsDir, rel);
    fs.mkdirSync(path.dirname(dest), { recursive: true });
    fs.copyFileSync(src, dest);
  }
}

/**
 * Build the autograder configuration tree from scratch and archive it.
 * Returns the archive path.
 */
export function createConfiguration(
  exercises: readonly Exercise[],
  params: JudgeParameters,
  options: PublishOptions & {
    readonly confDir?: string;
    readonly archivePath?: string;
  } = {},
): string {
  const { bus } = options;
  const confDir = options.confDir ?? CONF_DIR;
  const archivePath = options.archivePath ?? `${confDir}.zip`;

  fs.rmSync(confDir, { recursive: true, force: true });
  for (const exercise of exercises) {
    bus?.emit("configuration:exercise", {
      key: exercise.key,
      dir: path.join(confDir, exercise.key),
    });
    writeExerciseConfiguration(exercise, params, confDir);
  }
  fs.mkdirSync(confDir, { recursive: true });

  const names = archiveDirectory(confDir, archivePath);
  bus?.emit("configuration:archived", {
    path: archivePath,
    entries: names.length,
  });
  return archivePath;
}
