/**
 * @module judge-setting
 *
 * Judge configuration: how a `SYSTEM_TEST_SETTING` cell becomes the
 * `setting.json` an external judge reads.
 *
 * The cell holds data, not code: a JSON5 object of parameters, optionally
 * naming a registered builder.
 *
 * ```json5
 * {
 *   builder: "system-test", // default
 *   required_files: ["data/input.csv"],
 *   mode: "strict",
 * }
 * ```
 *
 * Builders are registered by name; the exercise stores a `SettingGenerator`
 * that binds the chosen builder to the cell's parameters and is called once
 * per exercise with the resolved judge parameters.
 */
import * as path from "node:path";
import JSON5 from "json5";
import { z } from "zod";
import type { Cell } from "../ipynb/cell.ts";
import { snippet } from "../universal/text-utils.ts";
import { MasterDocumentError } from "./errors.ts";

export type JudgeSetting = Record<string, unknown>;

export interface SettingContext {
  readonly environment: string;
  readonly timeLimit: number;
  readonly memoryLimit: number;
  readonly exerciseKey: string;
  readonly version: string;
  readonly studentCode: string;
}

export type SettingBuilder = (
  ctx: SettingContext,
  params: Readonly<Record<string, unknown>>,
) => JudgeSetting;

export type SettingGenerator = (
  environment: string,
  timeLimit: number,
  memoryLimit: number,
  exerciseKey: string,
  version: string,
  studentCode: string,
) => JudgeSetting;

export const DEFAULT_SETTING_BUILDER = "system-test";

const relativeFilePath = z.string().min(1).refine(
  (p) => !path.isAbsolute(p) && !p.split(/[\\/]/).includes(".."),
  { message: "must be a path inside the exercise directory" },
);

const systemTestParamsSchema = z.looseObject({
  required_files: z.array(relativeFilePath).default([]),
});

/**
 * Default builder: the resolved judge parameters, the exercise identity, the
 * student code template and every extra parameter of the setting cell.
 */
export const generateSystemTestSetting: SettingBuilder = (ctx, params) => {
  const { required_files, ...rest } = systemTestParamsSchema.parse(params);
  return {
    ...rest,
    exercise_key: ctx.exerciseKey,
    version: ctx.version,
    environment: ctx.environment,
    time_limit: ctx.timeLimit,
    memory_limit: ctx.memoryLimit,
    student_code: ctx.studentCode,
    required_files,
  };
};

const builders = new Map<string, SettingBuilder>([
  [DEFAULT_SETTING_BUILDER, generateSystemTestSetting],
]);

export function registerSettingBuilder(
  name: string,
  builder: SettingBuilder,
): void {
  builders.set(name, builder);
}

export function settingBuilderNames(): string[] {
  return Array.from(builders.keys()).sort();
}

const settingCellSchema = z.looseObject({
  builder: z.string().default(DEFAULT_SETTING_BUILDER),
});

/**
 * Read the parameters of a setting cell and bind them to their builder.
 * Malformed data and unknown builders fail here; the builder's own parameter
 * checks run when the generator is called.
 */
export function loadSystemTestSetting(cell: Cell): SettingGenerator {
  let data: unknown;
  try {
    data = JSON5.parse(cell.source);
  } catch (error) {
    throw new MasterDocumentError(
      `The system test setting is not a JSON5 object: ${
        error instanceof Error ? error.message : String(error)
      }`,
      "EXTRACTION",
      { field: "SYSTEM_TEST_SETTING", snippet: snippet(cell.source) },
    );
  }
  const parsed = settingCellSchema.safeParse(data);
  if (!parsed.success) {
    throw new MasterDocumentError(
      `The system test setting is malformed: ${
        z.prettifyError(parsed.error)
      }`,
      "EXTRACTION",
      { field: "SYSTEM_TEST_SETTING", snippet: snippet(cell.source) },
    );
  }
  const { builder: name, ...params } = parsed.data;
  const builder = builders.get(name);
  if (!builder) {
    throw new MasterDocumentError(
      `Unknown setting builder \`${name}\` (known: ${
        settingBuilderNames().join(", ")
      }).`,
      "EXTRACTION",
      { field: "SYSTEM_TEST_SETTING", snippet: snippet(cell.source) },
    );
  }

  return (
    environment,
    timeLimit,
    memoryLimit,
    exerciseKey,
    version,
    studentCode,
  ) => {
    try {
      return builder(
        { environment, timeLimit, memoryLimit, exerciseKey, version, studentCode },
        params,
      );
    } catch (error) {
      if (error instanceof z.ZodError) {
        throw new MasterDocumentError(
          `The system test setting of \`${exerciseKey}\` is invalid: ${
            z.prettifyError(error)
          }`,
          "EXTRACTION",
          { field: "SYSTEM_TEST_SETTING" },
        );
      }
      throw error;
    }
  };
}

const requiredFilesSchema = z.looseObject({
  required_files: z.array(relativeFilePath).default([]),
});

/** Files, relative to the exercise directory, the judge needs beside the tests. */
export function requiredFiles(setting: JudgeSetting): string[] {
  const parsed = requiredFilesSchema.safeParse(setting);
  if (!parsed.success) {
    throw new MasterDocumentError(
      `Setting declares invalid required files: ${
        z.prettifyError(parsed.error)
      }`,
      "EXTRACTION",
      { field: "SYSTEM_TEST_SETTING" },
    );
  }
  return parsed.data.required_files;
}
