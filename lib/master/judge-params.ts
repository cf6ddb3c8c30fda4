import * as fs from "node:fs";
import { z } from "zod";
import { completeDeadlines, type Deadlines } from "../ipynb/metadata.ts";
import { MasterDocumentError } from "./errors.ts";

export const judgeParameterSetSchema = z.object({
  environment: z.string(),
  time_limit: z.number().positive(),
  memory_limit: z.number().positive(),
});

export const judgeParametersSchema = z.object({
  default: judgeParameterSetSchema,
  override: z.record(z.string(), judgeParameterSetSchema.partial()).default({}),
});

export type JudgeParameterSet = z.infer<typeof judgeParameterSetSchema>;
export type JudgeParameters = z.infer<typeof judgeParametersSchema>;

export const deadlinesFileSchema = z.object({
  begins_at: z.string().nullable().optional(),
  opens_at: z.string().nullable().optional(),
  checks_at: z.string().nullable().optional(),
  closes_at: z.string().nullable().optional(),
  ends_at: z.string().nullable().optional(),
});

function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T>,
  what: string,
): T {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new MasterDocumentError(
      `Cannot read ${what} \`${filePath}\`: ${
        error instanceof Error ? error.message : String(error)
      }`,
      "CONFIGURATION",
      { path: filePath },
    );
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new MasterDocumentError(
      `Invalid ${what} \`${filePath}\`: ${z.prettifyError(parsed.error)}`,
      "CONFIGURATION",
      { path: filePath },
    );
  }
  return parsed.data;
}

/** Load the `default` / `override` judge parameter file. */
export function loadJudgeParameters(filePath: string): JudgeParameters {
  return readJsonFile(filePath, judgeParametersSchema, "judge parameter file");
}

/** Load a deadline file; keys it leaves out become `null`. */
export function loadDeadlines(filePath: string): Deadlines {
  return completeDeadlines(
    readJsonFile(filePath, deadlinesFileSchema, "deadline file"),
  );
}

/** Overlay the per-exercise override onto the defaults. */
export function resolveJudgeParameters(
  params: JudgeParameters,
  exerciseKey: string,
): JudgeParameterSet {
  return { ...params.default, ...params.override[exerciseKey] };
}
