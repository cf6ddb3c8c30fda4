import { z } from "zod";
import type { NotebookMetadata } from "./io.ts";

export const DEADLINE_KEYS = [
  "begins_at",
  "opens_at",
  "checks_at",
  "closes_at",
  "ends_at",
] as const;

export type DeadlineKey = typeof DEADLINE_KEYS[number];
export type Deadlines = Record<DeadlineKey, string | null>;

export const COMMON_METADATA = Object.freeze({
  kernelspec: {
    display_name: "Python 3",
    language: "python",
    name: "python3",
  },
  language_info: {
    name: "",
  },
});

/** Metadata of a form that the judge extracts submissions from. */
export function submissionMetadata(
  keyToVersion: Readonly<Record<string, string>>,
  extraction: boolean,
): NotebookMetadata {
  return {
    judge_submission: { exercises: { ...keyToVersion }, extraction },
    ...COMMON_METADATA,
  };
}

/** Fill every deadline key, defaulting to `null`. */
export function completeDeadlines(
  deadlines?: Partial<Record<string, string | null>>,
): Deadlines {
  return {
    begins_at: deadlines?.begins_at ?? null,
    opens_at: deadlines?.opens_at ?? null,
    checks_at: deadlines?.checks_at ?? null,
    closes_at: deadlines?.closes_at ?? null,
    ends_at: deadlines?.ends_at ?? null,
  };
}

export function masterMetadata(
  exerciseKey: string,
  autograde: boolean,
  version: string,
  title?: string,
  deadlines?: Partial<Deadlines>,
): NotebookMetadata {
  return {
    judge_master: {
      autograde,
      deadlines: completeDeadlines(deadlines),
      exercise_key: exerciseKey,
      title: title ?? exerciseKey,
      version,
    },
    ...COMMON_METADATA,
  };
}

// version and deadlines are read independently of each other
const masterVersionSchema = z.object({ version: z.string() });
const masterDeadlinesSchema = z.object({
  deadlines: z.record(z.string(), z.string().nullable()),
});

/** Version recorded in a master's metadata, or `""`. */
export function masterMetadataVersion(metadata: NotebookMetadata): string {
  const parsed = masterVersionSchema.safeParse(metadata.judge_master);
  return parsed.success ? parsed.data.version : "";
}

export function masterMetadataDeadlines(metadata: NotebookMetadata): Deadlines {
  const parsed = masterDeadlinesSchema.safeParse(metadata.judge_master);
  return completeDeadlines(parsed.success ? parsed.data.deadlines : undefined);
}
