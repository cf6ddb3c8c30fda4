import assert from "node:assert/strict";
import * as fs from "node:fs";
import * as path from "node:path";
import test from "node:test";
import { MasterDocumentError } from "./errors.ts";
import {
  loadDeadlines,
  loadJudgeParameters,
  resolveJudgeParameters,
} from "./judge-params.ts";
import { tempDir } from "./test-fixtures.ts";

const writeJson = (dir: string, name: string, text: string) => {
  const file = path.join(dir, name);
  fs.writeFileSync(file, text);
  return file;
};

const configurationError = (pattern: RegExp) => (error: unknown) =>
  error instanceof MasterDocumentError && error.code === "CONFIGURATION" &&
  pattern.test(error.message);

test("judge parameters", async (t) => {
  const dir = tempDir();

  await t.test("override defaults to an empty map", () => {
    const file = writeJson(
      dir,
      "judge.json",
      JSON.stringify({
        default: { environment: "python3", time_limit: 2, memory_limit: 512 },
      }),
    );
    assert.deepEqual(loadJudgeParameters(file), {
      default: { environment: "python3", time_limit: 2, memory_limit: 512 },
      override: {},
    });
  });

  await t.test("overrides are merged over the defaults per exercise", () => {
    const file = writeJson(
      dir,
      "judge-override.json",
      JSON.stringify({
        default: { environment: "python3", time_limit: 2, memory_limit: 512 },
        override: { heavy: { memory_limit: 2048, environment: "python3-np" } },
      }),
    );
    const params = loadJudgeParameters(file);
    assert.deepEqual(resolveJudgeParameters(params, "heavy"), {
      environment: "python3-np",
      time_limit: 2,
      memory_limit: 2048,
    });
    assert.deepEqual(resolveJudgeParameters(params, "light"), {
      environment: "python3",
      time_limit: 2,
      memory_limit: 512,
    });
  });

  await t.test("invalid files are configuration errors", () => {
    const negative = writeJson(
      dir,
      "negative.json",
      JSON.stringify({
        default: { environment: "python3", time_limit: -1, memory_limit: 512 },
      }),
    );
    assert.throws(
      () => loadJudgeParameters(negative),
      configurationError(/^Invalid judge parameter file/),
    );
    const broken = writeJson(dir, "broken.json", "{ default: ");
    assert.throws(
      () => loadJudgeParameters(broken),
      configurationError(/^Cannot read judge parameter file/),
    );
    assert.throws(
      () => loadJudgeParameters(path.join(dir, "missing.json")),
      configurationError(/^Cannot read judge parameter file/),
    );
  });
});

test("deadlines", async (t) => {
  const dir = tempDir();

  await t.test("missing keys become null", () => {
    const file = writeJson(
      dir,
      "deadline.json",
      JSON.stringify({
        opens_at: "2024-04-08T09:00:00+09:00",
        closes_at: "2024-04-15T23:59:59+09:00",
      }),
    );
    assert.deepEqual(loadDeadlines(file), {
      begins_at: null,
      opens_at: "2024-04-08T09:00:00+09:00",
      checks_at: null,
      closes_at: "2024-04-15T23:59:59+09:00",
      ends_at: null,
    });
  });

  await t.test("non-string deadlines are rejected", () => {
    const file = writeJson(dir, "bad.json", JSON.stringify({ opens_at: 1 }));
    assert.throws(
      () => loadDeadlines(file),
      configurationError(/^Invalid deadline file/),
    );
  });
});
