import * as fs from "node:fs";
import * as path from "node:path";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { NotebookFormatError } from "../ipynb/io.ts";
import { MasterDocumentError } from "./errors.ts";
import { type BuildEventBus, informationalBuildEventBus } from "./events.ts";
import { loadDeadlines, loadJudgeParameters } from "./judge-params.ts";
import { allExercises, loadSources } from "./loader.ts";
import {
  CONF_DIR,
  cleanupExerciseMasters,
  createBundledForms,
  createConfiguration,
  createFilledForm,
  createSingleForms,
  FILLED_FORM_DEFAULT,
  type VersionRenewal,
} from "./publish.ts";
import { AS_IS_ARCHIVE, releaseAsIs } from "./release.ts";

/** `true` when the flag was given bare, the string when given a value. */
const optionalValue = z.union([z.literal(true), z.string()]).optional();

const commonOptionsSchema = z.object({
  source: z.array(z.string()).min(1),
  deadline: z.string().optional(),
  renewVersion: optionalValue,
  verbose: z.boolean().default(false),
  color: z.boolean().default(true),
});

export const buildOptionsSchema = commonOptionsSchema.extend({
  configuration: z.string().optional(),
  filledForm: optionalValue,
});

export const releaseOptionsSchema = commonOptionsSchema.extend({
  compressMasters: z.boolean().default(false),
});

export type BuildOptions = z.infer<typeof buildOptionsSchema>;
export type ReleaseOptions = z.infer<typeof releaseOptionsSchema>;

export function versionRenewal(
  flag: true | string | undefined,
): VersionRenewal | undefined {
  if (flag === undefined) return undefined;
  return flag === true ? { kind: "hash" } : { kind: "literal", version: flag };
}

function packageVersion(): string {
  const pkg = z.object({ version: z.string() }).safeParse(
    JSON.parse(
      fs.readFileSync(new URL("../../package.json", import.meta.url), "utf-8"),
    ),
  );
  return pkg.success ? pkg.data.version : "0.0.0";
}

export class CLI {
  readonly cwd: string;

  constructor(
    readonly conf?: {
      /** Directory relative paths and default outputs resolve against. */
      readonly cwd?: string;
      readonly bus?: (opts: { color: boolean; verbose: boolean }) => BuildEventBus;
    },
  ) {
    this.cwd = conf?.cwd ?? process.cwd();
  }

  /** Parse `args` and run the command; resolves to the process exit code. */
  async run(args: string[] = process.argv.slice(2)): Promise<number> {
    try {
      await this.rootCmd().parseAsync(args, { from: "user" });
      return 0;
    } catch (error) {
      if (error instanceof CommanderError) return error.exitCode;
      if (
        error instanceof MasterDocumentError ||
        error instanceof NotebookFormatError
      ) {
        console.error(`[ERROR] ${error.message}`);
        return 1;
      }
      throw error;
    }
  }

  rootCmd(): Command {
    const root = new Command()
      .name("masterbook")
      .version(packageVersion())
      .description("Build answer keys, forms and judge configuration from exercise masters")
      .exitOverride();
    root.addCommand(this.buildCommand());
    root.addCommand(this.releaseCommand());
    return root;
  }

  protected resolve(p: string): string {
    return path.resolve(this.cwd, p);
  }

  protected informationalBus(
    opts: { color: boolean; verbose: boolean },
  ): BuildEventBus {
    return this.conf?.bus?.(opts) ??
      informationalBuildEventBus({
        style: opts.color ? "rich" : "plain",
        verbose: opts.verbose,
      });
  }

  protected commonOptions(cmd: Command): Command {
    return cmd
      .requiredOption(
        "-s, --source <paths...>",
        "master notebooks (separate mode) or directories (bundle mode)",
      )
      .option("-d, --deadline <json>", "JSON file of deadline settings")
      .option(
        "-n, --renew-version [version]",
        "renew the version of every exercise (default: SHA-1 of its definition)",
      )
      .option("-v, --verbose", "trace segmentation and field validation")
      .option("--no-color", "Show output without using ANSI colors")
      .exitOverride();
  }

  buildCommand(): Command {
    return this.commonOptions(
      new Command("build").description(
        "validate masters and generate answer keys, forms and configuration",
      ),
    )
      .option(
        "-c, --configuration <json>",
        "create the autograde configuration with judge parameters from JSON",
      )
      .option(
        "-f, --filled-form [path]",
        `generate an all-filled form (default: ${FILLED_FORM_DEFAULT})`,
      )
      .action((opts: unknown) => this.build(buildOptionsSchema.parse(opts)));
  }

  releaseCommand(): Command {
    return this.commonOptions(
      new Command("release").description(
        "release masters as they are, without autograding",
      ),
    )
      .option("-z, --compress-masters", `create ${AS_IS_ARCHIVE} of the masters`)
      .action((opts: unknown) => this.release(releaseOptionsSchema.parse(opts)));
  }

  build(opts: BuildOptions): void {
    const bus = this.informationalBus(opts);
    const deadlines = opts.deadline
      ? loadDeadlines(this.resolve(opts.deadline))
      : undefined;
    const params = opts.configuration
      ? loadJudgeParameters(this.resolve(opts.configuration))
      : undefined;

    const sources = loadSources(opts.source.map((p) => this.resolve(p)), {
      bus,
    });
    const exercises = allExercises(sources);

    cleanupExerciseMasters(exercises, {
      bus,
      deadlines,
      renewVersion: versionRenewal(opts.renewVersion),
    });
    createBundledForms(sources.bundles, { bus });
    createSingleForms(sources.separates, { bus });

    if (params) {
      createConfiguration(exercises, params, {
        bus,
        confDir: this.resolve(CONF_DIR),
      });
    }
    if (opts.filledForm !== undefined) {
      createFilledForm(
        exercises,
        this.resolve(
          opts.filledForm === true ? FILLED_FORM_DEFAULT : opts.filledForm,
        ),
        { bus },
      );
    }
  }

  release(opts: ReleaseOptions): void {
    const bus = this.informationalBus(opts);
    releaseAsIs(opts.source.map((p) => this.resolve(p)), {
      bus,
      deadlines: opts.deadline ? loadDeadlines(this.resolve(opts.deadline)) : undefined,
      renewVersion: versionRenewal(opts.renewVersion),
      archivePath: opts.compressMasters ? this.resolve(AS_IS_ARCHIVE) : undefined,
    });
  }
}
