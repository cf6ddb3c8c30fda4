import pc from "picocolors";
import { type EventBus, eventBus } from "../universal/event-bus.ts";

/** Events emitted while loading masters and writing artifacts. */
export type BuildBusEvents = {
  "source:scan": { dirpath: string };
  "source:loaded": { path: string; key: string };
  "source:skipped": { path: string };
  "segment:trace": { field?: string; snippet: string };
  "field:validated": { key: string; field: string; cells: number };
  "master:cleaned": { path: string };
  "master:version-renewed": { key: string; version: string };
  "master:deadlines-renewed": { key: string };
  "artifact:written": {
    path: string;
    kind: "answer" | "form" | "pseudo-form" | "redirect" | "filled-form";
  };
  "configuration:exercise": { key: string; dir: string };
  "configuration:archived": { path: string; entries: number };
  "release:master": { path: string };
  "release:form": { path: string };
  "release:archive": { path: string };
};

export type BuildEventBus = EventBus<BuildBusEvents>;

/**
 * Create the bus the CLI logs through.
 *
 * - style: "rich" → emoji + ANSI colors
 * - style: "plain" → no emoji, no colors
 *
 * Progress events always print; `segment:trace` and `field:validated` only
 * when `verbose` is set.
 */
export function informationalBuildEventBus(
  init: { style: "plain" | "rich"; verbose?: boolean },
): BuildEventBus {
  const fancy = init.style === "rich";
  const colors = pc.createColors(fancy);
  const bus = eventBus<BuildBusEvents>();

  const E = {
    book: "📓",
    skip: "⏭️",
    broom: "🧹",
    tag: "🏷️",
    page: "📄",
    gear: "⚙️",
    box: "📦",
  } as const;

  const tag = (s: string) => colors.bold(colors.magenta(`[${s}]`));
  const em = (emoji: string, s: string) => (fancy ? `${emoji} ${s}` : s);
  const path = (s: string) => colors.bold(s);

  bus.on("source:scan", ({ dirpath }) => {
    console.info(`${tag("load")} ${em(E.book, "scanning")} ${path(dirpath)}`);
  });

  bus.on("source:loaded", ({ path: p, key }) => {
    console.info(
      `${tag("load")} ${em(E.book, "loaded")} ${path(p)} ${colors.dim(key)}`,
    );
  });

  bus.on("source:skipped", ({ path: p }) => {
    console.info(
      `${tag("load")} ${em(E.skip, colors.yellow("skip"))} ${path(p)}`,
    );
  });

  bus.on("master:cleaned", ({ path: p }) => {
    console.info(`${tag("master")} ${em(E.broom, "cleaned")} ${path(p)}`);
  });

  bus.on("master:version-renewed", ({ key, version }) => {
    console.info(
      `${tag("master")} ${em(E.tag, "version")} ${key} ${colors.cyan(version)}`,
    );
  });

  bus.on("master:deadlines-renewed", ({ key }) => {
    console.info(`${tag("master")} ${em(E.tag, "deadlines")} ${key}`);
  });

  bus.on("artifact:written", ({ path: p, kind }) => {
    console.info(
      `${tag(kind)} ${em(E.page, colors.green("written"))} ${path(p)}`,
    );
  });

  bus.on("configuration:exercise", ({ key, dir }) => {
    console.info(`${tag("conf")} ${em(E.gear, key)} ${colors.dim(dir)}`);
  });

  bus.on("configuration:archived", ({ path: p, entries }) => {
    console.info(
      `${tag("conf")} ${em(E.box, "archived")} ${path(p)} ${
        colors.dim(`${entries} entries`)
      }`,
    );
  });

  bus.on("release:master", ({ path: p }) => {
    console.info(`${tag("release")} ${em(E.broom, "master")} ${path(p)}`);
  });

  bus.on("release:form", ({ path: p }) => {
    console.info(`${tag("release")} ${em(E.page, "form")} ${path(p)}`);
  });

  bus.on("release:archive", ({ path: p }) => {
    console.info(`${tag("release")} ${em(E.box, "archive")} ${path(p)}`);
  });

  if (init.verbose) {
    bus.on("segment:trace", ({ field, snippet }) => {
      console.debug(
        `${colors.gray("[trace]")} ${field ?? "-"} ${colors.dim(snippet)}`,
      );
    });
    bus.on("field:validated", ({ key, field, cells }) => {
      console.debug(
        `${colors.gray("[trace]")} ${key} ${field} ${
          colors.dim(`${cells} cell(s)`)
        }`,
      );
    });
  }

  return bus;
}
