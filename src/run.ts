import createDebug from "debug";
import * as path from "node:path";
import { ConfigError, parseSplitOptions } from "./config";
import { SplitError } from "./errors";
import { splitPdfByBookmarks } from "./split";
import type { SplitOptions } from "./types";
import {
  formatChapterTable,
  formatResultLine,
  formatSummary,
} from "./report";

const debug = createDebug("chaptersplit:cli");

/** Run one split from CLI input; returns the process exit code. */
export async function run(file: string, rawOpts: unknown): Promise<number> {
  let opts: SplitOptions;
  try {
    opts = parseSplitOptions(rawOpts);
  } catch (err) {
    if (err instanceof ConfigError) {
      for (const issue of err.issues) console.error(`Invalid option ${issue}`);
      return 1;
    }
    throw err;
  }

  const resolvedPath = path.resolve(file);
  const outputDir = path.resolve(opts.outputDir);
  debug("run %s -> %s (%o)", resolvedPath, outputDir, opts);

  try {
    const report = await splitPdfByBookmarks(
      resolvedPath,
      { ...opts, outputDir },
      (result) => console.log(formatResultLine(result)),
    );

    for (const issue of report.selectionIssues)
      console.warn(`Warning: selection term "${issue.term}": ${issue.message}`);
    for (const warning of report.warnings) console.warn(`Warning: ${warning}`);

    if (report.listOnly) {
      const wanted = new Set(report.selected);
      const shown = report.chapters.filter((c) => wanted.has(c.number));
      console.log(formatChapterTable(shown, path.basename(resolvedPath)));
    } else if (report.results.length > 0) {
      console.log(`Chapters saved to: ${outputDir}`);
    }
    console.log("");
    console.log(formatSummary(report));
    return report.outcome === "failure" ? 1 : 0;
  } catch (err) {
    if (err instanceof SplitError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
