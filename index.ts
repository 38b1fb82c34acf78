#!/usr/bin/env node
import { Command } from "commander";
import createDebug from "debug";
import { run } from "./src/run";
import { DEFAULT_OUTPUT_DIR } from "./src/config";

const debug = createDebug("chaptersplit:cli");
const program = new Command();

program
  .name("pdf-chapter-split")
  .description("Split a PDF into one file per chapter using its bookmarks")
  .argument("<file>", "PDF file to split")
  .option("-o, --output <dir>", "output directory", DEFAULT_OUTPUT_DIR)
  .option(
    "-c, --chapters <list>",
    'chapters to extract, e.g. "1,3,5-7" (default: all)',
  )
  .option("-l, --list-only", "list chapters without writing any files", false)
  .option(
    "--max-title-length <n>",
    "max length of the title part of output file names",
    (v) => parseInt(v, 10),
    200,
  )
  .option(
    "--index-padding <n>",
    "minimum digits of the zero-padded chapter number in file names",
    (v) => parseInt(v, 10),
    2,
  )
  .option(
    "--depth <n>",
    "outline levels that become chapters (0 = all levels)",
    (v) => parseInt(v, 10),
    1,
  )
  .addHelpText(
    "after",
    `
Examples:
  $ pdf-chapter-split book.pdf --list-only
  $ pdf-chapter-split book.pdf -o chapters
  $ pdf-chapter-split book.pdf -c "1,3,5-7" -o chapters`,
  )
  .action(async (file: string, opts: Record<string, unknown>) => {
    process.exitCode = await run(file, opts);
  });

program.parseAsync().catch((err: unknown) => {
  debug("unexpected failure: %O", err);
  console.error("Unexpected error:", err);
  process.exitCode = 1;
});
