import { z } from "zod";
import type { SplitOptions } from "./types";

export const DEFAULT_OUTPUT_DIR = "chapters";

const SplitOptionsSchema = z.object({
  output: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  chapters: z.string().optional(),
  listOnly: z.boolean().default(false),
  maxTitleLength: z
    .number()
    .int()
    .min(1)
    .default(200)
    .describe("max length of the sanitized title in file names"),
  indexPadding: z
    .number()
    .int()
    .min(1)
    .max(10)
    .default(2)
    .describe("minimum digits of the chapter number prefix"),
  depth: z
    .number()
    .int()
    .min(0)
    .default(1)
    .describe("outline levels that become chapters (0 = all)"),
});

export type RawSplitOptions = z.input<typeof SplitOptionsSchema>;

/** Raised when CLI options fail validation; lists every offending option. */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/** Validate the raw option bag (as produced by commander) into SplitOptions. */
export function parseSplitOptions(raw: unknown): SplitOptions {
  const parsed = SplitOptionsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`,
      ),
    );
  }
  const { output, chapters, listOnly, maxTitleLength, indexPadding, depth } =
    parsed.data;
  return {
    outputDir: output,
    selection: chapters,
    listOnly,
    maxTitleLength,
    indexPadding,
    depth,
  };
}
