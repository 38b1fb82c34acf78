import { describe, it, expect } from "vitest";
import { ConfigError, parseSplitOptions } from "./config";
import type { RawSplitOptions } from "./config";

describe("parseSplitOptions", () => {
  it("fills in defaults", () => {
    expect(parseSplitOptions({})).toEqual({
      outputDir: "chapters",
      selection: undefined,
      listOnly: false,
      maxTitleLength: 200,
      indexPadding: 2,
      depth: 1,
    });
    expect(parseSplitOptions(undefined).outputDir).toBe("chapters");
  });

  it("maps CLI option names onto split options", () => {
    const raw: RawSplitOptions = {
      output: "out",
      chapters: "1-3",
      listOnly: true,
      maxTitleLength: 80,
      indexPadding: 3,
      depth: 0,
    };
    expect(parseSplitOptions(raw)).toEqual({
      outputDir: "out",
      selection: "1-3",
      listOnly: true,
      maxTitleLength: 80,
      indexPadding: 3,
      depth: 0,
    });
  });

  it("drops unknown keys", () => {
    expect(parseSplitOptions({ verbose: true })).not.toHaveProperty("verbose");
  });

  it("lists every invalid option", () => {
    let caught: unknown;
    try {
      parseSplitOptions({ depth: -1, indexPadding: Number.NaN });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({
      issues: [
        "indexPadding: Expected number, received nan",
        "depth: Number must be greater than or equal to 0",
      ],
    });
  });
});
