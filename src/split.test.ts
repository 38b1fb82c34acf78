import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { PDFDocument } from "pdf-lib";
import {
  decideOutcome,
  loadSourceDocument,
  planChapters,
  splitPdfByBookmarks,
} from "./split";
import { SplitError } from "./errors";
import type { ChapterResult, SplitOptions } from "./types";
import {
  buildPdf,
  chapterOutline,
  makeTempDir,
  pageWidth,
  writePdf,
} from "./test-utils";

/** 15 chapters of two pages each over a 30-page document. */
const FIFTEEN = chapterOutline(Array.from({ length: 15 }, (_, i) => i * 2));

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

let dir: string;
let outDir: string;

const options = (overrides: Partial<SplitOptions> = {}): SplitOptions => ({
  outputDir: outDir,
  listOnly: false,
  maxTitleLength: 200,
  indexPadding: 2,
  depth: 1,
  ...overrides,
});

beforeEach(() => {
  dir = makeTempDir();
  outDir = path.join(dir, "chapters");
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("loadSourceDocument", () => {
  it("reports a missing file", async () => {
    const missing = path.join(dir, "missing.pdf");
    await expect(loadSourceDocument(missing)).rejects.toMatchObject({
      code: "FILE_NOT_FOUND",
      message: `File not found: ${missing}`,
    });
  });

  it("reports a directory as not found", async () => {
    await expect(loadSourceDocument(dir)).rejects.toMatchObject({
      code: "FILE_NOT_FOUND",
    });
  });

  it("reports a file that is not a PDF", async () => {
    const file = path.join(dir, "notes.pdf");
    fs.writeFileSync(file, "just some text");
    const err = await loadSourceDocument(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SplitError);
    expect(err).toMatchObject({
      code: "UNREADABLE",
      message: expect.stringContaining(`Cannot read PDF ${file}:`),
    });
  });

  it("reports a document whose page tree is missing", async () => {
    const file = await writePdf(dir, "nopages.pdf", {
      pages: 3,
      outline: chapterOutline([0]),
      brokenPageTree: true,
    });
    const err = await loadSourceDocument(file).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SplitError);
    expect(err).toMatchObject({
      code: "UNREADABLE",
      message: expect.stringContaining(`Cannot read PDF ${file}:`),
    });
  });

  it("reports an encrypted document", async () => {
    const file = await writePdf(dir, "locked.pdf", {
      pages: 2,
      outline: chapterOutline([0]),
      encrypted: true,
    });
    await expect(loadSourceDocument(file)).rejects.toMatchObject({
      code: "ENCRYPTED",
      message: `${file} is encrypted; encrypted PDFs are not supported`,
    });
  });
});

describe("planChapters", () => {
  it("distinguishes a missing outline from an unresolvable one", async () => {
    const none = await PDFDocument.load(await buildPdf({ pages: 3 }));
    expect(thrownBy(() => planChapters(none, "none.pdf"))).toMatchObject({
      code: "NO_BOOKMARKS",
      message: "No bookmarks found in none.pdf",
    });

    const empty = await PDFDocument.load(
      await buildPdf({ pages: 3, outline: [] }),
    );
    expect(thrownBy(() => planChapters(empty, "empty.pdf"))).toMatchObject({
      code: "NO_BOOKMARKS",
    });

    const broken = await PDFDocument.load(
      await buildPdf({
        pages: 3,
        outline: [
          { title: "A", broken: true },
          { title: "B", broken: true },
        ],
      }),
    );
    expect(thrownBy(() => planChapters(broken, "broken.pdf"))).toMatchObject({
      code: "UNRESOLVED_BOOKMARKS",
      message: "None of the bookmarks in broken.pdf points to a page of the document",
    });
  });

  it("builds chapters from the top level by default", async () => {
    const doc = await PDFDocument.load(
      await buildPdf({
        pages: 10,
        outline: [
          {
            title: "Part 1",
            page: 0,
            children: [{ title: "Section 1.1", page: 2 }],
          },
          { title: "Part 2", page: 6 },
        ],
      }),
    );
    expect(planChapters(doc, "book.pdf").chapters).toEqual([
      { number: 1, title: "Part 1", startPage: 0, endPage: 5 },
      { number: 2, title: "Part 2", startPage: 6, endPage: 9 },
    ]);
    expect(
      planChapters(doc, "book.pdf", 2).chapters.map((c) => [
        c.title,
        c.startPage,
        c.endPage,
      ]),
    ).toEqual([
      ["Part 1", 0, 1],
      ["Section 1.1", 2, 5],
      ["Part 2", 6, 9],
    ]);
  });
});

describe("splitPdfByBookmarks", () => {
  it("extracts the selected chapters", async () => {
    const file = await writePdf(dir, "book.pdf", { pages: 30, outline: FIFTEEN });
    const progress: ChapterResult[] = [];

    const report = await splitPdfByBookmarks(
      file,
      options({ selection: "1,3,5-7,10" }),
      (r) => progress.push(r),
    );

    expect(report.selected).toEqual([1, 3, 5, 6, 7, 10]);
    expect(report.outcome).toBe("success");
    expect(report.chapters).toHaveLength(15);
    expect(report.totalPages).toBe(30);
    expect(progress.map((r) => r.chapter.number)).toEqual([1, 3, 5, 6, 7, 10]);
    expect(fs.readdirSync(outDir).sort()).toEqual([
      "01_Chapter 1.pdf",
      "03_Chapter 3.pdf",
      "05_Chapter 5.pdf",
      "06_Chapter 6.pdf",
      "07_Chapter 7.pdf",
      "10_Chapter 10.pdf",
    ]);
    const tenth = await PDFDocument.load(
      fs.readFileSync(path.join(outDir, "10_Chapter 10.pdf")),
    );
    expect(tenth.getPages().map((p) => p.getWidth())).toEqual([
      pageWidth(18),
      pageWidth(19),
    ]);
  });

  it("extracts the valid part of a partly invalid selection", async () => {
    const file = await writePdf(dir, "book.pdf", { pages: 30, outline: FIFTEEN });

    const report = await splitPdfByBookmarks(file, options({ selection: "1,20" }));

    expect(report.outcome).toBe("partial");
    expect(report.selectionIssues).toEqual([
      { term: "20", message: "chapter 20 is out of range (valid: 1-15)" },
    ]);
    expect(report.results.map((r) => [r.status, r.fileName])).toEqual([
      ["written", "01_Chapter 1.pdf"],
    ]);
    expect(fs.readdirSync(outDir)).toEqual(["01_Chapter 1.pdf"]);
  });

  it("extracts every chapter without a selection", async () => {
    const file = await writePdf(dir, "book.pdf", {
      pages: 5,
      outline: chapterOutline([0, 3]),
    });
    const report = await splitPdfByBookmarks(file, options());
    expect(
      report.results.map((r) => r.status === "written" && r.pageCount),
    ).toEqual([3, 2]);
  });

  it("fails without creating the output directory when there are no bookmarks", async () => {
    const file = await writePdf(dir, "plain.pdf", { pages: 4 });
    await expect(splitPdfByBookmarks(file, options())).rejects.toMatchObject({
      code: "NO_BOOKMARKS",
      message: "No bookmarks found in plain.pdf",
    });
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("writes nothing in list-only mode", async () => {
    const file = await writePdf(dir, "book.pdf", { pages: 30, outline: FIFTEEN });
    const report = await splitPdfByBookmarks(file, options({ listOnly: true }));
    expect(report.outcome).toBe("success");
    expect(report.results).toEqual([]);
    expect(report.selected).toHaveLength(15);
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("fails when nothing valid is selected", async () => {
    const file = await writePdf(dir, "book.pdf", { pages: 30, outline: FIFTEEN });
    const report = await splitPdfByBookmarks(file, options({ selection: "16-18" }));
    expect(report.outcome).toBe("failure");
    expect(report.results).toEqual([]);
    expect(fs.existsSync(outDir)).toBe(false);
  });

  it("surfaces derivation warnings", async () => {
    const file = await writePdf(dir, "book.pdf", {
      pages: 6,
      outline: [
        { title: "A", page: 1 },
        { title: "B", page: 1 },
      ],
    });
    const report = await splitPdfByBookmarks(file, options({ listOnly: true }));
    expect(report.warnings).toEqual([
      "Page 1 precedes the first bookmark and is not part of any chapter",
      'Chapter 1 "A" and chapter 2 "B" both start on page 2; chapter 1 is kept as a single page',
    ]);
  });
});

describe("decideOutcome", () => {
  const written: ChapterResult = {
    status: "written",
    chapter: { number: 1, title: "A", startPage: 0, endPage: 0 },
    fileName: "01_A.pdf",
    outputPath: "/out/01_A.pdf",
    pageCount: 1,
  };
  const failed: ChapterResult = {
    status: "failed",
    chapter: { number: 2, title: "B", startPage: 1, endPage: 1 },
    fileName: "02_B.pdf",
    error: "EACCES",
  };

  it("is partial when some chapters fail", () => {
    expect(decideOutcome(false, [1, 2], [], [written, failed])).toBe("partial");
  });

  it("is a failure when every chapter fails", () => {
    expect(decideOutcome(false, [2], [], [failed])).toBe("failure");
  });

  it("is a success when everything selected was written", () => {
    expect(decideOutcome(false, [1], [], [written])).toBe("success");
  });
});
