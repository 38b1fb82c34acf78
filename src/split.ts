import { PDFDocument } from "pdf-lib";
import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import type {
  Chapter,
  ChapterResult,
  SelectionIssue,
  SplitOptions,
  SplitOutcome,
  SplitReport,
} from "./types";
import { SplitError, errorMessage } from "./errors";
import { countBookmarks, flattenOutline, readOutline } from "./outline";
import { buildChapters } from "./ranges";
import { parseSelection } from "./selection";
import { extractChapters } from "./extract";

const debug = createDebug("chaptersplit:split");

export async function loadSourceDocument(
  filePath: string,
): Promise<PDFDocument> {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile())
    throw new SplitError("FILE_NOT_FOUND", `File not found: ${filePath}`);

  let pdfDoc: PDFDocument;
  try {
    pdfDoc = await PDFDocument.load(new Uint8Array(fs.readFileSync(filePath)), {
      ignoreEncryption: true,
      updateMetadata: false,
    });
  } catch (err) {
    throw new SplitError(
      "UNREADABLE",
      `Cannot read PDF ${filePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  if (pdfDoc.isEncrypted)
    throw new SplitError(
      "ENCRYPTED",
      `${filePath} is encrypted; encrypted PDFs are not supported`,
    );
  // The page tree is only walked on first access; load() does not check it.
  let pageCount: number;
  try {
    pageCount = pdfDoc.getPages().length;
  } catch (err) {
    throw new SplitError(
      "UNREADABLE",
      `Cannot read PDF ${filePath}: ${errorMessage(err)}`,
      { cause: err },
    );
  }
  debug("loaded %s: %d pages", filePath, pageCount);
  return pdfDoc;
}

/** Outline -> sorted bookmarks -> chapters, with derivation warnings. */
export function planChapters(
  pdfDoc: PDFDocument,
  source: string,
  depth = 1,
): { chapters: Chapter[]; warnings: string[] } {
  const outline = readOutline(pdfDoc);
  if (!outline || countBookmarks(outline) === 0)
    throw new SplitError("NO_BOOKMARKS", `No bookmarks found in ${source}`);

  const { bookmarks, dropped } = flattenOutline(outline, depth);
  if (bookmarks.length === 0)
    throw new SplitError(
      "UNRESOLVED_BOOKMARKS",
      `None of the bookmarks in ${source} points to a page of the document`,
    );

  const { chapters, warnings } = buildChapters(
    bookmarks,
    pdfDoc.getPageCount(),
  );
  if (dropped.length > 0)
    debug("%s: %d unresolved bookmarks dropped", source, dropped.length);
  return { chapters, warnings };
}

export function decideOutcome(
  listOnly: boolean,
  selected: number[],
  selectionIssues: SelectionIssue[],
  results: ChapterResult[],
): SplitOutcome {
  if (listOnly) {
    if (selected.length === 0) return "failure";
    return selectionIssues.length > 0 ? "partial" : "success";
  }
  const written = results.filter((r) => r.status === "written").length;
  if (written === 0) return "failure";
  return written === results.length && selectionIssues.length === 0
    ? "success"
    : "partial";
}

/**
 * Split `filePath` into one PDF per selected chapter. Fatal input problems
 * throw SplitError before the output directory is touched; everything else
 * is collected into the returned report.
 */
export async function splitPdfByBookmarks(
  filePath: string,
  opts: SplitOptions,
  onChapter?: (result: ChapterResult) => void,
): Promise<SplitReport> {
  const pdfDoc = await loadSourceDocument(filePath);
  const source = path.basename(filePath);
  const { chapters, warnings } = planChapters(pdfDoc, source, opts.depth);
  const { chapters: selected, issues } = parseSelection(
    opts.selection,
    chapters.length,
  );
  const wanted = new Set(selected);
  const toExtract = chapters.filter((c) => wanted.has(c.number));

  let results: ChapterResult[] = [];
  if (!opts.listOnly && toExtract.length > 0) {
    try {
      fs.mkdirSync(opts.outputDir, { recursive: true });
    } catch (err) {
      throw new SplitError(
        "OUTPUT_UNWRITABLE",
        `Cannot create output directory ${opts.outputDir}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
    results = await extractChapters(pdfDoc, toExtract, {
      outputDir: opts.outputDir,
      maxTitleLength: opts.maxTitleLength,
      indexPadding: opts.indexPadding,
      onChapter,
    });
  }

  return {
    source: filePath,
    totalPages: pdfDoc.getPageCount(),
    chapters,
    selected,
    selectionIssues: issues,
    warnings,
    results,
    listOnly: opts.listOnly,
    outcome: decideOutcome(opts.listOnly, selected, issues, results),
  };
}
