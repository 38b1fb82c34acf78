import createDebug from "debug";
import * as fs from "node:fs";
import * as path from "node:path";
import { PDFDocument } from "pdf-lib";
import type { Chapter, ChapterResult, FileNameOptions } from "./types";
import { chapterFileName } from "./filename";
import { chapterPageCount } from "./ranges";
import { errorMessage } from "./errors";

const debug = createDebug("chaptersplit:extract");

export interface ExtractOptions extends FileNameOptions {
  outputDir: string;
  /** Called after each chapter, in chapter order. */
  onChapter?: (result: ChapterResult) => void;
}

/** Copy pages [startPage, endPage] of the source into a new document. */
export async function extractChapterPdf(
  source: PDFDocument,
  chapter: Chapter,
): Promise<Uint8Array> {
  const out = await PDFDocument.create();
  out.setTitle(chapter.title);
  const indices: number[] = [];
  for (let p = chapter.startPage; p <= chapter.endPage; p++) indices.push(p);
  const pages = await out.copyPages(source, indices);
  for (const page of pages) out.addPage(page);
  return out.save();
}

/** Write through a sibling .part file so a failed write leaves nothing behind. */
export function writeFileAtomic(target: string, bytes: Uint8Array): void {
  const tmp = `${target}.part`;
  try {
    fs.writeFileSync(tmp, bytes);
    fs.renameSync(tmp, target);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

export async function extractChapters(
  source: PDFDocument,
  chapters: Chapter[],
  opts: ExtractOptions,
): Promise<ChapterResult[]> {
  const ordered = [...chapters].sort((a, b) => a.number - b.number);
  const results: ChapterResult[] = [];

  for (const chapter of ordered) {
    const fileName = chapterFileName(chapter, opts);
    const outputPath = path.join(opts.outputDir, fileName);
    let result: ChapterResult;
    try {
      const bytes = await extractChapterPdf(source, chapter);
      writeFileAtomic(outputPath, bytes);
      result = {
        status: "written",
        chapter,
        fileName,
        outputPath,
        pageCount: chapterPageCount(chapter),
      };
      debug(
        "chapter %d: %s (pages %d-%d)",
        chapter.number,
        fileName,
        chapter.startPage,
        chapter.endPage,
      );
    } catch (err) {
      debug("chapter %d failed: %O", chapter.number, err);
      result = {
        status: "failed",
        chapter,
        fileName,
        error: `${outputPath}: ${errorMessage(err)}`,
      };
    }
    results.push(result);
    opts.onChapter?.(result);
  }
  return results;
}
