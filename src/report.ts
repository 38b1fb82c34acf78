import type { Chapter, ChapterResult, SplitReport } from "./types";
import { chapterPageCount } from "./ranges";

const TITLE_WIDTH = 50;

/** One table row; pages are shown 1-indexed. */
export function formatChapterRow(chapter: Chapter): string {
  const num = String(chapter.number).padStart(3);
  const title = chapter.title.padEnd(TITLE_WIDTH);
  const start = String(chapter.startPage + 1).padStart(4);
  const end = String(chapter.endPage + 1).padStart(4);
  const count = String(chapterPageCount(chapter)).padStart(4);
  return `  ${num}. ${title} (pages ${start}-${end}, ${count} pages)`;
}

export function formatChapterTable(
  chapters: Chapter[],
  sourceName: string,
): string {
  const heading = `Found ${chapters.length} chapter${chapters.length === 1 ? "" : "s"} in '${sourceName}':`;
  return [heading, "", ...chapters.map(formatChapterRow)].join("\n");
}

export function formatResultLine(result: ChapterResult): string {
  const row = formatChapterRow(result.chapter);
  return result.status === "written"
    ? `${row} -> ${result.fileName}`
    : `${row} FAILED: ${result.error}`;
}

export function formatSummary(report: SplitReport): string {
  const written = report.results.filter((r) => r.status === "written");
  const failed = report.results.filter((r) => r.status === "failed");
  const lines = [
    `Chapters found: ${report.chapters.length}`,
    `Selected: ${report.selected.length}, skipped: ${report.chapters.length - report.selected.length}`,
  ];
  if (report.selectionIssues.length > 0)
    lines.push(`Rejected selection terms: ${report.selectionIssues.length}`);
  if (!report.listOnly) {
    lines.push(`Written: ${written.length}, failed: ${failed.length}`);
    for (const f of failed)
      lines.push(`  chapter ${f.chapter.number} (${f.fileName}): ${f.error}`);
  }
  switch (report.outcome) {
    case "success":
      lines.push("[OK] Completed successfully");
      break;
    case "partial":
      lines.push("[PARTIAL] Completed with problems");
      break;
    case "failure":
      lines.push(
        report.listOnly
          ? "[ERROR] No chapters selected"
          : "[ERROR] No chapters were extracted",
      );
      break;
  }
  return lines.join("\n");
}
