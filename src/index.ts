/**
 * Library entry: the split pipeline and its parts, without the CLI.
 */

export {
  loadSourceDocument,
  planChapters,
  splitPdfByBookmarks,
} from "./split";
export { readOutline, flattenOutline, countBookmarks } from "./outline";
export { buildChapters, chapterPageCount } from "./ranges";
export { parseSelection, formatSelection } from "./selection";
export { sanitizeTitle, chapterFileName } from "./filename";
export { extractChapterPdf, extractChapters } from "./extract";
export { parseSplitOptions, ConfigError } from "./config";
export {
  formatChapterRow,
  formatChapterTable,
  formatResultLine,
  formatSummary,
} from "./report";
export { SplitError } from "./errors";
export type { SplitErrorCode } from "./errors";
export type { ExtractOptions } from "./extract";
export type { RawSplitOptions } from "./config";
export type {
  Bookmark,
  Chapter,
  ChapterFailed,
  ChapterResult,
  ChapterWritten,
  FileNameOptions,
  OutlineBookmark,
  OutlineGroup,
  OutlineNode,
  Selection,
  SelectionIssue,
  SplitOptions,
  SplitOutcome,
  SplitReport,
} from "./types";
