/** One node of the outline tree as read from the document. */
export type OutlineNode = OutlineBookmark | OutlineGroup;

/** An outline entry; `pageIndex` is null when its destination cannot be resolved. */
export interface OutlineBookmark {
  kind: "bookmark";
  title: string;
  pageIndex: number | null;
}

/** Children of the bookmark that precedes this node in its sibling list. */
export interface OutlineGroup {
  kind: "group";
  children: OutlineNode[];
}

/** A bookmark with a resolved, zero-based target page. */
export interface Bookmark {
  title: string;
  pageIndex: number;
  depth: number;
}

/** A contiguous page span; pages are zero-based and inclusive. */
export interface Chapter {
  number: number;
  title: string;
  startPage: number;
  endPage: number;
}

export interface SelectionIssue {
  term: string;
  message: string;
}

export interface Selection {
  /** Ascending, duplicate-free chapter numbers. */
  chapters: number[];
  issues: SelectionIssue[];
}

export interface ChapterWritten {
  status: "written";
  chapter: Chapter;
  fileName: string;
  outputPath: string;
  pageCount: number;
}

export interface ChapterFailed {
  status: "failed";
  chapter: Chapter;
  fileName: string;
  error: string;
}

export type ChapterResult = ChapterWritten | ChapterFailed;

export type SplitOutcome = "success" | "partial" | "failure";

/** Naming options shared by the extractor and the list preview. */
export interface FileNameOptions {
  maxTitleLength: number;
  indexPadding: number;
}

/** Validated CLI/split options (defaults set in config.ts). */
export interface SplitOptions extends FileNameOptions {
  outputDir: string;
  selection?: string;
  listOnly: boolean;
  /** Outline levels that become chapters; 0 = every level. */
  depth: number;
}

export interface SplitReport {
  source: string;
  totalPages: number;
  chapters: Chapter[];
  selected: number[];
  selectionIssues: SelectionIssue[];
  warnings: string[];
  /** Empty for list-only runs. */
  results: ChapterResult[];
  listOnly: boolean;
  outcome: SplitOutcome;
}
