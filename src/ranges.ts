import createDebug from "debug";
import type { Bookmark, Chapter } from "./types";

const debug = createDebug("chaptersplit:ranges");

export function chapterPageCount(chapter: Chapter): number {
  return chapter.endPage - chapter.startPage + 1;
}

/**
 * Turn page-sorted bookmarks into chapters: each runs up to the page before
 * the next bookmark, the last one to the end of the document. Chapters whose
 * next bookmark targets the same page are clamped to a single page.
 */
export function buildChapters(
  bookmarks: Bookmark[],
  totalPages: number,
): { chapters: Chapter[]; warnings: string[] } {
  const chapters: Chapter[] = [];
  const warnings: string[] = [];

  for (const b of bookmarks) {
    if (b.pageIndex < 0 || b.pageIndex >= totalPages)
      throw new RangeError(
        `Bookmark "${b.title}" targets page ${b.pageIndex + 1}, outside the document (1-${totalPages})`,
      );
  }

  if (bookmarks.length > 0 && bookmarks[0].pageIndex > 0) {
    const first = bookmarks[0].pageIndex;
    warnings.push(
      first === 1
        ? "Page 1 precedes the first bookmark and is not part of any chapter"
        : `Pages 1-${first} precede the first bookmark and are not part of any chapter`,
    );
  }

  for (let i = 0; i < bookmarks.length; i++) {
    const cur = bookmarks[i];
    const next = i + 1 < bookmarks.length ? bookmarks[i + 1] : undefined;
    const startPage = cur.pageIndex;
    let endPage = next ? next.pageIndex - 1 : totalPages - 1;
    if (next && endPage < startPage) {
      warnings.push(
        `Chapter ${i + 1} "${cur.title}" and chapter ${i + 2} "${next.title}" both start on page ${startPage + 1}; chapter ${i + 1} is kept as a single page`,
      );
      endPage = startPage;
    }
    chapters.push({ number: i + 1, title: cur.title, startPage, endPage });
  }

  debug("%d chapters over %d pages", chapters.length, totalPages);
  return { chapters, warnings };
}
