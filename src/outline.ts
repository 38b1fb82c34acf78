import createDebug from "debug";
import type { PDFDocument } from "pdf-lib";
import { PDFName, PDFDict, PDFString, PDFHexString } from "pdf-lib";
import type { Bookmark, OutlineNode } from "./types";
import { buildPageIndex, resolveDest } from "./dest";

const debug = createDebug("chaptersplit:outline");

function readTitle(item: PDFDict): string {
  const titleObj = item.lookup(PDFName.of("Title"));
  return titleObj instanceof PDFString || titleObj instanceof PDFHexString
    ? titleObj.decodeText()
    : "";
}

function readSiblings(
  first: PDFDict | undefined,
  pdfDoc: PDFDocument,
  pageRefToIndex: Map<string, number>,
  seen: Set<PDFDict>,
): OutlineNode[] {
  const nodes: OutlineNode[] = [];
  let item = first;
  while (item && !seen.has(item)) {
    seen.add(item);
    nodes.push({
      kind: "bookmark",
      title: readTitle(item),
      pageIndex: resolveDest(item, pdfDoc, pageRefToIndex),
    });
    const firstChild = item.lookup(PDFName.of("First"));
    if (firstChild instanceof PDFDict) {
      const children = readSiblings(firstChild, pdfDoc, pageRefToIndex, seen);
      if (children.length > 0) nodes.push({ kind: "group", children });
    }
    const next = item.lookup(PDFName.of("Next"));
    item = next instanceof PDFDict ? next : undefined;
  }
  return nodes;
}

/**
 * Read the document outline as a tree. Each entry becomes a bookmark node;
 * an entry's children follow it as a group node. Returns null when the
 * catalog has no /Outlines at all.
 */
export function readOutline(pdfDoc: PDFDocument): OutlineNode[] | null {
  const root = pdfDoc.catalog.lookup(PDFName.of("Outlines"));
  if (!(root instanceof PDFDict)) return null;
  const first = root.lookup(PDFName.of("First"));
  const nodes = readSiblings(
    first instanceof PDFDict ? first : undefined,
    pdfDoc,
    buildPageIndex(pdfDoc),
    new Set(),
  );
  debug("outline: %d top-level nodes", nodes.length);
  return nodes;
}

export function countBookmarks(nodes: OutlineNode[]): number {
  let count = 0;
  for (const node of nodes)
    count += node.kind === "group" ? countBookmarks(node.children) : 1;
  return count;
}

/**
 * Depth-first flattening into bookmarks sorted by page. Only entries within
 * `maxDepth` levels are kept (0 = all levels); entries whose destination did
 * not resolve are dropped and their titles returned.
 */
export function flattenOutline(
  nodes: OutlineNode[],
  maxDepth = 1,
): { bookmarks: Bookmark[]; dropped: string[] } {
  const bookmarks: Bookmark[] = [];
  const dropped: string[] = [];

  const walk = (level: OutlineNode[], depth: number): void => {
    for (const node of level) {
      if (node.kind === "group") {
        if (maxDepth === 0 || depth < maxDepth) walk(node.children, depth + 1);
        continue;
      }
      if (node.pageIndex === null) {
        debug("dropping unresolved bookmark %o", node.title);
        dropped.push(node.title);
        continue;
      }
      bookmarks.push({ title: node.title, pageIndex: node.pageIndex, depth });
    }
  };
  walk(nodes, 1);

  // Array.prototype.sort is stable: ties keep outline order.
  bookmarks.sort((a, b) => a.pageIndex - b.pageIndex);
  return { bookmarks, dropped };
}
