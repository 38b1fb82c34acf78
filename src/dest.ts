import type { PDFDocument, PDFObject } from "pdf-lib";
import {
  PDFName,
  PDFDict,
  PDFRef,
  PDFArray,
  PDFString,
  PDFHexString,
} from "pdf-lib";

export function refKey(ref: PDFRef): string {
  return `${ref.objectNumber},${ref.generationNumber}`;
}

/** Map of page object reference -> zero-based page index. */
export function buildPageIndex(pdfDoc: PDFDocument): Map<string, number> {
  const pageRefToIndex = new Map<string, number>();
  const pages = pdfDoc.getPages();
  for (let i = 0; i < pages.length; i++)
    pageRefToIndex.set(refKey(pages[i].ref), i);
  return pageRefToIndex;
}

function decodeKey(obj: PDFObject | undefined): string | null {
  if (obj instanceof PDFString || obj instanceof PDFHexString)
    return obj.decodeText();
  if (obj instanceof PDFName) return obj.decodeText();
  return null;
}

/** A destination value is either an explicit array or a dict with /D. */
function asDestArray(
  value: PDFObject | undefined,
  pdfDoc: PDFDocument,
): PDFArray | undefined {
  const resolved = value ? pdfDoc.context.lookup(value) : undefined;
  if (resolved instanceof PDFArray) return resolved;
  if (resolved instanceof PDFDict) {
    const d = resolved.get(PDFName.of("D"));
    const inner = d ? pdfDoc.context.lookup(d) : undefined;
    if (inner instanceof PDFArray) return inner;
  }
  return undefined;
}

export function findInNameTree(
  name: string,
  nodeRefOrDict: PDFObject,
  pdfDoc: PDFDocument,
  seen: Set<PDFObject> = new Set(),
): PDFArray | undefined {
  const node = pdfDoc.context.lookup(nodeRefOrDict);
  if (!(node instanceof PDFDict) || seen.has(node)) return undefined;
  seen.add(node);
  const names = node.lookup(PDFName.of("Names"));
  if (names instanceof PDFArray) {
    for (let i = 0; i < names.size() - 1; i += 2) {
      if (decodeKey(pdfDoc.context.lookup(names.get(i))) === name)
        return asDestArray(names.get(i + 1), pdfDoc);
    }
  }
  const kids = node.lookup(PDFName.of("Kids"));
  if (kids instanceof PDFArray) {
    for (let j = 0; j < kids.size(); j++) {
      const found = findInNameTree(name, kids.get(j), pdfDoc, seen);
      if (found) return found;
    }
  }
  return undefined;
}

export function resolveNamedDest(
  name: string,
  pdfDoc: PDFDocument,
): PDFArray | undefined {
  const dests = pdfDoc.catalog.lookup(PDFName.of("Dests"));
  if (dests instanceof PDFDict) {
    const found = asDestArray(dests.get(PDFName.of(name)), pdfDoc);
    if (found) return found;
  }
  const names = pdfDoc.catalog.lookup(PDFName.of("Names"));
  if (!(names instanceof PDFDict)) return undefined;
  const destsTree = names.get(PDFName.of("Dests"));
  if (!destsTree) return undefined;
  return findInNameTree(name, destsTree, pdfDoc);
}

function toDestArray(
  value: PDFObject | undefined,
  pdfDoc: PDFDocument,
): PDFArray | undefined {
  if (!value) return undefined;
  const resolved = pdfDoc.context.lookup(value);
  if (resolved instanceof PDFArray) return resolved;
  const name = decodeKey(resolved);
  return name === null ? undefined : resolveNamedDest(name, pdfDoc);
}

/**
 * Zero-based page index an outline item points at, via /Dest or a GoTo
 * action. Null when the destination is missing or points at no page of
 * this document.
 */
export function resolveDest(
  item: PDFDict,
  pdfDoc: PDFDocument,
  pageRefToIndex: Map<string, number>,
): number | null {
  let dest = toDestArray(item.get(PDFName.of("Dest")), pdfDoc);
  if (!dest) {
    const a = item.lookup(PDFName.of("A"));
    if (a instanceof PDFDict) {
      const s = a.lookup(PDFName.of("S"));
      if (s instanceof PDFName && s.decodeText() === "GoTo")
        dest = toDestArray(a.get(PDFName.of("D")), pdfDoc);
    }
  }
  if (!dest || dest.size() < 1) return null;
  const firstElem = dest.get(0);
  let pageIndex: number | undefined;
  if (firstElem instanceof PDFRef) {
    pageIndex = pageRefToIndex.get(refKey(firstElem));
  } else {
    const pages = pdfDoc.getPages();
    pageIndex = pages.findIndex((p) => p.node === firstElem);
  }
  if (pageIndex === undefined || pageIndex < 0) return null;
  return pageIndex;
}
