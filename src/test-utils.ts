import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  PDFDict,
  PDFDocument,
  PDFHexString,
  PDFName,
  PDFNumber,
  PDFRef,
} from "pdf-lib";
import type { PDFObject } from "pdf-lib";

/** Outline entry for a fixture; exactly one of page / named / action / broken. */
export interface OutlineSpec {
  title: string;
  page?: number;
  named?: string;
  /** Target page reached through a GoTo action instead of /Dest. */
  action?: number;
  broken?: boolean;
  children?: OutlineSpec[];
}

export interface FixtureOptions {
  pages: number;
  /** Omit for a document without /Outlines. */
  outline?: OutlineSpec[];
  namedDests?: Record<string, number>;
  encrypted?: boolean;
  /** Point the catalog's /Pages at an object the file does not contain. */
  brokenPageTree?: boolean;
  /** Link the last top-level entry's /Next and /First back to the first. */
  cyclicOutline?: boolean;
}

/** Fixture pages get distinct widths so copies can be told apart. */
export function pageWidth(pageIndex: number): number {
  return 100 + pageIndex;
}

export async function buildPdf(opts: FixtureOptions): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (let i = 0; i < opts.pages; i++) doc.addPage([pageWidth(i), 200]);
  const pages = doc.getPages();
  const { context } = doc;

  const explicitDest = (pageIndex: number): PDFObject =>
    context.obj([pages[pageIndex].ref, "Fit"]);

  const writeLevel = (
    specs: OutlineSpec[],
    parent: PDFRef,
  ): { first: PDFRef; last: PDFRef } => {
    const refs = specs.map(() => context.nextRef());
    specs.forEach((spec, i) => {
      const item = context.obj({
        Title: PDFHexString.fromText(spec.title),
        Parent: parent,
      });
      if (spec.broken)
        item.set(PDFName.of("Dest"), context.obj([PDFRef.of(9999), "Fit"]));
      else if (spec.named !== undefined)
        item.set(PDFName.of("Dest"), PDFName.of(spec.named));
      else if (spec.action !== undefined)
        item.set(
          PDFName.of("A"),
          context.obj({ S: "GoTo", D: explicitDest(spec.action) }),
        );
      else if (spec.page !== undefined)
        item.set(PDFName.of("Dest"), explicitDest(spec.page));
      if (i > 0) item.set(PDFName.of("Prev"), refs[i - 1]);
      if (i < refs.length - 1) item.set(PDFName.of("Next"), refs[i + 1]);
      if (spec.children && spec.children.length > 0) {
        const kids = writeLevel(spec.children, refs[i]);
        item.set(PDFName.of("First"), kids.first);
        item.set(PDFName.of("Last"), kids.last);
      }
      context.assign(refs[i], item);
    });
    return { first: refs[0], last: refs[refs.length - 1] };
  };

  if (opts.outline) {
    const rootRef = context.nextRef();
    const root = context.obj({ Type: "Outlines" });
    if (opts.outline.length > 0) {
      const { first, last } = writeLevel(opts.outline, rootRef);
      root.set(PDFName.of("First"), first);
      root.set(PDFName.of("Last"), last);
      root.set(PDFName.of("Count"), PDFNumber.of(opts.outline.length));
      if (opts.cyclicOutline) {
        const lastItem = context.lookup(last, PDFDict);
        lastItem.set(PDFName.of("Next"), first);
        lastItem.set(PDFName.of("First"), first);
      }
    }
    context.assign(rootRef, root);
    doc.catalog.set(PDFName.of("Outlines"), rootRef);
  }

  if (opts.namedDests) {
    const dests = context.obj({});
    for (const [name, pageIndex] of Object.entries(opts.namedDests))
      dests.set(PDFName.of(name), explicitDest(pageIndex));
    doc.catalog.set(PDFName.of("Dests"), context.register(dests));
  }

  if (opts.encrypted)
    context.trailerInfo.Encrypt = context.register(
      context.obj({ Filter: "Standard", V: 1, R: 2 }),
    );

  if (opts.brokenPageTree)
    doc.catalog.set(PDFName.of("Pages"), PDFRef.of(9999));

  return doc.save({ useObjectStreams: false, addDefaultPage: false });
}

/** Outline with one top-level entry per `starts` page, titled "Chapter N". */
export function chapterOutline(starts: number[]): OutlineSpec[] {
  return starts.map((page, i) => ({ title: `Chapter ${i + 1}`, page }));
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "pdf-chapter-split-"));
}

export async function writePdf(
  dir: string,
  name: string,
  opts: FixtureOptions,
): Promise<string> {
  const file = path.join(dir, name);
  fs.writeFileSync(file, await buildPdf(opts));
  return file;
}
