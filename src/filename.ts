import createDebug from "debug";
import type { Chapter, FileNameOptions } from "./types";

const debug = createDebug("chaptersplit:filename");

export const DEFAULT_TITLE = "chapter";

// Characters Windows rejects in file names.
const INVALID_CHARS = /[<>:"/\\|?*]/g;
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

// Most file systems cap a single name at 255 bytes.
const MAX_NAME_BYTES = 255;
// ".pdf" plus the ".part" suffix of the temporary file.
const SUFFIX_BYTES = Buffer.byteLength(".pdf.part");

function trimDotsAndSpaces(name: string): string {
  return name.replace(/^[. ]+|[. ]+$/g, "");
}

function truncateBytes(name: string, maxBytes: number): string {
  let out = "";
  let bytes = 0;
  for (const ch of name) {
    bytes += Buffer.byteLength(ch);
    if (bytes > maxBytes) break;
    out += ch;
  }
  return out;
}

/**
 * File-name-safe form of a chapter title, at most `maxLength` code points
 * and `maxBytes` bytes of UTF-8.
 */
export function sanitizeTitle(
  title: string,
  maxLength = 200,
  maxBytes = Infinity,
): string {
  let name = trimDotsAndSpaces(
    title
      .replace(CONTROL_CHARS, " ")
      .replace(INVALID_CHARS, "")
      .replace(/\s+/g, " "),
  );
  const codePoints = Array.from(name);
  if (codePoints.length > maxLength) {
    debug(
      "truncate title %d -> %d: %s",
      codePoints.length,
      maxLength,
      `${name.slice(0, 40)}...`,
    );
    name = trimDotsAndSpaces(codePoints.slice(0, maxLength).join(""));
  }
  if (Buffer.byteLength(name) > maxBytes) {
    debug("truncate title to %d bytes: %s", maxBytes, `${name.slice(0, 40)}...`);
    name = trimDotsAndSpaces(truncateBytes(name, maxBytes));
  }
  return name || DEFAULT_TITLE;
}

export function chapterFileName(
  chapter: Chapter,
  opts: FileNameOptions,
): string {
  const index = String(chapter.number).padStart(opts.indexPadding, "0");
  const prefix = `${index}_`;
  const title = sanitizeTitle(
    chapter.title,
    opts.maxTitleLength,
    MAX_NAME_BYTES - Buffer.byteLength(prefix) - SUFFIX_BYTES,
  );
  return `${prefix}${title}.pdf`;
}
