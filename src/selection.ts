import createDebug from "debug";
import type { Selection, SelectionIssue } from "./types";

const debug = createDebug("chaptersplit:selection");

const TERM = /^(\d+)(?:\s*-\s*(\d+))?$/;

function span(from: number, to: number): string {
  return from === to ? String(from) : `${from}-${to}`;
}

/** Out-of-range part(s) of [from, to] against [1, count], as issue text. */
function outOfRange(
  term: string,
  from: number,
  to: number,
  count: number,
): SelectionIssue[] {
  const valid = count < 1 ? "no chapters available" : `valid: 1-${count}`;
  const parts: string[] = [];
  if (from < 1) parts.push(span(from, Math.min(to, 0)));
  if (to > count) parts.push(span(Math.max(from, count + 1), to));
  return parts.map((p) => ({
    term,
    message: p.includes("-")
      ? `chapters ${p} are out of range (${valid})`
      : `chapter ${p} is out of range (${valid})`,
  }));
}

/**
 * Parse a selection such as "1,3,5-7" against `chapterCount` chapters.
 * Invalid terms are reported and skipped; the rest still apply. An absent or
 * blank expression selects every chapter.
 */
export function parseSelection(
  expression: string | undefined,
  chapterCount: number,
): Selection {
  if (expression === undefined || expression.trim() === "") {
    return {
      chapters: Array.from({ length: chapterCount }, (_, i) => i + 1),
      issues: [],
    };
  }

  const picked = new Set<number>();
  const issues: SelectionIssue[] = [];

  for (const raw of expression.split(",")) {
    const term = raw.trim();
    const m = TERM.exec(term);
    if (!m) {
      issues.push({
        term,
        message: term === "" ? "empty term" : "not a chapter number or range",
      });
      continue;
    }
    const from = Number(m[1]);
    const to = m[2] === undefined ? from : Number(m[2]);
    if (to < from) {
      issues.push({
        term,
        message: `reversed range: ${from} is greater than ${to}`,
      });
      continue;
    }
    issues.push(...outOfRange(term, from, to, chapterCount));
    for (let n = Math.max(from, 1); n <= Math.min(to, chapterCount); n++)
      picked.add(n);
  }

  const chapters = [...picked].sort((a, b) => a - b);
  debug("selection %o -> %o (%d issues)", expression, chapters, issues.length);
  return { chapters, issues };
}

/** Canonical form of a set of chapter numbers, e.g. [1, 3, 5, 6, 7] -> "1,3,5-7". */
export function formatSelection(numbers: Iterable<number>): string {
  const sorted = [...new Set(numbers)].sort((a, b) => a - b);
  const parts: string[] = [];
  let i = 0;
  while (i < sorted.length) {
    let j = i;
    while (j + 1 < sorted.length && sorted[j + 1] === sorted[j] + 1) j++;
    parts.push(span(sorted[i], sorted[j]));
    i = j + 1;
  }
  return parts.join(",");
}
