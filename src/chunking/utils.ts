import type { Range } from "./types";

export function splitIntoWords(text: string): string[] {
  return text.replace(/\s+/g, " ").trim().split(" ").filter(Boolean);
}

export function countWords(text: string): number {
  return splitIntoWords(text).length;
}

function isLineBreak(ch: string | undefined): boolean {
  return ch === "\n" || ch === "\r";
}

/**
 * Narrows `[start, end)` so it no longer begins or ends with line breaks.
 * The result is the range of a chunk's core text; an all-newline range
 * collapses to an empty range at `end`.
 */
export function coreRange(text: string, start: number, end: number): Range {
  let s = start;
  let e = end;
  while (s < e && isLineBreak(text[s])) s++;
  while (e > s && isLineBreak(text[e - 1])) e--;
  if (s === e) return { start: end, end };
  return { start: s, end: e };
}

export function coreText(text: string, start: number, end: number): string {
  const core = coreRange(text, start, end);
  return text.slice(core.start, core.end);
}

/**
 * True when a cut at `offset` would fall between the halves of a UTF-16
 * surrogate pair.
 */
export function splitsSurrogatePair(text: string, offset: number): boolean {
  const before = text.charCodeAt(offset - 1);
  const after = text.charCodeAt(offset);
  return before >= 0xd800 && before <= 0xdbff && after >= 0xdc00 && after <= 0xdfff;
}

/**
 * Offsets in `[start, end)` where a word starts: `start` itself and every
 * non-whitespace character preceded by whitespace.
 */
export function wordStarts(text: string, start: number, end: number): number[] {
  const starts: number[] = [];
  for (let i = start; i < end; i++) {
    const ch = text[i] ?? "";
    if (/\s/.test(ch)) continue;
    if (i === start || /\s/.test(text[i - 1] ?? "")) starts.push(i);
  }
  return starts;
}
