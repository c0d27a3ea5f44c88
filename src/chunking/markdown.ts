import type { BlockAnnotation, ComputedRule, PatternRule, Range } from "./types";

export interface Heading {
  start: number;
  level: number;
  title: string;
}

interface Line {
  start: number;
  /** Offset of the line's end, before its newline. */
  end: number;
  content: string;
}

const OPENING_FENCE = /^( {0,3})(`{3,}|~{3,})(.*)$/;
const CLOSING_FENCE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;
// A closing run of hashes only counts after whitespace ("# C#" keeps its title)
const ATX_HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?(?:[ \t]+#+)?[ \t]*$/;

// Inline and block constructs that must never be cut internally
const PROTECTED_PATTERNS: readonly RegExp[] = [
  /\$\$[\s\S]*?\$\$/g, // math blocks
  /!?\[[^\]\n]*\]\([^)\n]*\)/g, // images and links
  /^[ \t]*\|.*\|[ \t]*$/gm, // table rows
];

function splitLines(text: string): Line[] {
  const lines: Line[] = [];
  let start = 0;
  while (start <= text.length) {
    const newline = text.indexOf("\n", start);
    const end = newline === -1 ? text.length : newline;
    const raw = text.slice(start, end);
    lines.push({ start, end, content: raw.endsWith("\r") ? raw.slice(0, -1) : raw });
    if (newline === -1) break;
    start = newline + 1;
  }
  return lines;
}

/**
 * Finds fenced code blocks (``` or ~~~). A closing fence uses the same
 * character and is at least as long as the opening one; an unclosed fence
 * runs to the end of the text.
 */
export function findFencedCodeBlocks(text: string): Range[] {
  const blocks: Range[] = [];
  const lines = splitLines(text);
  let open: { start: number; marker: string } | null = null;

  for (const line of lines) {
    if (!open) {
      const match = OPENING_FENCE.exec(line.content);
      if (!match || !match[2]) continue;
      const marker = match[2];
      // Backtick info strings may not contain backticks
      if (marker.startsWith("`") && (match[3] ?? "").includes("`")) continue;
      open = { start: line.start, marker };
      continue;
    }
    const close = CLOSING_FENCE.exec(line.content)?.[1];
    if (close && close[0] === open.marker[0] && close.length >= open.marker.length) {
      blocks.push({ start: open.start, end: line.end });
      open = null;
    }
  }

  if (open) blocks.push({ start: open.start, end: text.length });
  return blocks;
}

function insideAny(offset: number, ranges: readonly Range[]): boolean {
  return ranges.some((r) => offset >= r.start && offset < r.end);
}

/**
 * ATX headings outside fenced code, plus heading annotations from an
 * upstream parser. Sorted by offset.
 */
export function findHeadings(
  text: string,
  fences: readonly Range[],
  blocks: readonly BlockAnnotation[] = []
): Heading[] {
  const headings = new Map<number, Heading>();

  for (const line of splitLines(text)) {
    if (insideAny(line.start, fences)) continue;
    const match = ATX_HEADING.exec(line.content);
    const hashes = match?.[1];
    if (!match || !hashes) continue;
    headings.set(line.start, {
      start: line.start,
      level: hashes.length,
      title: (match[2] ?? "").trim(),
    });
  }

  for (const block of blocks) {
    if (block.kind !== "heading" || headings.has(block.start)) continue;
    const raw = text.slice(block.start, block.end).trim();
    const hashes = /^#{1,6}/.exec(raw)?.[0] ?? "";
    headings.set(block.start, {
      start: block.start,
      level: Math.max(1, hashes.length),
      title: raw.slice(hashes.length).replace(/[ \t]+#+[ \t]*$/, "").trim(),
    });
  }

  return [...headings.values()].sort((a, b) => a.start - b.start);
}

/**
 * Merges ranges into a sorted list of non-overlapping ranges.
 */
export function mergeRanges(ranges: readonly Range[]): Range[] {
  const sorted = ranges
    .filter((r) => r.end > r.start)
    .map((r) => ({ ...r }))
    .sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: Range[] = [];
  for (const range of sorted) {
    const last = merged[merged.length - 1];
    if (last && range.start < last.end) {
      last.end = Math.max(last.end, range.end);
    } else {
      merged.push(range);
    }
  }
  return merged;
}

/**
 * Ranges no rule may cut inside: the given fences, math blocks, images,
 * links, table rows and code/table/math annotations.
 */
export function findProtectedRanges(
  text: string,
  fences: readonly Range[],
  blocks: readonly BlockAnnotation[] = []
): Range[] {
  const ranges: Range[] = [...fences];
  for (const pattern of PROTECTED_PATTERNS) {
    const regex = new RegExp(pattern.source, pattern.flags);
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      if (match[0].length === 0) {
        regex.lastIndex = match.index + 1;
        continue;
      }
      ranges.push({ start: match.index, end: match.index + match[0].length });
    }
  }
  for (const block of blocks) {
    if (block.kind === "code" || block.kind === "table" || block.kind === "math") {
      ranges.push({ start: block.start, end: block.end });
    }
  }
  return mergeRanges(ranges);
}

function offsetsRule(name: string, offsets: readonly number[]): ComputedRule {
  return {
    kind: "computed",
    name,
    boundaries: (_text, start, end) => offsets.filter((o) => o > start && o < end),
  };
}

export function createHeadingRule(headings: readonly Heading[]): ComputedRule {
  return offsetsRule(
    "heading",
    headings.map((h) => h.start)
  );
}

export function createFenceRule(fences: readonly Range[]): ComputedRule {
  return offsetsRule(
    "code-fence",
    fences.flatMap((f) => [f.start, f.end])
  );
}

export const LIST_ITEM_RULE: PatternRule = {
  kind: "pattern",
  name: "list-item",
  pattern: /^[ \t]*(?:[-*+]|\d{1,9}[.)])[ \t]+/gm,
  keep: "following",
};

/**
 * Tracks the active heading at each level (H1..H6) so a chunk can carry the
 * path of sections it starts in.
 */
export class HeadingTracker {
  constructor(private readonly headings: readonly Heading[]) {}

  pathAt(offset: number): string[] {
    const active = new Map<number, string>();
    for (const heading of this.headings) {
      if (heading.start > offset) break;
      active.set(heading.level, heading.title);
      for (const level of [...active.keys()]) {
        if (level > heading.level) active.delete(level);
      }
    }
    return [...active.entries()].sort((a, b) => a[0] - b[0]).map(([, title]) => title);
  }
}
