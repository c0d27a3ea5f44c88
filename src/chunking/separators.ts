import { ConfigurationError } from "../errors/index";
import type {
  KeepSide,
  PatternRule,
  Range,
  SeparatorHierarchy,
  SeparatorRule,
  UniversalRule,
} from "./types";
import { splitsSurrogatePair } from "./utils";

export const DEFAULT_SENTENCE_ABBREVIATIONS: readonly string[] = Object.freeze([
  "Mr.",
  "Mrs.",
  "Ms.",
  "Dr.",
  "Prof.",
  "Sr.",
  "Jr.",
  "St.",
  "vs.",
  "etc.",
  "e.g.",
  "i.e.",
  "approx.",
  "No.",
  "Inc.",
  "Ltd.",
  "Co.",
  "Fig.",
]);

export const PARAGRAPH_RULE: PatternRule = {
  kind: "pattern",
  name: "paragraph",
  pattern: /\n\s*\n/g,
  keep: "preceding",
};

export const LINE_RULE: PatternRule = {
  kind: "pattern",
  name: "line",
  pattern: /(?:\r?\n)+/g,
  keep: "preceding",
};

export const WORD_RULE: PatternRule = {
  kind: "pattern",
  name: "word",
  pattern: /\s+/g,
  keep: "following",
};

export const CHARACTER_RULE: UniversalRule = {
  kind: "universal",
  name: "character",
};

const LEADING_PUNCTUATION = /^["'“‘(\[]+/;

/**
 * Sentence terminators: `.`, `!`, `?` (optionally closed by quotes or
 * brackets) followed by whitespace or end of text, and CJK terminators which
 * need no trailing whitespace. A period ending a listed abbreviation is not a
 * boundary.
 */
export function createSentenceRule(abbreviations: ReadonlySet<string>): PatternRule {
  return {
    kind: "pattern",
    name: "sentence",
    pattern: /[.!?]+["'”’)\]]*(?=\s|$)|[。！？]+["'”’)\]]*/g,
    keep: "preceding",
    accept: (text, match) => {
      if (!match[0].startsWith(".") || abbreviations.size === 0) return true;
      let wordStart = match.index;
      while (wordStart > 0 && !/\s/.test(text[wordStart - 1] ?? "")) wordStart--;
      const word = text.slice(wordStart, match.index + 1).replace(LEADING_PUNCTUATION, "");
      return !abbreviations.has(word);
    },
  };
}

/**
 * Compiles a caller-supplied pattern into a boundary rule. String patterns
 * are compiled with the `g` flag; RegExp flags are kept, `g` added and `y`
 * dropped.
 */
export function createRegexRule(pattern: string | RegExp, keep: KeepSide): PatternRule {
  const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gy]/g, "");
  const compiled = new RegExp(typeof pattern === "string" ? pattern : pattern.source, `${flags}g`);
  return { kind: "pattern", name: "regex", pattern: compiled, keep };
}

/**
 * Builds a hierarchy, enforcing that the last rule is the universal
 * fallback.
 */
export function createHierarchy(
  rules: readonly SeparatorRule[],
  protectedRanges: readonly Range[] = []
): SeparatorHierarchy {
  const last = rules[rules.length - 1];
  if (!last || last.kind !== "universal") {
    throw new ConfigurationError("Separator hierarchy must end with a universal fallback rule");
  }
  return { rules, protectedRanges };
}

function isProtected(offset: number, ranges: readonly Range[]): boolean {
  let lo = 0;
  let hi = ranges.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const range = ranges[mid];
    if (!range) break;
    if (offset <= range.start) {
      hi = mid - 1;
    } else if (offset >= range.end) {
      lo = mid + 1;
    } else {
      return true;
    }
  }
  return false;
}

function patternBoundaries(text: string, rule: PatternRule, start: number, end: number): number[] {
  // Fresh RegExp per call: lastIndex is shared state on the rule's instance.
  const regex = new RegExp(rule.pattern.source, rule.pattern.flags);
  regex.lastIndex = start;
  const offsets: number[] = [];
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    if (match.index >= end) break;
    if (match[0].length === 0) {
      regex.lastIndex = match.index + 1;
      continue;
    }
    if (rule.accept && !rule.accept(text, match)) continue;
    offsets.push(rule.keep === "preceding" ? match.index + match[0].length : match.index);
  }
  return offsets;
}

function universalBoundaries(text: string, start: number, end: number): number[] {
  const offsets: number[] = [];
  for (let offset = start + 1; offset < end; offset++) {
    if (!splitsSurrogatePair(text, offset)) offsets.push(offset);
  }
  return offsets;
}

function rawBoundaries(text: string, rule: SeparatorRule, start: number, end: number): number[] {
  switch (rule.kind) {
    case "pattern":
      return patternBoundaries(text, rule, start, end);
    case "universal":
      return universalBoundaries(text, start, end);
    case "computed":
      return [...rule.boundaries(text, start, end)];
  }
}

/**
 * Offsets strictly inside `(start, end)` where `rule` cuts, sorted and
 * de-duplicated, with offsets inside protected ranges dropped.
 */
export function nextBoundaries(
  text: string,
  rule: SeparatorRule,
  start: number,
  end: number,
  protectedRanges: readonly Range[] = []
): number[] {
  const sorted = rawBoundaries(text, rule, start, end).sort((a, b) => a - b);
  const result: number[] = [];
  for (const offset of sorted) {
    if (offset <= start || offset >= end) continue;
    if (result[result.length - 1] === offset) continue;
    if (isProtected(offset, protectedRanges)) continue;
    result.push(offset);
  }
  return result;
}
