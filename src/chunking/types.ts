export type BlockKind = "heading" | "code" | "table" | "math" | "paragraph" | "list";

/**
 * Structural annotation supplied by an upstream parser. Offsets are
 * half-open into `Document.content`.
 */
export interface BlockAnnotation {
  start: number;
  end: number;
  kind: BlockKind;
}

export interface Document {
  id: string;
  content: string;
  blocks?: readonly BlockAnnotation[];
}

export type Unit = "char" | "word" | "token";

export type Tokenizer = (text: string) => number;

export type KeepSide = "preceding" | "following";

/** Half-open offset range into a document. */
export interface Range {
  start: number;
  end: number;
}

/**
 * A boundary rule matched by a regular expression. `keep` decides which side
 * the matched text stays with: "preceding" cuts after the match, "following"
 * cuts before it.
 */
export interface PatternRule {
  readonly kind: "pattern";
  readonly name: string;
  readonly pattern: RegExp;
  readonly keep: KeepSide;
  /** Returns false to discard a match (abbreviations, etc.). */
  readonly accept?: (text: string, match: RegExpExecArray) => boolean;
}

/** Cuts between every pair of characters. Always last in a hierarchy. */
export interface UniversalRule {
  readonly kind: "universal";
  readonly name: string;
}

/** A rule whose cut offsets are computed rather than matched. */
export interface ComputedRule {
  readonly kind: "computed";
  readonly name: string;
  boundaries(text: string, start: number, end: number): number[];
}

export type SeparatorRule = PatternRule | UniversalRule | ComputedRule;

export interface SeparatorHierarchy {
  /** Highest priority first; the last rule is universal. */
  readonly rules: readonly SeparatorRule[];
  /** Ranges no rule may cut inside. Sorted, non-overlapping. */
  readonly protectedRanges: readonly Range[];
}

export interface Chunk {
  documentId: string;
  sequenceIndex: number;
  /** Overlap prefix (if any) followed by the core text. */
  text: string;
  /** Pre-overlap source range. */
  sourceStartOffset: number;
  sourceEndOffset: number;
  measuredSize: number;
  oversized: boolean;
  /** Characters at the start of `text` copied from the previous chunk. */
  overlapLength: number;
  /** Active markdown headings at the start of the chunk. */
  headingPath: string[];
}

export type StrategyName =
  | "character"
  | "sentence"
  | "recursive"
  | "regex"
  | "markdown"
  | "token"
  | "semantic";

export const STRATEGY_NAMES: readonly StrategyName[] = [
  "character",
  "sentence",
  "recursive",
  "regex",
  "markdown",
  "token",
  "semantic",
];

export interface ChunkOptions {
  unit?: Unit;
  tokenizer?: Tokenizer; // Required iff unit is "token"
  markdownAware?: boolean;
  regexPattern?: string | RegExp; // Required iff strategy is "regex"
  regexKeep?: KeepSide;
  sentenceAbbreviations?: readonly string[];
  splitOversizedFences?: boolean; // Let a fence over budget fall through to the plain rules
  semanticWindow?: number; // Sentences compared on each side of a boundary
  topicShiftThreshold?: number; // Cosine distance above which a boundary is a topic shift
}
