import type { ZodIssue } from "zod";
import { ConfigurationError, MeasurementError, UnsupportedStrategyError } from "../errors/index";
import { warn } from "../output/logger";
import { CHUNK_OPTIONS_SCHEMA, CHUNK_SIZE_SCHEMA } from "../schemas/options-schemas";
import {
  HeadingTracker,
  LIST_ITEM_RULE,
  createFenceRule,
  createHeadingRule,
  findFencedCodeBlocks,
  findHeadings,
  findProtectedRanges,
  mergeRanges,
} from "./markdown";
import { createMeasurer, type UnitMeasurer } from "./measurer";
import {
  CHARACTER_RULE,
  DEFAULT_SENTENCE_ABBREVIATIONS,
  LINE_RULE,
  PARAGRAPH_RULE,
  WORD_RULE,
  createHierarchy,
  createRegexRule,
  createSentenceRule,
} from "./separators";
import { createTopicShiftRule } from "./topic-shift";
import {
  STRATEGY_NAMES,
  type ChunkOptions,
  type Document,
  type PatternRule,
  type SeparatorHierarchy,
  type SeparatorRule,
  type StrategyName,
  type Unit,
} from "./types";
import { coreText } from "./utils";

export interface MarkdownSettings {
  splitOversizedFences: boolean;
}

interface StrategyBase {
  measurer: UnitMeasurer;
  maxChunkSize: number;
  overlapSize: number;
  /** Non-null when markdown rules are prepended to the hierarchy. */
  markdown: MarkdownSettings | null;
  sentenceRule: PatternRule;
}

/**
 * A strategy resolved against validated options. Each kind carries what its
 * hierarchy needs; the set is closed.
 */
export type ResolvedStrategy =
  | (StrategyBase & { kind: "character" })
  | (StrategyBase & { kind: "sentence" })
  | (StrategyBase & { kind: "recursive" })
  | (StrategyBase & { kind: "regex"; rule: PatternRule })
  | (StrategyBase & { kind: "markdown"; markdown: MarkdownSettings })
  | (StrategyBase & { kind: "token" })
  | (StrategyBase & { kind: "semantic"; window: number; threshold: number });

export interface DocumentPlan {
  hierarchy: SeparatorHierarchy;
  /** Present when markdown rules are active. */
  headings: HeadingTracker | null;
}

export function isStrategyName(name: string): name is StrategyName {
  return STRATEGY_NAMES.some((known) => known === name);
}

function isEmptyPattern(pattern: string | RegExp): boolean {
  return typeof pattern === "string" ? pattern === "" : pattern.source === "(?:)";
}

function formatIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`);
}

/**
 * Validates the configuration and resolves a strategy name to its variant.
 * Throws before any text is looked at.
 *
 * @throws UnsupportedStrategyError for names outside the supported set
 * @throws ConfigurationError for invalid or contradictory options
 */
export function selectStrategy(
  name: string,
  maxChunkSize: number,
  overlapSize: number,
  options: ChunkOptions = {}
): ResolvedStrategy {
  if (!isStrategyName(name)) {
    throw new UnsupportedStrategyError(name, STRATEGY_NAMES);
  }

  const issues: string[] = [];
  const size = CHUNK_SIZE_SCHEMA.safeParse({ maxChunkSize, overlapSize });
  if (!size.success) issues.push(...formatIssues(size.error.issues));
  const parsed = CHUNK_OPTIONS_SCHEMA.safeParse(options);
  if (!parsed.success) issues.push(...formatIssues(parsed.error.issues));
  if (!size.success || !parsed.success) {
    throw new ConfigurationError(`Invalid chunking configuration: ${issues.join("; ")}`, issues);
  }

  const opts = parsed.data;
  const tokenStrategy = name === "token" || name === "semantic";
  const unit: Unit = opts.unit ?? (tokenStrategy ? "token" : "char");

  if (tokenStrategy && unit !== "token") {
    issues.push(`unit: strategy '${name}' measures tokens, got '${unit}'`);
  }
  if (unit === "token" && !opts.tokenizer) {
    issues.push("tokenizer: required when unit is 'token'");
  }
  if (unit !== "token" && opts.tokenizer) {
    issues.push(`tokenizer: only used when unit is 'token', got '${unit}'`);
  }

  let regexRule: PatternRule | null = null;
  if (name === "regex") {
    const pattern = opts.regexPattern;
    if (pattern === undefined || isEmptyPattern(pattern)) {
      issues.push("regexPattern: required and non-empty for strategy 'regex'");
    } else {
      try {
        regexRule = createRegexRule(pattern, opts.regexKeep);
      } catch (e: unknown) {
        const message = e instanceof Error ? e.message : String(e);
        issues.push(`regexPattern: ${message}`);
      }
    }
  } else if (opts.regexPattern !== undefined) {
    issues.push(`regexPattern: only used by strategy 'regex', got '${name}'`);
  }

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid chunking configuration: ${issues.join("; ")}`, issues);
  }

  const abbreviations = new Set(opts.sentenceAbbreviations ?? DEFAULT_SENTENCE_ABBREVIATIONS);
  const markdown: MarkdownSettings = { splitOversizedFences: opts.splitOversizedFences };
  const base: StrategyBase = {
    measurer: createMeasurer(unit, opts.tokenizer),
    maxChunkSize: size.data.maxChunkSize,
    overlapSize: size.data.overlapSize,
    markdown: opts.markdownAware ? markdown : null,
    sentenceRule: createSentenceRule(abbreviations),
  };

  switch (name) {
    case "character":
    case "sentence":
    case "recursive":
    case "token":
      return { ...base, kind: name };
    case "markdown":
      return { ...base, kind: "markdown", markdown };
    case "regex":
      if (!regexRule) {
        throw new ConfigurationError("regexPattern: required and non-empty for strategy 'regex'");
      }
      return { ...base, kind: "regex", rule: regexRule };
    case "semantic":
      return { ...base, kind: "semantic", window: opts.semanticWindow, threshold: opts.topicShiftThreshold };
  }
}

function recursiveRules(sentenceRule: PatternRule): SeparatorRule[] {
  return [PARAGRAPH_RULE, LINE_RULE, sentenceRule, WORD_RULE, CHARACTER_RULE];
}

function plainRules(strategy: ResolvedStrategy): SeparatorRule[] {
  switch (strategy.kind) {
    case "character":
      return [CHARACTER_RULE];
    case "sentence":
      return [strategy.sentenceRule, WORD_RULE, CHARACTER_RULE];
    case "recursive":
    case "markdown":
    case "token":
      return recursiveRules(strategy.sentenceRule);
    case "regex":
      return [strategy.rule, CHARACTER_RULE];
    case "semantic":
      return [
        createTopicShiftRule(strategy.sentenceRule, {
          window: strategy.window,
          threshold: strategy.threshold,
        }),
        PARAGRAPH_RULE,
        strategy.sentenceRule,
        WORD_RULE,
        CHARACTER_RULE,
      ];
  }
}

/**
 * Builds the separator hierarchy for one document. Markdown-aware plans
 * prepend heading and code-fence rules, add list items after paragraphs and
 * protect fences, math, links, images and table rows from being cut.
 */
export function planDocument(strategy: ResolvedStrategy, document: Document): DocumentPlan {
  const rules = plainRules(strategy);
  if (!strategy.markdown) {
    return { hierarchy: createHierarchy(rules), headings: null };
  }

  const text = document.content;
  const blocks = document.blocks ?? [];
  const fences = mergeRanges([
    ...findFencedCodeBlocks(text),
    ...blocks.filter((b) => b.kind === "code"),
  ]);

  let atomicFences = fences;
  if (strategy.markdown.splitOversizedFences) {
    atomicFences = fences.filter((fence) => {
      let size: number;
      try {
        size = strategy.measurer.measure(coreText(text, fence.start, fence.end));
      } catch (e: unknown) {
        if (e instanceof MeasurementError) throw e.withSpan(document.id, fence.start, fence.end);
        throw e;
      }
      if (size <= strategy.maxChunkSize) return true;
      warn(
        `Code fence at ${fence.start}-${fence.end} in '${document.id}' measures ${size}, over the ${strategy.maxChunkSize} budget; splitting it with the plain rules`
      );
      return false;
    });
  }

  const paragraphAt = rules.indexOf(PARAGRAPH_RULE);
  if (paragraphAt !== -1) rules.splice(paragraphAt + 1, 0, LIST_ITEM_RULE);

  const headings = findHeadings(text, fences, blocks);
  const protectedRanges = findProtectedRanges(
    text,
    atomicFences,
    blocks.filter((b) => b.kind !== "code")
  );
  return {
    hierarchy: createHierarchy(
      [createHeadingRule(headings), createFenceRule(fences), ...rules],
      protectedRanges
    ),
    headings: new HeadingTracker(headings),
  };
}
