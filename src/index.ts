export { chunk, chunkText, createChunkIterator, ChunkIterator } from './chunking/emitter';
export { selectStrategy, planDocument, isStrategyName } from './chunking/strategy-selector';
export type { ResolvedStrategy, DocumentPlan, MarkdownSettings } from './chunking/strategy-selector';
export { RecursiveSplitter } from './chunking/splitter';
export type { SplitSpan } from './chunking/splitter';
export { OverlapAssembler } from './chunking/overlap';
export type { CoreSpan, AssembledText } from './chunking/overlap';
export { CharMeasurer, WordMeasurer, TokenMeasurer, createMeasurer } from './chunking/measurer';
export type { UnitMeasurer } from './chunking/measurer';
export {
  CHARACTER_RULE,
  DEFAULT_SENTENCE_ABBREVIATIONS,
  LINE_RULE,
  PARAGRAPH_RULE,
  WORD_RULE,
  createHierarchy,
  createRegexRule,
  createSentenceRule,
  nextBoundaries,
} from './chunking/separators';
export {
  HeadingTracker,
  LIST_ITEM_RULE,
  findFencedCodeBlocks,
  findHeadings,
  findProtectedRanges,
} from './chunking/markdown';
export type { Heading } from './chunking/markdown';
export { createTopicShiftRule, cosineDistance, termVector } from './chunking/topic-shift';
export type { TopicShiftOptions } from './chunking/topic-shift';
export { STRATEGY_NAMES } from './chunking/types';
export type {
  BlockAnnotation,
  BlockKind,
  Chunk,
  ChunkOptions,
  ComputedRule,
  Document,
  KeepSide,
  PatternRule,
  Range,
  SeparatorHierarchy,
  SeparatorRule,
  StrategyName,
  Tokenizer,
  UniversalRule,
  Unit,
} from './chunking/types';

export { ProfileLoader, profileOptions } from './config/profile-loader';
export type { ProfileRuntime } from './config/profile-loader';
export type { ChunkingProfile, ProfileFile } from './schemas/profile-schemas';

export { toChunkRecord, parseChunkRecord } from './output/chunk-record';
export { ChunkJsonFormatter } from './output/json-formatter';
export type { Result as ChunkExport, DocumentResult } from './output/json-formatter';
export type { ChunkRecord } from './schemas/chunk-schemas';
export { setSilentMode, isSilentMode, setLogSink } from './output/logger';
export type { LogSink } from './output/logger';

export {
  ChunkwrightError,
  ConfigurationError,
  UnsupportedStrategyError,
  MeasurementError,
  ValidationError,
  ProcessingError,
} from './errors/index';
