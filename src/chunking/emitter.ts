import { MeasurementError } from "../errors/index";
import { warn } from "../output/logger";
import type { HeadingTracker } from "./markdown";
import { OverlapAssembler, type AssembledText, type CoreSpan } from "./overlap";
import { RecursiveSplitter } from "./splitter";
import { planDocument, selectStrategy, type ResolvedStrategy } from "./strategy-selector";
import type { Chunk, ChunkOptions, Document } from "./types";
import { coreRange } from "./utils";

/**
 * Pull-based chunk sequence for one document. Configuration has already
 * been validated when an iterator exists; state lives only in this object,
 * so chunking again means creating a new iterator.
 */
export class ChunkIterator implements IterableIterator<Chunk> {
  private readonly splitter: RecursiveSplitter;
  private readonly assembler: OverlapAssembler;
  private readonly headings: HeadingTracker | null;
  private previous: CoreSpan | undefined;
  private sequenceIndex = 0;

  constructor(
    private readonly document: Document,
    private readonly strategy: ResolvedStrategy
  ) {
    const plan = planDocument(strategy, document);
    this.headings = plan.headings;
    this.splitter = new RecursiveSplitter(
      document.content,
      plan.hierarchy,
      strategy.measurer,
      strategy.maxChunkSize,
      document.id
    );
    this.assembler = new OverlapAssembler(
      document.content,
      strategy.measurer,
      strategy.maxChunkSize,
      strategy.overlapSize
    );
  }

  next(): IteratorResult<Chunk> {
    const span = this.splitter.next();
    if (!span) {
      return { done: true, value: undefined };
    }

    const core = coreRange(this.document.content, span.start, span.end);
    const current: CoreSpan = {
      coreStart: core.start,
      coreEnd: core.end,
      size: span.size,
      oversized: span.oversized,
    };

    let assembled: AssembledText;
    try {
      assembled = this.assembler.assemble(this.previous, current);
    } catch (e: unknown) {
      if (e instanceof MeasurementError) throw e.withSpan(this.document.id, span.start, span.end);
      throw e;
    }

    if (span.oversized) {
      warn(
        `Chunk ${this.sequenceIndex} of '${this.document.id}' (${span.start}-${span.end}) measures ${span.size} ${this.strategy.measurer.unit}, over the ${this.strategy.maxChunkSize} budget; emitted whole`
      );
    }

    const chunk: Chunk = {
      documentId: this.document.id,
      sequenceIndex: this.sequenceIndex++,
      text: assembled.text,
      sourceStartOffset: span.start,
      sourceEndOffset: span.end,
      measuredSize: assembled.measuredSize,
      oversized: span.oversized,
      overlapLength: assembled.overlapLength,
      headingPath: this.headings ? this.headings.pathAt(core.start) : [],
    };
    this.previous = current;
    return { done: false, value: chunk };
  }

  [Symbol.iterator](): ChunkIterator {
    return this;
  }
}

/**
 * Validates the configuration, then returns a lazy iterator over the
 * document's chunks.
 */
export function createChunkIterator(
  document: Document,
  strategy: string,
  maxChunkSize: number,
  overlapSize: number,
  options: ChunkOptions = {}
): ChunkIterator {
  const resolved = selectStrategy(strategy, maxChunkSize, overlapSize, options);
  return new ChunkIterator(document, resolved);
}

/**
 * Chunks a document eagerly.
 *
 * @throws UnsupportedStrategyError, ConfigurationError before any text is processed
 * @throws MeasurementError when the tokenizer fails; no partial result is returned
 */
export function chunk(
  document: Document,
  strategy: string,
  maxChunkSize: number,
  overlapSize: number,
  options: ChunkOptions = {}
): Chunk[] {
  return [...createChunkIterator(document, strategy, maxChunkSize, overlapSize, options)];
}

export function chunkText(
  text: string,
  strategy: string,
  maxChunkSize: number,
  overlapSize = 0,
  options: ChunkOptions = {},
  documentId = "document"
): Chunk[] {
  return chunk({ id: documentId, content: text }, strategy, maxChunkSize, overlapSize, options);
}
