import type { UnitMeasurer } from "./measurer";
import { wordStarts } from "./utils";

export interface CoreSpan {
  /** Core text range (edge line breaks removed). */
  coreStart: number;
  coreEnd: number;
  size: number;
  oversized: boolean;
}

export interface AssembledText {
  text: string;
  measuredSize: number;
  /** Characters of `text` taken from the previous chunk. */
  overlapLength: number;
}

/**
 * Prefixes each chunk with trailing context from the previous chunk's core
 * text. The prefix starts at a word boundary, measures at most
 * `overlapSize` (including the source text between the two cores), and never
 * pushes the chunk over `maxChunkSize`; when no prefix qualifies the chunk
 * goes out without one.
 */
export class OverlapAssembler {
  constructor(
    private readonly text: string,
    private readonly measurer: UnitMeasurer,
    private readonly maxChunkSize: number,
    private readonly overlapSize: number
  ) {}

  assemble(previous: CoreSpan | undefined, current: CoreSpan): AssembledText {
    const core: AssembledText = {
      text: this.text.slice(current.coreStart, current.coreEnd),
      measuredSize: current.size,
      overlapLength: 0,
    };
    if (
      this.overlapSize === 0 ||
      !previous ||
      current.oversized ||
      previous.coreStart === previous.coreEnd
    ) {
      return core;
    }

    let best: AssembledText | null = null;
    const candidates = wordStarts(this.text, previous.coreStart, previous.coreEnd).reverse();
    for (const start of candidates) {
      const prefix = this.text.slice(start, current.coreStart);
      if (this.measurer.measure(prefix) > this.overlapSize) break;
      const text = this.text.slice(start, current.coreEnd);
      const measuredSize = this.measurer.measure(text);
      if (measuredSize > this.maxChunkSize) break;
      best = { text, measuredSize, overlapLength: current.coreStart - start };
    }
    return best ?? core;
  }
}
