import { MeasurementError } from "../errors/index";
import type { UnitMeasurer } from "./measurer";
import { nextBoundaries } from "./separators";
import type { SeparatorHierarchy } from "./types";
import { coreText } from "./utils";

export interface SplitSpan {
  start: number;
  end: number;
  /** Measured size of the span's core text. */
  size: number;
  oversized: boolean;
}

interface Group {
  start: number;
  end: number;
  size: number;
}

interface PendingSpan {
  start: number;
  end: number;
  /** First rule to try if the span is over budget. */
  ruleIndex: number;
  size?: number;
}

/**
 * Splits a document into ordered, contiguous spans that fit the budget.
 *
 * A span over budget is cut at the boundaries of the first rule (from its
 * current position in the hierarchy) that produces any; the pieces are
 * coalesced greedily left to right into groups that fit, and a group still
 * over budget continues with the next rule. Sizes are measured on core text
 * (edge line breaks removed), and groups with no visible text fold into a
 * neighbour.
 */
export class RecursiveSplitter {
  private readonly stack: PendingSpan[] = [];

  constructor(
    private readonly text: string,
    private readonly hierarchy: SeparatorHierarchy,
    private readonly measurer: UnitMeasurer,
    private readonly budget: number,
    private readonly documentId: string
  ) {
    if (text.length > 0) {
      this.stack.push({ start: 0, end: text.length, ruleIndex: 0 });
    }
  }

  /**
   * Next span in document order, or undefined when the document is
   * exhausted.
   */
  next(): SplitSpan | undefined {
    let pending = this.stack.pop();
    while (pending) {
      const size = pending.size ?? this.measureRange(pending.start, pending.end);
      if (size <= this.budget) {
        return { start: pending.start, end: pending.end, size, oversized: false };
      }

      const split = this.findBoundaries(pending);
      if (!split) {
        return { start: pending.start, end: pending.end, size, oversized: true };
      }

      const groups = this.coalesce([pending.start, ...split.boundaries, pending.end]);
      for (let i = groups.length - 1; i >= 0; i--) {
        const group = groups[i];
        if (group) this.stack.push({ ...group, ruleIndex: split.ruleIndex + 1 });
      }
      pending = this.stack.pop();
    }
    return undefined;
  }

  splitAll(): SplitSpan[] {
    const spans: SplitSpan[] = [];
    let span = this.next();
    while (span) {
      spans.push(span);
      span = this.next();
    }
    return spans;
  }

  measureRange(start: number, end: number): number {
    try {
      return this.measurer.measure(coreText(this.text, start, end));
    } catch (e: unknown) {
      if (e instanceof MeasurementError) {
        throw e.withSpan(this.documentId, start, end);
      }
      throw e;
    }
  }

  private findBoundaries(span: PendingSpan): { ruleIndex: number; boundaries: number[] } | null {
    const { rules, protectedRanges } = this.hierarchy;
    for (let ruleIndex = span.ruleIndex; ruleIndex < rules.length; ruleIndex++) {
      const rule = rules[ruleIndex];
      if (!rule) continue;
      const boundaries = nextBoundaries(this.text, rule, span.start, span.end, protectedRanges);
      if (boundaries.length > 0) return { ruleIndex, boundaries };
    }
    return null;
  }

  /**
   * Greedy left-to-right coalescing of the pieces between consecutive cuts.
   * The longest fitting run is found by galloping then binary search over
   * piece ends; a single piece over budget forms its own group.
   */
  private coalesce(cuts: readonly number[]): Group[] {
    const at = (i: number): number => cuts[i] ?? cuts[cuts.length - 1] ?? 0;
    const pieces = cuts.length - 1;
    const groups: Group[] = [];

    let i = 0;
    while (i < pieces) {
      const firstSize = this.measureRange(at(i), at(i + 1));
      if (firstSize > this.budget) {
        groups.push({ start: at(i), end: at(i + 1), size: firstSize });
        i++;
        continue;
      }

      let lo = i + 1;
      let loSize = firstSize;
      let hi = pieces + 1;
      let step = 1;
      while (lo < pieces) {
        const probe = Math.min(lo + step, pieces);
        const size = this.measureRange(at(i), at(probe));
        if (size <= this.budget) {
          lo = probe;
          loSize = size;
          step *= 2;
        } else {
          hi = probe;
          break;
        }
      }
      while (hi - lo > 1) {
        const mid = Math.floor((lo + hi) / 2);
        const size = this.measureRange(at(i), at(mid));
        if (size <= this.budget) {
          lo = mid;
          loSize = size;
        } else {
          hi = mid;
        }
      }

      groups.push({ start: at(i), end: at(lo), size: loSize });
      i = lo;
    }
    return this.absorbBlankGroups(groups);
  }

  /**
   * Folds groups with no visible text into the previous group, or else the
   * next one. A neighbour within budget only takes the blank group if it
   * stays within budget; a neighbour over budget always takes it.
   */
  private absorbBlankGroups(groups: Group[]): Group[] {
    const result: Group[] = [];
    for (let i = 0; i < groups.length; i++) {
      const group = groups[i];
      if (!group) continue;
      if (coreText(this.text, group.start, group.end).trim() !== "") {
        result.push(group);
        continue;
      }
      const previous = result[result.length - 1];
      if (previous && this.extend(previous, previous.start, group.end)) continue;
      const next = groups[i + 1];
      if (next && this.extend(next, group.start, next.end)) continue;
      result.push(group);
    }
    return result;
  }

  private extend(target: Group, start: number, end: number): boolean {
    const size = this.measureRange(start, end);
    if (size > this.budget && target.size <= this.budget) return false;
    target.start = start;
    target.end = end;
    target.size = size;
    return true;
  }
}
