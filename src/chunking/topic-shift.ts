import STOP_WORD_LIST from "./data/stop-words.json";
import { nextBoundaries } from "./separators";
import type { ComputedRule, PatternRule } from "./types";

const STOP_WORDS: ReadonlySet<string> = new Set(STOP_WORD_LIST);

export interface TopicShiftOptions {
  /** Sentences compared on each side of a candidate boundary. */
  window: number;
  /** Cosine distance above which a boundary counts as a topic shift. */
  threshold: number;
}

type TermVector = Map<string, number>;

export function termVector(text: string): TermVector {
  const vector: TermVector = new Map();
  for (const term of text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []) {
    if (STOP_WORDS.has(term)) continue;
    vector.set(term, (vector.get(term) ?? 0) + 1);
  }
  return vector;
}

function addInto(target: TermVector, source: TermVector): void {
  for (const [term, count] of source) {
    target.set(term, (target.get(term) ?? 0) + count);
  }
}

function norm(vector: TermVector): number {
  let sum = 0;
  for (const count of vector.values()) sum += count * count;
  return Math.sqrt(sum);
}

/**
 * Cosine distance between two term vectors; 0 when either side has no
 * content words.
 */
export function cosineDistance(a: TermVector, b: TermVector): number {
  const normA = norm(a);
  const normB = norm(b);
  if (normA === 0 || normB === 0) return 0;
  let dot = 0;
  for (const [term, count] of a) {
    dot += count * (b.get(term) ?? 0);
  }
  return 1 - dot / (normA * normB);
}

function windowVector(vectors: readonly TermVector[], from: number, to: number): TermVector {
  const combined: TermVector = new Map();
  for (let i = Math.max(0, from); i < Math.min(vectors.length, to); i++) {
    const vector = vectors[i];
    if (vector) addInto(combined, vector);
  }
  return combined;
}

/**
 * Cuts at sentence boundaries where the vocabulary of the sentences before
 * the cut drifts away from the sentences after it.
 */
export function createTopicShiftRule(sentenceRule: PatternRule, options: TopicShiftOptions): ComputedRule {
  return {
    kind: "computed",
    name: "topic-shift",
    boundaries: (text, start, end) => {
      const cuts = nextBoundaries(text, sentenceRule, start, end);
      if (cuts.length === 0) return [];

      const edges = [start, ...cuts, end];
      const vectors: TermVector[] = [];
      for (let i = 0; i < edges.length - 1; i++) {
        vectors.push(termVector(text.slice(edges[i], edges[i + 1])));
      }

      const shifts: number[] = [];
      cuts.forEach((cut, index) => {
        const sentence = index + 1; // first sentence after the cut
        const before = windowVector(vectors, sentence - options.window, sentence);
        const after = windowVector(vectors, sentence, sentence + options.window);
        if (cosineDistance(before, after) > options.threshold) shifts.push(cut);
      });
      return shifts;
    },
  };
}
