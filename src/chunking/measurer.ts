import { ConfigurationError, MeasurementError, handleUnknownError } from "../errors/index";
import type { Tokenizer, Unit } from "./types";
import { countWords } from "./utils";

export interface UnitMeasurer {
  readonly unit: Unit;
  measure(text: string): number;
}

export class CharMeasurer implements UnitMeasurer {
  readonly unit = "char";

  measure(text: string): number {
    return text.length;
  }
}

export class WordMeasurer implements UnitMeasurer {
  readonly unit = "word";

  measure(text: string): number {
    return countWords(text);
  }
}

/**
 * Delegates to an injected tokenizer. The tokenizer must be pure; any throw
 * or non-count result is a MeasurementError, never a silent fallback.
 */
export class TokenMeasurer implements UnitMeasurer {
  readonly unit = "token";

  constructor(private readonly tokenizer: Tokenizer) {}

  measure(text: string): number {
    let count: unknown;
    try {
      count = this.tokenizer(text);
    } catch (e: unknown) {
      const err = handleUnknownError(e, "Tokenizer");
      throw new MeasurementError(
        `Tokenizer failed: ${err.message}`,
        undefined,
        undefined,
        undefined,
        e
      );
    }
    if (typeof count !== "number" || !Number.isInteger(count) || count < 0) {
      throw new MeasurementError(
        `Tokenizer returned ${String(count)}; expected a non-negative integer`
      );
    }
    return count;
  }
}

/**
 * Creates the measurer for a unit. Callers validate the unit/tokenizer
 * pairing beforehand (see strategy-selector).
 */
export function createMeasurer(unit: Unit, tokenizer?: Tokenizer): UnitMeasurer {
  switch (unit) {
    case "char":
      return new CharMeasurer();
    case "word":
      return new WordMeasurer();
    case "token":
      if (!tokenizer) {
        throw new ConfigurationError("Token unit requires a tokenizer");
      }
      return new TokenMeasurer(tokenizer);
  }
}
