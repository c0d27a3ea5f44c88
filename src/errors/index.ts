// Base error class for all chunkwright errors
export class ChunkwrightError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'ChunkwrightError';
  }
}

// Invalid or contradictory options, raised before any text is processed
export class ConfigurationError extends ChunkwrightError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

// Strategy name outside the supported set
export class UnsupportedStrategyError extends ChunkwrightError {
  constructor(
    public readonly strategy: string,
    public readonly available: readonly string[]
  ) {
    super(
      `Unsupported chunking strategy: '${strategy}'. Available strategies: ${available.join(', ')}`,
      'UNSUPPORTED_STRATEGY'
    );
    this.name = 'UnsupportedStrategyError';
  }
}

// Tokenizer failure on a specific span; fatal for the whole document
export class MeasurementError extends ChunkwrightError {
  constructor(
    message: string,
    public readonly documentId?: string,
    public readonly start?: number,
    public readonly end?: number,
    public readonly tokenizerError?: unknown
  ) {
    super(message, 'MEASUREMENT_ERROR');
    this.name = 'MeasurementError';
  }

  /**
   * Returns a copy carrying the document and span the failure happened on.
   */
  withSpan(documentId: string, start: number, end: number): MeasurementError {
    return new MeasurementError(
      `${this.message} (document '${documentId}', span ${start}-${end})`,
      documentId,
      start,
      end,
      this.tokenizerError
    );
  }
}

// Validation error for schema validation failures
export class ValidationError extends ChunkwrightError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Processing error for unreadable input files
export class ProcessingError extends ChunkwrightError {
  constructor(message: string) {
    super(message, 'PROCESSING_ERROR');
    this.name = 'ProcessingError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}
