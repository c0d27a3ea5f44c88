import type { Chunk } from '../chunking/types';
import { ValidationError } from '../errors/index';
import { CHUNK_RECORD_SCHEMA, type ChunkRecord } from '../schemas/chunk-schemas';

export function toChunkRecord(chunk: Chunk): ChunkRecord {
  return {
    document_id: chunk.documentId,
    sequence_index: chunk.sequenceIndex,
    text: chunk.text,
    source_start_offset: chunk.sourceStartOffset,
    source_end_offset: chunk.sourceEndOffset,
    measured_size: chunk.measuredSize,
    oversized: chunk.oversized,
  };
}

/**
 * Validates a record read back from an export (e.g. a JSON line).
 */
export function parseChunkRecord(raw: unknown): ChunkRecord {
  const result = CHUNK_RECORD_SCHEMA.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid chunk record: ${details}`);
  }
  return result.data;
}
