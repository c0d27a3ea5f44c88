import { z } from 'zod';

// Export record for one chunk, keyed downstream by (document_id, sequence_index)
export const CHUNK_RECORD_SCHEMA = z.object({
  document_id: z.string(),
  sequence_index: z.number().int().nonnegative(),
  text: z.string(),
  source_start_offset: z.number().int().nonnegative(),
  source_end_offset: z.number().int().nonnegative(),
  measured_size: z.number().int().nonnegative(),
  oversized: z.boolean(),
}).refine((record) => record.source_end_offset >= record.source_start_offset, {
  message: 'source_end_offset must not precede source_start_offset',
  path: ['source_end_offset'],
});

// Inferred types
export type ChunkRecord = z.infer<typeof CHUNK_RECORD_SCHEMA>;
